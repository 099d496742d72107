import { expect, test } from "vitest";
import { buildGraph } from "../../build/buildGraph.js";
import { scanKnownNames } from "../../input/loadDataDir.js";
import type { StructuredNode } from "../../input/structuredNode.js";
import { TextResolver } from "../../input/textResolver.js";
import { el } from "../fixtures.js";

function build(...documents: StructuredNode[][]) {
  return buildGraph({ documents, texts: new TextResolver(), knownNames: scanKnownNames(documents) });
}

test("aliases stand for the loaded event and create nothing", () => {
  const result = build([
    el("event", { name: "MERCHANT" }, el("store")),
    el("eventList", { name: "SHOPS" }, el("event", { load: "MERCHANT" }), el("event", { load: "MERCHANT" })),
  ]);

  expect([...result.registry.events.keys()]).toEqual(["MERCHANT"]);
  expect(result.registry.groups.get("SHOPS")?.cases).toEqual([
    { weight: 1, target: { name: "MERCHANT", context: "insideGroup" } },
    { weight: 1, target: { name: "MERCHANT", context: "insideGroup" } },
  ]);
});

test("nested events are named after their children", () => {
  const result = build([
    el(
      "event",
      { name: "ROOT" },
      el("choice", {}, el("text", {}, "Go"), el("event", {}, el("choice", {}, el("text", {}, "Deeper"), el("event")))),
    ),
  ]);
  const { events } = result.registry;

  expect(events.get("ROOT")?.choices?.[0]?.target).toEqual({ name: "evt-2", context: "topLevel" });
  expect(events.get("evt-2")?.choices?.[0]?.target).toEqual({ name: "evt-1", context: "topLevel" });
  expect(events.get("evt-1")?.outcomes).toEqual([{ type: "nothing" }]);
  expect(events.get("evt-1")?.synthetic).toBe(true);
  expect(events.get("ROOT")?.outcomes).toEqual([]);
});

test("a second definition of an event is fatal", () => {
  expect(() => build([el("event", { name: "TWICE" })], [el("event", { name: "TWICE" })])).toThrow(
    "Duplicate event name: TWICE",
  );
});

test("override lists apply after every document, whatever the file order", () => {
  const result = build(
    [el("eventList", { name: "OVERRIDE_POOL" }, el("event", { load: "NEW" }))],
    [el("eventList", { name: "POOL" }, el("event", { load: "OLD" })), el("event", { name: "OLD" }), el("event", { name: "NEW" })],
  );

  expect(result.registry.groups.get("POOL")?.cases.map((c) => c.target.name)).toEqual(["NEW"]);
  expect(result.registry.groups.has("OVERRIDE_POOL")).toBe(false);
});

test("a resource range crossing zero is fatal", () => {
  const doc = [
    el("event", { name: "BAD_TRADE" }, el("item_modify", {}, el("item", { type: "scrap", min: "-2", max: "3" }))),
  ];

  expect(() => build(doc)).toThrow("Nonsensical resource range for scrap: -2..3");
});

test("unknown tags and attributes are reported once each", () => {
  const result = build([
    el("event", { name: "A" }, el("mystery"), el("text", { colour: "red" }, "Hi")),
    el("event", { name: "B" }, el("mystery"), el("text", { colour: "blue" }, "Hi")),
  ]);

  expect(result.unknownShapes).toEqual([
    { parentKind: "event", tag: "mystery", attribute: null, example: "event.mystery" },
    { parentKind: "event", tag: "text", attribute: "colour", example: "event.text.colour" },
  ]);
});

test("quest markers are classified list-first against every known name", () => {
  const result = build(
    [el("event", { name: "GIVER" }, el("quest", { event: "QUEST" }))],
    [el("eventList", { name: "QUEST" }, el("event", { load: "QUEST" })), el("event", { name: "QUEST" })],
  );

  expect(result.questTargets).toEqual([{ kind: "group", name: "QUEST" }]);
  expect(result.registry.events.get("GIVER")?.outcomes).toEqual([
    { type: "quest", target: { name: "QUEST", context: "topLevel" } },
  ]);
});

test("a quest marker naming nothing is fatal", () => {
  expect(() => build([el("event", { name: "GIVER" }, el("quest", { event: "LOST" }))])).toThrow(
    'Unresolved quest target "LOST" (topLevel)',
  );
});

test("ships keep their outcome slots and events keep their fight", () => {
  const result = build(
    [el("event", { name: "AMBUSH" }, el("ship", { load: "PIRATE", hostile: "true" }))],
    [el("ship", { name: "PIRATE" }, el("destroyed", {}, el("text", {}, "It breaks apart.")), el("gotaway", { load: "ESCAPED" }))],
    [el("event", { name: "ESCAPED" })],
  );

  expect(result.registry.events.get("AMBUSH")?.fight).toBe("PIRATE");
  expect(result.registry.ships.get("PIRATE")?.slots).toEqual({
    destroyed: { name: "evt-1", context: "topLevel" },
    gotaway: { name: "ESCAPED", context: "topLevel" },
  });
  expect(result.registry.events.get("evt-1")?.text).toEqual({ kind: "single", text: "It breaks apart." });
});

test("a bare hostile ship in a nested event fights the ship loaded above it", () => {
  const result = build(
    [
      el(
        "event",
        { name: "HAIL" },
        el("ship", { load: "TRADER", hostile: "false" }),
        el("choice", {}, el("text", {}, "Attack"), el("event", {}, el("ship", { hostile: "true" }))),
      ),
    ],
    [el("ship", { name: "TRADER" })],
  );

  expect(result.registry.events.get("HAIL")?.fight).toBeNull();
  expect(result.registry.events.get("evt-1")?.fight).toBe("TRADER");
});

test("choices together with a fight raise a warning", () => {
  const result = build([
    el(
      "event",
      { name: "ODD" },
      el("ship", { load: "PIRATE", hostile: "true" }),
      el("choice", {}, el("text", {}, "Wait"), el("event")),
    ),
    el("ship", { name: "PIRATE" }),
  ]);

  expect(result.warnings).toEqual([
    { kind: "suspiciousEvent", entity: "ODD", message: "event has both choices and a fight against PIRATE" },
  ]);
});
