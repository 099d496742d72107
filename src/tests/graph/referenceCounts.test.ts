import { expect, test } from "vitest";
import { countReferences, inDegreeOf } from "../../graph/referenceCounts.js";
import { choice, enemyShip, eventGroup, registryOf, storyEvent } from "../fixtures.js";

test("choices count against the list and list entries against the event of a shared name", () => {
  const registry = registryOf({
    events: [storyEvent("ROOT", { outcomes: [], choices: [choice("Jump", "NEBULA")] }), storyEvent("NEBULA")],
    groups: [eventGroup("NEBULA", ["NEBULA"])],
  });

  const counts = countReferences(registry);

  expect(inDegreeOf(counts, { kind: "group", name: "NEBULA" })).toBe(1);
  expect(inDegreeOf(counts, { kind: "event", name: "NEBULA" })).toBe(1);
  expect(inDegreeOf(counts, { kind: "event", name: "ROOT" })).toBe(0);
});

test("every textual edge counts, including repeats", () => {
  const registry = registryOf({
    events: [
      storyEvent("HUB", { outcomes: [], choices: [choice("Left", "END"), choice("Right", "END")] }),
      storyEvent("END"),
      storyEvent("AMBUSH", { fight: "PIRATE" }),
      storyEvent("WRECK"),
    ],
    ships: [enemyShip("PIRATE", { destroyed: "WRECK", surrender: "END" })],
  });

  const counts = countReferences(registry);

  expect(counts.inDegree.get("event:END")).toBe(3);
  expect(counts.inDegree.get("event:WRECK")).toBe(1);
  expect(counts.inDegree.get("ship:PIRATE")).toBe(1);
  expect(counts.inDegree.get("event:AMBUSH")).toBe(0);
});

test("self edges are recorded apart and not counted", () => {
  const registry = registryOf({
    events: [storyEvent("LOOP", { outcomes: [], choices: [choice("Again", "LOOP"), choice("Stop", null)] })],
  });

  const counts = countReferences(registry);

  expect(counts.inDegree.get("event:LOOP")).toBe(0);
  expect([...counts.selfReferencing]).toEqual(["event:LOOP"]);
});

test("quest markers are not edges", () => {
  const registry = registryOf({
    events: [
      storyEvent("GIVER", { outcomes: [{ type: "quest", target: { name: "QUEST", context: "topLevel" } }] }),
      storyEvent("QUEST"),
    ],
  });

  expect(inDegreeOf(countReferences(registry), { kind: "event", name: "QUEST" })).toBe(0);
});

test("a reference to nothing is fatal", () => {
  const registry = registryOf({ events: [storyEvent("BROKEN", { outcomes: [], choices: [choice("Go", "NOWHERE")] })] });

  expect(() => countReferences(registry)).toThrow('Unresolved reference "NOWHERE" (topLevel)');
});
