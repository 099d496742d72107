import { expect, test } from "vitest";
import { resolveRoots } from "../../graph/roots.js";
import { eventGroup, registryOf, storyEvent } from "../fixtures.js";

test("lists given as entry points contribute their events, recursively", () => {
  const registry = registryOf({
    events: [storyEvent("START"), storyEvent("DEBRIS"), storyEvent("MERCHANT"), storyEvent("evt-1", { synthetic: true })],
    groups: [eventGroup("SECTOR_EVENTS", ["DEBRIS", "SHOPS", "evt-1"]), eventGroup("SHOPS", ["MERCHANT", "SECTOR_EVENTS"])],
  });

  const pins = resolveRoots(registry, ["START", "SECTOR_EVENTS", "START"], []);

  expect(pins.roots).toEqual(["START", "DEBRIS", "MERCHANT"]);
  expect([...pins.pinnedSet]).toEqual(["event:START", "event:DEBRIS", "event:MERCHANT"]);
});

test("an entry point shared by an event and a list is the event", () => {
  const registry = registryOf({
    events: [storyEvent("HOSTILE1"), storyEvent("PIRATE_AMBUSH")],
    groups: [eventGroup("HOSTILE1", ["PIRATE_AMBUSH"])],
  });

  expect(resolveRoots(registry, ["HOSTILE1"], []).roots).toEqual(["HOSTILE1"]);
});

test("quest targets are pinned but are not roots", () => {
  const registry = registryOf({
    events: [storyEvent("START"), storyEvent("QUEST_EVENT")],
    groups: [eventGroup("QUEST_LIST", ["QUEST_EVENT"])],
  });

  const pins = resolveRoots(registry, ["START"], [{ kind: "group", name: "QUEST_LIST" }]);

  expect(pins.roots).toEqual(["START"]);
  expect(pins.rootSet.has("QUEST_EVENT")).toBe(false);
  expect([...pins.pinnedSet]).toEqual(["event:START", "group:QUEST_LIST"]);
});

test("an unknown entry point is fatal", () => {
  expect(() => resolveRoots(registryOf({}), ["NO_SUCH_EVENT"], [])).toThrow(
    'Unresolved reference "NO_SUCH_EVENT" (insideGroup)',
  );
});
