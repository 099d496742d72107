import path from "node:path";
import { fileURLToPath } from "node:url";
import { expect, test } from "vitest";
import { loadEntryPoints, mergeEntryPoints, parseEntryPoints } from "../../input/entryPoints.js";

const shippedEntryPoints = path.join(path.dirname(fileURLToPath(import.meta.url)), "../../../data/entry-points.yml");

test("the shipped entry points load", () => {
  const file = loadEntryPoints(shippedEntryPoints);

  expect(file.events).toContain("START_BEACON");
  expect(file.groups).toEqual(["NO_FUEL", "NO_FUEL_DISTRESS", "HOSTILE1", "HOSTILE2"]);
});

test("events and lists are read, either may be missing", () => {
  expect(parseEntryPoints("events:\n  - START_GAME\n  - ' NOTHING '\n")).toEqual({ events: ["START_GAME", "NOTHING"], groups: [] });
  expect(parseEntryPoints("")).toEqual({ events: [], groups: [] });
});

test("malformed lists are rejected", () => {
  expect(() => parseEntryPoints("events: START_GAME\n", "entry.yml")).toThrow('entry.yml: "events" must be a list of names');
  expect(() => parseEntryPoints("groups:\n  - 12\n", "entry.yml")).toThrow("entry.yml: groups[0] must be a non-empty string");
  expect(() => parseEntryPoints("version: 1\nevents: []\n", "entry.yml")).toThrow('entry.yml: unknown key "version"');
});

test("file entries come first and repeats are dropped", () => {
  expect(mergeEntryPoints({ events: ["START_GAME"], groups: ["NO_FUEL"] }, ["SECTOR_1_START", "START_GAME"])).toEqual([
    "START_GAME",
    "NO_FUEL",
    "SECTOR_1_START",
  ]);
});
