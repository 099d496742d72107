import path from "node:path";
import os from "node:os";
import { expect, test } from "vitest";
import { loadDataDirectory } from "../../input/loadDataDir.js";
import { SAMPLE_FILES, writeDataDir } from "../sampleData.js";

test("a data folder yields documents, texts, names, blueprints and entry points", () => {
  const data = loadDataDirectory(writeDataDir());

  expect(data.documents.map((d) => d.file)).toEqual([
    "blueprints.xml",
    "events.xml",
    "events_boss.xml",
    "sector_data.xml",
    "text_events.xml",
  ]);
  expect([...data.knownNames.events]).toEqual(["START", "AMBUSH", "BOSS_1"]);
  expect([...data.knownNames.groups]).toEqual(["POOL"]);
  expect([...data.knownNames.ships]).toEqual(["PIRATE"]);
  expect(data.discoveredEntryPoints).toEqual(["START", "POOL", "BOSS_1"]);
  expect([...data.blueprintTitles]).toEqual([["LASER_1", "Basic Laser"]]);
  expect(data.texts.alternatives("GREETINGS")).toEqual(["Hi", "Hello there"]);
});

test("optional files may be absent", () => {
  const eventsOnly = SAMPLE_FILES["events.xml"] ?? "";
  const data = loadDataDirectory(writeDataDir({ "events.xml": eventsOnly.replace('<text id="HELLO"/>', "<text>Hey</text>") }));

  expect(data.blueprintTitles.size).toBe(0);
  expect(data.discoveredEntryPoints).toEqual([]);
  expect(data.texts.translationCount).toBe(0);
});

test("a translation key defined in two files is fatal", () => {
  const dir = writeDataDir({
    "text_events.xml": `<text name="HELLO">Hello there</text>`,
    "text_misc.xml": `<text name="HELLO">Hello again</text>`,
  });

  expect(() => loadDataDirectory(dir)).toThrow("Duplicate translation key: HELLO");
});

test("a missing folder is fatal", () => {
  const dir = path.join(os.tmpdir(), "ftl-cheatsheet-no-such-folder");

  expect(() => loadDataDirectory(dir)).toThrow(`Data directory not found: ${dir}`);
});
