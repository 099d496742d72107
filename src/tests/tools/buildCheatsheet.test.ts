import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, expect, test, vi } from "vitest";
import type { Config } from "../../config/types.js";
import { loadDataDirectory } from "../../input/loadDataDir.js";
import { TextResolver } from "../../input/textResolver.js";
import { parseXmlDocument } from "../../input/xmlNodes.js";
import { diagnosticCount, runCheatsheetPipeline } from "../../pipeline.js";
import { buildCheatsheet, parseArgs, reportDiagnostics } from "../../tools/build-cheatsheet.js";
import { log } from "../../utils/logger.js";
import { writeDataDir } from "../sampleData.js";

const shippedVocabulary = path.join(path.dirname(fileURLToPath(import.meta.url)), "../../../data/vocabulary.yml");

const config: Config = {
  data: { dir: undefined, entryPointsPath: "data/entry-points.yml", vocabularyPath: "data/vocabulary.yml" },
  output: { path: "out/cheatsheet.html", title: "FTL Cheatsheet", strict: false },
  logging: { level: "error", format: "pretty" },
};

afterEach(() => {
  log.configure({ level: "error", format: "pretty" });
  vi.restoreAllMocks();
});

test("flags override configuration and the positional argument is the data folder", () => {
  expect(parseArgs(["game-data", "--out", "sheet.html", "--title", "My Sheet", "--strict"], config)).toEqual({
    dataDir: "game-data",
    out: "sheet.html",
    entryPoints: "data/entry-points.yml",
    vocabulary: "data/vocabulary.yml",
    title: "My Sheet",
    strict: true,
  });
  expect(() => parseArgs(["--out"], config)).toThrow("--out needs a value");
  expect(() => parseArgs(["--verbose"], config)).toThrow("Unknown flag: --verbose");
});

test("the pipeline runs every stage over a data folder", () => {
  const data = loadDataDirectory(writeDataDir());
  const result = runCheatsheetPipeline({
    documents: data.documents.map((d) => d.nodes),
    texts: data.texts,
    entryPoints: data.discoveredEntryPoints,
  });

  expect(result.stats).toEqual({
    events: 5,
    groups: 1,
    ships: 1,
    roots: 2,
    pinned: 2,
    groupsChanged: 0,
    casesDropped: 0,
    eventBlocks: 3,
    fightBlocks: 1,
  });
  expect(result.render.events.map((b) => b.anchor)).toEqual(["event-BOSS_1", "list-POOL", "event-START"]);
  expect(diagnosticCount(result.diagnostics)).toBe(0);
});

test("an overridden pool leaves its nested nameless events unreported", () => {
  const nodes = parseXmlDocument(`
<event name="NEW"/>
<eventList name="POOL">
  <event>
    <text>Old.</text>
    <choice>
      <text>Go.</text>
      <event><text>Deeper.</text></event>
    </choice>
  </event>
</eventList>
<eventList name="OVERRIDE_POOL">
  <event load="NEW"/>
</eventList>
`);
  const result = runCheatsheetPipeline({ documents: [nodes], texts: new TextResolver(), entryPoints: ["POOL"] });

  expect(result.render.events.map((b) => b.anchor)).toEqual(["event-NEW", "list-POOL"]);
  expect(result.diagnostics.unreached).toEqual([]);
  expect(diagnosticCount(result.diagnostics)).toBe(0);
});

test("the cheatsheet links, inlines and spells out outcomes", () => {
  const dir = writeDataDir();
  const entryPoints = path.join(dir, "entry-points.yml");
  fs.writeFileSync(entryPoints, "events: []\ngroups: []\n", "utf8");

  const { html } = buildCheatsheet({
    dataDir: dir,
    out: path.join(dir, "out.html"),
    entryPoints,
    vocabulary: shippedVocabulary,
    title: "Test Sheet",
    strict: false,
  });
  const lines = html.split("\n");

  expect(lines).toContain('<h2 id="list-POOL">POOL</h2>');
  expect(lines).toContain('<ul class="result"><li>Go to <a href="#event-START">START</a></ul>');
  expect(lines).toContain("<li><em>Look around.</em>");
  expect(lines).toContain('<div class="inner"><p>You find some scrap.</p></div>');
  expect(lines).toContain('<ul class="result"><li>+10 <strong>Scrap</strong></ul>');
  expect(lines).toContain('<ul class="result"><li><strong>Fight</strong> a <a href="#ship-PIRATE">PIRATE</a></ul>');
  expect(lines).toContain('<ul class="result"><li><strong>Weapon</strong> (Basic Laser)</ul>');
  expect(lines).toContain('<ul class="result"><li><strong>High</strong> scrap and low resources</ul>');
  expect(lines).toContain('<h2 id="ship-PIRATE">PIRATE</h2>');
});

test("a data folder is required", () => {
  expect(() => buildCheatsheet({ ...parseArgs([], config) })).toThrow("Missing DATADIR");
});

test("diagnostics are logged once, after the run", () => {
  const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
  log.configure({ level: "warn", format: "json" });

  const nodes = parseXmlDocument(`
<event name="START">
  <text>Hello.</text>
  <hologram/>
  <choice><text>Wait.</text></choice>
</event>
`);
  const result = runCheatsheetPipeline({ documents: [nodes], texts: new TextResolver(), entryPoints: ["START"] });
  expect(warn).not.toHaveBeenCalled();

  reportDiagnostics(result.diagnostics);
  const messages = warn.mock.calls.map((call) => {
    const entry: unknown = JSON.parse(String(call[0]));
    return typeof entry === "object" && entry !== null && "message" in entry ? entry.message : null;
  });
  expect(messages).toEqual(["unknown tag event.hologram", 'START: empty choice "Wait."']);
});
