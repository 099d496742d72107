#!/usr/bin/env node
/**
 * build-cheatsheet.ts: Generate the HTML cheatsheet from an FTL data folder.
 *
 * CLI:
 *   npx tsx src/tools/build-cheatsheet.ts <DATADIR> [--out FILE] [--entry-points FILE]
 *                                          [--vocabulary FILE] [--title TEXT] [--strict]
 *
 * Flags:
 *   --out           Output HTML file (default: CHEATSHEET_OUTPUT or out/cheatsheet.html)
 *   --entry-points  YAML list of hard-coded entry points (default: data/entry-points.yml)
 *   --vocabulary    YAML name tables (default: data/vocabulary.yml)
 *   --title         Page title
 *   --strict        Exit non-zero when any diagnostic is reported
 *
 * DATADIR may also come from CHEATSHEET_DATA_DIR.
 */

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { cfg, printConfigSnapshot } from "../config/env.js";
import type { Config } from "../config/types.js";
import { log } from "../utils/logger.js";
import { loadEntryPoints, mergeEntryPoints } from "../input/entryPoints.js";
import { loadDataDirectory } from "../input/loadDataDir.js";
import { diagnosticCount, runCheatsheetPipeline, type Diagnostics, type PipelineResult } from "../pipeline.js";
import { renderHtmlDocument } from "../render/htmlDocument.js";
import { loadVocabulary, withBlueprintTitles } from "../render/vocabulary.js";

const cliLog = log.withScope("cli");

export type CliOptions = {
  dataDir: string | null;
  out: string;
  entryPoints: string;
  vocabulary: string;
  title: string;
  strict: boolean;
};

const USAGE =
  "Usage:\n" +
  "  build-cheatsheet <DATADIR> [--out FILE] [--entry-points FILE] [--vocabulary FILE] [--title TEXT] [--strict]";

export function parseArgs(argv: readonly string[], config: Config): CliOptions {
  const options: CliOptions = {
    dataDir: config.data.dir ?? null,
    out: config.output.path,
    entryPoints: config.data.entryPointsPath,
    vocabulary: config.data.vocabularyPath,
    title: config.output.title,
    strict: config.output.strict,
  };

  const valueOf = (flag: string, value: string | undefined): string => {
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`${flag} needs a value\n${USAGE}`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--out") {
      options.out = valueOf(arg, argv[++i]);
    } else if (arg === "--entry-points") {
      options.entryPoints = valueOf(arg, argv[++i]);
    } else if (arg === "--vocabulary") {
      options.vocabulary = valueOf(arg, argv[++i]);
    } else if (arg === "--title") {
      options.title = valueOf(arg, argv[++i]);
    } else if (arg === "--strict") {
      options.strict = true;
    } else if (arg !== undefined && arg.startsWith("--")) {
      throw new Error(`Unknown flag: ${arg}\n${USAGE}`);
    } else if (arg !== undefined) {
      options.dataDir = arg;
    }
  }

  return options;
}

export type CheatsheetBuild = {
  html: string;
  result: PipelineResult;
};

/** Everything but the file write: load, run the pipeline, serialize. */
export function buildCheatsheet(options: CliOptions): CheatsheetBuild {
  if (options.dataDir === null) {
    throw new Error(`Missing DATADIR\n${USAGE}`);
  }

  const data = loadDataDirectory(path.resolve(options.dataDir));
  const vocabulary = withBlueprintTitles(loadVocabulary(options.vocabulary), data.blueprintTitles);
  const entryPoints = mergeEntryPoints(loadEntryPoints(options.entryPoints), data.discoveredEntryPoints);

  const result = runCheatsheetPipeline({
    documents: data.documents.map((doc) => doc.nodes),
    texts: data.texts,
    knownNames: data.knownNames,
    entryPoints,
  });

  const html = renderHtmlDocument(result.render, vocabulary, { title: options.title });
  return { html, result };
}

export function reportDiagnostics(diagnostics: Diagnostics): void {
  for (const shape of diagnostics.unknownShapes) {
    cliLog.warn(`${shape.attribute === null ? "unknown tag" : "unknown attr"} ${shape.example}`);
  }
  for (const warning of diagnostics.warnings) cliLog.warn(`${warning.entity}: ${warning.message}`);
  for (const key of diagnostics.unreached) cliLog.warn(`unreached ${key}`);
  for (const anchor of diagnostics.brokenLinks) cliLog.warn(`broken link #${anchor}`);
  for (const key of diagnostics.duplicates) cliLog.warn(`rendered more than once: ${key}`);
}

async function main(): Promise<void> {
  log.configure(cfg.logging);
  printConfigSnapshot(cfg);
  const options = parseArgs(process.argv.slice(2), cfg);

  const { html, result } = buildCheatsheet(options);

  await fs.promises.mkdir(path.dirname(path.resolve(options.out)), { recursive: true });
  await fs.promises.writeFile(options.out, html, "utf-8");

  reportDiagnostics(result.diagnostics);
  const issues = diagnosticCount(result.diagnostics);
  cliLog.info(`Wrote ${options.out}`, {
    ...result.stats,
    diagnostics: issues,
  });

  if (options.strict && issues > 0) {
    cliLog.error(`${issues} diagnostic(s) reported in strict mode`);
    process.exit(1);
  }
}

const invokedPath = process.argv[1];
if (invokedPath !== undefined && fs.realpathSync(invokedPath) === fileURLToPath(import.meta.url)) {
  main().catch((err) => {
    cliLog.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
}
