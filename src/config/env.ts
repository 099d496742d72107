import "dotenv/config";
import path from "node:path";
import type { Config, LogFormat, LogLevel } from "./types.js";
import { log } from "../utils/logger.js";

function opt(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : undefined;
}

function optBool(name: string, def: boolean): boolean {
  const v = opt(name);
  if (!v) return def;
  if (["1", "true", "yes", "on"].includes(v.toLowerCase())) return true;
  if (["0", "false", "no", "off"].includes(v.toLowerCase())) return false;
  throw new Error(`Invalid boolean for ${name}: ${v}`);
}

function enumOf<T extends string>(name: string, allowed: readonly T[], def: T): T {
  const v = opt(name);
  if (!v) return def;
  const match = allowed.find((candidate) => candidate === v);
  if (match) return match;
  throw new Error(`Invalid value for ${name}: ${v}. Allowed: ${allowed.join(", ")}`);
}

export function loadConfig(): Config {
  const dataDir = opt("CHEATSHEET_DATA_DIR");

  const cfg: Config = {
    data: {
      dir: dataDir ? path.resolve(dataDir) : undefined,
      entryPointsPath: opt("CHEATSHEET_ENTRY_POINTS") ?? path.join("data", "entry-points.yml"),
      vocabularyPath: opt("CHEATSHEET_VOCABULARY") ?? path.join("data", "vocabulary.yml"),
    },

    output: {
      path: opt("CHEATSHEET_OUTPUT") ?? path.join("out", "cheatsheet.html"),
      title: opt("CHEATSHEET_TITLE") ?? "FTL Cheatsheet",
      strict: optBool("CHEATSHEET_STRICT", false),
    },

    logging: {
      level: enumOf<LogLevel>("LOG_LEVEL", ["error", "warn", "info", "debug", "trace"] as const, "info"),
      scopes: opt("LOG_SCOPES")?.split(",").map((s) => s.trim()).filter(Boolean),
      format: enumOf<LogFormat>("LOG_FORMAT", ["pretty", "json"] as const, "pretty"),
    },
  };

  return cfg;
}

export function printConfigSnapshot(cfg: Config): void {
  log.debug("config snapshot", "cli", {
    CHEATSHEET_DATA_DIR: cfg.data.dir,
    CHEATSHEET_ENTRY_POINTS: cfg.data.entryPointsPath,
    CHEATSHEET_VOCABULARY: cfg.data.vocabularyPath,
    CHEATSHEET_OUTPUT: cfg.output.path,
    CHEATSHEET_TITLE: cfg.output.title,
    CHEATSHEET_STRICT: cfg.output.strict,
    LOG_LEVEL: cfg.logging.level,
    LOG_SCOPES: cfg.logging.scopes?.join(",") ?? "",
    LOG_FORMAT: cfg.logging.format,
  });
}

export const cfg = loadConfig();
