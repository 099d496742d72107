import fs from "fs";
import yaml from "yaml";
import { isRecord } from "../utils/isRecord.js";

export type EntryPointsFile = {
  events: string[];
  groups: string[];
};

const KEYS = ["events", "groups"];

function readNameList(raw: Record<string, unknown>, key: string, source: string): string[] {
  const value = raw[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new Error(`${source}: "${key}" must be a list of names`);
  }
  return value.map((name, i) => {
    if (typeof name !== "string" || name.trim() === "") {
      throw new Error(`${source}: ${key}[${i}] must be a non-empty string`);
    }
    return name.trim();
  });
}

export function parseEntryPoints(content: string, source = "entry points"): EntryPointsFile {
  const raw: unknown = yaml.parse(content);
  if (raw === null || raw === undefined) return { events: [], groups: [] };
  if (!isRecord(raw)) {
    throw new Error(`${source}: expected a mapping with "events" and "groups"`);
  }
  const unknown = Object.keys(raw).find((key) => !KEYS.includes(key));
  if (unknown !== undefined) {
    throw new Error(`${source}: unknown key "${unknown}"`);
  }
  return {
    events: readNameList(raw, "events", source),
    groups: readNameList(raw, "groups", source),
  };
}

/**
 * Load the hard-coded entry points. Names are resolved later, against the built graph.
 */
export function loadEntryPoints(filePath: string): EntryPointsFile {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Entry points file not found: ${filePath}`);
  }
  return parseEntryPoints(fs.readFileSync(filePath, "utf-8"), filePath);
}

/** File entries first, then the ones found in the data folder, without repeats. */
export function mergeEntryPoints(file: EntryPointsFile, discovered: readonly string[]): string[] {
  return [...new Set([...file.events, ...file.groups, ...discovered])];
}
