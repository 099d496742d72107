import fs from "fs";
import yaml from "yaml";
import { isRecord } from "../utils/isRecord.js";

/** Hardcoded names the data files only mention by id. */
export type Vocabulary = {
  species: Map<string, string>;
  skills: Map<string, string>;
  systems: Map<string, string>;
  damageEffects: Map<string, string>;
  resources: Map<string, string>;
  autoRewardKinds: Map<string, string>;
  autoRewardLevels: Map<string, string>;
  unlockShips: Map<string, string>;
  /** blueprint lists from the vocabulary file, plus titles from blueprints.xml once merged */
  blueprints: Map<string, string>;
};

export type VocabularyTable = Exclude<keyof Vocabulary, "blueprints">;

const TABLES: ReadonlyArray<VocabularyTable> = [
  "species",
  "skills",
  "systems",
  "damageEffects",
  "resources",
  "autoRewardKinds",
  "autoRewardLevels",
  "unlockShips",
];

const BLUEPRINT_LISTS = "blueprintLists";

function readTable(raw: Record<string, unknown>, key: string, source: string): Map<string, string> {
  const table = raw[key];
  if (!isRecord(table)) {
    throw new Error(`${source}: missing table "${key}"`);
  }
  const out = new Map<string, string>();
  for (const [id, name] of Object.entries(table)) {
    if (typeof name !== "string" && typeof name !== "number") {
      throw new Error(`${source}: ${key}.${id} must be a string`);
    }
    out.set(id, String(name));
  }
  return out;
}

/** Parses a vocabulary document. Every table must be present, even if empty, and no other key may be. */
export function parseVocabulary(content: string, source = "vocabulary"): Vocabulary {
  const raw: unknown = yaml.parse(content);
  if (!isRecord(raw)) {
    throw new Error(`${source}: expected a mapping at the top level`);
  }

  const unknown = Object.keys(raw).find((key) => key !== BLUEPRINT_LISTS && !TABLES.some((table) => table === key));
  if (unknown !== undefined) {
    throw new Error(`${source}: unknown table "${unknown}"`);
  }

  const tables = new Map<VocabularyTable, Map<string, string>>();
  for (const table of TABLES) {
    tables.set(table, readTable(raw, table, source));
  }
  const pick = (table: VocabularyTable): Map<string, string> => tables.get(table) ?? new Map<string, string>();

  return {
    species: pick("species"),
    skills: pick("skills"),
    systems: pick("systems"),
    damageEffects: pick("damageEffects"),
    resources: pick("resources"),
    autoRewardKinds: pick("autoRewardKinds"),
    autoRewardLevels: pick("autoRewardLevels"),
    unlockShips: pick("unlockShips"),
    blueprints: readTable(raw, BLUEPRINT_LISTS, source),
  };
}

export function loadVocabulary(filePath: string): Vocabulary {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Vocabulary file not found: ${filePath}`);
  }
  return parseVocabulary(fs.readFileSync(filePath, "utf-8"), filePath);
}

/** Adds blueprint titles to the vocabulary. A blueprint id may only be named once. */
export function withBlueprintTitles(vocabulary: Vocabulary, titles: ReadonlyMap<string, string>): Vocabulary {
  const blueprints = new Map(vocabulary.blueprints);
  for (const [id, title] of titles) {
    if (blueprints.has(id)) {
      throw new Error(`Duplicate blueprint: ${id}`);
    }
    blueprints.set(id, title);
  }
  return { ...vocabulary, blueprints };
}

/** Looks an id up in one table. Unknown ids abort the run. */
export function spell(vocabulary: Vocabulary, table: keyof Vocabulary, id: string): string {
  const name = vocabulary[table].get(id);
  if (name === undefined) {
    throw new Error(`Unknown ${table} id: ${id}`);
  }
  return name;
}
