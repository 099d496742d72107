import fs from "fs";
import path from "path";
import { log } from "../utils/logger.js";
import { KnownNames } from "../graph/registry.js";
import { attr, child, childrenOf, requireAttr, type StructuredNode } from "./structuredNode.js";
import { TextResolver } from "./textResolver.js";
import { parseXmlDocument } from "./xmlNodes.js";

const inputLog = log.withScope("input");

const OVERRIDE_PREFIX = "OVERRIDE_";
const TRANSLATION_FILE = /^text_.*\.xml$/i;
const BLUEPRINTS_FILE = "blueprints.xml";
const SECTORS_FILE = "sector_data.xml";
const BOSS_FILE = "events_boss.xml";
const BLUEPRINT_TAGS = ["augBlueprint", "droneBlueprint", "weaponBlueprint"];

export type DataDocument = {
  file: string;
  nodes: StructuredNode[];
};

export type DataDirectory = {
  /** every *.xml file, in sorted file-name order */
  documents: DataDocument[];
  texts: TextResolver;
  knownNames: KnownNames;
  /** blueprint id -> English title */
  blueprintTitles: Map<string, string>;
  /** sector start events, sector event lists and last-stand events */
  discoveredEntryPoints: string[];
};

/** Names of everything the builder will create, gathered before it runs. */
export function scanKnownNames(documents: readonly StructuredNode[][]): KnownNames {
  const known = new KnownNames();
  for (const nodes of documents) {
    for (const node of nodes) {
      const name = attr(node, "name");
      if (name === undefined) continue;
      if (node.tag === "event") known.events.add(name);
      if (node.tag === "ship") known.ships.add(name);
      if (node.tag === "eventList") {
        known.groups.add(name.startsWith(OVERRIDE_PREFIX) ? name.slice(OVERRIDE_PREFIX.length) : name);
      }
    }
  }
  return known;
}

function readBlueprintTitles(nodes: readonly StructuredNode[], texts: TextResolver): Map<string, string> {
  const titles = new Map<string, string>();
  for (const node of nodes) {
    if (!BLUEPRINT_TAGS.includes(node.tag)) continue;
    const id = requireAttr(node, "name");
    if (titles.has(id)) {
      throw new Error(`Duplicate blueprint: ${id}`);
    }
    const title = child(node, "title");
    titles.set(id, title ? texts.resolveText(title) : id);
  }
  return titles;
}

function discoverSectorEntryPoints(nodes: readonly StructuredNode[]): string[] {
  const out: string[] = [];
  for (const sector of nodes) {
    if (sector.tag !== "sectorDescription") continue;
    const start = child(sector, "startEvent");
    if (start?.text) out.push(start.text);
    for (const list of childrenOf(sector, "event")) {
      out.push(requireAttr(list, "name"));
    }
  }
  return out;
}

function discoverBossEntryPoints(nodes: readonly StructuredNode[]): string[] {
  return nodes.filter((node) => node.tag === "event").map((node) => requireAttr(node, "name"));
}

/**
 * Reads an FTL data folder: events, translations, text lists, blueprint names and the
 * entry points the folder itself reveals.
 */
export function loadDataDirectory(dir: string): DataDirectory {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new Error(`Data directory not found: ${dir}`);
  }

  const files = fs
    .readdirSync(dir)
    .filter((file) => file.toLowerCase().endsWith(".xml"))
    .sort();

  const documents: DataDocument[] = files.map((file) => {
    const fullPath = path.join(dir, file);
    return { file, nodes: parseXmlDocument(fs.readFileSync(fullPath, "utf-8"), fullPath) };
  });
  const byFile = new Map(documents.map((doc) => [doc.file, doc.nodes]));

  const texts = new TextResolver();
  for (const doc of documents) {
    if (TRANSLATION_FILE.test(doc.file)) texts.addTranslationDocument(doc.nodes);
    for (const node of doc.nodes) {
      if (node.tag === "textList") texts.addTextList(node);
    }
  }

  const optional = (file: string): StructuredNode[] => {
    const nodes = byFile.get(file);
    if (nodes === undefined) {
      inputLog.debug(`${file} not found in ${dir}, skipping`);
      return [];
    }
    return nodes;
  };

  const blueprintTitles = readBlueprintTitles(optional(BLUEPRINTS_FILE), texts);
  const discoveredEntryPoints = [
    ...discoverSectorEntryPoints(optional(SECTORS_FILE)),
    ...discoverBossEntryPoints(optional(BOSS_FILE)),
  ];
  const knownNames = scanKnownNames(documents.map((doc) => doc.nodes));

  inputLog.info(`Loaded ${documents.length} data files from ${dir}`, {
    translations: texts.translationCount,
    blueprints: blueprintTitles.size,
    events: knownNames.events.size,
    groups: knownNames.groups.size,
    ships: knownNames.ships.size,
  });

  return { documents, texts, knownNames, blueprintTitles, discoveredEntryPoints };
}
