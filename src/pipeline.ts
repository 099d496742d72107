import { log } from "./utils/logger.js";
import { buildGraph, type BuildWarning } from "./build/buildGraph.js";
import type { UnknownShape } from "./build/unknownShapes.js";
import { canonicalizeGroups } from "./graph/canonicalize.js";
import { countReferences } from "./graph/referenceCounts.js";
import type { EntityRegistry } from "./graph/registry.js";
import { resolveRoots } from "./graph/roots.js";
import type { NameIndex } from "./graph/types.js";
import { scanKnownNames } from "./input/loadDataDir.js";
import type { StructuredNode } from "./input/structuredNode.js";
import type { TextSource } from "./input/textResolver.js";
import { renderGraph } from "./render/renderGraph.js";
import type { RenderResult } from "./render/renderTypes.js";

const pipelineLog = log.withScope("cli");

export type PipelineInput = {
  documents: StructuredNode[][];
  texts: TextSource;
  entryPoints: readonly string[];
  /** pre-scanned names; scanned from the documents when omitted */
  knownNames?: NameIndex;
};

export type Diagnostics = {
  unknownShapes: UnknownShape[];
  warnings: BuildWarning[];
  unreached: string[];
  brokenLinks: string[];
  duplicates: string[];
};

export type PipelineStats = {
  events: number;
  groups: number;
  ships: number;
  roots: number;
  pinned: number;
  groupsChanged: number;
  casesDropped: number;
  eventBlocks: number;
  fightBlocks: number;
};

export type PipelineResult = {
  registry: EntityRegistry;
  render: RenderResult;
  diagnostics: Diagnostics;
  stats: PipelineStats;
};

export function diagnosticCount(diagnostics: Diagnostics): number {
  return (
    diagnostics.unknownShapes.length +
    diagnostics.warnings.length +
    diagnostics.unreached.length +
    diagnostics.brokenLinks.length +
    diagnostics.duplicates.length
  );
}

/**
 * build -> canonicalize -> count -> roots -> render. Each stage finishes before the next
 * starts; fatal input errors throw out of the stage that finds them.
 */
export function runCheatsheetPipeline(input: PipelineInput): PipelineResult {
  const knownNames = input.knownNames ?? scanKnownNames(input.documents);

  const built = buildGraph({ documents: input.documents, texts: input.texts, knownNames });
  const { registry } = built;

  const canon = canonicalizeGroups(registry);
  const counts = countReferences(registry);
  const pins = resolveRoots(registry, input.entryPoints, built.questTargets);
  const render = renderGraph({ registry, counts, pins });

  const diagnostics: Diagnostics = {
    unknownShapes: built.unknownShapes,
    warnings: built.warnings,
    ...render.diagnostics,
  };

  const stats: PipelineStats = {
    events: registry.events.size,
    groups: registry.groups.size,
    ships: registry.ships.size,
    roots: pins.roots.length,
    pinned: pins.pinnedSet.size,
    groupsChanged: canon.groupsChanged,
    casesDropped: canon.casesDropped,
    eventBlocks: render.events.length,
    fightBlocks: render.fights.length,
  };
  pipelineLog.debug("pipeline finished", stats);

  return { registry, render, diagnostics, stats };
}
