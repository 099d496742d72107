import { log } from "../utils/logger.js";
import { eventsStructurallyEqual } from "./equality.js";
import type { EntityRegistry } from "./registry.js";
import { tryResolveRef } from "./resolve.js";
import type { GroupCase, StoryEvent } from "./types.js";

const canonLog = log.withScope("canon");

function caseEvent(registry: EntityRegistry, groupCase: GroupCase): StoryEvent | undefined {
  const resolved = tryResolveRef(registry, groupCase.target);
  if (!resolved || resolved.kind !== "event") return undefined;
  return registry.events.get(resolved.name);
}

/**
 * Folds repeated outcomes of one pool together:
 *   [(1, A), (1, A'), (1, B)]  with A ≡ A'  ->  [(2, A), (1, B)]
 * The first occurrence keeps its position and absorbs the later weights.
 * Only Event targets are compared; Group targets are never merged.
 */
export function mergeGroupCases(registry: EntityRegistry, cases: readonly GroupCase[]): GroupCase[] {
  const merged: GroupCase[] = [];
  const mergedEvents: Array<StoryEvent | undefined> = [];

  for (const groupCase of cases) {
    const event = caseEvent(registry, groupCase);
    const matchIndex = event
      ? mergedEvents.findIndex((other) => other !== undefined && eventsStructurallyEqual(event, other))
      : -1;

    if (matchIndex >= 0) {
      const kept = merged[matchIndex];
      merged[matchIndex] = { ...kept, weight: kept.weight + groupCase.weight };
    } else {
      merged.push({ ...groupCase });
      mergedEvents.push(event);
    }
  }

  return merged;
}

export type CanonicalizeStats = {
  groupsChanged: number;
  casesDropped: number;
};

/** Rewrites every Group's case list in place. */
export function canonicalizeGroups(registry: EntityRegistry): CanonicalizeStats {
  const stats: CanonicalizeStats = { groupsChanged: 0, casesDropped: 0 };

  for (const group of registry.groups.values()) {
    const merged = mergeGroupCases(registry, group.cases);
    if (merged.length === group.cases.length) continue;

    stats.groupsChanged += 1;
    stats.casesDropped += group.cases.length - merged.length;
    canonLog.trace(`merged ${group.name}: ${group.cases.length} -> ${merged.length} cases`);
    group.cases = merged;
  }

  canonLog.debug("canonicalized event lists", stats);
  return stats;
}
