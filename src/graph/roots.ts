import { log } from "../utils/logger.js";
import type { EntityRegistry } from "./registry.js";
import { resolveName, resolveRef } from "./resolve.js";
import { refKey, type ResolvedRef } from "./types.js";

const rootsLog = log.withScope("roots");

export type PinnedEntities = {
  /** Event names that always get a permanent anchor, in discovery order */
  roots: string[];
  rootSet: Set<string>;
  /** refKeys of roots plus quest targets: never inlined */
  pinnedSet: Set<string>;
};

/**
 * Entry points name either an Event (it becomes a root) or a Group, in which case the
 * Group's case targets become roots instead, recursively. Groups themselves are never
 * roots, and neither are synthetic events reached through a pool.
 */
export function resolveRoots(
  registry: EntityRegistry,
  entryPoints: readonly string[],
  questTargets: readonly ResolvedRef[],
): PinnedEntities {
  const roots: string[] = [];
  const rootSet = new Set<string>();
  const expandedGroups = new Set<string>();

  const addRoot = (ref: ResolvedRef) => {
    if (ref.kind === "event") {
      const event = registry.events.get(ref.name);
      if (!event || event.synthetic || rootSet.has(ref.name)) return;
      rootSet.add(ref.name);
      roots.push(ref.name);
      return;
    }

    if (expandedGroups.has(ref.name)) return;
    expandedGroups.add(ref.name);
    const group = registry.groups.get(ref.name);
    for (const groupCase of group?.cases ?? []) {
      addRoot(resolveRef(registry, groupCase.target));
    }
  };

  for (const name of entryPoints) {
    addRoot(resolveName(registry, name, "insideGroup"));
  }

  const pinnedSet = new Set<string>();
  for (const name of roots) pinnedSet.add(refKey({ kind: "event", name }));
  for (const target of questTargets) pinnedSet.add(refKey(target));

  rootsLog.debug("resolved entry points", {
    entryPoints: entryPoints.length,
    roots: roots.length,
    pinned: pinnedSet.size,
  });

  return { roots, rootSet, pinnedSet };
}
