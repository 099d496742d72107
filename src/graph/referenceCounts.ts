import { log } from "../utils/logger.js";
import type { EntityRegistry } from "./registry.js";
import { resolveRef, resolveShip } from "./resolve.js";
import { SHIP_SLOTS, refKey, type AnyRef } from "./types.js";

const countLog = log.withScope("count");

export type ReferenceCounts = {
  /** refKey -> number of textual edges pointing at the entity (every entity has an entry) */
  inDegree: Map<string, number>;
  /** entities with an edge to themselves; those edges are not counted */
  selfReferencing: Set<string>;
};

export function inDegreeOf(counts: ReferenceCounts, ref: AnyRef): number {
  return counts.inDegree.get(refKey(ref)) ?? 0;
}

/**
 * One increment per textual edge:
 *   Event -> choice target  (topLevel)
 *   Event -> fight          (Ship namespace)
 *   Group -> case target    (insideGroup)
 *   Ship  -> outcome slot   (topLevel)
 * Quest markers are not edges here; their targets are pinned instead.
 * Throws on any name that resolves in neither namespace.
 */
export function countReferences(registry: EntityRegistry): ReferenceCounts {
  const inDegree = new Map<string, number>();
  const selfReferencing = new Set<string>();

  for (const name of registry.events.keys()) inDegree.set(refKey({ kind: "event", name }), 0);
  for (const name of registry.groups.keys()) inDegree.set(refKey({ kind: "group", name }), 0);
  for (const name of registry.ships.keys()) inDegree.set(refKey({ kind: "ship", name }), 0);

  const addEdge = (parent: AnyRef, target: AnyRef) => {
    const parentKey = refKey(parent);
    const targetKey = refKey(target);
    if (parentKey === targetKey) {
      selfReferencing.add(targetKey);
      return;
    }
    inDegree.set(targetKey, (inDegree.get(targetKey) ?? 0) + 1);
  };

  for (const event of registry.events.values()) {
    const parent: AnyRef = { kind: "event", name: event.name };
    for (const choice of event.choices ?? []) {
      if (choice.target) addEdge(parent, resolveRef(registry, choice.target));
    }
    if (event.fight !== null) addEdge(parent, resolveShip(registry, event.fight));
  }

  for (const group of registry.groups.values()) {
    const parent: AnyRef = { kind: "group", name: group.name };
    for (const groupCase of group.cases) {
      addEdge(parent, resolveRef(registry, groupCase.target));
    }
  }

  for (const ship of registry.ships.values()) {
    const parent: AnyRef = { kind: "ship", name: ship.name };
    for (const slot of SHIP_SLOTS) {
      const target = ship.slots[slot];
      if (target) addEdge(parent, resolveRef(registry, target));
    }
  }

  countLog.debug("counted references", {
    entities: inDegree.size,
    selfReferencing: selfReferencing.size,
  });

  return { inDegree, selfReferencing };
}
