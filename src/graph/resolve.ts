import type { EntityRef, NameIndex, ResolveContext, ResolvedRef, ShipRef } from "./types.js";

/**
 * The one place where a name turns into an Event or a Group.
 * Some names exist in both namespaces (e.g. a pool and an event sharing a name),
 * so the caller's context decides which one wins:
 *   insideGroup -> Event, then Group
 *   topLevel    -> Group, then Event
 * Returns null when neither namespace has the name.
 */
export function tryResolveName(index: NameIndex, name: string, context: ResolveContext): ResolvedRef | null {
  if (context === "insideGroup") {
    if (index.hasEvent(name)) return { kind: "event", name };
    if (index.hasGroup(name)) return { kind: "group", name };
    return null;
  }
  if (index.hasGroup(name)) return { kind: "group", name };
  if (index.hasEvent(name)) return { kind: "event", name };
  return null;
}

export function resolveName(index: NameIndex, name: string, context: ResolveContext): ResolvedRef {
  const resolved = tryResolveName(index, name, context);
  if (!resolved) {
    throw new Error(`Unresolved reference "${name}" (${context})`);
  }
  return resolved;
}

export function resolveRef(index: NameIndex, ref: EntityRef): ResolvedRef {
  return resolveName(index, ref.name, ref.context);
}

export function tryResolveRef(index: NameIndex, ref: EntityRef): ResolvedRef | null {
  return tryResolveName(index, ref.name, ref.context);
}

/** Fight targets live only in the Ship namespace. */
export function resolveShip(index: NameIndex, name: string): ShipRef {
  if (!index.hasShip(name)) {
    throw new Error(`Unresolved ship reference "${name}"`);
  }
  return { kind: "ship", name };
}
