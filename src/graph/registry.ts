import type { EventGroup, NameIndex, Ship, StoryEvent } from "./types.js";

const SYNTHETIC_PREFIX = "evt-";

/**
 * The graph aggregate: three independent namespaces plus the synthetic-name counter.
 * Populated once by the builder, rewritten only by the canonicalizer, read-only after that.
 * Maps keep insertion order, which the renderer never relies on (it sorts by name).
 */
export class EntityRegistry implements NameIndex {
  readonly events = new Map<string, StoryEvent>();
  readonly groups = new Map<string, EventGroup>();
  readonly ships = new Map<string, Ship>();

  private syntheticCount = 0;

  /**
   * @param reservedNames real names known ahead of time; synthetic names never collide with them
   */
  constructor(private readonly reservedNames: NameIndex | null = null) {}

  hasEvent(name: string): boolean {
    return this.events.has(name);
  }

  hasGroup(name: string): boolean {
    return this.groups.has(name);
  }

  hasShip(name: string): boolean {
    return this.ships.has(name);
  }

  addEvent(event: StoryEvent): void {
    if (this.events.has(event.name)) {
      throw new Error(`Duplicate event name: ${event.name}`);
    }
    this.events.set(event.name, event);
  }

  addGroup(group: EventGroup): void {
    if (this.groups.has(group.name)) {
      throw new Error(`Duplicate event list name: ${group.name}`);
    }
    this.groups.set(group.name, group);
  }

  /** OVERRIDE_ lists replace (or create) the named list instead of colliding with it. */
  overrideGroup(group: EventGroup): void {
    this.groups.set(group.name, group);
  }

  addShip(ship: Ship): void {
    if (this.ships.has(ship.name)) {
      throw new Error(`Duplicate ship name: ${ship.name}`);
    }
    this.ships.set(ship.name, ship);
  }

  nextSyntheticName(): string {
    let name: string;
    do {
      this.syntheticCount += 1;
      name = `${SYNTHETIC_PREFIX}${this.syntheticCount}`;
    } while (this.isTaken(name));
    return name;
  }

  private isTaken(name: string): boolean {
    if (this.events.has(name) || this.groups.has(name) || this.ships.has(name)) return true;
    const reserved = this.reservedNames;
    return reserved !== null && (reserved.hasEvent(name) || reserved.hasGroup(name) || reserved.hasShip(name));
  }
}

/** Names of every entity in every namespace, pre-scanned before building. */
export class KnownNames implements NameIndex {
  readonly events = new Set<string>();
  readonly groups = new Set<string>();
  readonly ships = new Set<string>();

  hasEvent(name: string): boolean {
    return this.events.has(name);
  }

  hasGroup(name: string): boolean {
    return this.groups.has(name);
  }

  hasShip(name: string): boolean {
    return this.ships.has(name);
  }
}
