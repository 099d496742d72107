import type { Outcome } from "../build/outcomeTypes.js";

export type EntityKind = "event" | "group" | "ship";

/**
 * Which namespace wins when a name exists both as an Event and as a Group.
 * - insideGroup: Event first, then Group (entries of an event list)
 * - topLevel: Group first, then Event (choice targets, ship slots, quest markers)
 */
export type ResolveContext = "insideGroup" | "topLevel";

/** A reference as written in the data: a bare name plus the context it must be resolved in. */
export type EntityRef = {
  name: string;
  context: ResolveContext;
};

export type EventRef = { kind: "event"; name: string };
export type GroupRef = { kind: "group"; name: string };
export type ShipRef = { kind: "ship"; name: string };

/** Outcome of a name resolution. Never produced by probing maps at the use site. */
export type ResolvedRef = EventRef | GroupRef;
export type AnyRef = EventRef | GroupRef | ShipRef;

export type EventText =
  | { kind: "none" }
  | { kind: "single"; text: string }
  | { kind: "alternatives"; texts: string[] };

export type Choice = {
  label: string;
  highlighted: boolean;
  target: EntityRef | null; // null: the choice has no nested event
};

export type StoryEvent = {
  name: string;
  synthetic: boolean;
  text: EventText;
  outcomes: Outcome[];
  choices: Choice[] | null;
  fight: string | null; // Ship name
};

export type GroupCase = {
  weight: number;
  target: EntityRef;
};

export type EventGroup = {
  name: string;
  cases: GroupCase[];
};

export const SHIP_SLOTS = ["destroyed", "deadCrew", "gotaway", "surrender"] as const;
export type ShipSlot = (typeof SHIP_SLOTS)[number];

export type Ship = {
  name: string;
  slots: Partial<Record<ShipSlot, EntityRef>>;
};

/** Read-side view of the three namespaces, shared by the registry and the pre-scanned name index. */
export interface NameIndex {
  hasEvent(name: string): boolean;
  hasGroup(name: string): boolean;
  hasShip(name: string): boolean;
}

export function refKey(ref: AnyRef): string {
  return `${ref.kind}:${ref.name}`;
}

export function anchorId(ref: AnyRef): string {
  switch (ref.kind) {
    case "event":
      return `event-${ref.name}`;
    case "group":
      return `list-${ref.name}`;
    case "ship":
      return `ship-${ref.name}`;
  }
}
