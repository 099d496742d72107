import type { Outcome } from "../build/outcomeTypes.js";
import type { EntityKind, EventText, ShipSlot } from "../graph/types.js";

export type RenderLink = {
  kind: EntityKind;
  name: string;
  anchor: string;
};

/** Where a reference leads: nested content in place, or a link to a top-level block. */
export type RenderTarget =
  | { mode: "inline"; body: RenderedBody }
  | { mode: "link"; link: RenderLink };

export type RenderedOutcome =
  | { kind: "effect"; outcome: Outcome }
  | { kind: "quest"; link: RenderLink }
  | { kind: "ship"; hostile: boolean; link: RenderLink | null };

export type RenderedChoice = {
  label: string;
  highlighted: boolean;
  target: RenderTarget | null;
};

export type RenderedEvent = {
  kind: "event";
  name: string;
  /** roots and real decisions show their text; other texts are collapsible */
  textProminent: boolean;
  text: EventText;
  outcomes: RenderedOutcome[];
  choices: RenderedChoice[] | null;
  fight: RenderLink | null;
};

export type RenderedCase = {
  weight: number;
  total: number;
  target: RenderTarget;
};

export type RenderedGroup = {
  kind: "group";
  name: string;
  /** single: one case, shown without the pool wrapper */
  layout: "single" | "list";
  cases: RenderedCase[];
};

export type RenderedShipSlot = {
  slot: ShipSlot;
  target: RenderTarget;
};

export type RenderedShip = {
  kind: "ship";
  name: string;
  slots: RenderedShipSlot[];
};

export type RenderedBody = RenderedEvent | RenderedGroup | RenderedShip;

export type TopLevelBlock = {
  kind: EntityKind;
  name: string;
  anchor: string;
  body: RenderedBody;
};

export type RenderDiagnostics = {
  /** refKeys never emitted anywhere */
  unreached: string[];
  /** anchors that links point at but no block carries */
  brokenLinks: string[];
  /** refKeys emitted more than once */
  duplicates: string[];
};

export type RenderResult = {
  /** Events and Groups, sorted by name */
  events: TopLevelBlock[];
  /** Ships, sorted by name */
  fights: TopLevelBlock[];
  diagnostics: RenderDiagnostics;
};
