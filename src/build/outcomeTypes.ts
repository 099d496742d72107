import type { EntityRef } from "../graph/types.js";

export const ENVIRONMENT_HAZARDS = ["asteroid", "nebula", "pulsar", "storm", "sun", "PDS"] as const;
export type EnvironmentHazard = (typeof ENVIRONMENT_HAZARDS)[number];

export const PDS_TARGETS = ["all", "enemy", "player"] as const;
export type PdsTarget = (typeof PDS_TARGETS)[number];

export const STATUS_KINDS = ["clear", "divide", "limit", "loss"] as const;
export type StatusKind = (typeof STATUS_KINDS)[number];

export const STATUS_TARGETS = ["player", "enemy"] as const;
export type StatusTarget = (typeof STATUS_TARGETS)[number];

export type BlueprintCategory = "augment" | "weapon" | "drone";

/**
 * Effects of an event, in display order. The graph treats these as opaque values:
 * they only take part in structural equality. Vocabulary ids (species, systems,
 * resources, ...) stay raw here and are spelled out by the markup writer.
 */
export type Outcome =
  | { type: "environment"; hazard: EnvironmentHazard; target: PdsTarget | null }
  | { type: "boarders"; min: number; max: number; species: string | null; breach: boolean }
  | { type: "remove"; name: string }
  | { type: "resource"; resource: string; direction: "gain" | "lose"; min: number; max: number }
  | { type: "autoReward"; level: string; kind: string }
  | { type: "blueprint"; category: BlueprintCategory; id: string }
  | { type: "crew"; amount: number; species: string | null; skills: Array<{ skill: string; level: string }> }
  | { type: "removeCrew"; species: string | null; clonable: boolean }
  | { type: "hull"; amount: number } // > 0 damage, < 0 repair
  | { type: "systemDamage"; system: string; amount: string; effect: string | null }
  | { type: "status"; status: StatusKind; target: StatusTarget; system: string; amount: string | null }
  | { type: "pursuit"; amount: number }
  | { type: "revealMap" }
  | { type: "upgrade"; system: string; amount: string }
  | { type: "quest"; target: EntityRef }
  | { type: "unlockShip"; id: string }
  | { type: "secretSector" }
  | { type: "store" }
  | { type: "ship"; ship: string | null; hostile: boolean }
  | { type: "nothing" };

export type OutcomeType = Outcome["type"];
