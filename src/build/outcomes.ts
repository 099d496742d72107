import { tryResolveName } from "../graph/resolve.js";
import type { NameIndex, ResolvedRef } from "../graph/types.js";
import { attr, child, childrenOf, requireAttr, requireIntAttr, type StructuredNode } from "../input/structuredNode.js";
import {
  ENVIRONMENT_HAZARDS,
  PDS_TARGETS,
  STATUS_KINDS,
  STATUS_TARGETS,
  type BlueprintCategory,
  type Outcome,
} from "./outcomeTypes.js";

// crewMember attributes that carry a skill level, in display order
const SKILL_ATTRIBUTES = ["all_skills", "combat", "engines", "pilot", "repair", "shields"] as const;

// autoReward kinds that also hand out a random blueprint
const BLUEPRINT_REWARDS: Record<string, BlueprintCategory> = {
  augment: "augment",
  drone: "drone",
  weapon: "weapon",
};

export type OutcomeContext = {
  knownNames: NameIndex;
  /** Ship loaded by an enclosing event; a bare hostile <ship> fights it */
  enemyShip: string | null;
  onQuestTarget: (target: ResolvedRef) => void;
  onNotice: (message: string) => void;
};

export type EventOutcomes = {
  outcomes: Outcome[];
  fight: string | null;
  /** enemy identity passed down to nested choice events */
  enemyShip: string | null;
};

function oneOf<T extends string>(allowed: readonly T[], value: string | undefined, what: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`Unknown ${what}: ${value ?? "(missing)"}`);
  }
  return match;
}

function isTrue(value: string | undefined): boolean {
  return value !== undefined && value.toLowerCase() === "true";
}

function speciesOf(value: string | undefined): string | null {
  return value && value !== "random" ? value : null;
}

function readEnvironment(node: StructuredNode, out: Outcome[]): void {
  const hazardNode = child(node, "environment");
  if (!hazardNode) return;

  const hazard = oneOf(ENVIRONMENT_HAZARDS, attr(hazardNode, "type"), "<environment> type");
  const target = hazard === "PDS" ? oneOf(PDS_TARGETS, attr(hazardNode, "target"), "<environment> PDS target") : null;
  out.push({ type: "environment", hazard, target });
}

function readBoarders(node: StructuredNode, out: Outcome[]): void {
  const boarders = child(node, "boarders");
  if (!boarders) return;

  out.push({
    type: "boarders",
    min: requireIntAttr(boarders, "min"),
    max: requireIntAttr(boarders, "max"),
    species: speciesOf(attr(boarders, "class")),
    breach: isTrue(attr(boarders, "breach")),
  });
}

/** Payments are listed before rewards; a range crossing zero makes no sense and aborts. */
function readItemModify(node: StructuredNode, out: Outcome[]): void {
  const itemModify = child(node, "item_modify");
  if (!itemModify) return;

  const items = childrenOf(itemModify, "item").map((item) => {
    const resource = requireAttr(item, "type");
    const lo = requireIntAttr(item, "min");
    const hi = requireIntAttr(item, "max");
    if (!(lo >= 0 && hi >= 0) && !(lo <= 0 && hi <= 0)) {
      throw new Error(`Nonsensical resource range for ${resource}: ${lo}..${hi}`);
    }
    return { resource, lo, hi };
  });

  for (const { resource, lo, hi } of items) {
    if (lo >= 0 && hi >= 0) continue;
    out.push({ type: "resource", resource, direction: "lose", min: -hi, max: -lo });
  }
  for (const { resource, lo, hi } of items) {
    if (lo >= 0 && hi >= 0) {
      out.push({ type: "resource", resource, direction: "gain", min: lo, max: hi });
    }
  }
}

function readAutoReward(node: StructuredNode, out: Outcome[]): void {
  const reward = child(node, "autoReward");
  if (!reward) return;

  const level = requireAttr(reward, "level").toUpperCase();
  const rawKind = reward.text;
  if (!rawKind) {
    throw new Error("<autoReward> has no reward kind");
  }

  const blueprint = Object.prototype.hasOwnProperty.call(BLUEPRINT_REWARDS, rawKind) ? BLUEPRINT_REWARDS[rawKind] : null;
  out.push({ type: "autoReward", level, kind: blueprint ? "scrap_only" : rawKind });
  if (blueprint) {
    out.push({ type: "blueprint", category: blueprint, id: "RANDOM" });
  }
}

function readCrewMember(node: StructuredNode, out: Outcome[], ctx: OutcomeContext): void {
  const crew = child(node, "crewMember");
  if (!crew) return;

  const amount = requireIntAttr(crew, "amount");
  if (amount === 0) {
    ctx.onNotice("receive 0 crew");
    return;
  }

  const skills: Array<{ skill: string; level: string }> = [];
  for (const skill of SKILL_ATTRIBUTES) {
    const level = attr(crew, skill);
    if (level) skills.push({ skill, level });
  }

  out.push({
    type: "crew",
    amount,
    species: speciesOf(attr(crew, "class") ?? attr(crew, "type")),
    skills,
  });
}

function readRemoveCrew(node: StructuredNode, out: Outcome[]): void {
  const removeCrew = child(node, "removeCrew");
  if (!removeCrew) return;

  const cloneNode = child(removeCrew, "clone");
  const clonable = cloneNode ? isTrue(cloneNode.text ?? undefined) : isTrue(attr(removeCrew, "clone"));
  out.push({ type: "removeCrew", species: speciesOf(attr(removeCrew, "class")), clonable });
}

function readDamage(node: StructuredNode, out: Outcome[]): void {
  const damages = childrenOf(node, "damage");
  if (damages.length === 0) return;

  const hull = damages.reduce((sum, damage) => sum + requireIntAttr(damage, "amount"), 0);
  if (hull !== 0) {
    out.push({ type: "hull", amount: hull });
  }

  for (const damage of damages) {
    const system = attr(damage, "system");
    if (!system) continue;
    out.push({
      type: "systemDamage",
      system,
      amount: requireAttr(damage, "amount"),
      effect: attr(damage, "effect") ?? null,
    });
  }
}

function readStatus(node: StructuredNode, out: Outcome[]): void {
  for (const status of childrenOf(node, "status")) {
    const kind = oneOf(STATUS_KINDS, attr(status, "type"), "<status> type");
    const target = oneOf(STATUS_TARGETS, attr(status, "target"), "<status> target");
    const amount = attr(status, "amount") ?? null;
    if (kind === "divide" && amount !== "2") {
      throw new Error(`Expected <status> divide to be by 2, got ${amount ?? "(missing)"}`);
    }
    out.push({ type: "status", status: kind, target, system: requireAttr(status, "system"), amount });
  }
}

function readPursuit(node: StructuredNode, out: Outcome[]): void {
  const pursuit = child(node, "modifyPursuit");
  if (!pursuit) return;

  const amount = requireIntAttr(pursuit, "amount");
  if (amount === 0) {
    throw new Error("<modifyPursuit> with amount 0");
  }
  out.push({ type: "pursuit", amount });
}

function readQuest(node: StructuredNode, out: Outcome[], ctx: OutcomeContext): void {
  const quest = child(node, "quest");
  if (!quest) return;

  const name = requireAttr(quest, "event");
  const target = tryResolveName(ctx.knownNames, name, "topLevel");
  if (!target) {
    throw new Error(`Unresolved quest target "${name}" (topLevel)`);
  }
  ctx.onQuestTarget(target);
  out.push({ type: "quest", target: { name, context: "topLevel" } });
}

function readShip(node: StructuredNode, out: Outcome[], ctx: OutcomeContext): { fight: string | null; enemyShip: string | null } {
  const ship = child(node, "ship");
  if (!ship) return { fight: null, enemyShip: ctx.enemyShip };

  const loaded = attr(ship, "load") ?? null;
  const enemyShip = loaded ?? ctx.enemyShip;

  const hostility = attr(ship, "hostile");
  let hostile = false;
  if (hostility !== undefined) {
    const normalized = hostility.toLowerCase();
    if (normalized === "true") hostile = true;
    else if (normalized !== "false") throw new Error(`Unknown hostile=${hostility}`);
  }

  out.push({ type: "ship", ship: loaded, hostile });
  return { fight: hostile && enemyShip ? enemyShip : null, enemyShip };
}

/**
 * Reads every effect child of an <event> node. Closed vocabularies (hazards, status kinds,
 * hostility) are checked here and abort on anything unexpected.
 */
export function readEventOutcomes(node: StructuredNode, ctx: OutcomeContext): EventOutcomes {
  const out: Outcome[] = [];

  readEnvironment(node, out);
  readBoarders(node, out);

  const remove = child(node, "remove");
  if (remove) out.push({ type: "remove", name: requireAttr(remove, "name") });

  readItemModify(node, out);
  readAutoReward(node, out);
  readCrewMember(node, out, ctx);
  readRemoveCrew(node, out);
  readDamage(node, out);
  readStatus(node, out);
  readPursuit(node, out);

  if (child(node, "reveal_map")) out.push({ type: "revealMap" });

  const upgrade = child(node, "upgrade");
  if (upgrade) {
    out.push({ type: "upgrade", system: requireAttr(upgrade, "system"), amount: attr(upgrade, "amount") ?? "1" });
  }

  for (const category of ["augment", "weapon", "drone"] as const) {
    const blueprint = child(node, category);
    if (blueprint) out.push({ type: "blueprint", category, id: requireAttr(blueprint, "name") });
  }

  readQuest(node, out, ctx);

  const unlock = child(node, "unlockShip");
  if (unlock) out.push({ type: "unlockShip", id: requireAttr(unlock, "id") });

  if (child(node, "secretSector")) out.push({ type: "secretSector" });
  if (child(node, "store")) out.push({ type: "store" });

  // fleet, img, repair and distressBeacon only affect presentation in game
  const { fight, enemyShip } = readShip(node, out, ctx);

  return { outcomes: out, fight, enemyShip };
}
