import type { BlueprintCategory, EnvironmentHazard, Outcome, PdsTarget, StatusKind } from "../build/outcomeTypes.js";
import { escapeHtml } from "../utils/html.js";
import { spell, type Vocabulary } from "./vocabulary.js";

const HAZARD_NAMES: Record<Exclude<EnvironmentHazard, "PDS">, string> = {
  asteroid: "Asteroid Field",
  nebula: "Nebula",
  pulsar: "Pulsar",
  storm: "Plasma Storm",
  sun: "Red Star",
};

const PDS_NAMES: Record<PdsTarget, string> = {
  all: "Confused Anti-Ship Battery targeting both ships",
  enemy: "Friendly Anti-Ship Battery",
  player: "Anti-Ship Battery targeting us",
};

const BLUEPRINT_CATEGORIES: Record<BlueprintCategory, string> = {
  augment: "Augmentation",
  weapon: "Weapon",
  drone: "Drone Schematic",
};

const DLC_BLUEPRINT_LISTS = new Set(["DLC_AUGMENTS", "DLC_DRONES", "DLC_WEAPONS"]);

export function numRange(min: number, max: number): string {
  return min === max ? String(min) : `${min}-${max}`;
}

function strong(text: string): string {
  return `<strong>${escapeHtml(text)}</strong>`;
}

function environment(hazard: EnvironmentHazard, target: PdsTarget | null): string {
  if (hazard === "PDS") {
    if (target === null) throw new Error("Anti-ship battery without a target");
    return PDS_NAMES[target];
  }
  return HAZARD_NAMES[hazard];
}

function blueprint(vocabulary: Vocabulary, category: BlueprintCategory, id: string): string {
  const what = strong(BLUEPRINT_CATEGORIES[category]);
  if (id === "RANDOM") return what;
  if (DLC_BLUEPRINT_LISTS.has(id)) return `${what} (from Advanced Edition)`;
  return `${what} (${escapeHtml(spell(vocabulary, "blueprints", id))})`;
}

function powerChange(status: StatusKind, system: string, disables: boolean, amount: string): string {
  switch (status) {
    case "clear":
      return `${strong("Restore Power")} to ${system}`;
    case "divide":
      return `${strong("Half Power")} to ${system}`;
    case "limit":
      return disables ? `${strong("Disable")} ${system}` : `${strong("Limit Power")} to ${system}, down to ${amount}`;
    case "loss":
      return `${strong("Reduce Power")} to ${system} by ${amount}`;
  }
}

/**
 * Markup for one outcome line, without the surrounding <li>. Quest markers and ships
 * carry links and are written by the document writer; the plain forms here are only
 * used when no link is available.
 */
export function describeOutcome(outcome: Outcome, vocabulary: Vocabulary): string {
  switch (outcome.type) {
    case "environment":
      return `${strong("Environment")} is ${escapeHtml(environment(outcome.hazard, outcome.target))}`;

    case "boarders": {
      const who = outcome.species === null ? "enemies" : spell(vocabulary, "species", outcome.species);
      const breach = outcome.breach ? ` (with ${strong("breach")})` : "";
      return `${strong("Boarded")} by ${escapeHtml(numRange(outcome.min, outcome.max))} ${escapeHtml(who)}${breach}`;
    }

    case "remove":
      return `${strong("Remove")} ${escapeHtml(outcome.name)}`;

    case "resource": {
      const sign = outcome.direction === "gain" ? "+" : "−";
      const what = spell(vocabulary, "resources", outcome.resource);
      return `${sign}${escapeHtml(numRange(outcome.min, outcome.max))} ${strong(what)}`;
    }

    case "autoReward":
      return `${strong(spell(vocabulary, "autoRewardLevels", outcome.level))} ${escapeHtml(
        spell(vocabulary, "autoRewardKinds", outcome.kind),
      )}`;

    case "blueprint":
      return blueprint(vocabulary, outcome.category, outcome.id);

    case "crew": {
      const n = Math.abs(outcome.amount);
      if (outcome.amount <= -2) return strong(`Lose ${n} Crew`);
      if (outcome.amount === -1) return strong("Lose Crew");

      const extra: string[] = [];
      if (outcome.species !== null) extra.push(spell(vocabulary, "species", outcome.species));
      for (const { skill, level } of outcome.skills) {
        extra.push(`with level ${level} ${spell(vocabulary, "skills", skill)}`);
      }
      const extraText = extra.length > 0 ? escapeHtml(` ${extra.join(" ")}`) : "";
      return n === 1 ? `${strong("Gain Crew")}${extraText}` : `${strong(`Gain ${n} Crew`)}${extraText}`;
    }

    case "removeCrew": {
      const who = outcome.species === null ? "Lose Crew" : `Lose ${spell(vocabulary, "species", outcome.species)} Crew`;
      const clone = outcome.clonable ? "(can be saved by the clone bay)" : strong("(cannot be cloned)");
      return `${strong(who)} ${clone}`;
    }

    case "hull":
      return outcome.amount < 0
        ? `${-outcome.amount} ${strong("Hull Repair")}`
        : `${outcome.amount} ${strong("Hull Damage")}`;

    case "systemDamage": {
      const system = spell(vocabulary, "systems", outcome.system);
      const effect = outcome.effect !== null ? ` (${escapeHtml(spell(vocabulary, "damageEffects", outcome.effect))})` : "";
      return `${escapeHtml(outcome.amount)} ${strong("System Damage")} to ${escapeHtml(system)}${effect}`;
    }

    case "status": {
      const system = escapeHtml(spell(vocabulary, "systems", outcome.system));
      const amount = escapeHtml(outcome.amount ?? "?");
      const line = powerChange(outcome.status, system, outcome.amount === "0", amount);
      return outcome.target === "enemy" ? `${strong("Enemy ship: ")}${line}` : line;
    }

    case "pursuit": {
      const n = Math.abs(outcome.amount);
      const what = outcome.amount > 0 ? "Rebel Fleet Advances" : "Rebel Fleet Delayed";
      return `${strong(what)} by ${n} ${n === 1 ? "jump" : "jumps"}`;
    }

    case "revealMap":
      return strong("Map Update");

    case "upgrade": {
      const system = escapeHtml(spell(vocabulary, "systems", outcome.system));
      const by = outcome.amount !== "1" ? ` (by ${escapeHtml(outcome.amount)})` : "";
      return `${strong("Upgrade")} ${system}${by}`;
    }

    case "quest":
      return `${strong("Quest")} marker for ${escapeHtml(outcome.target.name)}`;

    case "unlockShip":
      return `${strong("Unlock")} the ${escapeHtml(spell(vocabulary, "unlockShips", outcome.id))}`;

    case "secretSector":
      return `${strong("Travel")} to the crystal sector!`;

    case "store":
      return strong("Enter Store");

    case "ship":
      return outcome.hostile ? strong("Fight") : strong("End Fight");

    case "nothing":
      return "Nothing happens";
  }
}
