import type { StructuredNode } from "../input/structuredNode.js";

export type SchemaKind = "event" | "ship" | "eventList";

/** Allowed child tags per parent kind, with their allowed attributes (null: anything goes). */
type ChildSchema = Record<string, readonly string[] | null>;

const SCHEMAS: Record<SchemaKind, ChildSchema> = {
  event: {
    augment: ["name"],
    autoReward: ["level"],
    boarders: ["min", "max", "class", "breach"],
    choice: ["req", "hidden", "hiiden", "blue", "lvl", "min_level", "max_lvl", "max_level", "max_group"],
    crewMember: ["amount", "class", "type", "id", "all_skills", "weapons", "shields", "pilot", "engines", "combat", "repair"],
    damage: ["amount", "system", "effect"],
    distressBeacon: [],
    drone: ["name"],
    environment: ["type", "target"],
    fleet: [],
    img: ["back", "planet"],
    item_modify: ["type", "min", "max", "steal"],
    modifyPursuit: ["amount"],
    quest: ["event"],
    removeCrew: ["class", "clone"],
    remove: ["name"],
    repair: [],
    reveal_map: [],
    secretSector: [],
    ship: ["load", "hostile"],
    status: ["type", "target", "system", "amount"],
    store: [],
    text: ["id", "load", "planet"],
    unlockShip: ["id"],
    upgrade: ["amount", "system"],
    weapon: ["name"],
    event: null,
  },
  ship: {
    crew: [],
    destroyed: ["load"],
    deadCrew: ["load"],
    escape: ["load", "chance", "min", "max", "timer"],
    gotaway: ["load"],
    surrender: ["load", "chance", "min", "max"],
    weaponOverride: null,
  },
  eventList: {
    event: ["load"],
  },
};

export type UnknownShape = {
  parentKind: SchemaKind;
  tag: string;
  attribute: string | null; // null: the whole tag is unknown
  example: string; // "<parent>.<child>[.<attr>]" as first seen
};

/**
 * Records each new content shape once per (parent kind, tag[, attribute]). Nothing here
 * is fatal; the list is surfaced with the other diagnostics after the run.
 */
export class ShapeTracker {
  private readonly seen = new Set<string>();
  readonly reported: UnknownShape[] = [];

  check(node: StructuredNode, kind: SchemaKind): void {
    const schema = SCHEMAS[kind];

    for (const c of node.children) {
      if (!Object.prototype.hasOwnProperty.call(schema, c.tag)) {
        this.report({ parentKind: kind, tag: c.tag, attribute: null, example: `${node.tag}.${c.tag}` });
        continue;
      }

      const allowed = schema[c.tag];
      if (allowed === null) continue;
      for (const name of Object.keys(c.attributes)) {
        if (!allowed.includes(name)) {
          this.report({ parentKind: kind, tag: c.tag, attribute: name, example: `${node.tag}.${c.tag}.${name}` });
        }
      }
    }
  }

  private report(shape: UnknownShape): void {
    const key = `${shape.parentKind}|${shape.tag}|${shape.attribute ?? ""}`;
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this.reported.push(shape);
  }
}
