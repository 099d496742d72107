import { EntityRegistry } from "../graph/registry.js";
import { SHIP_SLOTS, type Choice, type EventGroup, type GroupCase, type Ship, type ShipSlot, type StoryEvent } from "../graph/types.js";
import { makeNode, type StructuredNode } from "../input/structuredNode.js";

export function storyEvent(name: string, fields: Partial<Omit<StoryEvent, "name">> = {}): StoryEvent {
  return {
    name,
    synthetic: false,
    text: { kind: "none" },
    outcomes: [{ type: "nothing" }],
    choices: null,
    fight: null,
    ...fields,
  };
}

/** A choice that leads to a named entity, resolved Group-first. */
export function choice(label: string, target: string | null): Choice {
  return { label, highlighted: false, target: target === null ? null : { name: target, context: "topLevel" } };
}

export function eventGroup(name: string, cases: Array<string | [number, string]>): EventGroup {
  return {
    name,
    cases: cases.map((c): GroupCase => {
      const [weight, target] = typeof c === "string" ? [1, c] : c;
      return { weight, target: { name: target, context: "insideGroup" } };
    }),
  };
}

export function enemyShip(name: string, slots: Partial<Record<ShipSlot, string>> = {}): Ship {
  const out: Ship = { name, slots: {} };
  for (const slot of SHIP_SLOTS) {
    const target = slots[slot];
    if (target !== undefined) out.slots[slot] = { name: target, context: "topLevel" };
  }
  return out;
}

export function registryOf(parts: { events?: StoryEvent[]; groups?: EventGroup[]; ships?: Ship[] }): EntityRegistry {
  const registry = new EntityRegistry();
  for (const e of parts.events ?? []) registry.addEvent(e);
  for (const g of parts.groups ?? []) registry.addGroup(g);
  for (const s of parts.ships ?? []) registry.addShip(s);
  return registry;
}

/** Element factory: el("event", { name: "A" }, el("text", {}, "Hello")) */
export function el(tag: string, attributes: Record<string, string> = {}, ...content: Array<StructuredNode | string>): StructuredNode {
  const children = content.filter((c): c is StructuredNode => typeof c !== "string");
  const text = content.filter((c): c is string => typeof c === "string").join("");
  return makeNode(tag, attributes, children, text === "" ? null : text);
}
