import { log } from "../utils/logger.js";
import { inDegreeOf, type ReferenceCounts } from "../graph/referenceCounts.js";
import type { EntityRegistry } from "../graph/registry.js";
import { resolveRef, resolveShip } from "../graph/resolve.js";
import type { PinnedEntities } from "../graph/roots.js";
import {
  anchorId,
  refKey,
  SHIP_SLOTS,
  type AnyRef,
  type EventGroup,
  type ResolvedRef,
  type Ship,
  type StoryEvent,
} from "../graph/types.js";
import type {
  RenderedBody,
  RenderedChoice,
  RenderedEvent,
  RenderedGroup,
  RenderedOutcome,
  RenderedShip,
  RenderLink,
  RenderResult,
  RenderTarget,
  TopLevelBlock,
} from "./renderTypes.js";

const renderLog = log.withScope("render");

export type RenderInput = {
  registry: EntityRegistry;
  counts: ReferenceCounts;
  pins: PinnedEntities;
};

function byName(a: { name: string }, b: { name: string }): number {
  // code-unit order: independent of locale and of input file order
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Nameless events left without parents once their pool was merged or overridden away,
 * together with the nameless events only those reach.
 */
function findOrphanedSynthetics({ registry, counts, pins }: RenderInput): Set<string> {
  const isLoose = (name: string): boolean => {
    const event = registry.events.get(name);
    return event !== undefined && event.synthetic && !pins.pinnedSet.has(refKey({ kind: "event", name }));
  };

  const remaining = new Map(counts.inDegree);
  const orphaned = new Set<string>();
  const queue: string[] = [];
  for (const name of registry.events.keys()) {
    if (isLoose(name) && inDegreeOf(counts, { kind: "event", name }) === 0) {
      orphaned.add(refKey({ kind: "event", name }));
      queue.push(name);
    }
  }

  for (let name = queue.shift(); name !== undefined; name = queue.shift()) {
    const parent = registry.events.get(name);
    for (const choice of parent?.choices ?? []) {
      if (!choice.target) continue;
      const target = resolveRef(registry, choice.target);
      if (target.kind !== "event" || target.name === name || !isLoose(target.name)) continue;
      const key = refKey(target);
      const left = (remaining.get(key) ?? 0) - 1;
      remaining.set(key, left);
      if (left === 0 && !orphaned.has(key)) {
        orphaned.add(key);
        queue.push(target.name);
      }
    }
  }
  return orphaned;
}

/**
 * Single pass over the finished graph. Each reference is either inlined (the target has
 * exactly one incoming edge and is not pinned) or becomes a link to the target's one
 * anchored top-level block. The graph is only read here.
 */
class GraphRenderer {
  private readonly orphaned: Set<string>;
  private readonly emitted = new Map<string, number>();
  private readonly anchors = new Set<string>();
  private readonly linkTargets = new Set<string>();
  private readonly stack = new Set<string>();

  constructor(private readonly input: RenderInput) {
    this.orphaned = findOrphanedSynthetics(input);
  }

  run(): RenderResult {
    const { registry } = this.input;

    const candidates: ResolvedRef[] = [
      ...[...registry.events.keys()].map((name) => ({ kind: "event" as const, name })),
      ...[...registry.groups.keys()].map((name) => ({ kind: "group" as const, name })),
    ];
    // stable sort: an Event precedes a Group of the same name
    candidates.sort(byName);

    const events: TopLevelBlock[] = [];
    for (const ref of candidates) {
      if (!this.needsAnchor(ref) || this.isOrphanedSynthetic(ref)) continue;
      events.push(this.topLevel(ref));
    }

    const fights: TopLevelBlock[] = [...registry.ships.keys()]
      .map((name) => ({ kind: "ship" as const, name }))
      .sort(byName)
      .map((ref) => this.topLevel(ref));

    const diagnostics = this.diagnostics();
    renderLog.debug("rendered graph", {
      eventBlocks: events.length,
      fightBlocks: fights.length,
      links: this.linkTargets.size,
    });

    return { events, fights, diagnostics };
  }

  /** Pinned, self-referencing, or not referenced exactly once. Ships always. */
  private needsAnchor(ref: AnyRef): boolean {
    if (ref.kind === "ship") return true;
    const { counts, pins } = this.input;
    const key = refKey(ref);
    return pins.pinnedSet.has(key) || counts.selfReferencing.has(key) || inDegreeOf(counts, ref) !== 1;
  }

  private isOrphanedSynthetic(ref: AnyRef): boolean {
    return ref.kind === "event" && this.orphaned.has(refKey(ref));
  }

  private topLevel(ref: AnyRef): TopLevelBlock {
    const anchor = anchorId(ref);
    this.anchors.add(anchor);
    return { kind: ref.kind, name: ref.name, anchor, body: this.body(ref) };
  }

  private reference(ref: AnyRef): RenderTarget {
    if (this.needsAnchor(ref) || this.stack.has(refKey(ref))) {
      return { mode: "link", link: this.link(ref) };
    }
    return { mode: "inline", body: this.body(ref) };
  }

  private link(ref: AnyRef): RenderLink {
    const anchor = anchorId(ref);
    this.linkTargets.add(anchor);
    return { kind: ref.kind, name: ref.name, anchor };
  }

  private body(ref: AnyRef): RenderedBody {
    const key = refKey(ref);
    this.emitted.set(key, (this.emitted.get(key) ?? 0) + 1);
    this.stack.add(key);
    const body = this.renderBody(ref);
    this.stack.delete(key);
    return body;
  }

  private renderBody(ref: AnyRef): RenderedBody {
    switch (ref.kind) {
      case "event":
        return this.renderEvent(this.lookup(this.input.registry.events, ref));
      case "group":
        return this.renderGroup(this.lookup(this.input.registry.groups, ref));
      case "ship":
        return this.renderShip(this.lookup(this.input.registry.ships, ref));
    }
  }

  private lookup<T>(map: Map<string, T>, ref: AnyRef): T {
    const entity = map.get(ref.name);
    if (entity === undefined) {
      throw new Error(`Unknown ${ref.kind}: ${ref.name}`);
    }
    return entity;
  }

  private renderEvent(event: StoryEvent): RenderedEvent {
    const { registry, pins } = this.input;
    const fight = event.fight !== null ? this.link(resolveShip(registry, event.fight)) : null;

    const outcomes = event.outcomes.map((outcome): RenderedOutcome => {
      if (outcome.type === "quest") {
        return { kind: "quest", link: this.link(resolveRef(registry, outcome.target)) };
      }
      if (outcome.type === "ship") {
        const shipLink = outcome.ship !== null ? this.link(resolveShip(registry, outcome.ship)) : outcome.hostile ? fight : null;
        return { kind: "ship", hostile: outcome.hostile, link: shipLink };
      }
      return { kind: "effect", outcome };
    });

    let choices: RenderedChoice[] | null = null;
    if (event.choices !== null) {
      choices = event.choices.map((choice) => ({
        label: choice.label,
        highlighted: choice.highlighted,
        target: choice.target ? this.reference(resolveRef(registry, choice.target)) : null,
      }));
    }

    return {
      kind: "event",
      name: event.name,
      textProminent: pins.rootSet.has(event.name) || (event.choices?.length ?? 0) >= 2,
      text: event.text,
      outcomes,
      choices,
      fight,
    };
  }

  private renderGroup(group: EventGroup): RenderedGroup {
    const total = group.cases.reduce((sum, groupCase) => sum + groupCase.weight, 0);
    return {
      kind: "group",
      name: group.name,
      layout: group.cases.length === 1 ? "single" : "list",
      cases: group.cases.map((groupCase) => ({
        weight: groupCase.weight,
        total,
        target: this.reference(resolveRef(this.input.registry, groupCase.target)),
      })),
    };
  }

  private renderShip(ship: Ship): RenderedShip {
    const slots: RenderedShip["slots"] = [];
    for (const slot of SHIP_SLOTS) {
      const target = ship.slots[slot];
      if (target) {
        slots.push({ slot, target: this.reference(resolveRef(this.input.registry, target)) });
      }
    }
    return { kind: "ship", name: ship.name, slots };
  }

  private diagnostics(): RenderResult["diagnostics"] {
    const { registry } = this.input;
    const all: AnyRef[] = [
      ...[...registry.events.keys()].map((name) => ({ kind: "event" as const, name })),
      ...[...registry.groups.keys()].map((name) => ({ kind: "group" as const, name })),
      ...[...registry.ships.keys()].map((name) => ({ kind: "ship" as const, name })),
    ];

    const unreached = all
      .filter((ref) => !this.isOrphanedSynthetic(ref) && !this.emitted.has(refKey(ref)))
      .map(refKey)
      .sort();
    const brokenLinks = [...this.linkTargets].filter((anchor) => !this.anchors.has(anchor)).sort();
    const duplicates = [...this.emitted.entries()]
      .filter(([, times]) => times > 1)
      .map(([key]) => key)
      .sort();

    return { unreached, brokenLinks, duplicates };
  }
}

export function renderGraph(input: RenderInput): RenderResult {
  return new GraphRenderer(input).run();
}
