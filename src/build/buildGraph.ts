import { log } from "../utils/logger.js";
import { EntityRegistry } from "../graph/registry.js";
import { refKey, SHIP_SLOTS, type Choice, type EntityRef, type EventText, type NameIndex, type ResolvedRef, type Ship } from "../graph/types.js";
import { attr, child, childrenOf, requireAttr, type StructuredNode } from "../input/structuredNode.js";
import type { TextSource } from "../input/textResolver.js";
import { readChoiceLabel } from "./choices.js";
import { readEventOutcomes } from "./outcomes.js";
import { ShapeTracker, type UnknownShape } from "./unknownShapes.js";

const buildLog = log.withScope("build");

const OVERRIDE_PREFIX = "OVERRIDE_";

export type BuildWarningKind = "suspiciousEvent" | "emptyChoice" | "zeroCrew";

export type BuildWarning = {
  kind: BuildWarningKind;
  entity: string;
  message: string;
};

export type BuildInput = {
  /** top-level nodes of each document, in document order */
  documents: StructuredNode[][];
  texts: TextSource;
  /** every real name, gathered before building so quest markers can be classified */
  knownNames: NameIndex;
};

export type BuildResult = {
  registry: EntityRegistry;
  questTargets: ResolvedRef[];
  unknownShapes: UnknownShape[];
  warnings: BuildWarning[];
};

/**
 * Turns structured nodes into the three namespaces. References are kept as names and
 * resolved later, so documents can come in any order. Pure aliases (<event load="X"/>)
 * create nothing and simply stand for X.
 */
export class GraphBuilder {
  readonly registry: EntityRegistry;
  private readonly shapes = new ShapeTracker();
  private readonly questTargets = new Map<string, ResolvedRef>();
  private readonly warnings: BuildWarning[] = [];
  private readonly overrides: StructuredNode[] = [];
  private finished = false;

  constructor(
    private readonly texts: TextSource,
    private readonly knownNames: NameIndex,
  ) {
    this.registry = new EntityRegistry(knownNames);
  }

  addDocument(nodes: StructuredNode[]): void {
    if (this.finished) {
      throw new Error("GraphBuilder.addDocument called after finish()");
    }

    for (const node of nodes) {
      switch (node.tag) {
        case "event":
          this.addEvent(node, null);
          break;
        case "eventList":
          if (requireAttr(node, "name").startsWith(OVERRIDE_PREFIX)) {
            this.overrides.push(node);
          } else {
            this.addGroup(node);
          }
          break;
        case "ship":
          this.addShip(node);
          break;
        default:
          // textList, text, blueprints, sectors: handled by the loader
          break;
      }
    }
  }

  finish(): BuildResult {
    if (!this.finished) {
      this.finished = true;
      for (const node of this.overrides) this.addGroup(node);
    }

    buildLog.debug("built graph", {
      events: this.registry.events.size,
      groups: this.registry.groups.size,
      ships: this.registry.ships.size,
      questTargets: this.questTargets.size,
    });

    return {
      registry: this.registry,
      questTargets: [...this.questTargets.values()],
      unknownShapes: [...this.shapes.reported],
      warnings: [...this.warnings],
    };
  }

  /**
   * Builds one <event> (or an event-shaped node such as a ship's <destroyed>) and returns
   * the name that refers to it.
   * @param enemyShip ship loaded by the enclosing event, fought by a bare hostile <ship>
   */
  addEvent(node: StructuredNode, enemyShip: string | null): string {
    this.shapes.check(node, "event");

    const alias = attr(node, "load");
    if (alias) return alias;

    const declaredName = attr(node, "name");
    const where = declaredName ?? `<${node.tag}> (unnamed)`;

    const text = this.readText(node);
    const read = readEventOutcomes(node, {
      knownNames: this.knownNames,
      enemyShip,
      onQuestTarget: (target) => this.questTargets.set(refKey(target), target),
      onNotice: (message) => this.warn("zeroCrew", where, message),
    });

    const choiceNodes = childrenOf(node, "choice");
    let choices: Choice[] | null = null;
    if (choiceNodes.length > 0) {
      choices = choiceNodes.map((choiceNode) => {
        const { label, highlighted } = readChoiceLabel(choiceNode, this.texts);
        const subEvent = child(choiceNode, "event");
        if (!subEvent) {
          this.warn("emptyChoice", where, `empty choice "${label}"`);
          return { label, highlighted, target: null };
        }
        const target: EntityRef = { name: this.addEvent(subEvent, read.enemyShip), context: "topLevel" };
        return { label, highlighted, target };
      });
    }

    const outcomes = read.outcomes;
    if (outcomes.length === 0 && choices === null && read.fight === null) {
      outcomes.push({ type: "nothing" });
    }

    // Nested events are numbered before their parent
    const name = declaredName ?? this.registry.nextSyntheticName();

    if (choices !== null && read.fight !== null) {
      this.warn("suspiciousEvent", name, `event has both choices and a fight against ${read.fight}`);
    }

    this.registry.addEvent({
      name,
      synthetic: declaredName === undefined,
      text,
      outcomes,
      choices,
      fight: read.fight,
    });
    return name;
  }

  addGroup(node: StructuredNode): string {
    this.shapes.check(node, "eventList");

    const cases = childrenOf(node, "event").map((eventNode) => ({
      weight: 1,
      target: { name: this.addEvent(eventNode, null), context: "insideGroup" as const },
    }));

    const rawName = requireAttr(node, "name");
    if (rawName.startsWith(OVERRIDE_PREFIX)) {
      const name = rawName.slice(OVERRIDE_PREFIX.length);
      this.registry.overrideGroup({ name, cases });
      return name;
    }

    this.registry.addGroup({ name: rawName, cases });
    return rawName;
  }

  addShip(node: StructuredNode): string {
    this.shapes.check(node, "ship");

    const name = requireAttr(node, "name");
    const slots: Ship["slots"] = {};
    for (const slot of SHIP_SLOTS) {
      const slotNode = child(node, slot);
      if (slotNode) {
        slots[slot] = { name: this.addEvent(slotNode, null), context: "topLevel" };
      }
    }

    this.registry.addShip({ name, slots });
    return name;
  }

  private readText(node: StructuredNode): EventText {
    const textNode = child(node, "text");
    if (!textNode) return { kind: "none" };

    const listName = attr(textNode, "load");
    if (listName) {
      return { kind: "alternatives", texts: this.texts.alternatives(listName) };
    }
    return { kind: "single", text: this.texts.resolveText(textNode) };
  }

  private warn(kind: BuildWarningKind, entity: string, message: string): void {
    this.warnings.push({ kind, entity, message });
  }
}

export function buildGraph(input: BuildInput): BuildResult {
  const builder = new GraphBuilder(input.texts, input.knownNames);
  for (const document of input.documents) {
    builder.addDocument(document);
  }
  return builder.finish();
}
