import { isDeepStrictEqual } from "node:util";
import type { Choice, EntityRef, StoryEvent } from "./types.js";

function sameRef(a: EntityRef | null, b: EntityRef | null): boolean {
  if (a === null || b === null) return a === b;
  return a.name === b.name && a.context === b.context;
}

function sameChoices(a: Choice[] | null, b: Choice[] | null): boolean {
  if (a === null || b === null) return a === b;
  if (a.length !== b.length) return false;
  return a.every(
    (choice, i) =>
      choice.label === b[i].label &&
      choice.highlighted === b[i].highlighted &&
      sameRef(choice.target, b[i].target),
  );
}

/**
 * Structural equality over an event's own fields; the name is ignored.
 * Referenced entities are compared by target name only, never by descending into them:
 * two choices leading to different names are different even if those targets happen to
 * be identical, and self or mutual references cannot recurse.
 */
export function eventsStructurallyEqual(a: StoryEvent, b: StoryEvent): boolean {
  return (
    a.fight === b.fight &&
    isDeepStrictEqual(a.text, b.text) &&
    isDeepStrictEqual(a.outcomes, b.outcomes) &&
    sameChoices(a.choices, b.choices)
  );
}
