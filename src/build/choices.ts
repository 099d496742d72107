import { attr, child, type StructuredNode } from "../input/structuredNode.js";
import type { TextSource } from "../input/textResolver.js";

// Cost already shown among the results of the choice
const REDUNDANT_MISSILE_COST = "[ Missiles: -1 ]";

export type ChoiceLabel = {
  label: string;
  highlighted: boolean;
};

function levelRequirement(req: string, minLevel: string | undefined, maxLevel: string | undefined): string {
  if (minLevel !== undefined && maxLevel !== undefined) return `(${minLevel} ≤ ${req} ≤ ${maxLevel}) `;
  if (minLevel !== undefined) return `(${req} ≥ ${minLevel}) `;
  if (maxLevel !== undefined) return `(${req} ≤ ${maxLevel}) `;
  return "";
}

/**
 * Label and highlight of a <choice>. Blue options are the ones gated behind a hidden
 * requirement; level bounds only change the label, never the highlight.
 */
export function readChoiceLabel(choice: StructuredNode, texts: TextSource): ChoiceLabel {
  const textNode = child(choice, "text");
  let text = textNode ? texts.resolveText(textNode).trim() : "";

  const req = attr(choice, "req");
  const blue = attr(choice, "blue");
  const minLevel = attr(choice, "lvl") ?? attr(choice, "min_level");
  const maxLevel = attr(choice, "max_lvl") ?? attr(choice, "max_level");
  const hidden = attr(choice, "hidden")?.toLowerCase();

  if (text.endsWith(REDUNDANT_MISSILE_COST)) {
    text = text.slice(0, -REDUNDANT_MISSILE_COST.length).trimEnd();
  }

  const highlighted = req !== undefined && hidden === "true" && blue !== "false";
  const isComplex = Boolean(maxLevel) || (Boolean(minLevel) && minLevel !== "1");

  const reqMsg = req && isComplex ? levelRequirement(req, minLevel || undefined, maxLevel || undefined) : "";

  // "(Improved Weapons) Fire!" reads worse than "(weapons ≥ 6) Fire!"
  if (reqMsg && text.startsWith("(")) {
    const close = text.indexOf(")");
    if (close >= 0) text = text.slice(close + 1).trimStart();
  }

  return { label: reqMsg + text, highlighted };
}
