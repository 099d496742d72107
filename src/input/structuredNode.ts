/**
 * Generic element shape handed to the graph builder. Whatever the input format,
 * a loader turns it into these before anything else looks at it.
 */
export type StructuredNode = {
  tag: string;
  attributes: Record<string, string>;
  children: StructuredNode[];
  text: string | null; // concatenated character data, trimmed; null when empty
};

export function makeNode(
  tag: string,
  attributes: Record<string, string> = {},
  children: StructuredNode[] = [],
  text: string | null = null,
): StructuredNode {
  return { tag, attributes, children, text };
}

export function attr(node: StructuredNode, name: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(node.attributes, name) ? node.attributes[name] : undefined;
}

/** First direct child with the given tag. */
export function child(node: StructuredNode, tag: string): StructuredNode | undefined {
  return node.children.find((c) => c.tag === tag);
}

/** All direct children with the given tag, in document order. */
export function childrenOf(node: StructuredNode, tag: string): StructuredNode[] {
  return node.children.filter((c) => c.tag === tag);
}

export function requireAttr(node: StructuredNode, name: string): string {
  const value = attr(node, name);
  if (value === undefined) {
    throw new Error(`<${node.tag}> is missing required attribute "${name}"`);
  }
  return value;
}

export function requireIntAttr(node: StructuredNode, name: string): number {
  const raw = requireAttr(node, name);
  const n = Number(raw);
  if (!Number.isInteger(n)) {
    throw new Error(`<${node.tag}> attribute "${name}" is not an integer: ${raw}`);
  }
  return n;
}
