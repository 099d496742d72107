import { attr, childrenOf, type StructuredNode } from "./structuredNode.js";

/** What the graph builder needs from the localization layer. */
export interface TextSource {
  /** English text for a <text> node. */
  resolveText(node: StructuredNode): string;
  /** Every alternative of a <textList>, resolved. */
  alternatives(listName: string): string[];
}

const NO_TEXT = "(no text)";

/**
 * Resolves <text> nodes against the translation tables (text_*.xml) and the <textList>
 * groups found in the event files.
 */
export class TextResolver implements TextSource {
  private readonly translations = new Map<string, string>();
  private readonly textLists = new Map<string, StructuredNode[]>();

  addTranslation(key: string, value: string): void {
    if (this.translations.has(key)) {
      throw new Error(`Duplicate translation key: ${key}`);
    }
    this.translations.set(key, value);
  }

  /** Picks up every <text name="..."> entry of a translation document. */
  addTranslationDocument(nodes: StructuredNode[]): void {
    for (const node of nodes) {
      if (node.tag !== "text") continue;
      const key = attr(node, "name");
      if (key === undefined) continue;
      this.addTranslation(key, node.text ?? "");
    }
  }

  addTextList(node: StructuredNode): void {
    const name = attr(node, "name");
    if (name === undefined) {
      throw new Error("<textList> without a name");
    }
    if (this.textLists.has(name)) {
      throw new Error(`Duplicate text list: ${name}`);
    }
    this.textLists.set(name, childrenOf(node, "text"));
  }

  get translationCount(): number {
    return this.translations.size;
  }

  resolveText(node: StructuredNode): string {
    // Hardcoded text
    if (node.text !== null) return node.text;

    const id = attr(node, "id");
    if (id) {
      const translated = this.translations.get(id);
      if (translated === undefined) {
        throw new Error(`Unknown text id: ${id}`);
      }
      return translated;
    }

    // Text lists hold interchangeable variants; the first one stands for all of them
    const listName = attr(node, "load");
    if (listName) {
      const [first] = this.listNodes(listName);
      return first ? this.resolveText(first) : NO_TEXT;
    }

    return NO_TEXT;
  }

  alternatives(listName: string): string[] {
    return this.listNodes(listName).map((node) => this.resolveText(node));
  }

  private listNodes(listName: string): StructuredNode[] {
    const nodes = this.textLists.get(listName);
    if (!nodes) {
      throw new Error(`Unknown text list: ${listName}`);
    }
    return nodes;
  }
}
