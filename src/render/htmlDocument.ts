import { escapeHtml } from "../utils/html.js";
import type { ShipSlot } from "../graph/types.js";
import { describeOutcome } from "./describeOutcome.js";
import type {
  RenderedBody,
  RenderedEvent,
  RenderedGroup,
  RenderedOutcome,
  RenderedShip,
  RenderLink,
  RenderResult,
  RenderTarget,
  TopLevelBlock,
} from "./renderTypes.js";
import type { Vocabulary } from "./vocabulary.js";

export type HtmlDocumentOptions = {
  title: string;
};

export const SHIP_SLOT_CAPTIONS: Record<ShipSlot, string> = {
  destroyed: "You destroy the enemy ship",
  deadCrew: "You kill the enemy crew",
  gotaway: "The enemy ship escaped",
  surrender: "The enemy ship offers to surrender",
};

const STYLE = `
    body {
        font-family: sans-serif;
        color: #222;
        max-width: 50em;
        margin: 0 auto;
    }

    a, a:visited { color: rgb(0, 0, 238); }
    a { text-decoration: none; }
    a:hover, a:focus { text-decoration: underline; }

    h2 { font-size: medium; }

    .texts  { list-style: circle;  }
    .random { list-style: circle;  }
    .result { list-style: disc;    }
    .choice { list-style: decimal; }
    .fight  { list-style: square;  }

    ul.fight > li {
        margin-top: 10px;
        margin-bottom: 10px;
    }

    ul.texts { padding-left: 0px; }
    .indent { padding-left: 20px; }
    .blue { color: #10aee8; }

    .inner { display: none; }
    .showchildren .inner { display: block; }
`;

const TOGGLE_SCRIPT = `
    var toggle = document.getElementById('showinner');
    update_showhidden();
    toggle.addEventListener('change', update_showhidden);

    function update_showhidden() {
        document.body.className = toggle.checked ? 'showchildren' : '';
    }
`;

export function linkHtml(link: RenderLink): string {
  return `<a href="#${escapeHtml(link.anchor)}">${escapeHtml(link.name)}</a>`;
}

/**
 * Serializes a render tree. Output depends only on its inputs: same tree, same bytes.
 */
class HtmlWriter {
  readonly lines: string[] = [];

  constructor(private readonly vocabulary: Vocabulary) {}

  block(block: TopLevelBlock): void {
    this.lines.push(`<h2 id="${escapeHtml(block.anchor)}">${escapeHtml(block.name)}</h2>`);
    this.lines.push('<div class="indent">');
    this.body(block.body);
    this.lines.push("</div>");
  }

  private body(body: RenderedBody): void {
    switch (body.kind) {
      case "event":
        this.event(body);
        return;
      case "group":
        this.group(body);
        return;
      case "ship":
        this.ship(body);
        return;
    }
  }

  private target(target: RenderTarget): void {
    if (target.mode === "inline") {
      this.body(target.body);
    } else {
      this.lines.push(`<ul class="result"><li>Go to ${linkHtml(target.link)}</ul>`);
    }
  }

  private event(event: RenderedEvent): void {
    const text = this.textHtml(event);
    if (text !== "") {
      this.lines.push(event.textProminent ? text : `<div class="inner">${text}</div>`);
    }

    if (event.outcomes.length > 0) {
      const items = event.outcomes.map((outcome) => `<li>${this.outcomeHtml(outcome)}`);
      this.lines.push(`<ul class="result">${items.join("\n")}</ul>`);
    }

    if (event.choices !== null) {
      this.lines.push('<ol class="choice">');
      for (const choice of event.choices) {
        const cls = choice.highlighted ? ' class="blue"' : "";
        this.lines.push(`<li><em${cls}>${escapeHtml(choice.label)}</em>`);
        this.lines.push("<div>");
        if (choice.target !== null) this.target(choice.target);
        this.lines.push("</div>");
      }
      this.lines.push("</ol>");
    }
  }

  private textHtml(event: RenderedEvent): string {
    switch (event.text.kind) {
      case "none":
        return "";
      case "single":
        return `<p>${escapeHtml(event.text.text)}</p>`;
      case "alternatives":
        return ['<ul class="texts">', ...event.text.texts.map((text) => `<li>${escapeHtml(text)}`), "</ul>"].join("\n");
    }
  }

  private outcomeHtml(outcome: RenderedOutcome): string {
    switch (outcome.kind) {
      case "effect":
        return describeOutcome(outcome.outcome, this.vocabulary);
      case "quest":
        return `<strong>Quest</strong> marker for ${linkHtml(outcome.link)}`;
      case "ship":
        if (outcome.link === null) {
          return outcome.hostile ? "<strong>Fight</strong>" : "<strong>End Fight</strong>";
        }
        return `<strong>${outcome.hostile ? "Fight" : "Encounter"}</strong> a ${linkHtml(outcome.link)}`;
    }
  }

  private group(group: RenderedGroup): void {
    if (group.layout === "single") {
      for (const groupCase of group.cases) this.target(groupCase.target);
      return;
    }

    this.lines.push('<ul class="random">');
    for (const groupCase of group.cases) {
      this.lines.push(`<li> ${groupCase.weight}/${groupCase.total}`);
      this.target(groupCase.target);
    }
    this.lines.push("</ul>");
  }

  private ship(ship: RenderedShip): void {
    this.lines.push('<ul class="fight">');
    for (const slot of ship.slots) {
      this.lines.push(`<li><em>${escapeHtml(SHIP_SLOT_CAPTIONS[slot.slot])}</em>`);
      this.lines.push("<div>");
      this.target(slot.target);
      this.lines.push("</div>");
    }
    this.lines.push("</ul>");
  }
}

export function renderHtmlDocument(result: RenderResult, vocabulary: Vocabulary, options: HtmlDocumentOptions): string {
  const title = escapeHtml(options.title);
  const writer = new HtmlWriter(vocabulary);
  const lines = writer.lines;

  lines.push("<!doctype html>");
  lines.push("<html>");
  lines.push("<head>");
  lines.push('<meta charset="utf-8">');
  lines.push(`<title>${title}</title>`);
  lines.push(`<style>${STYLE}</style>`);
  lines.push("</head>");
  lines.push("<body>");
  lines.push(`<h1>${title}</h1>`);
  lines.push("<p>Every event of the game, with its choices, random outcomes and fights. Use Ctrl-F to find an event.");
  lines.push("<p>Some events in the list may be test or debug events that cannot be reached in normal play.");
  lines.push("<h2>Settings</h2>");
  lines.push('<ul style="list-style:none">');
  lines.push('<li><input type="checkbox" id="showinner"><label for="showinner">Show full text for event responses</label>');
  lines.push("</ul>");
  lines.push(`<script>${TOGGLE_SCRIPT}</script>`);

  lines.push("<h1>Events</h1>");
  for (const block of result.events) writer.block(block);

  lines.push("<h1>Fights</h1>");
  for (const block of result.fights) writer.block(block);

  lines.push("</body>");
  lines.push("</html>");
  return lines.join("\n") + "\n";
}
