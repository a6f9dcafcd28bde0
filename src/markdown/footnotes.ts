import type { RendererThis, Token, TokenizerAndRendererExtension, TokenizerThis, Tokens } from "marked";
import { SiteError } from "../errors.js";

export interface FootnoteReferenceToken extends Tokens.Generic {
  type: "footnoteRef";
  raw: string;
  label: string;
}

/** Inline content lives under `content`, not `tokens`, so a plain token walk never enters it. */
export interface FootnoteDefinitionToken extends Tokens.Generic {
  type: "footnoteDef";
  raw: string;
  label: string;
  content: Token[];
}

export type TokenWalker = (tokens: Token[], visit: (token: Token) => void) => void;

interface FootnoteEntry {
  label: string;
  ordinal: number;
  definition: FootnoteDefinitionToken;
  citations: number;
}

const REFERENCE_RE = /^\[\^([^\]\s]+)\]/;
// Lines that start a new block end a definition, as they would end a paragraph.
const INTERRUPT = String.raw`[ \t]*\n|\[\^[^\]\s]+\]:| {0,3}(?:#{1,6}(?:[ \t]|\n|$)|[-*+][ \t]|\d{1,9}[.)][ \t]|\x60{3}|~{3}|>|\$\$|<|(?:[-*_][ \t]*){3,}\n)`;
const DEFINITION_RE = new RegExp(
  String.raw`^\[\^([^\]\s]+)\]:[ \t]*([^\n]*(?:\n(?!${INTERRUPT})[^\n]+)*)(?:\n+|$)`
);
const DEFINITION_START_RE = /^\[\^[^\]\s]+\]:/m;

export function isFootnoteReference(token: Token): token is FootnoteReferenceToken {
  return token.type === "footnoteRef" && "label" in token && typeof token.label === "string";
}

export function isFootnoteDefinition(token: Token): token is FootnoteDefinitionToken {
  return (
    token.type === "footnoteDef" &&
    "label" in token &&
    typeof token.label === "string" &&
    "content" in token &&
    Array.isArray(token.content)
  );
}

function readLabel(token: Tokens.Generic): string {
  return typeof token.label === "string" ? token.label : "";
}

/**
 * Footnote bookkeeping for a single render pass. Ordinals follow the first
 * reference in the body; labels referenced only from inside other footnotes
 * are numbered after those, in the order they are reached.
 */
export class FootnoteTable {
  private readonly entries = new Map<string, FootnoteEntry>();

  get size(): number {
    return this.entries.size;
  }

  /** First pass: collect references and definitions, assign ordinals. */
  resolve(tokens: Token[], walk: TokenWalker): void {
    const definitions = new Map<string, FootnoteDefinitionToken>();
    const queue: string[] = [];

    walk(tokens, (token) => {
      if (isFootnoteDefinition(token)) {
        if (!definitions.has(token.label)) {
          definitions.set(token.label, token);
        }
      } else if (isFootnoteReference(token)) {
        queue.push(token.label);
      }
    });

    for (let i = 0; i < queue.length; i++) {
      const label = queue[i];
      if (label === undefined || this.entries.has(label)) {
        continue;
      }
      const definition = definitions.get(label);
      if (!definition) {
        throw new SiteError("UndefinedFootnote", `footnote [^${label}] is referenced but never defined`);
      }
      this.entries.set(label, { label, ordinal: this.entries.size + 1, definition, citations: 0 });

      walk(definition.content, (token) => {
        if (isFootnoteReference(token)) {
          queue.push(token.label);
        }
      });
    }
  }

  /** Record one more citation of `label`; the first citation owns the back-link anchor. */
  cite(label: string): { ordinal: number; anchorId: string } {
    const entry = this.entries.get(label);
    if (!entry) {
      throw new SiteError("UndefinedFootnote", `footnote [^${label}] is referenced but never defined`);
    }
    entry.citations += 1;
    const anchorId = entry.citations === 1 ? `fnref-${entry.ordinal}` : `fnref-${entry.ordinal}-${entry.citations}`;
    return { ordinal: entry.ordinal, anchorId };
  }

  ordered(): FootnoteEntry[] {
    return [...this.entries.values()].sort((a, b) => a.ordinal - b.ordinal);
  }
}

/** Token appended after the body so the footnote list renders last. */
export const FOOTNOTE_SECTION_TOKEN: Tokens.Generic = { type: "footnoteSection", raw: "" };

export function createFootnoteExtensions(table: FootnoteTable): TokenizerAndRendererExtension[] {
  const reference: TokenizerAndRendererExtension = {
    name: "footnoteRef",
    level: "inline",
    start(src: string) {
      return src.indexOf("[^");
    },
    tokenizer(src: string): FootnoteReferenceToken | undefined {
      const match = src.match(REFERENCE_RE);
      if (!match?.[1]) {
        return undefined;
      }
      return { type: "footnoteRef", raw: match[0], label: match[1] };
    },
    renderer(token: Tokens.Generic) {
      const { ordinal, anchorId } = table.cite(readLabel(token));
      return `<sup class="footnote-ref" id="${anchorId}"><a href="#fn-${ordinal}">${ordinal}</a></sup>`;
    },
  };

  const definition: TokenizerAndRendererExtension = {
    name: "footnoteDef",
    level: "block",
    start(src: string) {
      return src.match(DEFINITION_START_RE)?.index;
    },
    tokenizer(this: TokenizerThis, src: string): FootnoteDefinitionToken | undefined {
      const match = src.match(DEFINITION_RE);
      if (!match?.[1]) {
        return undefined;
      }
      const text = (match[2] ?? "")
        .split("\n")
        .map((line) => line.trim())
        .join("\n")
        .trim();
      const token: FootnoteDefinitionToken = { type: "footnoteDef", raw: match[0], label: match[1], content: [] };
      this.lexer.inline(text, token.content);
      return token;
    },
    // Definitions render in the footnote section, not where they were written.
    renderer() {
      return "";
    },
  };

  const section: TokenizerAndRendererExtension = {
    name: "footnoteSection",
    renderer(this: RendererThis) {
      const entries = table.ordered();
      if (entries.length === 0) {
        return "";
      }
      const items = entries
        .map(({ ordinal, definition }) => {
          const text = this.parser.parseInline(definition.content);
          const backref = `<a href="#fnref-${ordinal}" class="footnote-backref" aria-label="Back to reference ${ordinal}">↩</a>`;
          return `<li id="fn-${ordinal}">${text} ${backref}</li>\n`;
        })
        .join("");
      return `<section class="footnotes" aria-label="Footnotes">\n<hr>\n<ol>\n${items}</ol>\n</section>\n`;
    },
  };

  return [reference, definition, section];
}
