import type { TokenizerAndRendererExtension, Tokens } from "marked";
import { escapeHtml } from "../presentation/escape.js";

export interface MathToken extends Tokens.Generic {
  type: "inlineMath" | "blockMath";
  raw: string;
  text: string;
  display: boolean;
}

// Opening `$` not followed by whitespace, closing `$` not preceded by whitespace nor followed by a digit,
// so prices like "$5 and $10" stay text.
const INLINE_MATH_RE = /^\$(?!\s)([^$\n]*?[^\s$])\$(?!\d)/;
const INLINE_DISPLAY_MATH_RE = /^\$\$(?!\s)([^$\n]*?[^\s$])\$\$/;
const BLOCK_MATH_RE = /^\$\$[ \t]*\n([\s\S]*?)\n[ \t]*\$\$[ \t]*(?:\n+|$)/;
const BLOCK_MATH_START_RE = /^\$\$[ \t]*$/m;
const MATH_SPAN_RE = /\$\$(?!\s)[^$\n]*?[^\s$]\$\$|\$(?!\s)[^$\n]*?[^\s$]\$(?!\d)/g;

function readText(token: Tokens.Generic): string {
  return typeof token.text === "string" ? token.text : "";
}

export function renderMath(text: string, display: boolean, block: boolean): string {
  const escaped = escapeHtml(text);
  if (block) {
    return `<div class="math math-display">${escaped}</div>\n`;
  }
  return `<span class="math ${display ? "math-display" : "math-inline"}">${escaped}</span>`;
}

/**
 * Blank out the inside of every math span, keeping the length, so emphasis
 * delimiters inside math cannot pair with ones outside it.
 */
export function maskMath(src: string): string {
  return src.replace(MATH_SPAN_RE, (span) => `$${"a".repeat(span.length - 2)}$`);
}

export const MATH_TOKEN_TYPES: ReadonlySet<string> = new Set(["inlineMath", "blockMath"]);

/** `$…$` and `$$…$$` within a line, passed through for client-side rendering. */
export const inlineMathExtension: TokenizerAndRendererExtension = {
  name: "inlineMath",
  level: "inline",
  start(src: string) {
    return src.indexOf("$");
  },
  tokenizer(src: string): MathToken | undefined {
    const display = src.match(INLINE_DISPLAY_MATH_RE);
    const match = display ?? src.match(INLINE_MATH_RE);
    if (!match) {
      return undefined;
    }
    return { type: "inlineMath", raw: match[0], text: match[1] ?? "", display: display !== null };
  },
  renderer(token: Tokens.Generic) {
    return renderMath(readText(token), token.display === true, false);
  },
};

/** `$$` on its own line, content lines, `$$` on its own line. */
export const blockMathExtension: TokenizerAndRendererExtension = {
  name: "blockMath",
  level: "block",
  start(src: string) {
    return src.match(BLOCK_MATH_START_RE)?.index;
  },
  tokenizer(src: string): MathToken | undefined {
    const match = src.match(BLOCK_MATH_RE);
    if (!match) {
      return undefined;
    }
    return { type: "blockMath", raw: match[0], text: match[1] ?? "", display: true };
  },
  renderer(token: Tokens.Generic) {
    return renderMath(readText(token), true, true);
  },
};
