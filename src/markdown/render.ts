import { Marked, Tokenizer, type Token, type Tokens } from "marked";
import { escapeHtml } from "../presentation/escape.js";
import { extractAttribution, isBlockquote } from "./epigraph.js";
import { isFigureParagraph, renderFigure } from "./figure.js";
import { highlightCode } from "./highlight.js";
import { createFootnoteExtensions, FOOTNOTE_SECTION_TOKEN, FootnoteTable } from "./footnotes.js";
import type { LanguageTable } from "./languages.js";
import { blockMathExtension, inlineMathExtension, maskMath, MATH_TOKEN_TYPES } from "./math.js";

export interface RenderedMarkdown {
  html: string;
  /** The fragment contains math spans, so the page needs the client-side renderer */
  hasMath: boolean;
  /** Number of footnotes emitted */
  footnotes: number;
}

/**
 * Render a document body to an HTML fragment. Each call gets its own
 * `Marked` instance and footnote table, so concurrent renders share nothing.
 */
export function renderMarkdown(body: string, languages: LanguageTable): RenderedMarkdown {
  const table = new FootnoteTable();
  const attributions = new Map<Tokens.Blockquote, string>();
  let images = 0;

  const marked = new Marked({ gfm: true });
  marked.use({
    extensions: [inlineMathExtension, blockMathExtension, ...createFootnoteExtensions(table)],
    tokenizer: {
      emStrong(src: string, maskedSrc: string, prevChar?: string) {
        return Tokenizer.prototype.emStrong.call(this, src, maskMath(maskedSrc), prevChar);
      },
    },
    renderer: {
      code({ text, lang }: Tokens.Code) {
        return highlightCode(text, lang, languages);
      },
      image(token: Tokens.Image) {
        images++;
        return renderFigure(token, images === 1);
      },
      paragraph(token: Tokens.Paragraph) {
        const inner = this.parser.parseInline(token.tokens);
        return isFigureParagraph(token) ? `${inner}\n` : `<p>${inner}</p>\n`;
      },
      blockquote(token: Tokens.Blockquote) {
        const inner = this.parser.parse(token.tokens);
        const attribution = attributions.get(token);
        const footer = attribution === undefined ? "" : `<footer>${escapeHtml(attribution)}</footer>`;
        return `<blockquote>\n${inner}${footer}</blockquote>\n`;
      },
    },
  });

  const tokens = marked.lexer(body);
  const walk = (list: Token[], visit: (token: Token) => void): void => {
    marked.walkTokens(list, visit);
  };

  table.resolve(tokens, walk);

  walk(tokens, (token) => {
    if (isBlockquote(token)) {
      const attribution = extractAttribution(token);
      if (attribution !== undefined) {
        attributions.set(token, attribution);
      }
    }
  });

  let hasMath = false;
  const detectMath = (token: Token): void => {
    if (MATH_TOKEN_TYPES.has(token.type)) {
      hasMath = true;
    }
  };
  walk(tokens, detectMath);
  for (const { definition } of table.ordered()) {
    walk(definition.content, detectMath);
  }

  tokens.push(FOOTNOTE_SECTION_TOKEN);
  const html = marked.parser(tokens);

  return { html, hasMath, footnotes: table.size };
}
