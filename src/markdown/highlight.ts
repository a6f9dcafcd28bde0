import { escapeHtml } from "../presentation/escape.js";
import { findLanguage, type Language, type LanguageTable } from "./languages.js";

export interface CodeToken {
  /** Token class, absent for plain text */
  token?: string;
  text: string;
}

function matchAt(language: Language, code: string, pos: number): CodeToken | undefined {
  for (const rule of language.rules) {
    rule.regex.lastIndex = pos;
    const match = rule.regex.exec(code);
    if (match && match[0].length > 0) {
      return { token: rule.token, text: match[0] };
    }
  }
  return undefined;
}

/** First matching rule wins at each position; runs of unmatched characters become one plain token. */
export function tokenize(code: string, language: Language): CodeToken[] {
  const tokens: CodeToken[] = [];
  let plain = "";
  let pos = 0;

  while (pos < code.length) {
    const hit = matchAt(language, code, pos);
    if (!hit) {
      plain += code.charAt(pos);
      pos += 1;
      continue;
    }
    if (plain) {
      tokens.push({ text: plain });
      plain = "";
    }
    tokens.push(hit);
    pos += hit.text.length;
  }
  if (plain) {
    tokens.push({ text: plain });
  }
  return tokens;
}

function renderTokens(tokens: CodeToken[]): string {
  return tokens
    .map(({ token, text }) =>
      token === undefined ? escapeHtml(text) : `<span class="tok-${token}">${escapeHtml(text)}</span>`
    )
    .join("");
}

/**
 * Highlight a fenced code block. Unknown or absent languages come back as
 * escaped plain text with no token spans.
 */
export function highlightCode(code: string, lang: string | undefined, table: LanguageTable): string {
  const tag = lang?.trim().split(/\s+/)[0] ?? "";
  const language = findLanguage(table, tag);
  const classAttr = tag ? ` class="language-${escapeHtml(tag)}"` : "";
  const inner = language ? renderTokens(tokenize(code, language)) : escapeHtml(code);
  return `<pre><code${classAttr}>${inner}</code></pre>\n`;
}
