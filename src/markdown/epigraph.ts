import type { Token, Tokens } from "marked";

// Checked in this order; the last occurrence of the first one found wins.
const DELIMITERS = ["--", "–", "—"] as const;

export interface Attribution {
  quote: string;
  attribution: string;
}

export function isBlockquote(token: Token): token is Tokens.Blockquote {
  return token.type === "blockquote" && Array.isArray(token.tokens);
}

function isParagraph(token: Token): token is Tokens.Paragraph {
  return token.type === "paragraph" && Array.isArray(token.tokens);
}

function isText(token: Token): token is Tokens.Text {
  return token.type === "text" && "text" in token && typeof token.text === "string";
}

/** Split `Quote -- Author` into its parts; undefined when there is no attribution. */
export function splitAttribution(text: string): Attribution | undefined {
  for (const delimiter of DELIMITERS) {
    const at = text.lastIndexOf(delimiter);
    if (at === -1) {
      continue;
    }
    const attribution = text
      .slice(at)
      .replace(/^[-–—]+/, "")
      .trim();
    if (!attribution) {
      return undefined;
    }
    return { quote: text.slice(0, at).trimEnd(), attribution };
  }
  return undefined;
}

/**
 * Pull a trailing attribution out of a blockquote's last paragraph. The
 * token is edited in place: the attribution text is removed, and so is a
 * paragraph left empty by that.
 */
export function extractAttribution(blockquote: Tokens.Blockquote): string | undefined {
  const children = blockquote.tokens;
  let last = children.length - 1;
  while (last >= 0 && children[last]?.type === "space") {
    last--;
  }
  const paragraph = children[last];
  if (!paragraph || !isParagraph(paragraph)) {
    return undefined;
  }

  const inline = paragraph.tokens;
  const textIndex = inline.length - 1;
  const text = inline[textIndex];
  if (!text || !isText(text)) {
    return undefined;
  }
  const split = splitAttribution(text.text);
  if (!split) {
    return undefined;
  }

  if (split.quote) {
    text.text = split.quote;
    text.raw = split.quote;
  } else {
    inline.splice(textIndex, 1);
    if (inline.length === 0) {
      children.splice(last, 1);
    }
  }
  return split.attribution;
}
