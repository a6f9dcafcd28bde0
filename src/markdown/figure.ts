import type { Tokens } from "marked";
import { escapeHtml } from "../presentation/escape.js";

/**
 * An image as a captioned figure. The first image on a page loads eagerly
 * at high priority; the rest load lazily.
 */
export function renderFigure({ href, title, text }: Tokens.Image, first: boolean): string {
  const attrs = [`src="${escapeHtml(href)}"`, `alt="${escapeHtml(text)}"`];
  if (title) {
    attrs.push(`title="${escapeHtml(title)}"`);
  }
  attrs.push(first ? 'loading="eager"' : 'loading="lazy"', 'decoding="async"');
  if (first) {
    attrs.push('fetchpriority="high"');
  }
  const caption = text ? `<figcaption>${escapeHtml(text)}</figcaption>` : "";
  return `<figure class="image-container"><img ${attrs.join(" ")} />${caption}</figure>`;
}

/** A paragraph holding nothing but images and whitespace. */
export function isFigureParagraph({ tokens }: Tokens.Paragraph): boolean {
  let images = 0;
  for (const token of tokens) {
    if (token.type === "image") {
      images++;
    } else if (!(token.type === "text" && token.raw.trim() === "")) {
      return false;
    }
  }
  return images > 0;
}
