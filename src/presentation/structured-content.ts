export interface TocItem {
  id: string;
  /** Heading level after demotion: 2 or 3 */
  level: number;
  text: string;
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/<[^>]+>/g, "")
    .replace(/[^\p{L}\p{M}\p{N}\s-]/gu, "")
    .trim()
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");
}

function tocEntry(className: string, num: string, item: TocItem): string {
  return (
    `<li class="${className}"><a href="#${item.id}"><span class="toc-num">${num}</span>` +
    `<span class="toc-text">${item.text}</span><span class="toc-leader" aria-hidden="true"></span></a>`
  );
}

/**
 * Margin table of contents: `h2` entries numbered `01`, `02`, with the
 * `h3`s under each numbered `01.1`. An `h3` before any `h2` stands alone.
 */
export function renderToc(toc: TocItem[]): string {
  if (toc.length === 0) {
    return "";
  }

  const groups: { item: TocItem; children: TocItem[] }[] = [];
  for (const item of toc) {
    const current = groups[groups.length - 1];
    if (item.level === 3 && current && current.item.level === 2) {
      current.children.push(item);
    } else {
      groups.push({ item, children: [] });
    }
  }

  const items = groups
    .map(({ item, children }, index) => {
      const num = String(index + 1).padStart(2, "0");
      let html = tocEntry("toc-l1", num, item);
      if (children.length > 0) {
        const sub = children.map((child, j) => `${tocEntry("toc-l2", `${num}.${j + 1}`, child)}</li>`).join("");
        html += `<ol class="toc-sub">${sub}</ol>`;
      }
      return `${html}</li>`;
    })
    .join("");

  return (
    `<div class="toc-anchor"><nav class="toc marginnote" aria-label="Contents">` +
    `<p class="toc-title">Contents</p><ol class="toc-list">${items}</ol></nav></div>`
  );
}

/**
 * Give every heading a slug id and push it down one level, since the page
 * title owns `<h1>`. `h6` stays `h6`. Repeated slugs get `-2`, `-3`, ….
 * The demoted `h2` and `h3` headings make up the table of contents.
 */
export function enrichHeadings(contentHtml: string): { html: string; toc: TocItem[] } {
  const counts = new Map<string, number>();
  const toc: TocItem[] = [];

  const html = contentHtml.replace(/<h([1-6])>([\s\S]*?)<\/h\1>/g, (_match, levelRaw: string, innerHtml: string) => {
    const level = Math.min(parseInt(levelRaw, 10) + 1, 6);
    const text = innerHtml.replace(/<[^>]+>/g, "").trim();
    const base = slugify(text) || "section";
    const count = (counts.get(base) ?? 0) + 1;
    counts.set(base, count);
    const id = count === 1 ? base : `${base}-${count}`;

    if (level <= 3 && text) {
      toc.push({ id, level, text });
    }

    return `<h${level} id="${id}">${innerHtml}</h${level}>`;
  });

  return { html, toc };
}
