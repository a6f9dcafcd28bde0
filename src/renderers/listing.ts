import type nunjucks from "nunjucks";
import { basename } from "path";
import type { SiteConfig } from "../config.js";
import type { Article } from "../content/model.js";
import { listingSocialMeta } from "../presentation/social.js";
import { pageLinks, tagPagePath } from "../render.js";

export interface ListingPage {
  outputRelPath: string;
  html: string;
}

interface ListingGroup {
  year: string;
  articles: Array<{ title: string; href: string; date: string; description?: string }>;
}

export interface ListingContext {
  config: SiteConfig;
  env: nunjucks.Environment;
  head?: string;
  footer?: string;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Articles by publication year, newest first. */
export function groupByYear(articles: readonly Article[], rootPrefix: string): ListingGroup[] {
  const sorted = [...articles].sort(
    (a, b) => b.published.getTime() - a.published.getTime() || compareText(a.title, b.title)
  );

  const groups: ListingGroup[] = [];
  for (const article of sorted) {
    const date = article.published.toISOString().slice(0, 10);
    const year = date.slice(0, 4);
    let group = groups[groups.length - 1];
    if (!group || group.year !== year) {
      group = { year, articles: [] };
      groups.push(group);
    }
    group.articles.push({
      title: article.title,
      href: `${rootPrefix}${article.href}`,
      date,
      ...(article.description !== undefined ? { description: article.description } : {}),
    });
  }
  return groups;
}

function renderListing(
  ctx: ListingContext,
  outputRelPath: string,
  heading: string,
  articles: readonly Article[],
  isIndex: boolean
): ListingPage {
  const { config } = ctx;
  const links = pageLinks(outputRelPath, config);
  const html = ctx.env.render("listing.njk", {
    lang: config.site.language,
    siteTitle: config.site.title,
    pageTitle: isIndex ? config.site.title : `${heading} | ${config.site.title}`,
    heading,
    description: isIndex ? config.site.description : undefined,
    social: listingSocialMeta(isIndex ? config.site.title : heading, config.site, links.canonical),
    indexHref: isIndex ? undefined : links.indexHref,
    feedHref: links.feedHref,
    stylesheetHref: `${links.rootPrefix}${basename(config.stylesheet)}`,
    headFragment: ctx.head,
    footer: ctx.footer,
    groups: groupByYear(articles, links.rootPrefix),
  });
  return { outputRelPath, html };
}

/** Tag pages keyed by output path; tags whose slugs collide share a page. */
function collectTags(articles: readonly Article[]): Map<string, { label: string; articles: Article[] }> {
  const pages = new Map<string, { label: string; articles: Article[] }>();
  for (const article of articles) {
    for (const tag of new Set(article.tags)) {
      const path = tagPagePath(tag);
      const page = pages.get(path);
      if (page) {
        if (!page.articles.includes(article)) page.articles.push(article);
      } else {
        pages.set(path, { label: tag, articles: [article] });
      }
    }
  }
  return pages;
}

/** The index page, then one page per tag ordered by output path. */
export function buildListingPages(articles: readonly Article[], ctx: ListingContext): ListingPage[] {
  const pages: ListingPage[] = [renderListing(ctx, "index.html", ctx.config.site.title, articles, true)];

  const tags = [...collectTags(articles)].sort(([a], [b]) => compareText(a, b));
  for (const [path, { label, articles: tagged }] of tags) {
    pages.push(renderListing(ctx, path, `Tagged: ${label}`, tagged, false));
  }
  return pages;
}
