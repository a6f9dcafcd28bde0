import { Feed } from "feed";
import type { FeedConfig, SiteMeta } from "../config.js";
import type { Article } from "../content/model.js";
import { SiteError } from "../errors.js";

export interface FeedEntry {
  title: string;
  /** Absolute URL of the page */
  link: string;
  description?: string;
  tags: string[];
  published: Date;
  /** Full body HTML */
  content: string;
}

export interface GeneratedFeeds {
  entries: FeedEntry[];
  rss: string;
  atom: string;
}

const GENERATOR = "quillpress";

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Newest first; equal timestamps fall back to title, then href. */
export function sortArticles(articles: readonly Article[]): Article[] {
  return [...articles].sort(
    (a, b) =>
      b.updated.getTime() - a.updated.getTime() || compareText(a.title, b.title) || compareText(a.href, b.href)
  );
}

export function absoluteUrl(site: SiteMeta, href: string): string {
  return `${site.baseUrl}/${href}`;
}

export function toFeedEntries(articles: readonly Article[], site: SiteMeta, limit: number): FeedEntry[] {
  return sortArticles(articles)
    .slice(0, Math.max(0, limit))
    .map((article) => {
      const entry: FeedEntry = {
        title: article.title,
        link: absoluteUrl(site, article.href),
        tags: article.tags,
        published: article.updated,
        content: article.contentHtml,
      };
      if (article.description !== undefined) {
        entry.description = article.description;
      }
      return entry;
    });
}

/**
 * RSS 2.0 and Atom documents for the site. The channel's update time is the
 * newest entry's, so unchanged input gives identical feeds.
 */
export function generateFeeds(articles: readonly Article[], site: SiteMeta, options: FeedConfig): GeneratedFeeds {
  const entries = toFeedEntries(articles, site, options.limit);
  if (entries.length === 0 && options.requireEntries) {
    throw new SiteError("EmptyFeed", "no documents qualify for the feed");
  }

  const feed = new Feed({
    title: site.title,
    description: site.description,
    id: `${site.baseUrl}/`,
    link: `${site.baseUrl}/`,
    language: site.language,
    copyright: site.author,
    generator: GENERATOR,
    updated: entries[0]?.published ?? new Date(0),
    feedLinks: {
      rss: absoluteUrl(site, options.rss),
      atom: absoluteUrl(site, options.atom),
    },
    author: { name: site.author },
  });

  for (const entry of entries) {
    feed.addItem({
      title: entry.title,
      id: entry.link,
      link: entry.link,
      description: entry.description,
      content: entry.content,
      date: entry.published,
      category: entry.tags.map((name) => ({ name })),
    });
  }

  return { entries, rss: feed.rss2(), atom: feed.atom1() };
}
