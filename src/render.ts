import { stat } from "fs/promises";
import type nunjucks from "nunjucks";
import { basename, posix } from "path";
import type { SiteConfig } from "./config.js";
import type { Article, DocumentModel, IsoDate, RenderedPage, SourceDocument } from "./content/model.js";
import { loadDocument } from "./content/load.js";
import { SiteError } from "./errors.js";
import type { LanguageTable } from "./markdown/languages.js";
import { renderMarkdown, type RenderedMarkdown } from "./markdown/render.js";
import { articleSocialMeta } from "./presentation/social.js";
import { enrichHeadings, renderToc, slugify } from "./presentation/structured-content.js";

/** Everything shared, read-only, by the renders of one build */
export interface RenderContext {
  config: SiteConfig;
  languages: LanguageTable;
  env: nunjucks.Environment;
  /** Shared head fragment, when the site has one */
  head?: string;
  /** Shared footer fragment, when the site has one */
  footer?: string;
}

export interface RenderedDocument {
  page: RenderedPage;
  article: Article;
  /** Site-root-relative stylesheet this page links instead of the site stylesheet */
  stylesheetOverride?: string;
}

export interface PageLinks {
  /** `../` repeated once per directory level of the page */
  rootPrefix: string;
  canonical: string;
  indexHref: string;
  feedHref: string;
}

export function rootPrefixFor(outputRelPath: string): string {
  return "../".repeat(outputRelPath.split("/").length - 1);
}

export function tagSlug(tag: string): string {
  return slugify(tag) || "tag";
}

export function tagPagePath(tag: string): string {
  return `tags/${tagSlug(tag)}.html`;
}

export function pageLinks(outputRelPath: string, config: SiteConfig): PageLinks {
  const rootPrefix = rootPrefixFor(outputRelPath);
  return {
    rootPrefix,
    canonical: `${config.site.baseUrl}/${outputRelPath}`,
    indexHref: `${rootPrefix}index.html`,
    feedHref: `${rootPrefix}${config.feed.rss}`,
  };
}

/** Normalize a site-root-relative stylesheet path; paths leaving the site root are rejected. */
export function normalizeStylesheetOverride(value: string, documentPath: string): string {
  const rel = posix.normalize(value.replace(/\\/g, "/").replace(/^\/+/, ""));
  if (rel === "." || rel === ".." || rel.startsWith("../")) {
    throw new SiteError("StylesheetMissing", `stylesheet "${value}" is outside the site root`, {
      path: documentPath,
    });
  }
  return rel;
}

function isoToDate(value: IsoDate): Date {
  return new Date(`${value}T00:00:00.000Z`);
}

async function fileModifiedAt(path: string): Promise<Date> {
  try {
    return (await stat(path)).mtime;
  } catch (err) {
    throw new SiteError("ReadFailure", "could not read document timestamp", { path, cause: err });
  }
}

async function articleTimestamps(doc: DocumentModel): Promise<{ published: Date; updated: Date }> {
  const { created, updated } = doc.metadata;
  const latest = updated ?? created;
  const updatedAt = latest !== undefined ? isoToDate(latest) : await fileModifiedAt(doc.source.path);
  return { published: created !== undefined ? isoToDate(created) : updatedAt, updated: updatedAt };
}

function renderBody(doc: DocumentModel, languages: LanguageTable): RenderedMarkdown {
  try {
    return renderMarkdown(doc.body, languages);
  } catch (err) {
    throw err instanceof SiteError ? err.withPath(doc.source.path) : err;
  }
}

/** Render a loaded document into its page and article. */
export async function renderPage(doc: DocumentModel, ctx: RenderContext): Promise<RenderedDocument> {
  const { config } = ctx;
  const { source, metadata } = doc;

  const markdown = renderBody(doc, ctx.languages);
  const links = pageLinks(source.outputRelPath, config);
  const stylesheetOverride =
    metadata.stylesheet !== undefined ? normalizeStylesheetOverride(metadata.stylesheet, source.path) : undefined;
  const stylesheetHref = `${links.rootPrefix}${stylesheetOverride ?? basename(config.stylesheet)}`;
  const body = enrichHeadings(markdown.html);

  const html = ctx.env.render("page.njk", {
    lang: config.site.language,
    siteTitle: config.site.title,
    pageTitle: `${metadata.title} | ${config.site.title}`,
    title: metadata.title,
    subtitle: metadata.subtitle,
    description: metadata.description,
    created: metadata.created,
    updated: metadata.updated,
    social: articleSocialMeta(metadata, config.site, links.canonical),
    indexHref: links.indexHref,
    feedHref: links.feedHref,
    stylesheetHref,
    headFragment: ctx.head,
    footer: ctx.footer,
    math: markdown.hasMath ? config.math : null,
    tags: metadata.tags.map((name) => ({ name, href: `${links.rootPrefix}${tagPagePath(name)}` })),
    toc: renderToc(body.toc),
    content: body.html,
  });

  const article: Article = {
    title: metadata.title,
    href: source.outputRelPath,
    tags: metadata.tags,
    ...(await articleTimestamps(doc)),
    contentHtml: body.html,
  };
  if (metadata.description !== undefined) {
    article.description = metadata.description;
  }

  const rendered: RenderedDocument = {
    page: { outputRelPath: source.outputRelPath, html, metadata },
    article,
  };
  if (stylesheetOverride !== undefined) {
    rendered.stylesheetOverride = stylesheetOverride;
  }
  return rendered;
}

export async function renderDocument(source: SourceDocument, ctx: RenderContext): Promise<RenderedDocument> {
  return renderPage(await loadDocument(source), ctx);
}
