import { copyFile, mkdir, readFile, stat, writeFile } from "fs/promises";
import { basename, dirname, resolve } from "path";
import type { SiteConfig } from "../config.js";
import { walkContentTree } from "../content/load.js";
import type { Article, RenderedPage } from "../content/model.js";
import { SiteError } from "../errors.js";
import { loadLanguageTable } from "../markdown/languages.js";
import { createTemplateEnv } from "../presentation/template.js";
import { renderDocument, type RenderContext } from "../render.js";
import { warn } from "../warn.js";
import { generateFeeds, sortArticles, type GeneratedFeeds } from "./feed.js";
import { buildListingPages } from "./listing.js";

export interface SiteBuildResult {
  pages: RenderedPage[];
  /** Newest first */
  articles: Article[];
  /** Listing pages written, relative to the output root */
  listings: string[];
  /** Stylesheets copied, relative to the output root */
  stylesheets: string[];
  feeds: GeneratedFeeds;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function assertStylesheet(path: string, message: string): Promise<void> {
  if (!(await isFile(path))) {
    throw new SiteError("StylesheetMissing", message, { path });
  }
}

/** Shared fragment contents, or undefined when the site has none. */
async function readOptionalFragment(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      return undefined;
    }
    throw new SiteError("ReadFailure", "could not read shared fragment", { path, cause: err });
  }
}

async function writeOutput(outputDir: string, relPath: string, contents: string): Promise<void> {
  const path = resolve(outputDir, relPath);
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, contents);
  } catch (err) {
    throw new SiteError("WriteFailure", "could not write output file", { path, cause: err });
  }
}

async function copyOutput(source: string, outputDir: string, relPath: string): Promise<void> {
  const path = resolve(outputDir, relPath);
  try {
    await mkdir(dirname(path), { recursive: true });
    await copyFile(source, path);
  } catch (err) {
    throw new SiteError("WriteFailure", "could not copy stylesheet", { path, cause: err });
  }
}

/**
 * Build the whole site: every document under the content directory becomes a
 * page in the mirrored output tree, followed by listing pages and feeds.
 */
export async function buildSite(config: SiteConfig): Promise<SiteBuildResult> {
  const tree = await walkContentTree(config.contentDir);
  await assertStylesheet(config.stylesheet, "site stylesheet does not exist");

  const [languages, head, footer] = await Promise.all([
    loadLanguageTable(config.languages),
    readOptionalFragment(config.head),
    readOptionalFragment(config.footer),
  ]);

  const ctx: RenderContext = { config, languages, env: createTemplateEnv() };
  if (head !== undefined) ctx.head = head;
  if (footer !== undefined) ctx.footer = footer;

  const rendered = await Promise.all(tree.map((source) => renderDocument(source, ctx)));

  // Stylesheets by output path, site stylesheet first.
  const stylesheets = new Map<string, string>([[basename(config.stylesheet), config.stylesheet]]);
  for (const { page, stylesheetOverride } of rendered) {
    if (stylesheetOverride === undefined || stylesheets.has(stylesheetOverride)) {
      continue;
    }
    const source = resolve(config.rootDir, stylesheetOverride);
    await assertStylesheet(source, `stylesheet override of ${page.outputRelPath} does not exist`);
    stylesheets.set(stylesheetOverride, source);
  }

  await Promise.all(rendered.map(({ page }) => writeOutput(config.outputDir, page.outputRelPath, page.html)));
  for (const [relPath, source] of stylesheets) {
    await copyOutput(source, config.outputDir, relPath);
  }

  const articles = sortArticles(rendered.map(({ article }) => article));

  const taken = new Set(rendered.map(({ page }) => page.outputRelPath));
  const listings = buildListingPages(articles, ctx).filter((listing) => {
    if (!taken.has(listing.outputRelPath)) {
      return true;
    }
    warn(`Skipping listing page ${listing.outputRelPath}`, ["a document already renders to this path"]);
    return false;
  });
  for (const listing of listings) {
    await writeOutput(config.outputDir, listing.outputRelPath, listing.html);
  }

  const feeds = generateFeeds(articles, config.site, config.feed);
  await writeOutput(config.outputDir, config.feed.rss, feeds.rss);
  await writeOutput(config.outputDir, config.feed.atom, feeds.atom);

  return {
    pages: rendered.map(({ page }) => page),
    articles,
    listings: listings.map((listing) => listing.outputRelPath),
    stylesheets: [...stylesheets.keys()],
    feeds,
  };
}
