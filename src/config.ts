import { resolve } from "path";
import { fileURLToPath } from "url";

export interface SiteMeta {
  title: string;
  description: string;
  /** Absolute base URL without a trailing slash, used for feed links and canonical URLs */
  baseUrl: string;
  author: string;
  language: string;
  /** Share image for pages whose header names none */
  defaultImage?: string;
}

export interface FeedConfig {
  /** RSS 2.0 file name in the output root */
  rss: string;
  /** Atom file name in the output root */
  atom: string;
  /** Maximum number of entries per feed */
  limit: number;
  /** Fail with EmptyFeed when no document qualifies */
  requireEntries: boolean;
}

/** Client-side math renderer assets, linked only from pages containing math */
export interface MathAssets {
  stylesheet: string;
  script: string;
}

export interface SiteConfig {
  rootDir: string;
  contentDir: string;
  outputDir: string;
  /** Site-wide stylesheet, copied byte-for-byte to the output root */
  stylesheet: string;
  /** Optional shared footer fragment appended to every page */
  footer: string;
  /** Optional shared fragment inserted into every page head */
  head: string;
  /** Syntax highlighting language table */
  languages: string;
  site: SiteMeta;
  feed: FeedConfig;
  math: MathAssets;
}

export interface SiteConfigOverrides {
  contentDir?: string;
  outputDir?: string;
  stylesheet?: string;
  footer?: string;
  head?: string;
  languages?: string;
  site?: Partial<SiteMeta>;
  feed?: Partial<FeedConfig>;
  math?: Partial<MathAssets>;
}

export const DEFAULT_LAYOUT = {
  contentDir: "contents",
  outputDir: "public",
  stylesheet: "style.css",
  footer: "footer.html",
  head: "header.html",
} as const;

export const DEFAULT_SITE: SiteMeta = {
  title: "Notebook",
  description: "Notes and essays",
  baseUrl: "https://example.com",
  author: "Site Author",
  language: "en",
};

export const DEFAULT_FEED: FeedConfig = {
  rss: "rss.xml",
  atom: "atom.xml",
  limit: 50,
  requireEntries: false,
};

const KATEX_CDN = "https://cdn.jsdelivr.net/npm/katex@0.16.11/dist";

export const DEFAULT_MATH: MathAssets = {
  stylesheet: `${KATEX_CDN}/katex.min.css`,
  script: `${KATEX_CDN}/katex.min.js`,
};

export const BUNDLED_LANGUAGES = fileURLToPath(new URL("../data/languages.json", import.meta.url));

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Conventional layout under `rootDir`, with overrides shallow-merged on top
 * (nested merge for `site`, `feed` and `math`). Relative paths resolve against `rootDir`.
 */
export function resolveSiteConfig(rootDir: string, overrides: SiteConfigOverrides = {}): SiteConfig {
  const root = resolve(rootDir);
  const site = { ...DEFAULT_SITE, ...overrides.site };

  return {
    rootDir: root,
    contentDir: resolve(root, overrides.contentDir ?? DEFAULT_LAYOUT.contentDir),
    outputDir: resolve(root, overrides.outputDir ?? DEFAULT_LAYOUT.outputDir),
    stylesheet: resolve(root, overrides.stylesheet ?? DEFAULT_LAYOUT.stylesheet),
    footer: resolve(root, overrides.footer ?? DEFAULT_LAYOUT.footer),
    head: resolve(root, overrides.head ?? DEFAULT_LAYOUT.head),
    languages: overrides.languages ? resolve(root, overrides.languages) : BUNDLED_LANGUAGES,
    site: { ...site, baseUrl: trimTrailingSlash(site.baseUrl) },
    feed: { ...DEFAULT_FEED, ...overrides.feed },
    math: { ...DEFAULT_MATH, ...overrides.math },
  };
}
