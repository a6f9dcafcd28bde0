/** `YYYY-MM-DD` */
export type IsoDate = string;

export interface SourceDocument {
  /** Absolute path of the Markdown file */
  path: string;
  /** Path relative to the content root, posix separators */
  relPath: string;
  /** Mirrored output path relative to the output root, `.md` replaced by `.html` */
  outputRelPath: string;
}

/** Every document discovered in one run, ordered by relative path */
export type SiteTree = SourceDocument[];

export interface Metadata {
  title: string;
  subtitle?: string;
  description?: string;
  /** Site-root-relative stylesheet override */
  stylesheet?: string;
  tags: string[];
  created?: IsoDate;
  updated?: IsoDate;
  /** Canonical URL overriding the page's own */
  canonical?: string;
  /** Share image, absolute or relative to the base URL */
  image?: string;
  ogTitle?: string;
  ogDescription?: string;
  ogType?: string;
  twitterCard?: string;
  twitterCreator?: string;
}

export interface DocumentModel {
  source: SourceDocument;
  metadata: Metadata;
  body: string;
}

export interface RenderedPage {
  /** Output path relative to the output root */
  outputRelPath: string;
  html: string;
  metadata: Metadata;
}

/** What listing pages and feeds need to know about a rendered document */
export interface Article {
  title: string;
  /** Output path relative to the site root, posix separators */
  href: string;
  description?: string;
  tags: string[];
  /** `ctime`, else the `updated` timestamp */
  published: Date;
  /** `mtime`, else `ctime`, else the source file's modification time */
  updated: Date;
  /** Full body for feed readers */
  contentHtml: string;
}
