import type { SiteMeta } from "../config.js";
import type { Metadata } from "../content/model.js";

/** OpenGraph and Twitter card values for one page */
export interface SocialMeta {
  title: string;
  description?: string;
  type: string;
  url: string;
  image?: string;
  twitterCard: string;
  twitterCreator?: string;
}

const DEFAULT_TWITTER_CARD = "summary_large_image";

/** Resolve `href` against the site's base URL unless it already names a scheme or host. */
export function absoluteAssetUrl(baseUrl: string, href: string): string {
  if (/^[a-z][a-z0-9+.-]*:/i.test(href) || href.startsWith("//")) {
    return href;
  }
  return `${baseUrl}/${href.replace(/^\/+/, "")}`;
}

interface OptionalSocial {
  description?: string;
  image?: string;
  creator?: string;
}

function withOptional(meta: SocialMeta, site: SiteMeta, { description, image, creator }: OptionalSocial): SocialMeta {
  if (description) meta.description = description;
  if (image) meta.image = absoluteAssetUrl(site.baseUrl, image);
  if (creator) meta.twitterCreator = creator;
  return meta;
}

/** Header fields first, then the page's own values, then the site's. */
export function articleSocialMeta(metadata: Metadata, site: SiteMeta, pageUrl: string): SocialMeta {
  const meta: SocialMeta = {
    title: metadata.ogTitle ?? metadata.title,
    type: metadata.ogType ?? "article",
    url: metadata.canonical ?? pageUrl,
    twitterCard: metadata.twitterCard ?? DEFAULT_TWITTER_CARD,
  };
  return withOptional(meta, site, {
    description: metadata.ogDescription ?? metadata.description ?? site.description,
    image: metadata.image ?? site.defaultImage,
    creator: metadata.twitterCreator ?? site.author,
  });
}

export function listingSocialMeta(title: string, site: SiteMeta, pageUrl: string): SocialMeta {
  const meta: SocialMeta = { title, type: "website", url: pageUrl, twitterCard: DEFAULT_TWITTER_CARD };
  return withOptional(meta, site, {
    description: site.description,
    image: site.defaultImage,
    creator: site.author,
  });
}
