import matter from "gray-matter";
import { z } from "zod";
import { describeCause, SiteError } from "../errors.js";
import type { IsoDate, Metadata } from "./model.js";

const DELIMITER = "---";
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function parseIsoDate(value: string): IsoDate | null {
  const match = value.trim().match(ISO_DATE_RE);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return `${year}-${pad(month)}-${pad(day)}`;
}

// YAML turns bare `2024-03-01` into a Date at UTC midnight.
const isoDateSchema = z.union([z.string(), z.date()]).transform((value, ctx) => {
  const parsed = value instanceof Date ? value.toISOString().slice(0, 10) : parseIsoDate(value);
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a YYYY-MM-DD date" });
    return z.NEVER;
  }
  return parsed;
});

const metadataSchema = z.object({
  title: z.string().trim().min(1),
  subtitle: z.string().nullish(),
  description: z.string().nullish(),
  stylesheet: z.string().trim().min(1).nullish(),
  tags: z.array(z.string()).nullish(),
  ctime: isoDateSchema.nullish(),
  mtime: isoDateSchema.nullish(),
  canonical: z.string().nullish(),
  image: z.string().nullish(),
  og_image: z.string().nullish(),
  og_title: z.string().nullish(),
  og_description: z.string().nullish(),
  og_type: z.string().nullish(),
  twitter_card: z.string().nullish(),
  twitter_creator: z.string().nullish(),
});

// Blank social fields count as absent.
function present(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export interface ParsedHeader {
  metadata: Metadata;
  body: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasClosingDelimiter(text: string): boolean {
  const lines = text.split("\n");
  return lines.slice(1).some((line) => line.trimEnd() === DELIMITER);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "header"}: ${issue.message}`)
    .join("; ");
}

function decodeYaml(text: string): { data: unknown; body: string } {
  try {
    // Explicit options also keep gray-matter from caching by content.
    const { data, content } = matter(text, { language: "yaml" });
    return { data, body: content };
  } catch (err) {
    throw new SiteError("MalformedHeader", `metadata header is not valid YAML: ${describeCause(err)}`, {
      cause: err,
    });
  }
}

/** Split a document into decoded metadata and Markdown body. */
export function parseHeader(raw: string): ParsedHeader {
  const text = raw.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
  const firstLine = text.split("\n", 1)[0] ?? "";

  if (firstLine.trimEnd() !== DELIMITER) {
    throw new SiteError("MissingTitle", "document has no metadata header, so no title");
  }
  if (!hasClosingDelimiter(text)) {
    throw new SiteError("MalformedHeader", `metadata header is not closed by a "${DELIMITER}" line`);
  }

  const { data, body } = decodeYaml(text);

  if (!isRecord(data)) {
    throw new SiteError("MalformedHeader", "metadata header must be a mapping of keys to values");
  }
  const title = data.title;
  if (title === undefined || title === null || (typeof title === "string" && title.trim() === "")) {
    throw new SiteError("MissingTitle", "metadata header has no title");
  }

  const result = metadataSchema.safeParse(data);
  if (!result.success) {
    throw new SiteError("MalformedHeader", `invalid metadata header: ${formatIssues(result.error)}`);
  }

  const header = result.data;
  const metadata: Metadata = {
    title: header.title,
    tags: header.tags ?? [],
  };
  if (header.subtitle != null) metadata.subtitle = header.subtitle;
  if (header.description != null) metadata.description = header.description;
  if (header.stylesheet != null) metadata.stylesheet = header.stylesheet;
  if (header.ctime != null) metadata.created = header.ctime;
  if (header.mtime != null) metadata.updated = header.mtime;

  const canonical = present(header.canonical);
  const image = present(header.image) ?? present(header.og_image);
  const ogTitle = present(header.og_title);
  const ogDescription = present(header.og_description);
  const ogType = present(header.og_type);
  const twitterCard = present(header.twitter_card);
  const twitterCreator = present(header.twitter_creator);
  if (canonical) metadata.canonical = canonical;
  if (image) metadata.image = image;
  if (ogTitle) metadata.ogTitle = ogTitle;
  if (ogDescription) metadata.ogDescription = ogDescription;
  if (ogType) metadata.ogType = ogType;
  if (twitterCard) metadata.twitterCard = twitterCard;
  if (twitterCreator) metadata.twitterCreator = twitterCreator;

  return { metadata, body };
}
