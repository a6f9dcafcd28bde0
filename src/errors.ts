export const SITE_ERROR_KINDS = [
  "ContentDirectoryMissing",
  "StylesheetMissing",
  "MissingTitle",
  "ReadFailure",
  "MalformedHeader",
  "UndefinedFootnote",
  "WriteFailure",
  "EmptyFeed",
] as const;
export type SiteErrorKind = (typeof SITE_ERROR_KINDS)[number];

/** A fatal build error. `path` names the file or directory that triggered it, when known. */
export class SiteError extends Error {
  readonly kind: SiteErrorKind;
  readonly path: string | undefined;

  constructor(kind: SiteErrorKind, message: string, opts: { path?: string; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "SiteError";
    this.kind = kind;
    this.path = opts.path;
  }

  /** Same error, reported against `path`. Errors that already carry a path are returned as-is. */
  withPath(path: string): SiteError {
    if (this.path !== undefined) {
      return this;
    }
    return new SiteError(this.kind, this.message, { path, cause: this.cause });
  }
}

export function isSiteError(err: unknown): err is SiteError {
  return err instanceof SiteError;
}

export function describeCause(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
