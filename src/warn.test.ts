import { describe, expect, test } from "vitest";
import { SiteError } from "./errors.js";
import { formatBuildFailure, formatWarning } from "./warn.js";

const ANSI_RE = /\x1b\[[0-9;]*m/g;

function plain(text: string): string {
  return text.replace(ANSI_RE, "");
}

describe("formatWarning", () => {
  test("lists details under the header", () => {
    expect(plain(formatWarning("Skipped listing index", ["index.md already maps to index.html"]))).toBe(
      "⚠️ [quillpress] Skipped listing index\n  - index.md already maps to index.html"
    );
  });

  test("header only without details", () => {
    expect(plain(formatWarning("Nothing to do"))).toBe("⚠️ [quillpress] Nothing to do");
  });
});

describe("formatBuildFailure", () => {
  test("names kind, path and reason", () => {
    const err = new SiteError("MissingTitle", "metadata header has no title", {
      path: "/site/contents/a.md",
    });
    expect(plain(formatBuildFailure(err))).toBe(
      "✖ [quillpress] MissingTitle\n  path: /site/contents/a.md\n  reason: metadata header has no title"
    );
  });

  test("includes the cause message", () => {
    const err = new SiteError("WriteFailure", "could not write output file", {
      path: "/site/public/a.html",
      cause: new Error("EACCES: permission denied"),
    });
    expect(plain(formatBuildFailure(err))).toBe(
      "✖ [quillpress] WriteFailure\n  path: /site/public/a.html\n  reason: could not write output file\n  caused by: EACCES: permission denied"
    );
  });

  test("falls back to the message of unknown errors", () => {
    expect(plain(formatBuildFailure(new Error("boom")))).toBe("✖ [quillpress] Build failed\n  boom");
  });
});

describe("SiteError.withPath", () => {
  test("attaches a path once", () => {
    const err = new SiteError("UndefinedFootnote", "no definition for [^x]");
    const located = err.withPath("/site/contents/b.md");
    expect(located.path).toBe("/site/contents/b.md");
    expect(located.kind).toBe("UndefinedFootnote");
    expect(located.withPath("/elsewhere.md").path).toBe("/site/contents/b.md");
  });
});
