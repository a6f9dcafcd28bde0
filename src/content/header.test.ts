import { describe, expect, test } from "vitest";
import { SiteError } from "../errors.js";
import { parseHeader } from "./header.js";

function errorKind(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof SiteError ? err.kind : `unexpected: ${String(err)}`;
  }
  return undefined;
}

describe("parseHeader", () => {
  test("splits metadata from body", () => {
    const { metadata, body } = parseHeader(
      `---
title: "Test"
tags: [first, second]
---
This is a test document with $x=5y$
`
    );

    expect(metadata).toEqual({ title: "Test", tags: ["first", "second"] });
    expect(body).toBe("This is a test document with $x=5y$\n");
  });

  test("round-trips every recognized field", () => {
    const { metadata } = parseHeader(
      `---
title: On Gardens
subtitle: A second look
description: Notes on walled gardens
stylesheet: css/essay.css
tags:
  - zeta
  - alpha
  - mid
ctime: 2024-03-01
mtime: "2024-03-05"
---
Body
`
    );

    expect(metadata).toEqual({
      title: "On Gardens",
      subtitle: "A second look",
      description: "Notes on walled gardens",
      stylesheet: "css/essay.css",
      tags: ["zeta", "alpha", "mid"],
      created: "2024-03-01",
      updated: "2024-03-05",
    });
  });

  test("reads the sharing fields", () => {
    const { metadata } = parseHeader(
      `---
title: Shared
canonical: https://elsewhere.test/shared
og_image: img/card.png
og_title: Shared, for sharing
og_description: A card description
og_type: website
twitter_card: summary
twitter_creator: "@writer"
---
`
    );

    expect(metadata).toEqual({
      title: "Shared",
      tags: [],
      canonical: "https://elsewhere.test/shared",
      image: "img/card.png",
      ogTitle: "Shared, for sharing",
      ogDescription: "A card description",
      ogType: "website",
      twitterCard: "summary",
      twitterCreator: "@writer",
    });
  });

  test("prefers image over og_image and treats blank sharing fields as absent", () => {
    const { metadata } = parseHeader(`---\ntitle: Pic\nimage: a.png\nog_image: b.png\nog_title: "  "\n---\n`);
    expect(metadata).toEqual({ title: "Pic", tags: [], image: "a.png" });
  });

  test("absent optional fields decode to defaults", () => {
    const { metadata } = parseHeader(`---\ntitle: Bare\ndescription:\n---\n`);
    expect(metadata.tags).toEqual([]);
    expect(metadata.description).toBeUndefined();
    expect(metadata.stylesheet).toBeUndefined();
    expect(metadata.created).toBeUndefined();
  });

  test("ignores unknown keys", () => {
    const { metadata } = parseHeader(`---\ntitle: Extra\nlayout: wide\n---\nx\n`);
    expect(metadata).toEqual({ title: "Extra", tags: [] });
  });

  test("normalizes CRLF line endings and a byte-order mark", () => {
    const { metadata, body } = parseHeader("\uFEFF---\r\ntitle: Windows\r\n---\r\nBody\r\n");
    expect(metadata.title).toBe("Windows");
    expect(body).toBe("Body\n");
  });

  test("fails with MissingTitle when title is absent", () => {
    expect(errorKind(() => parseHeader(`---\ndescription: untitled\n---\nBody\n`))).toBe("MissingTitle");
  });

  test("fails with MissingTitle when title is empty", () => {
    expect(errorKind(() => parseHeader(`---\ntitle:\n---\nBody\n`))).toBe("MissingTitle");
    expect(errorKind(() => parseHeader(`---\ntitle: "  "\n---\nBody\n`))).toBe("MissingTitle");
  });

  test("fails with MissingTitle when there is no header", () => {
    expect(errorKind(() => parseHeader(`# Just markdown\n`))).toBe("MissingTitle");
  });

  test("fails with MalformedHeader when the block is not closed", () => {
    expect(errorKind(() => parseHeader(`---\ntitle: Open\n\nBody\n`))).toBe("MalformedHeader");
  });

  test("fails with MalformedHeader on invalid YAML", () => {
    expect(errorKind(() => parseHeader(`---\ntitle: [unclosed\n---\nBody\n`))).toBe("MalformedHeader");
  });

  test("fails with MalformedHeader on wrongly typed fields", () => {
    expect(errorKind(() => parseHeader(`---\ntitle: 42\n---\n`))).toBe("MalformedHeader");
    expect(errorKind(() => parseHeader(`---\ntitle: Tags\ntags: solo\n---\n`))).toBe("MalformedHeader");
    expect(errorKind(() => parseHeader(`---\ntitle: Dates\nctime: "2024-02-30"\n---\n`))).toBe(
      "MalformedHeader"
    );
  });

  test("names the offending field", () => {
    expect(() => parseHeader(`---\ntitle: Tags\ntags: solo\n---\n`)).toThrow(/tags:/);
  });
});
