import { describe, expect, test } from "vitest";
import { resolve } from "path";
import { BUNDLED_LANGUAGES, DEFAULT_FEED, resolveSiteConfig } from "./config.js";

const root = resolve("/srv/site");

describe("resolveSiteConfig", () => {
  test("links only the KaTeX stylesheet and script", () => {
    expect(resolveSiteConfig(root).math).toEqual({
      stylesheet: "https://cdn.jsdelivr.net/npm/katex@0.16.11/dist/katex.min.css",
      script: "https://cdn.jsdelivr.net/npm/katex@0.16.11/dist/katex.min.js",
    });
  });

  test("uses the conventional layout under the root", () => {
    const config = resolveSiteConfig(root);
    expect(config.rootDir).toBe(root);
    expect(config.contentDir).toBe(resolve(root, "contents"));
    expect(config.outputDir).toBe(resolve(root, "public"));
    expect(config.stylesheet).toBe(resolve(root, "style.css"));
    expect(config.footer).toBe(resolve(root, "footer.html"));
    expect(config.head).toBe(resolve(root, "header.html"));
    expect(config.languages).toBe(BUNDLED_LANGUAGES);
    expect(config.feed).toEqual(DEFAULT_FEED);
  });

  test("resolves overridden paths against the root", () => {
    const config = resolveSiteConfig(root, {
      contentDir: "notes",
      outputDir: "/tmp/out",
      languages: "langs.json",
    });
    expect(config.contentDir).toBe(resolve(root, "notes"));
    expect(config.outputDir).toBe(resolve("/tmp/out"));
    expect(config.languages).toBe(resolve(root, "langs.json"));
  });

  test("nested-merges site and feed settings", () => {
    const config = resolveSiteConfig(root, {
      site: { title: "Field Notes", baseUrl: "https://notes.example.org/" },
      feed: { requireEntries: true },
    });
    expect(config.site.title).toBe("Field Notes");
    expect(config.site.baseUrl).toBe("https://notes.example.org");
    expect(config.site.language).toBe("en");
    expect(config.feed.requireEntries).toBe(true);
    expect(config.feed.rss).toBe("rss.xml");
    expect(config.feed.limit).toBe(50);
  });
});
