import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { resolve } from "path";
import { createTemplateEnv, formatIsoDate } from "./template.js";

let templateRoot = "";

describe("template environment", () => {
  beforeAll(async () => {
    templateRoot = await mkdtemp(resolve(tmpdir(), "quillpress-template-"));
    await writeFile(resolve(templateRoot, "sample.njk"), "{{ text }}|{{ html | safe }}|{{ day | longdate }}");
  });

  afterAll(async () => {
    await rm(templateRoot, { recursive: true, force: true });
  });

  test("escapes values unless marked safe", () => {
    const env = createTemplateEnv(templateRoot);
    const out = env.render("sample.njk", { text: "<b>Tom & Jerry</b>", html: "<i>ok</i>", day: "2024-03-01" });
    expect(out).toBe("&lt;b&gt;Tom &amp; Jerry&lt;/b&gt;|<i>ok</i>|1 March 2024");
  });

  test("loads the built-in templates by default", () => {
    const env = createTemplateEnv();
    expect(env.getTemplate("page.njk")).toBeDefined();
    expect(env.getTemplate("listing.njk")).toBeDefined();
  });
});

describe("formatIsoDate", () => {
  test("formats ISO dates in long form", () => {
    expect(formatIsoDate("2023-12-25")).toBe("25 December 2023");
  });

  test("returns other strings unchanged", () => {
    expect(formatIsoDate("someday")).toBe("someday");
  });
});
