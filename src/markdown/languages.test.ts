import { describe, expect, test } from "vitest";
import { BUNDLED_LANGUAGES } from "../config.js";
import { buildLanguageTable, findLanguage, loadLanguageTable } from "./languages.js";

describe("language table", () => {
  test("looks languages up by name or alias, ignoring case", async () => {
    const table = await loadLanguageTable(BUNDLED_LANGUAGES);
    expect(findLanguage(table, "rs")?.name).toBe("rust");
    expect(findLanguage(table, "Rust")?.name).toBe("rust");
    expect(findLanguage(table, "JS")?.name).toBe("typescript");
    expect(findLanguage(table, "cobol")).toBeUndefined();
    expect(findLanguage(table, undefined)).toBeUndefined();
  });

  test("compiles word lists into whole-word rules", () => {
    const table = buildLanguageTable({ demo: { rules: [{ token: "keyword", words: ["if", "c++"] }] } });
    const rule = findLanguage(table, "demo")?.rules[0];
    expect(rule?.regex.source).toBe("\\b(?:if|c\\+\\+)\\b");
    expect(rule?.regex.sticky).toBe(true);
  });

  test("rejects an invalid regex at load time", () => {
    expect(() => buildLanguageTable({ demo: { rules: [{ token: "string", pattern: "(unclosed" }] } })).toThrow(
      /Invalid pattern for demo rule 0 \(string\)/
    );
  });

  test("rejects malformed entries", () => {
    expect(() => buildLanguageTable({ demo: { rules: [] } })).toThrow(/demo\.rules/);
    expect(() => buildLanguageTable({ demo: { rules: [{ token: "Bad Class", pattern: "x" }] } })).toThrow(
      /Invalid language table/
    );
  });
});
