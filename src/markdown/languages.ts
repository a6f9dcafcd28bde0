import { readFile } from "fs/promises";
import { z } from "zod";
import { describeCause } from "../errors.js";

export interface HighlightRule {
  token: string;
  /** Sticky regex, tried at the current position only */
  regex: RegExp;
}

export interface Language {
  name: string;
  rules: HighlightRule[];
}

/** Languages by lower-cased name and alias */
export type LanguageTable = ReadonlyMap<string, Language>;

const tokenClassSchema = z.string().regex(/^[a-z][a-z0-9-]*$/, "token classes are lower-case words");

const ruleSchema = z.union([
  z.object({ token: tokenClassSchema, pattern: z.string().min(1) }),
  z.object({ token: tokenClassSchema, words: z.array(z.string().min(1)).min(1) }),
]);

const languageFileSchema = z.record(
  z.string().min(1),
  z.object({
    aliases: z.array(z.string().min(1)).default([]),
    rules: z.array(ruleSchema).min(1),
  })
);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function compile(source: string, where: string): RegExp {
  try {
    return new RegExp(source, "y");
  } catch (err) {
    throw new Error(`Invalid pattern for ${where}: ${describeCause(err)}`);
  }
}

function wordsPattern(words: string[]): string {
  return `\\b(?:${words.map(escapeRegExp).join("|")})\\b`;
}

/** Validate raw table data and compile every rule. */
export function buildLanguageTable(data: unknown): LanguageTable {
  const parsed = languageFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new Error(`Invalid language table:\n  - ${issues.join("\n  - ")}`);
  }

  const table = new Map<string, Language>();
  for (const [name, entry] of Object.entries(parsed.data)) {
    const rules = entry.rules.map((rule, index) => {
      const source = "pattern" in rule ? rule.pattern : wordsPattern(rule.words);
      return { token: rule.token, regex: compile(source, `${name} rule ${index} (${rule.token})`) };
    });
    const language: Language = { name, rules };
    for (const key of [name, ...entry.aliases]) {
      table.set(key.toLowerCase(), language);
    }
  }
  return table;
}

export async function loadLanguageTable(path: string): Promise<LanguageTable> {
  const text = await readFile(path, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new Error(`Language table ${path} is not valid JSON: ${describeCause(err)}`);
  }
  try {
    return buildLanguageTable(data);
  } catch (err) {
    throw new Error(`Language table ${path} rejected: ${describeCause(err)}`, { cause: err });
  }
}

export function findLanguage(table: LanguageTable, tag: string | undefined): Language | undefined {
  if (!tag) {
    return undefined;
  }
  return table.get(tag.trim().toLowerCase());
}
