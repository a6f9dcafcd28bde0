import nunjucks from "nunjucks";
import { fileURLToPath } from "url";
import type { IsoDate } from "../content/model.js";

export const TEMPLATE_DIR = fileURLToPath(new URL("../../templates", import.meta.url));

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

const longDate = new Intl.DateTimeFormat("en-GB", {
  day: "numeric",
  month: "long",
  year: "numeric",
  timeZone: "UTC",
});

/** `2024-03-01` → `1 March 2024`; anything else is returned unchanged. */
export function formatIsoDate(value: IsoDate): string {
  const match = value.match(ISO_DATE_RE);
  if (!match) {
    return value;
  }
  const date = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  return longDate.format(date);
}

/**
 * Environment over the built-in templates. Autoescaping is on; trusted HTML
 * (rendered Markdown, shared fragments) goes through `| safe`.
 */
export function createTemplateEnv(templateDir: string = TEMPLATE_DIR): nunjucks.Environment {
  const env = new nunjucks.Environment(new nunjucks.FileSystemLoader(templateDir), {
    autoescape: true,
    throwOnUndefined: false,
  });

  env.addFilter("longdate", (value: unknown) => (typeof value === "string" ? formatIsoDate(value) : ""));

  return env;
}
