import { relative } from "path";
import { parseArgs } from "util";
import { resolveSiteConfig } from "./config.js";
import { buildSite } from "./renderers/site.js";
import { formatBuildFailure } from "./warn.js";

export const USAGE = `Usage:
  quillpress    build the site rooted at the current directory (contents/ → public/)`;

function hasArguments(args: string[]): boolean {
  try {
    const { positionals } = parseArgs({ args, options: {}, allowPositionals: true, strict: true });
    return positionals.length > 0;
  } catch {
    // Any option is unknown.
    return true;
  }
}

/** Run one build from `cwd`; resolves to the process exit code. */
export async function runCli(args: string[], cwd: string): Promise<number> {
  if (hasArguments(args)) {
    console.error(USAGE);
    return 1;
  }

  const config = resolveSiteConfig(cwd);
  console.log(`Building site: ${relative(cwd, config.contentDir) || "."} → ${relative(cwd, config.outputDir) || "."}`);

  try {
    const result = await buildSite(config);
    console.log(
      `Built ${result.pages.length} page(s), ${result.listings.length} listing page(s) and ` +
        `${result.feeds.entries.length} feed entr${result.feeds.entries.length === 1 ? "y" : "ies"}`
    );
    return 0;
  } catch (err) {
    console.error(formatBuildFailure(err));
    return 1;
  }
}
