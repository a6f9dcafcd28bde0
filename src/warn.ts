import { describeCause, isSiteError } from "./errors.js";

const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const RESET = "\x1b[0m";

export function formatWarning(context: string, details: string[] = []): string {
  const icon = "⚠️";
  const header = `${YELLOW}${BOLD}${icon} [quillpress] ${context}${RESET}`;
  if (details.length === 0) {
    return header;
  }
  const lines = details.map((item) => `${YELLOW}  - ${item}${RESET}`).join("\n");
  return `${header}\n${lines}`;
}

export function warn(context: string, details: string[] = []): void {
  console.warn(formatWarning(context, details));
}

/** Diagnostic for a failed build: error kind, offending path, then the reason chain. */
export function formatBuildFailure(err: unknown): string {
  if (!isSiteError(err)) {
    return `${RED}${BOLD}✖ [quillpress] Build failed${RESET}\n${RED}  ${describeCause(err)}${RESET}`;
  }

  const header = `${RED}${BOLD}✖ [quillpress] ${err.kind}${RESET}`;
  const lines: string[] = [];
  if (err.path !== undefined) {
    lines.push(`path: ${err.path}`);
  }
  lines.push(`reason: ${err.message}`);
  if (err.cause !== undefined) {
    lines.push(`caused by: ${describeCause(err.cause)}`);
  }
  return `${header}\n${lines.map((line) => `${RED}  ${line}${RESET}`).join("\n")}`;
}
