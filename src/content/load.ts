import type { Dirent } from "fs";
import { readdir, readFile, realpath, stat } from "fs/promises";
import { join, posix } from "path";
import { describeCause, SiteError } from "../errors.js";
import { warn } from "../warn.js";
import { parseHeader } from "./header.js";
import type { DocumentModel, SiteTree, SourceDocument } from "./model.js";

const MARKDOWN_EXT = ".md";

type WalkStep =
  | { state: "visit"; dir: string; relDir: string }
  | { state: "render-file"; path: string; relPath: string }
  | { state: "done" };

export function toOutputRelPath(relPath: string): string {
  return relPath.slice(0, -MARKDOWN_EXT.length) + ".html";
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export async function assertContentDirectory(contentDir: string): Promise<void> {
  if (!(await isDirectory(contentDir))) {
    throw new SiteError("ContentDirectoryMissing", "content directory does not exist", { path: contentDir });
  }
}

export async function listDirectory(dir: string): Promise<Dirent[]> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (err) {
    throw new SiteError("ReadFailure", "could not list directory", { path: dir, cause: err });
  }
}

export async function canonicalDirectory(dir: string): Promise<string> {
  try {
    return await realpath(dir);
  } catch (err) {
    throw new SiteError("ReadFailure", "could not resolve directory", { path: dir, cause: err });
  }
}

/** Entries of `dir` as walk steps, in name order. Symlinks are followed; dot-entries are skipped. */
async function expand(dir: string, relDir: string): Promise<WalkStep[]> {
  const entries = await listDirectory(dir);
  const steps: WalkStep[] = [];

  for (const entry of entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))) {
    if (entry.name.startsWith(".")) {
      continue;
    }
    const path = join(dir, entry.name);
    const relPath = relDir ? posix.join(relDir, entry.name) : entry.name;

    let kind: "dir" | "file" | "other" = entry.isDirectory() ? "dir" : entry.isFile() ? "file" : "other";
    if (entry.isSymbolicLink()) {
      try {
        const target = await stat(path);
        kind = target.isDirectory() ? "dir" : target.isFile() ? "file" : "other";
      } catch (err) {
        warn(`Skipping unreadable symlink ${path}`, [describeCause(err)]);
        continue;
      }
    }

    if (kind === "dir") {
      steps.push({ state: "visit", dir: path, relDir: relPath });
    } else if (kind === "file" && entry.name.endsWith(MARKDOWN_EXT)) {
      steps.push({ state: "render-file", path, relPath });
    }
  }

  return steps;
}

/**
 * Discover every Markdown document under `contentDir`. Directories are
 * deduplicated by canonical path, so symlink cycles terminate.
 */
export async function walkContentTree(contentDir: string): Promise<SiteTree> {
  await assertContentDirectory(contentDir);

  const visited = new Set<string>();
  const results: SourceDocument[] = [];
  const pending: WalkStep[] = [{ state: "visit", dir: contentDir, relDir: "" }];
  const next = (): WalkStep => pending.shift() ?? { state: "done" };

  let step = next();
  while (step.state !== "done") {
    if (step.state === "render-file") {
      results.push({ path: step.path, relPath: step.relPath, outputRelPath: toOutputRelPath(step.relPath) });
    } else {
      const canonical = await canonicalDirectory(step.dir);
      if (!visited.has(canonical)) {
        visited.add(canonical);
        // Depth-first: children run before the remaining siblings.
        pending.unshift(...(await expand(step.dir, step.relDir)));
      }
    }
    step = next();
  }

  return results.sort((a, b) => (a.relPath < b.relPath ? -1 : a.relPath > b.relPath ? 1 : 0));
}

export async function readSourceText(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    throw new SiteError("ReadFailure", "could not read document", { path, cause: err });
  }
}

/** Read and decode one document; header errors are reported against its path. */
export async function loadDocument(source: SourceDocument): Promise<DocumentModel> {
  const raw = await readSourceText(source.path);
  try {
    const { metadata, body } = parseHeader(raw);
    return { source, metadata, body };
  } catch (err) {
    throw err instanceof SiteError ? err.withPath(source.path) : err;
  }
}
