import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import { ReleaseError, preconditionFailure } from "../core/errors.js";

export const VCS_METADATA_DIR = ".git";

export type StageInput = {
  sourceTree: string;
  destinationRoot: string;
  /** minimatch patterns, relative to sourceTree, that are not copied. */
  exclude?: string[];
};

export type StageSummary = {
  removed: number;
  copied: string[];
};

/** A working copy has a `.git` entry (a directory, or a file for worktrees). */
export function isWorkingCopy(dir: string): boolean {
  return fs.existsSync(path.join(dir, VCS_METADATA_DIR));
}

function isInside(parent: string, child: string): boolean {
  const rel = path.relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

function toPosix(p: string): string {
  return p.split(path.sep).join("/");
}

/** Files under `root` (relative, posix separators), skipping excluded paths and `.git`. */
export function listTree(root: string, exclude: string[] = []): string[] {
  const files: string[] = [];
  const excluded = (rel: string) => exclude.some((pattern) => minimatch(rel, pattern, { dot: true }));

  const walk = (dir: string) => {
    const entries = fs.readdirSync(dir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      if (entry.name === VCS_METADATA_DIR) continue;
      const full = path.join(dir, entry.name);
      const rel = toPosix(path.relative(root, full));
      if (excluded(rel)) continue;
      if (entry.isDirectory()) {
        walk(full);
      } else if (entry.isFile()) {
        files.push(rel);
      }
    }
  };

  walk(root);
  return files;
}

/**
 * Mirror-replace: empty the destination (keeping its `.git`) and copy the
 * whole source tree into it. Nothing is merged or diffed; the destination's
 * content is always fully derived from the source.
 */
export function stage(input: StageInput): StageSummary {
  const sourceTree = path.resolve(input.sourceTree);
  const destinationRoot = path.resolve(input.destinationRoot);

  if (!fs.existsSync(destinationRoot) || !fs.statSync(destinationRoot).isDirectory()) {
    throw new ReleaseError("ChannelNotFound", `Distribution channel not found: ${destinationRoot}`, {
      stage: "stage",
      details: { path: destinationRoot }
    });
  }
  if (!isWorkingCopy(destinationRoot)) {
    throw new ReleaseError("ChannelNotFound", `Distribution channel is not a git working copy: ${destinationRoot}`, {
      stage: "stage",
      details: { path: destinationRoot }
    });
  }
  if (!fs.existsSync(sourceTree) || !fs.statSync(sourceTree).isDirectory()) {
    throw preconditionFailure(`Source tree not found: ${sourceTree}`, { path: sourceTree });
  }
  if (isInside(sourceTree, destinationRoot) || isInside(destinationRoot, sourceTree)) {
    throw preconditionFailure(`Source tree and distribution channel overlap: ${sourceTree} / ${destinationRoot}`);
  }

  // collected first so a bad pattern or unreadable source fails before deletion
  const files = listTree(sourceTree, input.exclude);

  let removed = 0;
  for (const entry of fs.readdirSync(destinationRoot)) {
    if (entry === VCS_METADATA_DIR) continue;
    fs.rmSync(path.join(destinationRoot, entry), { recursive: true, force: true });
    removed++;
  }

  for (const rel of files) {
    const target = path.join(destinationRoot, ...rel.split("/"));
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.copyFileSync(path.join(sourceTree, ...rel.split("/")), target);
  }

  return { removed, copied: files };
}
