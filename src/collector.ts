// Recursive source file discovery

import fs from "node:fs";
import path from "node:path";
import { ScanError } from "./errors.js";
import { toCMakePath } from "./paths.js";
import type { CollectOptions } from "./types.js";

export const HIDDEN_MARKER = ".";

/**
 * Walk `root` depth-first and return every file ending in
 * `options.extension`, relative to `root`. Anything under a directory
 * named `options.buildDir` is skipped, as are files whose name starts
 * with the hidden marker. Entries come back in directory read order.
 */
export function collectSources(root: string, options: CollectOptions): string[] {
  const sources: string[] = [];
  walk(root, [], options, sources);
  return sources;
}

function walk(
  dirPath: string,
  segments: string[],
  options: CollectOptions,
  out: string[],
): void {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dirPath, { withFileTypes: true });
  } catch (err: unknown) {
    throw new ScanError(dirPath, err);
  }

  for (const entry of entries) {
    // Build output is never scanned, at any depth
    if (entry.name === options.buildDir) continue;

    const entrySegments = [...segments, entry.name];

    if (entry.isDirectory()) {
      walk(path.join(dirPath, entry.name), entrySegments, options, out);
      continue;
    }

    if (isCollectable(entrySegments, options)) {
      out.push(toCMakePath(entrySegments));
    }
  }
}

/**
 * Selection rule for one file, given its path segments relative to the
 * scan root. Segments are taken as-is: a backslash is an ordinary name
 * character on POSIX.
 */
export function isCollectable(segments: string[], options: CollectOptions): boolean {
  const base = segments[segments.length - 1];
  if (base === undefined || base === "") return false;
  if (segments.includes(options.buildDir)) return false;
  if (base.startsWith(HIDDEN_MARKER)) return false;
  return base.endsWith(options.extension);
}
