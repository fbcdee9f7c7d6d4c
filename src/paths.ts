// Cross-platform path utilities

import path from "node:path";
import os from "node:os";
import envPaths from "env-paths";

const paths = envPaths("cmakegen", { suffix: "" });

export function getConfigPath(): string {
  return path.join(paths.config, "config.json");
}

export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/") || p.startsWith("~\\")) {
    return path.join(os.homedir(), p.slice(2));
  }
  return p;
}

// Absolute, tilde-expanded, without "." / ".." segments or a trailing slash
export function normalizePath(p: string): string {
  return path.resolve(expandHome(p));
}

/**
 * Join relative path segments with forward slashes, which CMake accepts
 * on every platform.
 */
export function toCMakePath(segments: string[]): string {
  return segments.join("/");
}
