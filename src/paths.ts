import { relative, resolve } from "node:path";
import { minimatch } from "minimatch";

export function normalizePath(filePath: string): string {
  return filePath.replace(/\\/g, "/").replace(/^\.\//, "");
}

/** Express `filePath` relative to `cwd`, the form exclusion globs are written against. */
export function toProjectPath(filePath: string, cwd: string = process.cwd()): string {
  return normalizePath(relative(cwd, resolve(cwd, filePath)));
}

/** Patterns without a slash match the file's base name, as in .gitignore. */
export function matchesAny(filePath: string, patterns: readonly string[]): boolean {
  const normalized = normalizePath(filePath);
  return patterns.some((pattern) =>
    minimatch(normalized, pattern, { dot: true, matchBase: true }),
  );
}

export function baseName(filePath: string): string {
  const name = normalizePath(filePath).split("/").pop() ?? "";
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(0, dot) : name;
}
