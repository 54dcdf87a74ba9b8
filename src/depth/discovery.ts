/**
 * Expands path arguments into the list of source files to analyze.
 */

import { statSync } from "fs";
import { globSync } from "glob";
import { minimatch } from "minimatch";
import { join, sep } from "path";

const SOURCE_PATTERN = "**/*.{ts,tsx,mts,cts,js,jsx,mjs,cjs}";

// Never walked, whatever the exclude patterns say
const DEFAULT_EXCLUDE_PATTERNS = ["**/node_modules/**", "**/.git/**"];

function isDirectory(filePath: string): boolean {
  try {
    return statSync(filePath).isDirectory();
  } catch {
    return false;
  }
}

function toPosix(filePath: string): string {
  return filePath.split(sep).join("/");
}

/**
 * Check if a file path matches any of the given glob patterns.
 */
export function matchesPatterns(filePath: string, patterns: string[]): boolean {
  const posixPath = toPosix(filePath);
  return patterns.some((pattern) => minimatch(posixPath, pattern));
}

/**
 * Walk a directory recursively for source files, in sorted order.
 * Exclude patterns match paths relative to the directory.
 */
export function discoverFilesInDirectory(
  dirPath: string,
  exclude: string[] = [],
): string[] {
  const found = globSync(SOURCE_PATTERN, {
    cwd: dirPath,
    nodir: true,
    ignore: DEFAULT_EXCLUDE_PATTERNS,
  });

  return found
    .filter((relPath) => !matchesPatterns(relPath, exclude))
    .sort()
    .map((relPath) => join(dirPath, relPath));
}

/**
 * Files to analyze, in argument order. Directories are walked; anything else
 * is taken as a file, so a missing path surfaces as a read failure later.
 */
export function discoverFiles(
  paths: string[],
  exclude: string[] = [],
): string[] {
  return paths.flatMap((p) =>
    isDirectory(p) ? discoverFilesInDirectory(p, exclude) : [p],
  );
}
