/**
 * Nesting depth analysis.
 * Parses source files and scores every top-level function and method.
 */

import type { Stat } from "../types.js";
import { buildStats } from "./collector.js";
import { discoverFiles } from "./discovery.js";
import { parseFile } from "./parser.js";

export { AnalysisError } from "./types.js";
export { discoverFiles } from "./discovery.js";

export interface AnalyzePathsOptions {
  // Patterns for walked files to skip
  exclude?: string[];
}

/**
 * Analyze a single source file.
 * @throws AnalysisError if the file cannot be read or parsed
 */
export function analyzeFile(filePath: string): Stat[] {
  return buildStats(parseFile(filePath));
}

/**
 * Analyze files in order. The first file that fails to parse aborts the run.
 */
export function analyzeFiles(files: string[]): Stat[] {
  const stats: Stat[] = [];
  for (const filePath of files) {
    stats.push(...analyzeFile(filePath));
  }
  return stats;
}

/**
 * Analyze files and directories in argument order.
 * @returns One Stat per declaration, in discovery order
 */
export function analyzePaths(
  paths: string[],
  options: AnalyzePathsOptions = {},
): Stat[] {
  return analyzeFiles(discoverFiles(paths, options.exclude));
}
