/**
 * Sorting, truncation and averaging of analysis results.
 */

import type { ReportOptions, Stat } from "../types.js";

export interface DepthReport {
  // Number of declarations analyzed, before any filtering
  analyzed: number;
  // Records to print, deepest first
  reported: Stat[];
  // Mean depth over every analyzed declaration, when requested
  average?: number;
  // --over is active and something exceeded it
  thresholdExceeded: boolean;
}

/**
 * Sort by depth, deepest first. Ties keep discovery order.
 */
export function sortByDepth(stats: readonly Stat[]): Stat[] {
  return [...stats].sort((a, b) => b.depth - a.depth);
}

/**
 * Leading records of a depth-sorted list: at most `top` of them, stopping at
 * the first whose depth is not over `over`.
 */
export function selectStats(
  sorted: readonly Stat[],
  options: Pick<ReportOptions, "over" | "top">,
): Stat[] {
  const limited =
    options.top === undefined ? sorted : sorted.slice(0, options.top);
  const cut = limited.findIndex((stat) => stat.depth <= options.over);
  return cut === -1 ? [...limited] : limited.slice(0, cut);
}

/**
 * Arithmetic mean of depth; NaN when there is nothing to average.
 */
export function averageDepth(stats: readonly Stat[]): number {
  const total = stats.reduce((sum, stat) => sum + stat.depth, 0);
  return total / stats.length;
}

export function buildReport(
  stats: readonly Stat[],
  options: ReportOptions,
): DepthReport {
  const reported = selectStats(sortByDepth(stats), options);

  return {
    analyzed: stats.length,
    reported,
    average: options.avg ? averageDepth(stats) : undefined,
    thresholdExceeded: options.over > 0 && reported.length > 0,
  };
}
