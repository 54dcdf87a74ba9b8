import type { DepthReport } from "../report/stats.js";
import type { Stat } from "../types.js";

interface JsonStat {
  depth: number;
  module: string;
  function: string;
  file: string;
  line: number;
  column: number;
}

interface JsonOutput {
  functions: JsonStat[];
  summary: {
    functions_analyzed: number;
    functions_reported: number;
    average_depth?: number | null;
  };
}

/** `<depth> <module> <function> <file>:<line>:<column>` */
export function formatStat(stat: Stat): string {
  const { file, line, column } = stat.position;
  return `${stat.depth} ${stat.module} ${stat.name} ${file}:${line}:${column}`;
}

/** Average to three significant digits, e.g. "Average: 5.00" */
export function formatAverage(average: number): string {
  return `Average: ${average.toPrecision(3)}`;
}

function toJsonStat(stat: Stat): JsonStat {
  return {
    depth: stat.depth,
    module: stat.module,
    function: stat.name,
    file: stat.position.file,
    line: stat.position.line,
    column: stat.position.column,
  };
}

export function buildJsonOutput(report: DepthReport): JsonOutput {
  const output: JsonOutput = {
    functions: report.reported.map(toJsonStat),
    summary: {
      functions_analyzed: report.analyzed,
      functions_reported: report.reported.length,
    },
  };

  if (report.average !== undefined) {
    // JSON has no NaN
    output.summary.average_depth = Number.isFinite(report.average)
      ? report.average
      : null;
  }

  return output;
}

function outputTextResults(report: DepthReport): void {
  for (const stat of report.reported) {
    console.log(formatStat(stat));
  }
  if (report.average !== undefined) {
    console.log(formatAverage(report.average));
  }
}

export function outputResults(report: DepthReport, json: boolean): void {
  if (json) {
    console.log(JSON.stringify(buildJsonOutput(report), null, 2));
    return;
  }

  outputTextResults(report);
}
