import { ConfigError, type Config, resolveConfig } from "../../config/loader.js";
import { analyzeFiles, discoverFiles } from "../../depth/index.js";
import { buildReport } from "../../report/stats.js";
import {
  DEFAULT_REPORT_OPTIONS,
  ExitCode,
  type ExitCodeValue,
  type ReportOptions,
} from "../../types.js";
import { colors } from "../output.js";
import { outputResults } from "../output-stats.js";

export interface AnalyzeOptions {
  over?: number;
  top?: number;
  avg?: boolean;
  json?: boolean;
  exclude?: string[];
  config?: string;
}

/** Command-line flags take precedence over [depth] in tsdepth.toml */
export function resolveReportOptions(
  options: AnalyzeOptions,
  config: Config,
): ReportOptions {
  return {
    over: options.over ?? config.depth?.over ?? DEFAULT_REPORT_OPTIONS.over,
    top: options.top ?? config.depth?.top ?? DEFAULT_REPORT_OPTIONS.top,
    avg: options.avg ?? config.depth?.avg ?? DEFAULT_REPORT_OPTIONS.avg,
  };
}

/** Exclude patterns from tsdepth.toml followed by those from --exclude */
export function resolveExcludePatterns(
  options: AnalyzeOptions,
  config: Config,
): string[] {
  return [...(config.files?.exclude ?? []), ...(options.exclude ?? [])];
}

/** Main analyze execution logic */
async function executeAnalyze(
  paths: string[],
  options: AnalyzeOptions,
): Promise<ExitCodeValue> {
  const config = await resolveConfig(options.config);
  const reportOptions = resolveReportOptions(options, config);
  const exclude = resolveExcludePatterns(options, config);

  const files = discoverFiles(paths, exclude);
  if (files.length === 0) {
    console.error(colors.yellow("Warning: no source files found"));
  }

  const stats = analyzeFiles(files);
  const report = buildReport(stats, reportOptions);

  outputResults(report, options.json ?? false);
  return report.thresholdExceeded
    ? ExitCode.THRESHOLD_EXCEEDED
    : ExitCode.SUCCESS;
}

function getExitCode(error: unknown): ExitCodeValue {
  if (error instanceof ConfigError) {
    return ExitCode.USAGE_ERROR;
  }
  // Read and parse failures (AnalysisError) and anything unexpected
  return ExitCode.ANALYSIS_ERROR;
}

function handleAnalyzeError(error: unknown): ExitCodeValue {
  const errorMessage = error instanceof Error ? error.message : "Unknown error";
  console.error(colors.red(`Error: ${errorMessage}`));
  return getExitCode(error);
}

/**
 * Run an analysis and report it.
 * @returns Exit code for the process
 */
export async function analyzeCommand(
  paths: string[],
  options: AnalyzeOptions,
): Promise<ExitCodeValue> {
  try {
    return await executeAnalyze(paths, options);
  } catch (error: unknown) {
    return handleAnalyzeError(error);
  }
}
