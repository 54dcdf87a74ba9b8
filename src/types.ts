// Location of a declaration, as reported in output lines
export interface SourcePosition {
  file: string;
  line: number;
  column: number;
}

// One analyzed function or method
export interface Stat {
  // Module the declaration lives in (file base name, or directory for index files)
  module: string;
  // Display name: "name" or "(Receiver).name"
  name: string;
  depth: number;
  position: SourcePosition;
}

// Reporter settings resolved from command-line flags and tsdepth.toml
export interface ReportOptions {
  // Only report depths strictly greater than this
  over: number;
  // Report at most this many records; undefined means unbounded
  top?: number;
  // Also compute the mean depth over every analyzed declaration
  avg: boolean;
}

export const DEFAULT_REPORT_OPTIONS: ReportOptions = {
  over: 0,
  avg: false,
};

export const ExitCode = {
  SUCCESS: 0, // Nothing over the threshold
  THRESHOLD_EXCEEDED: 1, // --over is set and at least one function exceeded it
  ANALYSIS_ERROR: 1, // A source file could not be read or parsed
  USAGE_ERROR: 2, // Bad arguments or invalid tsdepth.toml
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];
