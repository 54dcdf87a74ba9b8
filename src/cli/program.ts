import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { Command, CommanderError, InvalidArgumentError } from "commander";

import { ExitCode, type ExitCodeValue } from "../types.js";
import { type AnalyzeOptions, analyzeCommand } from "./commands/analyze.js";

// Read version from package.json
function readVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const pkg: unknown = JSON.parse(
    readFileSync(join(__dirname, "../../package.json"), "utf-8"),
  );
  if (
    typeof pkg === "object" &&
    pkg !== null &&
    "version" in pkg &&
    typeof pkg.version === "string"
  ) {
    return pkg.version;
  }
  return "0.0.0";
}

function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return Number.parseInt(value, 10);
}

function parseCount(value: string): number {
  const n = parseInteger(value);
  if (n < 0) {
    throw new InvalidArgumentError("Must be zero or more.");
  }
  return n;
}

// commander writes a lone newline before the help shown after an error
function writeTo(write: (line: string) => void): (str: string) => void {
  return (str) => {
    const text = str.trimEnd();
    if (text !== "") {
      write(text);
    }
  };
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

export type AnalyzeAction = (
  paths: string[],
  options: AnalyzeOptions,
) => Promise<void>;

export function createProgram(action: AnalyzeAction): Command {
  return new Command()
    .name("tsdepth")
    .description(
      "Calculate the maximum nesting depth of TypeScript and JavaScript functions",
    )
    .version(readVersion())
    .argument("<paths...>", "Source files or directories to analyze")
    .option(
      "--over <n>",
      "show functions with depth > n only and exit 1 if any are shown",
      parseInteger,
    )
    .option("--top <n>", "show the n deepest functions only", parseCount)
    .option(
      "--avg",
      "show the average depth over all functions, whether or not --over or --top are set",
    )
    .option("--json", "output results as JSON")
    .option(
      "--exclude <pattern>",
      "skip files found in directories that match the pattern (repeatable)",
      collect,
    )
    .option("--config <file>", "path to tsdepth.toml")
    .addHelpText(
      "after",
      `
The output fields for each line are:
  <depth> <module> <function> <file:line:column>
Static members show as (typeof Class).name, with a space inside the
function field; use --json when the output is parsed by a script.

Examples:
  $ tsdepth src/                   Depth of every function under src/
  $ tsdepth --top 10 src/          The ten deepest functions
  $ tsdepth --over 4 src/          Fail if any function is nested deeper than 4
  $ tsdepth --avg src/ lib/main.ts Also print the average depth`,
    )
    .showHelpAfterError()
    .exitOverride()
    .configureOutput({
      writeOut: writeTo((line) => console.log(line)),
      writeErr: writeTo((line) => console.error(line)),
    })
    .action(action);
}

/**
 * Parse command-line arguments (without the node and script entries) and run.
 * @returns Exit code for the process
 */
export async function run(args: string[]): Promise<ExitCodeValue> {
  let exitCode: ExitCodeValue = ExitCode.SUCCESS;

  const program = createProgram(async (paths, options) => {
    exitCode = await analyzeCommand(paths, options);
  });

  try {
    await program.parseAsync(args, { from: "user" });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // --help and --version exit 0, everything else is a usage error
      return error.exitCode === 0 ? ExitCode.SUCCESS : ExitCode.USAGE_ERROR;
    }
    throw error;
  }

  return exitCode;
}
