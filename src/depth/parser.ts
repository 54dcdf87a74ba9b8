/**
 * Parses TypeScript/JavaScript sources with the TypeScript compiler API.
 */

import { readFileSync } from "fs";
import { extname, resolve } from "path";
import ts from "typescript";

import { AnalysisError } from "./types.js";

export const SOURCE_EXTENSIONS = [
  ".ts",
  ".tsx",
  ".mts",
  ".cts",
  ".js",
  ".jsx",
  ".mjs",
  ".cjs",
];

// A one-file program: nothing is resolved, no lib files are loaded
const COMPILER_OPTIONS: ts.CompilerOptions = {
  allowJs: true,
  noLib: true,
  noResolve: true,
  noEmit: true,
  types: [],
  target: ts.ScriptTarget.Latest,
};

export interface ParsedFile {
  filePath: string;
  sourceFile: ts.SourceFile;
}

export function isSourceFile(filePath: string): boolean {
  return SOURCE_EXTENSIONS.includes(extname(filePath).toLowerCase());
}

function scriptKindFor(filePath: string): ts.ScriptKind {
  switch (extname(filePath).toLowerCase()) {
    case ".tsx":
      return ts.ScriptKind.TSX;
    case ".jsx":
      return ts.ScriptKind.JSX;
    case ".js":
    case ".mjs":
    case ".cjs":
      return ts.ScriptKind.JS;
    default:
      return ts.ScriptKind.TS;
  }
}

/**
 * Syntax errors for a parsed file. The parser itself never throws, so the
 * diagnostics come from a program that holds only this file.
 */
function syntacticDiagnostics(
  sourceFile: ts.SourceFile,
): readonly ts.Diagnostic[] {
  const target = resolve(sourceFile.fileName);
  const isTarget = (fileName: string): boolean => resolve(fileName) === target;

  const host: ts.CompilerHost = {
    ...ts.createCompilerHost(COMPILER_OPTIONS, true),
    getSourceFile: (fileName) => (isTarget(fileName) ? sourceFile : undefined),
    fileExists: isTarget,
    readFile: (fileName) => (isTarget(fileName) ? sourceFile.text : undefined),
  };

  const program = ts.createProgram({
    rootNames: [sourceFile.fileName],
    options: COMPILER_OPTIONS,
    host,
  });
  return program.getSyntacticDiagnostics(sourceFile);
}

function formatDiagnostic(filePath: string, diagnostic: ts.Diagnostic): string {
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n");
  if (diagnostic.file === undefined || diagnostic.start === undefined) {
    return `${filePath}: ${message}`;
  }
  const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(
    diagnostic.start,
  );
  return `${filePath}:${line + 1}:${character + 1}: ${message}`;
}

function formatDiagnostics(
  filePath: string,
  diagnostics: readonly ts.Diagnostic[],
): string {
  const [first, ...rest] = diagnostics;
  if (first === undefined) {
    return `${filePath}: parse failed`;
  }
  const message = formatDiagnostic(filePath, first);
  if (rest.length === 0) {
    return message;
  }
  const s = rest.length === 1 ? "" : "s";
  return `${message} (and ${rest.length} more error${s})`;
}

/**
 * Parse source text into a syntax tree with parent pointers set.
 * @throws AnalysisError if the extension is not a source extension or the text has syntax errors
 */
export function parseSource(filePath: string, text: string): ParsedFile {
  if (!isSourceFile(filePath)) {
    throw new AnalysisError(`${filePath}: unsupported file extension`);
  }

  const sourceFile = ts.createSourceFile(
    filePath,
    text,
    ts.ScriptTarget.Latest,
    true,
    scriptKindFor(filePath),
  );

  const diagnostics = syntacticDiagnostics(sourceFile);
  if (diagnostics.length > 0) {
    throw new AnalysisError(formatDiagnostics(filePath, diagnostics));
  }

  return { filePath, sourceFile };
}

/**
 * Read and parse a source file.
 */
export function parseFile(filePath: string): ParsedFile {
  let source: string;
  try {
    source = readFileSync(filePath, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new AnalysisError(`Failed to read file ${filePath}: ${message}`);
  }

  return parseSource(filePath, source);
}
