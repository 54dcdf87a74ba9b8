/**
 * Type definitions for nesting depth analysis.
 */

import type ts from "typescript";

import type { SourcePosition } from "../types.js";

/**
 * Offsets of a block's opening delimiter and its end.
 * A contains B iff A.start < B.start and A.end > B.end.
 */
export interface LexicalSpan {
  start: number;
  end: number;
}

/**
 * The type a method-like declaration is attached to.
 * "static" members are reached through the class constructor, so they render
 * as `typeof T`.
 */
export type Receiver =
  | { kind: "named"; typeName: string }
  | { kind: "static"; typeName: string }
  | { kind: "malformed" };

/**
 * A function or method found at the top level of a file.
 */
export interface FunctionDeclaration {
  name: string;
  receiver?: Receiver;
  // Top-level body nodes: block statements, or the expression of a concise arrow
  body: readonly ts.Node[];
  position: SourcePosition;
}

/**
 * Error thrown when a source file cannot be read or parsed
 */
export class AnalysisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AnalysisError";
  }
}
