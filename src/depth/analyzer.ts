/**
 * Maximum nested-block depth of a function body.
 *
 * Nesting is inferred from block spans alone: each block is compared with the
 * block visited just before it, with no ancestor stack. A block that both
 * starts and ends after the previous one is taken as its sibling, so depth
 * steps back out one level before descending again. This keeps else-if chains
 * and consecutive loops from accumulating depth, but it only ever steps back
 * one level, so a sibling that follows a more deeply nested block is scored
 * too deep. Reported numbers depend on that behavior; keep it.
 */

import ts from "typescript";

import type { LexicalSpan } from "./types.js";

/**
 * Traversal state for one top-level body node.
 */
export interface DepthState {
  depth: number;
  last: LexicalSpan | undefined;
  max: number;
}

export function createDepthState(): DepthState {
  return { depth: 0, last: undefined, max: 0 };
}

/**
 * Record entry into a block and return the depth it was scored at.
 */
export function enterBlock(state: DepthState, span: LexicalSpan): number {
  const previous = state.last;
  if (
    previous !== undefined &&
    span.start > previous.start &&
    span.end > previous.end
  ) {
    state.depth--;
  }

  state.last = span;
  state.depth++;
  state.max = Math.max(state.max, state.depth);
  return state.depth;
}

/**
 * Span of a block-delimited node, or undefined for any other node.
 * Statement blocks and switch case blocks count; object literals and class
 * bodies do not.
 */
export function blockSpan(
  node: ts.Node,
  sourceFile: ts.SourceFile,
): LexicalSpan | undefined {
  if (!ts.isBlock(node) && !ts.isCaseBlock(node)) {
    return undefined;
  }
  return { start: node.getStart(sourceFile), end: node.getEnd() };
}

/**
 * Deepest block reached under a single top-level body node.
 */
export function statementDepth(
  statement: ts.Node,
  sourceFile: ts.SourceFile,
): number {
  const state = createDepthState();

  function visit(node: ts.Node): void {
    const span = blockSpan(node, sourceFile);
    if (span) {
      enterBlock(state, span);
    }
    ts.forEachChild(node, visit);
  }

  visit(statement);
  return state.max;
}

/**
 * Maximum nesting depth over a function's top-level body nodes (0 when empty).
 */
export function maxNestingDepth(
  body: readonly ts.Node[],
  sourceFile: ts.SourceFile,
): number {
  return body.reduce(
    (max, statement) => Math.max(max, statementDepth(statement, sourceFile)),
    0,
  );
}
