/**
 * Collects the functions and methods declared at the top level of a file and
 * turns each into a Stat.
 */

import { basename, dirname, resolve } from "path";
import ts from "typescript";

import type { SourcePosition, Stat } from "../types.js";
import { maxNestingDepth } from "./analyzer.js";
import type { ParsedFile } from "./parser.js";
import type { FunctionDeclaration, Receiver } from "./types.js";

export const MALFORMED_RECEIVER = "<unknown>";

type FunctionLiteral = ts.ArrowFunction | ts.FunctionExpression;

function isFunctionLiteral(node: ts.Node): node is FunctionLiteral {
  return ts.isArrowFunction(node) || ts.isFunctionExpression(node);
}

/**
 * The function literal an initializer evaluates to, looking through
 * parentheses, `as`, `satisfies`, `<T>` assertions and `!`.
 */
function functionLiteralOf(
  expression: ts.Expression | undefined,
): FunctionLiteral | undefined {
  let current = expression;
  while (
    current !== undefined &&
    (ts.isParenthesizedExpression(current) ||
      ts.isAsExpression(current) ||
      ts.isSatisfiesExpression(current) ||
      ts.isTypeAssertionExpression(current) ||
      ts.isNonNullExpression(current))
  ) {
    current = current.expression;
  }
  return current !== undefined && isFunctionLiteral(current)
    ? current
    : undefined;
}

/**
 * Module name of a file: its base name without extension, or the directory
 * name for index files.
 */
export function moduleName(filePath: string): string {
  const name = basename(filePath).replace(/(\.d)?\.[^.]+$/, "");
  if (name === "index") {
    return basename(dirname(resolve(filePath)));
  }
  return name;
}

/**
 * Render a receiver as "T", "typeof T" or the malformed marker.
 */
export function receiverString(receiver: Receiver): string {
  switch (receiver.kind) {
    case "named":
      return receiver.typeName;
    case "static":
      return `typeof ${receiver.typeName}`;
    case "malformed":
      return MALFORMED_RECEIVER;
  }
}

/**
 * Display name: "(Receiver).name" for methods, "name" otherwise.
 */
export function displayName(declaration: FunctionDeclaration): string {
  if (declaration.receiver) {
    return `(${receiverString(declaration.receiver)}).${declaration.name}`;
  }
  return declaration.name;
}

/**
 * Receiver described by the type annotation of an explicit `this` parameter.
 */
export function receiverFromType(type: ts.TypeNode | undefined): Receiver {
  if (type === undefined) {
    return { kind: "malformed" };
  }
  if (ts.isParenthesizedTypeNode(type)) {
    return receiverFromType(type.type);
  }
  if (ts.isTypeReferenceNode(type) && ts.isIdentifier(type.typeName)) {
    return { kind: "named", typeName: type.typeName.text };
  }
  if (ts.isTypeQueryNode(type) && ts.isIdentifier(type.exprName)) {
    return { kind: "static", typeName: type.exprName.text };
  }
  return { kind: "malformed" };
}

function thisReceiver(fn: ts.SignatureDeclarationBase): Receiver | undefined {
  const first = fn.parameters[0];
  if (
    first === undefined ||
    !ts.isIdentifier(first.name) ||
    first.name.text !== "this"
  ) {
    return undefined;
  }
  return receiverFromType(first.type);
}

function positionOf(node: ts.Node, parsed: ParsedFile): SourcePosition {
  const { line, character } = parsed.sourceFile.getLineAndCharacterOfPosition(
    node.getStart(parsed.sourceFile),
  );
  return { file: parsed.filePath, line: line + 1, column: character + 1 };
}

/**
 * Build a declaration from a function-like node; undefined when it has no
 * body (overload signatures, ambient declarations).
 */
function fromFunctionLike(
  fn: ts.FunctionLikeDeclaration,
  name: string,
  anchor: ts.Node,
  parsed: ParsedFile,
  receiver: Receiver | undefined = thisReceiver(fn),
): FunctionDeclaration | undefined {
  if (fn.body === undefined) {
    return undefined;
  }

  return {
    name,
    receiver,
    body: ts.isBlock(fn.body) ? fn.body.statements : [fn.body],
    position: positionOf(anchor, parsed),
  };
}

function memberFunction(
  member: ts.ClassElement,
): ts.FunctionLikeDeclaration | undefined {
  if (
    ts.isMethodDeclaration(member) ||
    ts.isConstructorDeclaration(member) ||
    ts.isGetAccessorDeclaration(member) ||
    ts.isSetAccessorDeclaration(member)
  ) {
    return member;
  }
  // handle = () => { ... }
  if (ts.isPropertyDeclaration(member)) {
    return functionLiteralOf(member.initializer);
  }
  return undefined;
}

function memberName(member: ts.ClassElement, sourceFile: ts.SourceFile): string {
  if (ts.isConstructorDeclaration(member)) {
    return "constructor";
  }
  return member.name?.getText(sourceFile) ?? "<anonymous>";
}

function classReceiver(
  className: string | undefined,
  member: ts.ClassElement,
): Receiver {
  if (className === undefined) {
    return { kind: "malformed" };
  }
  const isStatic =
    (ts.getCombinedModifierFlags(member) & ts.ModifierFlags.Static) !== 0;
  return { kind: isStatic ? "static" : "named", typeName: className };
}

function classDeclarations(
  node: ts.ClassDeclaration,
  parsed: ParsedFile,
): FunctionDeclaration[] {
  const className = node.name?.text;
  const declarations: FunctionDeclaration[] = [];

  for (const member of node.members) {
    const fn = memberFunction(member);
    if (!fn) continue;

    const declaration = fromFunctionLike(
      fn,
      memberName(member, parsed.sourceFile),
      member,
      parsed,
      classReceiver(className, member),
    );
    if (declaration) {
      declarations.push(declaration);
    }
  }

  return declarations;
}

function variableDeclarations(
  statement: ts.VariableStatement,
  parsed: ParsedFile,
): FunctionDeclaration[] {
  const declarations: FunctionDeclaration[] = [];

  // const foo = () => {} or const foo = function() {}
  for (const variable of statement.declarationList.declarations) {
    const fn = functionLiteralOf(variable.initializer);
    if (!ts.isIdentifier(variable.name) || fn === undefined) {
      continue;
    }
    const declaration = fromFunctionLike(
      fn,
      variable.name.text,
      statement,
      parsed,
    );
    if (declaration) {
      declarations.push(declaration);
    }
  }

  return declarations;
}

function statementDeclarations(
  statement: ts.Statement,
  parsed: ParsedFile,
): FunctionDeclaration[] {
  if (ts.isFunctionDeclaration(statement)) {
    const declaration = fromFunctionLike(
      statement,
      statement.name?.text ?? "default",
      statement,
      parsed,
    );
    return declaration ? [declaration] : [];
  }

  if (ts.isClassDeclaration(statement)) {
    return classDeclarations(statement, parsed);
  }

  if (ts.isVariableStatement(statement)) {
    return variableDeclarations(statement, parsed);
  }

  // export default () => {}
  if (ts.isExportAssignment(statement)) {
    const fn = functionLiteralOf(statement.expression);
    const declaration =
      fn && fromFunctionLike(fn, "default", statement, parsed);
    return declaration ? [declaration] : [];
  }

  return [];
}

/**
 * Enumerate top-level function and method declarations in source order.
 */
export function collectDeclarations(parsed: ParsedFile): FunctionDeclaration[] {
  return parsed.sourceFile.statements.flatMap((statement) =>
    statementDeclarations(statement, parsed),
  );
}

/**
 * One Stat per declaration, in declaration order.
 */
export function buildStats(parsed: ParsedFile): Stat[] {
  const module = moduleName(parsed.filePath);

  return collectDeclarations(parsed).map((declaration) => ({
    module,
    name: displayName(declaration),
    depth: maxNestingDepth(declaration.body, parsed.sourceFile),
    position: declaration.position,
  }));
}
