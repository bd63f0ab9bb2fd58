import type {
  CatchallKey,
  Declaration,
  Expression,
  FunctionRef,
  Literal,
  Markup,
  Message,
  PatternMessage,
  SelectMessage,
  VariableRef,
} from "./types.js";

function hasType(node: unknown, ...types: string[]): node is { type: string } {
  if (typeof node !== "object" || node === null || !("type" in node)) return false;
  const { type } = node;
  return typeof type === "string" && types.includes(type);
}

export function isMessage(node: unknown): node is Message {
  return hasType(node, "message", "select");
}

export function isPatternMessage(node: unknown): node is PatternMessage {
  return hasType(node, "message");
}

export function isSelectMessage(node: unknown): node is SelectMessage {
  return hasType(node, "select");
}

export function isDeclaration(node: unknown): node is Declaration {
  return hasType(node, "input", "local");
}

export function isExpression(node: unknown): node is Expression {
  return hasType(node, "expression");
}

export function isMarkup(node: unknown): node is Markup {
  return hasType(node, "markup");
}

export function isLiteral(node: unknown): node is Literal {
  return hasType(node, "literal");
}

export function isVariableRef(node: unknown): node is VariableRef {
  return hasType(node, "variable");
}

export function isFunctionRef(node: unknown): node is FunctionRef {
  return hasType(node, "function");
}

export function isCatchallKey(node: unknown): node is CatchallKey {
  return hasType(node, "*");
}

/** Text elements of a pattern are plain strings. */
export function isText(node: unknown): node is string {
  return typeof node === "string";
}
