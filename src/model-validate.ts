import { MessageDataModelError, type DataModelErrorCode } from "./errors.js";
import type { Expression, Markup, Message, Node, Options, Pattern, VariableRef } from "./types.js";

export interface ValidationResult {
  /** Names of every function the message calls. */
  functions: Set<string>;
  /** Names of variables the message expects as arguments. */
  variables: Set<string>;
}

export type ValidationErrorHandler = (error: MessageDataModelError, node: Node) => void;

/**
 * Checks the data model rules a parser cannot: unique declarations and
 * variants, annotated selectors, key counts and a catchall variant.
 *
 * Without `onError`, the first problem is thrown.
 */
export function validate(msg: Message, onError?: ValidationErrorHandler): ValidationResult {
  const report = (code: DataModelErrorCode, node: Node): void => {
    const error = new MessageDataModelError(code);
    if (!onError) throw error;
    onError(error, node);
  };

  const functions = new Set<string>();
  const variables = new Set<string>();
  const locals = new Set<string>();
  const declared = new Set<string>();
  const annotated = new Set<string>();

  const visitOptions = (options: Options | undefined): void => {
    for (const value of options?.values() ?? []) {
      if (value.type === "variable") variables.add(value.name);
    }
  };
  const visitExpression = (expression: Expression): void => {
    if (expression.arg?.type === "variable") variables.add(expression.arg.name);
    if (expression.functionRef) {
      functions.add(expression.functionRef.name);
      visitOptions(expression.functionRef.options);
    }
  };
  const visitMarkup = (markup: Markup): void => visitOptions(markup.options);
  const visitPattern = (pattern: Pattern): void => {
    for (const element of pattern) {
      if (typeof element === "string") continue;
      if (element.type === "markup") visitMarkup(element);
      else visitExpression(element);
    }
  };

  for (const decl of msg.declarations) {
    const { value } = decl;
    const arg = value.arg;
    if (value.functionRef || (decl.type === "local" && arg?.type === "variable" && annotated.has(arg.name))) {
      annotated.add(decl.name);
    }
    if (decl.type === "local") locals.add(decl.name);

    if (declared.has(decl.name)) report("duplicate-declaration", decl);
    else declared.add(decl.name);

    visitExpression(value);
  }

  if (msg.type === "message") {
    visitPattern(msg.pattern);
  } else {
    for (const selector of msg.selectors) {
      variables.add(selector.name);
      if (!annotated.has(selector.name)) report("missing-selector-annotation", selector);
    }

    const seen = new Set<string>();
    let hasFallback = false;
    for (const variant of msg.variants) {
      if (variant.keys.length !== msg.selectors.length) report("key-mismatch", variant);

      const keys = variant.keys.map((key) => (key.type === "*" ? 0 : key.value.normalize("NFC")));
      if (keys.every((key) => key === 0)) hasFallback = true;

      const id = JSON.stringify(keys);
      if (seen.has(id)) report("duplicate-variant", variant);
      else seen.add(id);

      visitPattern(variant.value);
    }

    const lastSelector: VariableRef | undefined = msg.selectors[msg.selectors.length - 1];
    if (!hasFallback && lastSelector) report("missing-fallback", lastSelector);
  }

  for (const local of locals) variables.delete(local);
  return { functions, variables };
}
