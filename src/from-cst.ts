import type * as CST from "./cst.js";
import { MessageDataModelError, MessageSyntaxError } from "./errors.js";
import type {
  Attributes,
  CatchallKey,
  Declaration,
  Expression,
  FunctionRef,
  Literal,
  Markup,
  Message,
  Options,
  Pattern,
  PatternElement,
  VariableRef,
  VariableRefExpression,
} from "./types.js";

/**
 * Converts a concrete syntax tree into the message data model.
 *
 * Throws a `MessageSyntaxError` for the first error recorded in the tree, or
 * for any junk node, and a `MessageDataModelError` for an `.input` whose
 * argument is not a variable. No partial message is ever returned.
 */
export function fromCST(msg: CST.Message): Message {
  const [first] = msg.errors;
  if (first) throw new MessageSyntaxError("parse-error", first.start, first.end);

  const declarations: Declaration[] = msg.declarations ? msg.declarations.map(asDeclaration) : [];

  if (msg.type === "select") {
    return {
      type: "select",
      declarations,
      selectors: msg.selectors.map(asVariableRef),
      variants: msg.variants.map((variant) => ({
        keys: variant.keys.map((key) => (key.type === "*" ? catchall() : asLiteral(key))),
        value: asPattern(variant.value),
      })),
    };
  }

  return { type: "message", declarations, pattern: asPattern(msg.pattern) };
}

// ── Declarations ──

function asDeclaration(decl: CST.Declaration): Declaration {
  switch (decl.type) {
    case "input": {
      const value = asExpression(decl.value);
      if (!isVariableRefExpression(value)) throw new MessageDataModelError("bad-input-expression", decl);
      return { type: "input", name: value.arg.name, value };
    }

    case "local":
      return { type: "local", name: asVariableRef(decl.target).name, value: asExpression(decl.value) };

    case "junk":
      throw junkError(decl);
  }
}

function isVariableRefExpression(expression: Expression): expression is VariableRefExpression {
  return expression.arg?.type === "variable";
}

// ── Patterns ──

function asPattern(pattern: CST.Pattern): Pattern {
  return pattern.body.map((element): PatternElement => {
    switch (element.type) {
      case "text":
        return element.value;
      case "expression":
        return element.markup ? asMarkup(element, element.markup) : asExpression(element);
      case "junk":
        throw junkError(element);
    }
  });
}

function asExpression(exp: CST.Expression | CST.Junk): Expression {
  if (exp.type === "junk") throw junkError(exp);

  const expression: Expression = { type: "expression" };
  if (exp.arg) expression.arg = asValue(exp.arg);
  if (exp.functionRef) expression.functionRef = asFunctionRef(exp.functionRef);
  const attributes = asAttributes(exp.attributes);
  if (attributes) expression.attributes = attributes;
  return expression;
}

function asFunctionRef(ref: CST.FunctionRef | CST.Junk): FunctionRef {
  if (ref.type === "junk") throw junkError(ref);

  const functionRef: FunctionRef = { type: "function", name: asName(ref.name) };
  const options = asOptions(ref.options);
  if (options) functionRef.options = options;
  return functionRef;
}

/** `/name` closes, `#name /` stands alone, `#name` opens. */
function asMarkup(exp: CST.Expression, markup: CST.Markup): Markup {
  const kind = markup.open.value === "/" ? "close" : markup.close ? "standalone" : "open";
  const result: Markup = { type: "markup", kind, name: asName(markup.name) };
  const options = asOptions(markup.options);
  if (options) result.options = options;
  const attributes = asAttributes(exp.attributes);
  if (attributes) result.attributes = attributes;
  return result;
}

function asOptions(options: CST.Option[]): Options | undefined {
  if (options.length === 0) return undefined;
  return new Map(
    options.map((option): [string, Literal | VariableRef] => [asName(option.name), asValue(option.value)])
  );
}

function asAttributes(attributes: CST.Attribute[]): Attributes | undefined {
  if (attributes.length === 0) return undefined;
  return new Map(
    attributes.map((attribute): [string, true | Literal] => [
      asName(attribute.name),
      attribute.value ? asLiteral(attribute.value) : true,
    ])
  );
}

// ── Values ──

function asValue(value: CST.Literal | CST.VariableRef): Literal | VariableRef {
  return value.type === "literal" ? asLiteral(value) : asVariableRef(value);
}

function asLiteral(literal: CST.Literal): Literal {
  return { type: "literal", value: literal.value };
}

function asVariableRef(ref: CST.VariableRef | CST.Junk): VariableRef {
  if (ref.type === "junk") throw junkError(ref);
  return { type: "variable", name: ref.name };
}

function catchall(): CatchallKey {
  return { type: "*" };
}

// TODO: reject identifiers that are neither `name` nor `ns:name` once the
// parser guarantees it never emits other token counts.
function asName(id: CST.Identifier): string {
  switch (id.length) {
    case 1:
      return id[0].value;
    case 3:
      return `${id[0].value}:${id[2].value}`;
    default:
      return "";
  }
}

function junkError(junk: CST.Junk): MessageSyntaxError {
  return new MessageSyntaxError("parse-error", junk.start, junk.end);
}
