import type { Attributes, Declaration, Expression, Literal, Markup, Message, Options, Pattern, VariableRef } from "./types.js";

const NAME_RE = /^[\p{L}_][\p{L}\p{N}_.-]*$/u;
const NUMBER_RE = /^-?(0|[1-9][0-9]*)(\.[0-9]+)?([eE][-+]?[0-9]+)?$/;
const LEADING_DOT_RE = /^\s*\./;

/**
 * Renders a data model message back to MessageFormat 2.0 syntax.
 */
export function stringifyMessage(msg: Message): string {
  const declarations = msg.declarations.map(stringifyDeclaration).join("");

  if (msg.type === "message") {
    return declarations + stringifyPattern(msg.pattern, declarations !== "");
  }

  const selectors = msg.selectors.map((selector) => ` ${stringifyVariableRef(selector)}`).join("");
  const variants = msg.variants.map((variant) => {
    const keys = variant.keys.map((key) => (key.type === "*" ? "*" : stringifyLiteral(key)));
    return `\n${keys.join(" ")} ${stringifyPattern(variant.value, true)}`;
  });
  return `${declarations}.match${selectors}${variants.join("")}`;
}

function stringifyDeclaration(decl: Declaration): string {
  return decl.type === "input"
    ? `.input ${stringifyExpression(decl.value)}\n`
    : `.local $${decl.name} = ${stringifyExpression(decl.value)}\n`;
}

function stringifyPattern(pattern: Pattern, quoted: boolean): string {
  const [first] = pattern;
  const quote = quoted || (typeof first === "string" && LEADING_DOT_RE.test(first));
  const body = pattern
    .map((element) => {
      if (typeof element === "string") return element.replace(/[\\{}]/g, "\\$&");
      return element.type === "markup" ? stringifyMarkup(element) : stringifyExpression(element);
    })
    .join("");
  return quote ? `{{${body}}}` : body;
}

export function stringifyExpression(expression: Expression): string {
  const parts: string[] = [];
  if (expression.arg) parts.push(stringifyValue(expression.arg));
  if (expression.functionRef) {
    parts.push(`:${expression.functionRef.name}${stringifyOptions(expression.functionRef.options)}`);
  }
  const body = parts.join(" ") + stringifyAttributes(expression.attributes);
  return `{${body}}`;
}

function stringifyMarkup({ kind, name, options, attributes }: Markup): string {
  const sigil = kind === "close" ? "/" : "#";
  const close = kind === "standalone" ? " /" : "";
  return `{${sigil}${name}${stringifyOptions(options)}${stringifyAttributes(attributes)}${close}}`;
}

function stringifyOptions(options: Options | undefined): string {
  if (!options) return "";
  return [...options].map(([name, value]) => ` ${name}=${stringifyValue(value)}`).join("");
}

function stringifyAttributes(attributes: Attributes | undefined): string {
  if (!attributes) return "";
  return [...attributes]
    .map(([name, value]) => (value === true ? ` @${name}` : ` @${name}=${stringifyLiteral(value)}`))
    .join("");
}

function stringifyValue(value: Literal | VariableRef): string {
  return value.type === "literal" ? stringifyLiteral(value) : stringifyVariableRef(value);
}

/** Names and numbers stand unquoted; anything else goes between `|`. */
export function stringifyLiteral({ value }: Literal): string {
  if (NAME_RE.test(value) || NUMBER_RE.test(value)) return value;
  return `|${value.replace(/[\\|]/g, "\\$&")}|`;
}

function stringifyVariableRef({ name }: VariableRef): string {
  return `$${name}`;
}
