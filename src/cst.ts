import type { MessageSyntaxError } from "./errors.js";

/**
 * Concrete syntax tree node shapes, as produced by a MessageFormat 2.0
 * parser. Every node carries `start`/`end` offsets into the source.
 */

export type Message = SimpleMessage | ComplexMessage | SelectMessage;

export interface SimpleMessage {
  type: "simple";
  declarations?: never;
  pattern: Pattern;
  errors: MessageSyntaxError[];
}

export interface ComplexMessage {
  type: "complex";
  declarations: Declaration[];
  pattern: Pattern;
  errors: MessageSyntaxError[];
}

export interface SelectMessage {
  type: "select";
  declarations: Declaration[];
  match: Syntax<".match">;
  selectors: VariableRef[];
  variants: Variant[];
  errors: MessageSyntaxError[];
}

export type Declaration = InputDeclaration | LocalDeclaration | Junk;

export interface InputDeclaration {
  type: "input";
  start: number;
  end: number;
  keyword: Syntax<".input">;
  value: Expression | Junk;
}

export interface LocalDeclaration {
  type: "local";
  start: number;
  end: number;
  keyword: Syntax<".local">;
  target: VariableRef | Junk;
  equals?: Syntax<"=">;
  value: Expression | Junk;
}

export interface Variant {
  start: number;
  end: number;
  keys: Array<Literal | CatchallKey>;
  value: Pattern;
}

export interface CatchallKey {
  type: "*";
  start: number;
  end: number;
}

export interface Pattern {
  start: number;
  end: number;
  braces?: [Syntax<"{{">] | [Syntax<"{{">, Syntax<"}}">];
  body: Array<Text | Expression | Junk>;
}

export interface Text {
  type: "text";
  start: number;
  end: number;
  value: string;
}

export interface Expression {
  type: "expression";
  start: number;
  end: number;
  braces: [Syntax<"{">] | [Syntax<"{">, Syntax<"}">];
  arg?: Literal | VariableRef;
  functionRef?: FunctionRef | Junk;
  markup?: Markup;
  attributes: Attribute[];
}

export interface Junk {
  type: "junk";
  start: number;
  end: number;
  source: string;
}

export interface Literal {
  type: "literal";
  start: number;
  end: number;
  quoted: boolean;
  open?: Syntax<"|">;
  value: string;
  close?: Syntax<"|">;
}

export interface VariableRef {
  type: "variable";
  start: number;
  end: number;
  open: Syntax<"$">;
  name: string;
}

export interface FunctionRef {
  type: "function";
  start: number;
  end: number;
  open: Syntax<":">;
  name: Identifier;
  options: Option[];
}

export interface Markup {
  type: "markup";
  start: number;
  end: number;
  open: Syntax<"#" | "/">;
  name: Identifier;
  options: Option[];
  close?: Syntax<"/">;
}

export interface Option {
  start: number;
  end: number;
  name: Identifier;
  equals?: Syntax<"=">;
  value: Literal | VariableRef;
}

export interface Attribute {
  start: number;
  end: number;
  open: Syntax<"@">;
  name: Identifier;
  equals?: Syntax<"=">;
  value?: Literal;
}

/**
 * `[name]` or `[namespace, ":", name]`. Parsers may emit other token
 * counts for malformed input.
 */
export type Identifier = Array<Syntax<string>>;

export interface Syntax<T extends string> {
  start: number;
  end: number;
  value: T;
}
