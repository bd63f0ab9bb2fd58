// ── Message Types ──

export type Message = PatternMessage | SelectMessage;

export interface PatternMessage {
  type: "message";
  declarations: Declaration[];
  pattern: Pattern;
  comment?: string;
}

export interface SelectMessage {
  type: "select";
  declarations: Declaration[];
  selectors: VariableRef[];
  variants: Variant[];
  comment?: string;
}

// ── Declarations ──

export type Declaration = InputDeclaration | LocalDeclaration;

export interface InputDeclaration {
  type: "input";
  name: string;
  value: VariableRefExpression;
}

export interface LocalDeclaration {
  type: "local";
  name: string;
  value: Expression;
}

// ── Variants ──

export interface Variant {
  keys: VariantKey[];
  value: Pattern;
}

export type VariantKey = Literal | CatchallKey;

/**
 * The `*` key. `value` keeps an optional label for the catchall.
 */
export interface CatchallKey {
  type: "*";
  value?: string;
}

// ── Patterns ──

export type Pattern = PatternElement[];

/** A `string` element is literal text. */
export type PatternElement = string | Expression | Markup;

export interface Expression<A extends Literal | VariableRef | undefined = Literal | VariableRef | undefined> {
  type: "expression";
  arg?: A;
  functionRef?: FunctionRef;
  attributes?: Attributes;
}

/** An expression whose operand is always a variable. */
export type VariableRefExpression = Expression<VariableRef> & { arg: VariableRef };

export interface Literal {
  type: "literal";
  value: string;
}

export interface VariableRef {
  type: "variable";
  name: string;
}

export interface FunctionRef {
  type: "function";
  name: string;
  options?: Options;
}

export interface Markup {
  type: "markup";
  kind: "open" | "standalone" | "close";
  name: string;
  options?: Options;
  attributes?: Attributes;
}

export type Options = Map<string, Literal | VariableRef>;

export type Attributes = Map<string, true | Literal>;

export type Node =
  | Declaration
  | Variant
  | CatchallKey
  | Expression
  | Literal
  | VariableRef
  | FunctionRef
  | Markup;
