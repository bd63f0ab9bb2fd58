// ── Error taxonomy ──

export type MessageErrorType =
  | "syntax-error"
  | "data-model-error"
  | "bad-operand"
  | "bad-option"
  | "bad-selector"
  | "unresolved-variable"
  | "unsupported-operation"
  | "bad-function-result";

export type ResolutionErrorType =
  | "bad-operand"
  | "bad-option"
  | "unresolved-variable"
  | "unsupported-operation"
  | "bad-function-result";

// Only `parse-error` is raised here; the rest arrive on CST errors from the parser.
export type SyntaxErrorCode =
  | "parse-error"
  | "empty-token"
  | "bad-escape"
  | "extra-content"
  | "missing-syntax";

export type DataModelErrorCode =
  | "bad-input-expression"
  | "duplicate-declaration"
  | "duplicate-variant"
  | "key-mismatch"
  | "missing-fallback"
  | "missing-selector-annotation";

export type SelectionErrorCode = "not-selectable";

/**
 * Base class for every error surfaced by this package.
 *
 * `type` is the stable category reported to error sinks; `code` names the
 * precise condition and equals `type` for resolution errors.
 */
export class MessageError extends Error {
  constructor(
    public readonly type: MessageErrorType,
    public readonly code: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "MessageError";
    Object.setPrototypeOf(this, MessageError.prototype);
  }

  public override toString(): string {
    return `${this.name} [${this.code}] ${this.message}`;
  }
}

/**
 * Malformed syntax, located by offsets into the message source.
 */
export class MessageSyntaxError extends MessageError {
  constructor(
    code: SyntaxErrorCode | DataModelErrorCode,
    public readonly start: number,
    public readonly end: number = start + 1,
    type: "syntax-error" | "data-model-error" = "syntax-error"
  ) {
    super(type, code, start >= 0 ? `${code} at ${start}` : code);
    this.name = "MessageSyntaxError";
    Object.setPrototypeOf(this, MessageSyntaxError.prototype);
  }

  public override toString(): string {
    return `${this.name} [${this.code}] [Position ${this.start}-${this.end}] ${this.message}`;
  }
}

export interface LocatedNode {
  start: number;
  end: number;
}

/**
 * Structurally valid syntax that does not form a valid message.
 * Built from the offending node when one is available.
 */
export class MessageDataModelError extends MessageSyntaxError {
  constructor(code: DataModelErrorCode, node?: Partial<LocatedNode>) {
    super(code, node?.start ?? -1, node?.end ?? -1, "data-model-error");
    this.name = "MessageDataModelError";
    Object.setPrototypeOf(this, MessageDataModelError.prototype);
  }
}

/**
 * Raised while resolving an expression; `source` is the expression's
 * fallback representation.
 */
export class MessageResolutionError extends MessageError {
  constructor(
    type: ResolutionErrorType,
    message: string,
    public readonly source: string
  ) {
    super(type, type, message);
    this.name = "MessageResolutionError";
    Object.setPrototypeOf(this, MessageResolutionError.prototype);
  }

  public override toString(): string {
    return `${this.name} [${this.code}] {${this.source}} ${this.message}`;
  }
}

/**
 * Raised when a resolved value cannot take part in variant selection.
 */
export class MessageSelectionError extends MessageError {
  constructor(
    code: SelectionErrorCode,
    public readonly source: string,
    cause?: unknown
  ) {
    super("bad-selector", code, `Selection error (${code}) for {${source}}`, { cause });
    this.name = "MessageSelectionError";
    Object.setPrototypeOf(this, MessageSelectionError.prototype);
  }
}

export function isMessageError(error: unknown): error is MessageError {
  return error instanceof MessageError;
}

export function badOperand(message: string, source: string): MessageResolutionError {
  return new MessageResolutionError("bad-operand", message, source);
}

export function badOption(message: string, source: string): MessageResolutionError {
  return new MessageResolutionError("bad-option", message, source);
}

export function unsupportedOperation(message: string, source: string): MessageResolutionError {
  return new MessageResolutionError("unsupported-operation", message, source);
}

export function unresolvedVariable(name: string, source: string): MessageResolutionError {
  return new MessageResolutionError("unresolved-variable", `Variable not available: $${name}`, source);
}

export function badFunctionResult(message: string, source: string): MessageResolutionError {
  return new MessageResolutionError("bad-function-result", message, source);
}
