import type { Direction } from "./bidi.js";
import type { MessageError } from "./errors.js";
import type { MessageValue } from "./message-value.js";

export const DEFAULT_LOCALE = "en";

export type LocaleMatcher = "best fit" | "lookup";

export type ErrorHandler = (error: MessageError) => void;

/**
 * Everything a function needs to know about the expression it resolves.
 */
export interface MessageFunctionContext {
  /** Locale preference list, most preferred first. */
  readonly locales: readonly string[];
  /** First entry of `locales`. */
  readonly locale: string;
  /** Fallback representation of the expression, used for attribution. */
  readonly source: string;
  readonly localeMatcher: LocaleMatcher;
  /** Option names whose value was written as a literal in the message. */
  readonly literalOptionKeys: ReadonlySet<string>;
  /** Explicit direction from the expression's `u:dir` option. */
  readonly dir?: Direction;
  /** Expression identifier from the `u:id` option. */
  readonly id?: string;
  onError(error: MessageError): void;
}

export type MessageFunction = (
  ctx: MessageFunctionContext,
  options: Record<string, unknown>,
  operand?: unknown
) => MessageValue;

export interface FunctionContextInit {
  locales?: readonly string[];
  source: string;
  localeMatcher?: LocaleMatcher;
  literalOptionKeys?: Iterable<string>;
  dir?: Direction;
  id?: string;
  onError?: ErrorHandler;
}

export class FunctionContext implements MessageFunctionContext {
  public readonly locales: readonly string[];
  public readonly source: string;
  public readonly localeMatcher: LocaleMatcher;
  public readonly literalOptionKeys: ReadonlySet<string>;
  public readonly dir?: Direction;
  public readonly id?: string;
  private readonly handler?: ErrorHandler;

  constructor(init: FunctionContextInit) {
    this.locales = Object.freeze([...(init.locales ?? [])]);
    this.source = init.source;
    this.localeMatcher = init.localeMatcher ?? "best fit";
    this.literalOptionKeys = new Set(init.literalOptionKeys);
    if (init.dir !== undefined) this.dir = init.dir;
    if (init.id !== undefined) this.id = init.id;
    this.handler = init.onError;
  }

  public get locale(): string {
    return this.locales[0] ?? DEFAULT_LOCALE;
  }

  public onError(error: MessageError): void {
    this.handler?.(error);
  }
}
