import type { Direction, IsolationChar } from "./bidi.js";
import { MessageSelectionError } from "./errors.js";

export const FALLBACK_SOURCE = "�";

// ── Parts ──

export interface TextPart {
  type: "text";
  value: string;
}

export interface BidiIsolationPart {
  type: "bidiIsolation";
  value: IsolationChar;
}

export interface MarkupPart {
  type: "markup";
  kind: "open" | "standalone" | "close";
  name: string;
  source?: string;
  options: Record<string, unknown>;
}

export interface StringPart {
  type: "string";
  source: string;
  locale: string;
  dir: Direction;
  value: string;
}

export interface NumberPart {
  type: "number";
  source: string;
  locale: string;
  dir: Direction;
  parts: Intl.NumberFormatPart[];
}

export interface DateTimePart {
  type: "datetime";
  source: string;
  locale: string;
  dir: Direction;
  parts: Intl.DateTimeFormatPart[];
}

export interface FallbackPart {
  type: "fallback";
  source: string;
}

export interface UnknownPart {
  type: "unknown";
  source: string;
  value: unknown;
}

export type MessagePart =
  | TextPart
  | BidiIsolationPart
  | MarkupPart
  | StringPart
  | NumberPart
  | DateTimePart
  | FallbackPart
  | UnknownPart;

// ── Values ──

export interface ValueInit {
  source: string;
  locale: string;
  dir: Direction;
  options?: Record<string, unknown>;
}

/**
 * The resolved result of one expression.
 *
 * Instances are frozen once constructed. `valueOf()` returns the raw operand
 * value and never applies display conventions.
 */
export abstract class MessageValue<T extends string = string> {
  abstract readonly type: T;
  abstract readonly selectable: boolean;

  public readonly source: string;
  public readonly locale: string;
  public readonly dir: Direction;
  public readonly options: Readonly<Record<string, unknown>>;

  constructor(init: ValueInit) {
    this.source = init.source;
    this.locale = init.locale;
    this.dir = init.dir;
    this.options = Object.freeze({ ...init.options });
  }

  abstract valueOf(): unknown;
  abstract toString(): string;
  abstract toParts(): MessagePart[];

  /**
   * Keys of `keys` this value matches, best match first.
   * Throws a `not-selectable` selection error for values that cannot select.
   */
  public selectKeys(_keys: readonly string[]): string[] {
    throw new MessageSelectionError("not-selectable", this.source);
  }
}

export class StringValue extends MessageValue<"string"> {
  public override readonly type = "string";
  public override readonly selectable = true;

  constructor(
    private readonly value: string,
    init: ValueInit
  ) {
    super(init);
    Object.freeze(this);
  }

  public override valueOf(): string {
    return this.value;
  }

  public override toString(): string {
    return this.value;
  }

  public override toParts(): StringPart[] {
    return [{ type: "string", source: this.source, locale: this.locale, dir: this.dir, value: this.value }];
  }

  public override selectKeys(keys: readonly string[]): string[] {
    const normalized = this.value.normalize("NFC");
    const match = keys.find((key) => key.normalize("NFC") === normalized);
    return match === undefined ? [] : [match];
  }
}

export class FallbackValue extends MessageValue<"fallback"> {
  public override readonly type = "fallback";
  public override readonly selectable = false;

  constructor(source: string = FALLBACK_SOURCE, locale = "und") {
    super({ source, locale, dir: "auto" });
    Object.freeze(this);
  }

  public override valueOf(): undefined {
    return undefined;
  }

  public override toString(): string {
    return `{${this.source}}`;
  }

  public override toParts(): FallbackPart[] {
    return [{ type: "fallback", source: this.source }];
  }
}

export class UnknownValue extends MessageValue<"unknown"> {
  public override readonly type = "unknown";
  public override readonly selectable = false;

  constructor(
    private readonly value: unknown,
    init: Omit<ValueInit, "dir">
  ) {
    super({ ...init, dir: "auto" });
    Object.freeze(this);
  }

  public override valueOf(): unknown {
    return this.value;
  }

  public override toString(): string {
    return String(this.value);
  }

  public override toParts(): UnknownPart[] {
    return [{ type: "unknown", source: this.source, value: this.value }];
  }
}

export function fallback(source: string = FALLBACK_SOURCE): FallbackValue {
  return new FallbackValue(source);
}

export function isMessageValue(value: unknown): value is MessageValue {
  return value instanceof MessageValue;
}
