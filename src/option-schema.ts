import { badOption } from "./errors.js";
import type { MessageFunctionContext } from "./function-context.js";
import { MessageValue } from "./message-value.js";

/**
 * Validates and normalizes one option value. Throws a `RangeError` when the
 * value is not acceptable.
 */
export type OptionCoercer<T> = (value: unknown) => T;

export interface OptionField<O> {
  readonly name: string;
  assign(target: O, value: unknown): void;
}

/** Option name → field, for the options of type `O` one function accepts. */
export type OptionSchema<O> = ReadonlyMap<string, OptionField<O>>;

const POSITIVE_INTEGER_RE = /^(0|[1-9][0-9]*)$/;

// ── Coercers ──

export function asString(value: unknown): string {
  const raw = unwrap(value);
  if (typeof raw === "string") return raw;
  throw new RangeError("Not a string");
}

export function asBoolean(value: unknown): boolean {
  const raw = unwrap(value);
  if (typeof raw === "boolean") return raw;
  if (raw === "true") return true;
  if (raw === "false") return false;
  throw new RangeError("Not a boolean");
}

/** Non-negative safe integer, from a number, bigint or digit string. */
export function asPositiveInteger(value: unknown): number {
  const raw = unwrap(value);
  if (typeof raw === "number" && Number.isSafeInteger(raw) && raw >= 0) return raw;
  if (typeof raw === "bigint" && raw >= 0n && raw <= BigInt(Number.MAX_SAFE_INTEGER)) return Number(raw);
  if (typeof raw === "string" && POSITIVE_INTEGER_RE.test(raw)) {
    const parsed = Number(raw);
    if (Number.isSafeInteger(parsed)) return parsed;
  }
  throw new RangeError("Not a positive integer");
}

export function oneOf<const T extends string>(...allowed: T[]): OptionCoercer<T> {
  return (value) => {
    const raw = asString(value);
    const match = allowed.find((candidate) => candidate === raw);
    if (match === undefined) throw new RangeError(`Expected one of ${allowed.join(", ")}`);
    return match;
  };
}

// ── Schemas ──

/**
 * Field factory bound to one options type, so that each field's coercer is
 * checked against the property it fills.
 */
export function fieldsOf<O>() {
  return <K extends keyof O & string>(name: K, coerce: OptionCoercer<O[K]>): OptionField<O> => ({
    name,
    assign(target, value) {
      target[name] = coerce(value);
    },
  });
}

export function defineSchema<O>(...fields: OptionField<O>[]): OptionSchema<O> {
  return new Map(fields.map((field) => [field.name, field]));
}

export function extendSchema<O>(base: OptionSchema<O>, ...fields: OptionField<O>[]): OptionSchema<O> {
  return new Map([...base, ...fields.map((field): [string, OptionField<O>] => [field.name, field])]);
}

/**
 * Coerces every option `schema` knows about into `target`. Unknown names are
 * ignored; each rejected value is reported once as `bad-option` and skipped.
 */
export function applyOptionSchema<O>(
  ctx: MessageFunctionContext,
  functionName: string,
  schema: OptionSchema<O>,
  options: Readonly<Record<string, unknown>>,
  target: O
): O {
  for (const [name, value] of Object.entries(options)) {
    const field = schema.get(name);
    if (!field || value === undefined) continue;
    try {
      field.assign(target, value);
    } catch (error) {
      if (!(error instanceof RangeError)) throw error;
      ctx.onError(badOption(`Value ${describe(value)} is not valid for :${functionName} option ${name}`, ctx.source));
    }
  }
  return target;
}

function unwrap(value: unknown): unknown {
  return value instanceof MessageValue ? value.valueOf() : value;
}

function describe(value: unknown): string {
  const raw = unwrap(value);
  return typeof raw === "string" ? JSON.stringify(raw) : String(raw);
}
