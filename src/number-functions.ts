import { getLocaleDirection } from "./bidi.js";
import { badOperand, badOption, MessageResolutionError, unsupportedOperation } from "./errors.js";
import type { MessageFunctionContext } from "./function-context.js";
import { FallbackValue, MessageValue, fallback } from "./message-value.js";
import { parseJsonNumber, type NumberOptions, type NumberStyle, type NumericInput } from "./number-format.js";
import { NumberValue } from "./number-value.js";
import {
  applyOptionSchema,
  asPositiveInteger,
  asString,
  defineSchema,
  extendSchema,
  fieldsOf,
  oneOf,
  type OptionSchema,
} from "./option-schema.js";

type CurrencyOptions = NumberOptions & { fractionDigits?: "auto" | number };

// ── Option schemas ──

const field = fieldsOf<NumberOptions>();

const INTEGER_DIGITS = field("minimumIntegerDigits", asPositiveInteger);
const FRACTION_DIGITS = [
  field("minimumFractionDigits", asPositiveInteger),
  field("maximumFractionDigits", asPositiveInteger),
];
const SIGNIFICANT_DIGITS = [
  field("minimumSignificantDigits", asPositiveInteger),
  field("maximumSignificantDigits", asPositiveInteger),
];
const ROUNDING = [
  field("roundingIncrement", asPositiveInteger),
  field(
    "roundingMode",
    oneOf("ceil", "floor", "expand", "trunc", "halfCeil", "halfFloor", "halfExpand", "halfTrunc", "halfEven")
  ),
  field("roundingPriority", oneOf("auto", "morePrecision", "lessPrecision")),
  field("trailingZeroDisplay", oneOf("auto", "stripIfInteger")),
];
const SIGN_DISPLAY = field("signDisplay", oneOf("auto", "always", "exceptZero", "negative", "never"));
const GROUPING = field("useGrouping", oneOf("auto", "always", "min2", "never", "false"));
const SELECT = field("select", oneOf("plural", "cardinal", "ordinal", "exact"));

const INTEGER_SCHEMA = defineSchema<NumberOptions>(
  INTEGER_DIGITS,
  ...SIGNIFICANT_DIGITS,
  ...ROUNDING,
  SIGN_DISPLAY,
  GROUPING,
  SELECT,
  field("notation", oneOf("standard", "scientific", "engineering", "compact")),
  field("compactDisplay", oneOf("short", "long"))
);

const NUMBER_SCHEMA = extendSchema(INTEGER_SCHEMA, ...FRACTION_DIGITS);

const PERCENT_SCHEMA = defineSchema<NumberOptions>(
  INTEGER_DIGITS,
  ...FRACTION_DIGITS,
  ...SIGNIFICANT_DIGITS,
  ...ROUNDING,
  SIGN_DISPLAY,
  GROUPING,
  SELECT
);

const currencyField = fieldsOf<CurrencyOptions>();

const CURRENCY_SCHEMA = defineSchema<CurrencyOptions>(
  currencyField("currency", asCurrencyCode),
  currencyField("currencySign", oneOf("standard", "accounting")),
  currencyField("currencyDisplay", oneOf("symbol", "narrowSymbol", "code", "name")),
  currencyField("fractionDigits", asFractionDigits),
  INTEGER_DIGITS,
  ...SIGNIFICANT_DIGITS,
  ...ROUNDING,
  SIGN_DISPLAY,
  GROUPING
);

const UNIT_SCHEMA = defineSchema<NumberOptions>(
  field("unit", asUnitIdentifier),
  field("unitDisplay", oneOf("short", "narrow", "long")),
  INTEGER_DIGITS,
  ...FRACTION_DIGITS,
  ...SIGNIFICANT_DIGITS,
  ...ROUNDING,
  SIGN_DISPLAY,
  GROUPING
);

const CURRENCY_CODE_RE = /^[A-Za-z]{3}$/;

let sanctionedUnits: ReadonlySet<string> | undefined;

function asCurrencyCode(value: unknown): string {
  const code = asString(value);
  if (!CURRENCY_CODE_RE.test(code)) throw new RangeError("Not a currency code");
  return code;
}

function asFractionDigits(value: unknown): "auto" | number {
  const raw = value instanceof MessageValue ? value.valueOf() : value;
  return raw === "auto" ? "auto" : asPositiveInteger(raw);
}

/** A sanctioned unit, or a `<unit>-per-<unit>` compound of two. */
function asUnitIdentifier(value: unknown): string {
  const unit = asString(value);
  sanctionedUnits ??= new Set(Intl.supportedValuesOf("unit"));
  const units = sanctionedUnits;
  const [numerator = "", denominator, ...rest] = unit.split("-per-");
  const valid = units.has(numerator) && rest.length === 0 && (denominator === undefined || units.has(denominator));
  if (!valid) throw new RangeError("Not a sanctioned unit");
  return unit;
}

// ── Operand ──

/**
 * Reads a numeric operand. Resolved values contribute their raw value and,
 * for numbers, their options; strings must be JSON numbers.
 */
export function readNumericOperand(operand: unknown, source: string): NumericInput {
  let value = operand;
  let options: NumberOptions = {};
  if (value instanceof MessageValue) {
    if (value instanceof FallbackValue) throw badOperand("Input is not numeric", source);
    if (value instanceof NumberValue) options = { ...value.numberOptions };
    value = value.valueOf();
  }
  if (typeof value === "string") {
    const parsed = parseJsonNumber(value);
    if (parsed === undefined) throw badOperand("Input is not numeric", source);
    value = parsed;
  }
  if (typeof value !== "number" && typeof value !== "bigint") {
    throw badOperand("Input is not numeric", source);
  }
  return { value, options };
}

function readOperandOrReport(ctx: MessageFunctionContext, operand: unknown): NumericInput | undefined {
  try {
    return readNumericOperand(operand, ctx.source);
  } catch (error) {
    if (!(error instanceof MessageResolutionError)) throw error;
    ctx.onError(error);
    return undefined;
  }
}

// ── Resolution ──

interface NumericFunctionDef<O extends NumberOptions> {
  name: string;
  style: NumberStyle;
  schema: OptionSchema<O>;
  selectable: boolean;
}

/**
 * Options come from the operand, then the function defaults, then the
 * expression. A non-literal `select` is reported and leaves the value
 * unable to select.
 */
function resolveOptions<O extends NumberOptions>(
  ctx: MessageFunctionContext,
  def: NumericFunctionDef<O>,
  input: NumericInput,
  options: Record<string, unknown>,
  target: O
): { options: O; selectable: boolean } {
  let selectable = def.selectable;
  let exprOptions = options;
  if (options.select !== undefined && def.schema.has("select") && !ctx.literalOptionKeys.has("select")) {
    ctx.onError(badOption("The option select may only be set by a literal value", ctx.source));
    selectable = false;
    exprOptions = omit(options, "select");
  }
  Object.assign(target, input.options, { localeMatcher: ctx.localeMatcher, style: def.style });
  return { options: applyOptionSchema(ctx, def.name, def.schema, exprOptions, target), selectable };
}

function createNumberValue(
  ctx: MessageFunctionContext,
  name: string,
  value: NumericInput["value"],
  options: NumberOptions,
  selectable: boolean
): MessageValue {
  try {
    return new NumberValue(value, {
      source: ctx.source,
      locale: ctx.locale,
      dir: ctx.dir ?? getLocaleDirection(ctx.locale),
      options,
      selectable,
    });
  } catch (error) {
    if (!(error instanceof RangeError)) throw error;
    ctx.onError(badOption(`Invalid :${name} options: ${error.message}`, ctx.source));
    return fallback(ctx.source);
  }
}

function resolveNumeric(
  ctx: MessageFunctionContext,
  def: NumericFunctionDef<NumberOptions>,
  input: NumericInput,
  options: Record<string, unknown>
): MessageValue {
  const resolved = resolveOptions<NumberOptions>(ctx, def, input, options, {});
  return createNumberValue(ctx, def.name, input.value, resolved.options, resolved.selectable);
}

const NUMBER: NumericFunctionDef<NumberOptions> = {
  name: "number",
  style: "decimal",
  schema: NUMBER_SCHEMA,
  selectable: true,
};

// ── Functions ──

export function number(ctx: MessageFunctionContext, options: Record<string, unknown>, operand?: unknown): MessageValue {
  const input = readOperandOrReport(ctx, operand);
  if (!input) return fallback(ctx.source);
  return resolveNumeric(ctx, NUMBER, input, options);
}

/**
 * Rounds finite values to the nearest integer, ties away from zero, and
 * formats without fraction digits.
 */
export function integer(ctx: MessageFunctionContext, options: Record<string, unknown>, operand?: unknown): MessageValue {
  const input = readOperandOrReport(ctx, operand);
  if (!input) return fallback(ctx.source);

  const { value } = input;
  const rounded =
    typeof value === "number" && Number.isFinite(value) ? Math.sign(value) * Math.round(Math.abs(value)) || 0 : value;

  const def: NumericFunctionDef<NumberOptions> = {
    name: "integer",
    style: "decimal",
    schema: INTEGER_SCHEMA,
    selectable: true,
  };
  const resolved = resolveOptions<NumberOptions>(ctx, def, input, options, {});
  resolved.options.maximumFractionDigits = 0;
  return createNumberValue(ctx, def.name, rounded, resolved.options, resolved.selectable);
}

export function percent(ctx: MessageFunctionContext, options: Record<string, unknown>, operand?: unknown): MessageValue {
  const input = readOperandOrReport(ctx, operand);
  if (!input) return fallback(ctx.source);
  return resolveNumeric(ctx, { name: "percent", style: "percent", schema: PERCENT_SCHEMA, selectable: true }, input, options);
}

export function currency(ctx: MessageFunctionContext, options: Record<string, unknown>, operand?: unknown): MessageValue {
  const input = readOperandOrReport(ctx, operand);
  if (!input) return fallback(ctx.source);

  let exprOptions = options;
  if (isNever(options.currencyDisplay)) {
    ctx.onError(unsupportedOperation('Currency display "never" is not supported', ctx.source));
    exprOptions = omit(options, "currencyDisplay");
  }

  const def: NumericFunctionDef<CurrencyOptions> = {
    name: "currency",
    style: "currency",
    schema: CURRENCY_SCHEMA,
    selectable: false,
  };
  const { options: resolved } = resolveOptions<CurrencyOptions>(ctx, def, input, exprOptions, {});
  const { fractionDigits, ...numberOptions } = resolved;
  if (fractionDigits === "auto") {
    delete numberOptions.minimumFractionDigits;
    delete numberOptions.maximumFractionDigits;
  } else if (fractionDigits !== undefined) {
    numberOptions.minimumFractionDigits = fractionDigits;
    numberOptions.maximumFractionDigits = fractionDigits;
  }

  if (numberOptions.currency === undefined) {
    ctx.onError(badOperand("A currency code is required for :currency", ctx.source));
    return fallback(ctx.source);
  }
  return createNumberValue(ctx, def.name, input.value, numberOptions, false);
}

export function unit(ctx: MessageFunctionContext, options: Record<string, unknown>, operand?: unknown): MessageValue {
  const input = readOperandOrReport(ctx, operand);
  if (!input) return fallback(ctx.source);

  const def: NumericFunctionDef<NumberOptions> = { name: "unit", style: "unit", schema: UNIT_SCHEMA, selectable: false };
  const { options: resolved } = resolveOptions<NumberOptions>(ctx, def, input, options, {});
  if (resolved.unit === undefined) {
    ctx.onError(badOperand("A unit identifier is required for :unit", ctx.source));
    return fallback(ctx.source);
  }
  return createNumberValue(ctx, def.name, input.value, resolved, false);
}

export function offset(ctx: MessageFunctionContext, options: Record<string, unknown>, operand?: unknown): MessageValue {
  return applyDelta(ctx, "offset", options, operand);
}

export function math(ctx: MessageFunctionContext, options: Record<string, unknown>, operand?: unknown): MessageValue {
  return applyDelta(ctx, "math", options, operand);
}

/**
 * Adds or subtracts a non-negative integer, keeping the operand's numeric
 * type, then formats the result as `:number` with the operand's options.
 */
function applyDelta(
  ctx: MessageFunctionContext,
  name: "offset" | "math",
  options: Record<string, unknown>,
  operand: unknown
): MessageValue {
  const input = readOperandOrReport(ctx, operand);
  if (!input) return fallback(ctx.source);

  const amounts: { add?: number; subtract?: number } = {};
  for (const key of ["add", "subtract"] as const) {
    const raw = options[key];
    if (raw === undefined) continue;
    try {
      amounts[key] = asPositiveInteger(raw);
    } catch (error) {
      if (!(error instanceof RangeError)) throw error;
      ctx.onError(badOption(`Value ${String(raw)} is not valid for :${name} option ${key}`, ctx.source));
      return fallback(ctx.source);
    }
  }

  const { add, subtract } = amounts;
  if ((add === undefined) === (subtract === undefined)) {
    ctx.onError(badOption(`Exactly one of "add" or "subtract" is required as a :${name} option`, ctx.source));
    return fallback(ctx.source);
  }

  const delta = add ?? -(subtract ?? 0);
  const value = typeof input.value === "bigint" ? input.value + BigInt(delta) : input.value + delta;
  return resolveNumeric(ctx, NUMBER, { value, options: input.options }, {});
}

function isNever(value: unknown): boolean {
  return (value instanceof MessageValue ? value.valueOf() : value) === "never";
}

function omit(options: Record<string, unknown>, name: string): Record<string, unknown> {
  return Object.fromEntries(Object.entries(options).filter(([key]) => key !== name));
}
