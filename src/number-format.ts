import type { LocaleMatcher } from "./function-context.js";

export type NumericValue = number | bigint;

export type NumberStyle = "decimal" | "currency" | "percent" | "unit";

export type NumberSelect = "plural" | "cardinal" | "ordinal" | "exact";

export type RoundingMode =
  | "ceil"
  | "floor"
  | "expand"
  | "trunc"
  | "halfCeil"
  | "halfFloor"
  | "halfExpand"
  | "halfTrunc"
  | "halfEven";

export type SignDisplay = "auto" | "always" | "exceptZero" | "negative" | "never";

export type GroupingDisplay = "auto" | "always" | "min2" | "never" | "false" | boolean;

/** Resolved options of a numeric value. */
export type NumberOptions = {
  localeMatcher?: LocaleMatcher;
  style?: NumberStyle;
  select?: NumberSelect;
  currency?: string;
  currencyDisplay?: "symbol" | "narrowSymbol" | "code" | "name";
  currencySign?: "standard" | "accounting";
  unit?: string;
  unitDisplay?: "short" | "narrow" | "long";
  notation?: "standard" | "scientific" | "engineering" | "compact";
  compactDisplay?: "short" | "long";
  minimumIntegerDigits?: number;
  minimumFractionDigits?: number;
  maximumFractionDigits?: number;
  minimumSignificantDigits?: number;
  maximumSignificantDigits?: number;
  roundingIncrement?: number;
  roundingMode?: RoundingMode;
  roundingPriority?: "auto" | "morePrecision" | "lessPrecision";
  signDisplay?: SignDisplay;
  trailingZeroDisplay?: "auto" | "stripIfInteger";
  useGrouping?: GroupingDisplay;
};

/** Operand value and the options it carried, read by a numeric function. */
export interface NumericInput {
  value: NumericValue;
  options: NumberOptions;
}

const JSON_NUMBER_RE = /^-?(0|[1-9][0-9]*)(\.[0-9]+)?([eE][-+]?[0-9]+)?$/;
const INTEGER_RE = /^-?(0|[1-9][0-9]*)$/;

// ── Formatting ──

/**
 * Maps resolved options onto `Intl.NumberFormat` options. Options added by
 * the 2023 edition of ECMA-402 are copied over as they are.
 */
export function toIntlOptions(options: NumberOptions): Intl.NumberFormatOptions {
  const {
    select: _select,
    roundingIncrement,
    roundingMode,
    roundingPriority,
    signDisplay,
    trailingZeroDisplay,
    useGrouping,
    ...standard
  } = options;

  const intl: Intl.NumberFormatOptions = { ...standard };
  const { minimumFractionDigits: min, maximumFractionDigits: max } = options;
  if (min !== undefined && max !== undefined && min > max) intl.minimumFractionDigits = max;

  const extended: Record<string, string | number | boolean> = {};
  if (roundingIncrement !== undefined) extended.roundingIncrement = roundingIncrement;
  if (roundingMode !== undefined) extended.roundingMode = roundingMode;
  if (roundingPriority !== undefined) extended.roundingPriority = roundingPriority;
  if (signDisplay !== undefined) extended.signDisplay = signDisplay;
  if (trailingZeroDisplay !== undefined) extended.trailingZeroDisplay = trailingZeroDisplay;
  if (useGrouping !== undefined) extended.useGrouping = toGrouping(useGrouping);
  return Object.assign(intl, extended);
}

/** Throws a `RangeError` when the platform rejects the option combination. */
export function createNumberFormat(locale: string, options: NumberOptions): Intl.NumberFormat {
  return new Intl.NumberFormat(locale, toIntlOptions(options));
}

export function formatNumber(value: NumericValue, locale: string, options: NumberOptions): string {
  return createNumberFormat(locale, options).format(value);
}

export function formatNumberToParts(
  value: NumericValue,
  locale: string,
  options: NumberOptions
): Intl.NumberFormatPart[] {
  return createNumberFormat(locale, options).formatToParts(value);
}

function toGrouping(value: GroupingDisplay): string | boolean {
  if (value === "never" || value === "false") return false;
  return value;
}

// ── Decimal strings ──

/** Strict JSON number syntax; safe-range overflow of an integer yields a bigint. */
export function parseJsonNumber(source: string): NumericValue | undefined {
  if (!JSON_NUMBER_RE.test(source)) return undefined;
  if (INTEGER_RE.test(source)) {
    const value = Number(source);
    return Number.isSafeInteger(value) ? value : BigInt(source);
  }
  const value = Number(source);
  return Number.isFinite(value) ? value : undefined;
}

/** Plain decimal rendering of `value`, never in exponent notation. */
export function toDecimalString(value: NumericValue): string {
  if (typeof value === "bigint" || !Number.isFinite(value)) return String(value);
  const [mantissa = "", exponent] = String(value).split("e");
  return exponent === undefined ? mantissa : shiftDecimal(mantissa, Number(exponent));
}

/**
 * Moves the decimal point of a plain decimal string `places` digits to the
 * right, or to the left for negative `places`.
 */
export function shiftDecimal(decimal: string, places: number): string {
  const negative = decimal.startsWith("-");
  const [integerPart = "", fractionPart = ""] = (negative ? decimal.slice(1) : decimal).split(".");
  let digits = integerPart + fractionPart;
  let point = integerPart.length + places;
  if (point <= 0) {
    digits = "0".repeat(1 - point) + digits;
    point = 1;
  } else if (point > digits.length) {
    digits += "0".repeat(point - digits.length);
  }
  const integer = digits.slice(0, point).replace(/^0+(?=[0-9])/, "");
  const fraction = digits.slice(point).replace(/0+$/, "");
  const result = fraction ? `${integer}.${fraction}` : integer;
  return negative && /[1-9]/.test(result) ? `-${result}` : result;
}

/** `value × 100`, computed on the decimal digits. */
export function scalePercent(value: NumericValue): NumericValue {
  if (typeof value === "bigint") return value * 100n;
  if (!Number.isFinite(value)) return value * 100;
  return Number(shiftDecimal(toDecimalString(value), 2));
}

// ── Selection ──

/**
 * Keys matching a numeric value, in order of precedence: an `=N` key equal
 * to the value, then the value's decimal string, then its plural category.
 * Percent values are compared as `value × 100`.
 */
export function selectNumberKeys(
  value: NumericValue,
  options: NumberOptions,
  locale: string,
  keys: readonly string[]
): string[] {
  const effective = options.style === "percent" ? scalePercent(value) : value;

  const exact = keys.find((key) => key.startsWith("=") && equalsKey(key.slice(1), effective));
  if (exact !== undefined) return [exact];

  const decimal = toDecimalString(effective);
  if (keys.includes(decimal)) return [decimal];

  if (options.select === "exact") return [];

  const category = pluralCategory(effective, options, locale);
  return keys.includes(category) ? [category] : [];
}

export function pluralCategory(value: NumericValue, options: NumberOptions, locale: string): Intl.LDMLPluralRule {
  const { minimumIntegerDigits, minimumFractionDigits, maximumFractionDigits } = options;
  const { minimumSignificantDigits, maximumSignificantDigits } = options;
  const rules: Intl.PluralRulesOptions = {
    type: options.select === "ordinal" ? "ordinal" : "cardinal",
    minimumIntegerDigits,
    minimumFractionDigits:
      minimumFractionDigits !== undefined && maximumFractionDigits !== undefined
        ? Math.min(minimumFractionDigits, maximumFractionDigits)
        : minimumFractionDigits,
    maximumFractionDigits,
    minimumSignificantDigits,
    maximumSignificantDigits,
  };
  return new Intl.PluralRules(locale, rules).select(Number(value));
}

function equalsKey(key: string, value: NumericValue): boolean {
  if (!JSON_NUMBER_RE.test(key)) return false;
  if (typeof value === "bigint") return INTEGER_RE.test(key) && BigInt(key) === value;
  return Number(key) === value;
}
