import { getLocaleDirection } from "./bidi.js";
import { badOperand, badOption, MessageResolutionError, unsupportedOperation } from "./errors.js";
import type { MessageFunctionContext } from "./function-context.js";
import {
  DateTimeValue,
  FIELD_OPTIONS,
  STYLE_OPTIONS,
  type DateTimeOptions,
} from "./datetime-value.js";
import { FallbackValue, MessageValue, fallback } from "./message-value.js";
import { applyOptionSchema, asBoolean, asString, defineSchema, fieldsOf, oneOf, type OptionSchema } from "./option-schema.js";

type DateTimeKind = "datetime" | "date" | "time";

interface DateTimeOperand {
  date: Date;
  /** Time zone embedded in the operand. */
  timeZone?: string;
  options: Pick<DateTimeOptions, "calendar" | "hour12">;
}

// RFC 9557 suffix annotations, e.g. `[Europe/Paris][u-ca=iso8601]`
const ANNOTATIONS_RE = /(\[[^\]]*\])+$/;
const ANNOTATION_RE = /\[(!?)([^\]]*)\]/g;
const UTC_OFFSET_RE = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;
const GMT_OFFSET_RE = /^GMT(?:([+-])(\d{2}):(\d{2})(?::(\d{2}))?)?$/;

// ── Option schemas ──

const field = fieldsOf<DateTimeOptions>();

const COMMON_FIELDS = [field("calendar", asString), field("hour12", asBoolean), field("timeZone", asString)];

const DATE_FIELDS = [
  field(
    "dateFields",
    oneOf("weekday", "day-weekday", "month-day", "month-day-weekday", "year-month-day", "year-month-day-weekday")
  ),
  field("dateLength", oneOf("long", "medium", "short")),
  field("dateStyle", oneOf("full", "long", "medium", "short")),
];

const TIME_FIELDS = [
  field("timePrecision", oneOf("hour", "minute", "second")),
  field("timeZoneStyle", oneOf("long", "short")),
  field("timeStyle", oneOf("full", "long", "medium", "short")),
];

const SCHEMAS: Record<DateTimeKind, OptionSchema<DateTimeOptions>> = {
  datetime: defineSchema(...DATE_FIELDS, ...TIME_FIELDS, ...COMMON_FIELDS),
  date: defineSchema(...DATE_FIELDS, ...COMMON_FIELDS),
  time: defineSchema(...TIME_FIELDS, ...COMMON_FIELDS),
};

// ── Operand ──

/**
 * Accepts a `Date`, epoch milliseconds, an ISO 8601 string (optionally with
 * RFC 9557 annotations) or a resolved date/time value.
 *
 * A zone annotation on a timestamp without a UTC offset places the wall time
 * in that zone. A `u-ca` annotation sets the default calendar.
 */
export function readDateTimeOperand(operand: unknown, source: string): DateTimeOperand {
  if (operand instanceof DateTimeValue) {
    const { calendar, hour12 } = operand.dateTimeOptions;
    return withZone({ date: operand.valueOf(), options: { calendar, hour12 } }, operand.timeZone);
  }

  const value = operand instanceof MessageValue && !(operand instanceof FallbackValue) ? operand.valueOf() : operand;

  if (value instanceof Date && !Number.isNaN(value.getTime())) return { date: value, options: {} };
  if (typeof value === "number" && Number.isFinite(value)) return { date: new Date(value), options: {} };

  if (typeof value === "string") {
    const annotations = ANNOTATIONS_RE.exec(value)?.[0] ?? "";
    const text = value.slice(0, value.length - annotations.length);
    const tags = [...annotations.matchAll(ANNOTATION_RE)].map((match) => match[2] ?? "");
    const zone = tags.find((tag) => tag !== "" && !tag.includes("="));
    const calendar = tags.find((tag) => tag.startsWith("u-ca="))?.slice(5);

    const floating = zone !== undefined && text.includes("T") && !UTC_OFFSET_RE.test(text);
    const timestamp = floating ? wallTimeIn(zone, Date.parse(`${text}Z`), source) : Date.parse(text);
    if (!Number.isNaN(timestamp)) {
      return withZone({ date: new Date(timestamp), options: calendar ? { calendar } : {} }, zone);
    }
  }

  throw badOperand("Input is not a date", source);
}

function withZone(operand: DateTimeOperand, timeZone: string | undefined): DateTimeOperand {
  return timeZone === undefined ? operand : { ...operand, timeZone };
}

/** The instant at which the clock in `timeZone` reads `wallTime` (given as if it were UTC). */
function wallTimeIn(timeZone: string, wallTime: number, source: string): number {
  if (Number.isNaN(wallTime)) return wallTime;
  let formatter: Intl.DateTimeFormat;
  try {
    formatter = new Intl.DateTimeFormat("en-US", { timeZone, timeZoneName: "longOffset" });
  } catch (error) {
    if (!(error instanceof RangeError)) throw error;
    throw badOperand(`Unknown time zone: ${timeZone}`, source);
  }
  // Offsets can differ on either side of a transition; the second pass settles it.
  const first = wallTime - zoneOffset(formatter, wallTime);
  return wallTime - zoneOffset(formatter, first);
}

function zoneOffset(formatter: Intl.DateTimeFormat, instant: number): number {
  const name = formatter.formatToParts(instant).find((part) => part.type === "timeZoneName")?.value ?? "GMT";
  const match = GMT_OFFSET_RE.exec(name);
  if (!match?.[1]) return 0;
  const sign = match[1] === "-" ? -1 : 1;
  const [hours, minutes, seconds] = [match[2], match[3], match[4]].map((part) => Number(part ?? 0));
  return sign * ((hours ?? 0) * 3600 + (minutes ?? 0) * 60 + (seconds ?? 0)) * 1000;
}

// ── Resolution ──

const DEFAULTS: Record<DateTimeKind, DateTimeOptions> = {
  datetime: { dateFields: "year-month-day", dateLength: "medium", timePrecision: "minute" },
  date: { dateFields: "year-month-day", dateLength: "medium" },
  time: { timePrecision: "minute" },
};

function resolveDateTime(
  kind: DateTimeKind,
  ctx: MessageFunctionContext,
  options: Record<string, unknown>,
  operand: unknown
): MessageValue {
  let input: DateTimeOperand;
  try {
    input = readDateTimeOperand(operand, ctx.source);
  } catch (error) {
    if (!(error instanceof MessageResolutionError)) throw error;
    ctx.onError(error);
    return fallback(ctx.source);
  }

  const resolved = applyOptionSchema<DateTimeOptions>(ctx, kind, SCHEMAS[kind], options, {
    localeMatcher: ctx.localeMatcher,
    ...input.options,
  });

  const hasStyle = STYLE_OPTIONS.some((name) => resolved[name] !== undefined);
  const hasFields = FIELD_OPTIONS.some((name) => resolved[name] !== undefined);
  if (hasStyle && hasFields) {
    ctx.onError(badOption(`Style and field options cannot be both set for :${kind}`, ctx.source));
    return fallback(ctx.source);
  }
  if (!hasStyle) {
    const defaults = DEFAULTS[kind];
    resolved.dateFields ??= defaults.dateFields;
    resolved.dateLength ??= defaults.dateLength;
    resolved.timePrecision ??= defaults.timePrecision;
  }

  if (resolved.timeZone === "input") {
    if (input.timeZone === undefined) {
      ctx.onError(badOption(`The :${kind} operand has no time zone`, ctx.source));
      delete resolved.timeZone;
    } else {
      resolved.timeZone = input.timeZone;
    }
  } else if (resolved.timeZone !== undefined && input.timeZone !== undefined && resolved.timeZone !== input.timeZone) {
    ctx.onError(unsupportedOperation(`Time zone conversion is not supported for :${kind}`, ctx.source));
    return fallback(ctx.source);
  } else if (input.timeZone !== undefined) {
    resolved.timeZone = input.timeZone;
  }

  try {
    return new DateTimeValue(input.date, {
      source: ctx.source,
      locale: ctx.locale,
      dir: ctx.dir ?? getLocaleDirection(ctx.locale),
      options: resolved,
    });
  } catch (error) {
    if (!(error instanceof RangeError)) throw error;
    ctx.onError(badOption(`Invalid :${kind} options: ${error.message}`, ctx.source));
    return fallback(ctx.source);
  }
}

// ── Functions ──

export function datetime(ctx: MessageFunctionContext, options: Record<string, unknown>, operand?: unknown): MessageValue {
  return resolveDateTime("datetime", ctx, options, operand);
}

export function date(ctx: MessageFunctionContext, options: Record<string, unknown>, operand?: unknown): MessageValue {
  return resolveDateTime("date", ctx, options, operand);
}

export function time(ctx: MessageFunctionContext, options: Record<string, unknown>, operand?: unknown): MessageValue {
  return resolveDateTime("time", ctx, options, operand);
}
