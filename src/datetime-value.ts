import type { LocaleMatcher } from "./function-context.js";
import { MessageValue, type DateTimePart, type ValueInit } from "./message-value.js";

export type DateFields =
  | "weekday"
  | "day-weekday"
  | "month-day"
  | "month-day-weekday"
  | "year-month-day"
  | "year-month-day-weekday";

export type DateLength = "long" | "medium" | "short";

export type TimePrecision = "hour" | "minute" | "second";

export type DateTimeStyle = "full" | "long" | "medium" | "short";

export type DateTimeOptions = {
  localeMatcher?: LocaleMatcher;
  dateFields?: DateFields;
  dateLength?: DateLength;
  timePrecision?: TimePrecision;
  timeZoneStyle?: "long" | "short";
  dateStyle?: DateTimeStyle;
  timeStyle?: DateTimeStyle;
  hour12?: boolean;
  calendar?: string;
  timeZone?: string;
};

export const FIELD_OPTIONS = ["dateFields", "dateLength", "timePrecision", "timeZoneStyle"] as const;
export const STYLE_OPTIONS = ["dateStyle", "timeStyle"] as const;

const MONTH_BY_LENGTH = { long: "long", medium: "short", short: "numeric" } as const;
const WEEKDAY_BY_LENGTH = { long: "long", medium: "short", short: "short" } as const;

/**
 * Maps field or style options onto `Intl.DateTimeFormat` options.
 */
export function toIntlDateTimeOptions(options: DateTimeOptions): Intl.DateTimeFormatOptions {
  const { localeMatcher, hour12, calendar, timeZone, dateStyle, timeStyle } = options;
  const intl: Intl.DateTimeFormatOptions = { localeMatcher, hour12, calendar, timeZone };

  if (dateStyle !== undefined || timeStyle !== undefined) {
    return { ...intl, dateStyle, timeStyle };
  }

  const { dateFields, dateLength = "medium", timePrecision, timeZoneStyle } = options;
  if (dateFields !== undefined) {
    const fields = new Set(dateFields.split("-"));
    if (fields.has("year")) intl.year = "numeric";
    if (fields.has("month")) intl.month = MONTH_BY_LENGTH[dateLength];
    if (fields.has("day")) intl.day = "numeric";
    if (fields.has("weekday")) intl.weekday = WEEKDAY_BY_LENGTH[dateLength];
  }

  switch (timePrecision) {
    case "second":
      intl.second = "2-digit";
    // falls through
    case "minute":
      intl.minute = "2-digit";
    // falls through
    case "hour":
      intl.hour = "numeric";
  }

  if (timeZoneStyle !== undefined) intl.timeZoneName = timeZoneStyle;
  return intl;
}

export interface DateTimeValueInit extends Omit<ValueInit, "options"> {
  options: DateTimeOptions;
}

/**
 * A formatted date/time. Never selectable.
 */
export class DateTimeValue extends MessageValue<"datetime"> {
  public override readonly type = "datetime";
  public override readonly selectable = false;
  public readonly dateTimeOptions: Readonly<DateTimeOptions>;
  private readonly value: Date;
  private readonly formatter: Intl.DateTimeFormat;

  constructor(value: Date, init: DateTimeValueInit) {
    super(init);
    this.value = new Date(value.getTime());
    this.dateTimeOptions = Object.freeze({ ...init.options });
    this.formatter = new Intl.DateTimeFormat(init.locale, toIntlDateTimeOptions(init.options));
    Object.freeze(this);
  }

  /** The time zone the value was resolved in, if one was set. */
  public get timeZone(): string | undefined {
    return this.dateTimeOptions.timeZone;
  }

  /** A copy; the held date never changes. */
  public override valueOf(): Date {
    return new Date(this.value.getTime());
  }

  public override toString(): string {
    return this.formatter.format(this.value);
  }

  public override toParts(): DateTimePart[] {
    return [
      {
        type: "datetime",
        source: this.source,
        locale: this.locale,
        dir: this.dir,
        parts: this.formatter.formatToParts(this.value),
      },
    ];
  }
}
