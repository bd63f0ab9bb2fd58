import { describe, it, expect } from "vitest";
import { DateTimeValue, toIntlDateTimeOptions } from "../../src/datetime-value.js";
import { date, datetime, readDateTimeOperand, time } from "../../src/datetime-functions.js";
import { FallbackValue, StringValue } from "../../src/message-value.js";
import { collect, errorTypes } from "../helpers.js";

const MOMENT = new Date(Date.UTC(2024, 0, 15, 13, 45, 30));

describe("toIntlDateTimeOptions", () => {
  it("maps date fields by length", () => {
    expect(toIntlDateTimeOptions({ dateFields: "year-month-day", dateLength: "long" })).toStrictEqual({
      localeMatcher: undefined,
      hour12: undefined,
      calendar: undefined,
      timeZone: undefined,
      year: "numeric",
      month: "long",
      day: "numeric",
    });
    expect(toIntlDateTimeOptions({ dateFields: "month-day-weekday", dateLength: "short" })).toMatchObject({
      month: "numeric",
      day: "numeric",
      weekday: "short",
    });
  });

  it("adds coarser time fields for finer precision", () => {
    expect(toIntlDateTimeOptions({ timePrecision: "second" })).toMatchObject({
      hour: "numeric",
      minute: "2-digit",
      second: "2-digit",
    });
    expect(toIntlDateTimeOptions({ timePrecision: "hour" })).not.toHaveProperty("minute");
  });

  it("passes styles through", () => {
    expect(toIntlDateTimeOptions({ dateStyle: "full", timeZone: "UTC" })).toStrictEqual({
      localeMatcher: undefined,
      hour12: undefined,
      calendar: undefined,
      timeZone: "UTC",
      dateStyle: "full",
      timeStyle: undefined,
    });
  });
});

describe("readDateTimeOperand", () => {
  it("accepts dates, epoch milliseconds and ISO strings", () => {
    expect(readDateTimeOperand(MOMENT, "$x").date).toBe(MOMENT);
    expect(readDateTimeOperand(MOMENT.getTime(), "$x").date.getTime()).toBe(MOMENT.getTime());
    expect(readDateTimeOperand("2024-01-15T13:45:30Z", "$x").date.getTime()).toBe(MOMENT.getTime());
  });

  it("reads the time zone annotation of an RFC 9557 string", () => {
    const operand = readDateTimeOperand("2024-01-15T22:45:30+09:00[Asia/Tokyo][u-ca=japanese]", "$x");

    expect(operand.timeZone).toBe("Asia/Tokyo");
    expect(operand.date.getTime()).toBe(MOMENT.getTime());
    expect(operand.options).toStrictEqual({ calendar: "japanese" });
  });

  it.each([
    ["2024-01-15T13:45:00[Asia/Tokyo]", "2024-01-15T04:45:00.000Z"],
    ["2024-07-01T12:00:00[America/New_York]", "2024-07-01T16:00:00.000Z"],
    ["2024-01-15T12:00:00[America/New_York]", "2024-01-15T17:00:00.000Z"],
    ["2024-01-15T13:45:00[UTC]", "2024-01-15T13:45:00.000Z"],
  ])("places the wall time of %s in its zone", (operand, instant) => {
    expect(readDateTimeOperand(operand, "$x").date.toISOString()).toBe(instant);
  });

  it("rejects a wall time in an unknown zone", () => {
    expect(() => readDateTimeOperand("2024-01-15T13:45:00[Mars/Olympus_Mons]", "$x")).toThrowError(
      "Unknown time zone: Mars/Olympus_Mons"
    );
  });

  it("reads the raw value of a resolved string", () => {
    const operand = new StringValue("2024-01-15T13:45:30Z", { source: "$s", locale: "en", dir: "auto" });

    expect(readDateTimeOperand(operand, "$x").date.getTime()).toBe(MOMENT.getTime());
  });

  it.each([["tomorrow"], [Number.NaN], [true], [new Date(Number.NaN)], [undefined]])("rejects %s", (operand) => {
    expect(() => readDateTimeOperand(operand, "$x")).toThrowError(/Input is not a date/);
  });
});

describe(":date", () => {
  it("formats the medium year-month-day by default", () => {
    const { ctx, errors } = collect();

    expect(date(ctx, { timeZone: "UTC" }, MOMENT).toString()).toBe("Jan 15, 2024");
    expect(errors).toStrictEqual([]);
  });

  it.each([
    ["long", "January 15, 2024"],
    ["short", "1/15/2024"],
  ])("formats dateLength=%s", (dateLength, expected) => {
    const { ctx } = collect();

    expect(date(ctx, { timeZone: "UTC", dateLength }, MOMENT).toString()).toBe(expected);
  });

  it("formats a date style", () => {
    const { ctx } = collect();

    expect(date(ctx, { timeZone: "UTC", dateStyle: "long" }, MOMENT).toString()).toBe("January 15, 2024");
  });

  it("ignores time options", () => {
    const { ctx, errors } = collect();

    expect(date(ctx, { timeZone: "UTC", timePrecision: "second" }, MOMENT).toString()).toBe("Jan 15, 2024");
    expect(errors).toStrictEqual([]);
  });

  it("is never selectable", () => {
    const { ctx } = collect();

    expect(() => date(ctx, { timeZone: "UTC" }, MOMENT).selectKeys(["a"])).toThrowError(/not-selectable/);
  });

  it("keeps the operand as its value", () => {
    const { ctx } = collect();
    const value = date(ctx, { timeZone: "UTC" }, MOMENT);

    expect(value).toBeInstanceOf(DateTimeValue);
    expect(value.valueOf()).toStrictEqual(MOMENT);
    expect(value.valueOf()).not.toBe(MOMENT);
    expect(value.dir).toBe("ltr");
  });

  it("is not changed by later changes to the operand", () => {
    const { ctx } = collect();
    const operand = new Date(MOMENT.getTime());
    const value = date(ctx, { timeZone: "UTC" }, operand);

    operand.setUTCFullYear(1999);
    const held = value.valueOf();
    if (held instanceof Date) held.setUTCFullYear(1998);

    expect(value.toString()).toBe("Jan 15, 2024");
    expect(value.valueOf()).toStrictEqual(MOMENT);
  });

  it("formats to date parts", () => {
    const { ctx } = collect();
    const [part] = date(ctx, { timeZone: "UTC", dateLength: "short" }, MOMENT).toParts();

    expect(part?.type).toBe("datetime");
    if (part?.type === "datetime") {
      expect(part.parts).toStrictEqual([
        { type: "month", value: "1" },
        { type: "literal", value: "/" },
        { type: "day", value: "15" },
        { type: "literal", value: "/" },
        { type: "year", value: "2024" },
      ]);
    }
  });
});

describe(":time", () => {
  it("formats to the minute by default", () => {
    const { ctx } = collect();

    expect(time(ctx, { timeZone: "UTC", hour12: false }, MOMENT).toString()).toBe("13:45");
  });

  it("formats to the second", () => {
    const { ctx } = collect();

    expect(time(ctx, { timeZone: "UTC", hour12: "false", timePrecision: "second" }, MOMENT).toString()).toBe(
      "13:45:30"
    );
  });

  it("reports an invalid hour12 value", () => {
    const { ctx, errors } = collect();

    time(ctx, { timeZone: "UTC", hour12: "no" }, MOMENT);
    expect(errorTypes(errors)).toStrictEqual(["bad-option"]);
  });
});

describe(":datetime", () => {
  it("formats date and time together", () => {
    const { ctx } = collect();

    expect(datetime(ctx, { timeZone: "UTC", hour12: false }, MOMENT).toString()).toBe("Jan 15, 2024, 13:45");
  });

  it("rejects style and field options together", () => {
    const { ctx, errors } = collect();
    const value = datetime(ctx, { dateStyle: "short", dateFields: "month-day" }, MOMENT);

    expect(value).toBeInstanceOf(FallbackValue);
    expect(errorTypes(errors)).toStrictEqual(["bad-option"]);
    expect(errors[0]?.message).toBe("Style and field options cannot be both set for :datetime");
  });

  it("falls back on an unknown time zone", () => {
    const { ctx, errors } = collect();

    expect(datetime(ctx, { timeZone: "Mars/Olympus_Mons" }, MOMENT).toString()).toBe("{$x}");
    expect(errorTypes(errors)).toStrictEqual(["bad-option"]);
  });

  it("falls back on a bad operand", () => {
    const { ctx, errors } = collect();

    expect(datetime(ctx, {}, "soon").toString()).toBe("{$x}");
    expect(errorTypes(errors)).toStrictEqual(["bad-operand"]);
  });
});

describe("time zones", () => {
  it("formats in the zone embedded in the operand", () => {
    const { ctx, errors } = collect();

    expect(time(ctx, { hour12: false }, "2024-01-15T13:45:00+09:00[Asia/Tokyo]").toString()).toBe("13:45");
    expect(errors).toStrictEqual([]);
  });

  it("formats a wall time in the zone it names", () => {
    const { ctx, errors } = collect();

    expect(time(ctx, { hour12: false }, "2024-01-15T13:45:00[Asia/Tokyo]").toString()).toBe("13:45");
    expect(errors).toStrictEqual([]);
  });

  it("takes the default calendar from the operand", () => {
    const { ctx } = collect();
    const operand = "2024-01-15T13:45:00+09:00[Asia/Tokyo][u-ca=japanese]";
    const annotated = date(ctx, {}, operand);
    const explicit = date(ctx, { calendar: "gregory" }, operand);

    expect(annotated instanceof DateTimeValue && annotated.dateTimeOptions.calendar).toBe("japanese");
    expect(explicit instanceof DateTimeValue && explicit.dateTimeOptions.calendar).toBe("gregory");
  });

  it("uses the embedded zone for timeZone=input", () => {
    const { ctx, errors } = collect();

    expect(time(ctx, { timeZone: "input", hour12: false }, "2024-01-15T13:45:00+09:00[Asia/Tokyo]").toString()).toBe(
      "13:45"
    );
    expect(errors).toStrictEqual([]);
  });

  it("reports timeZone=input without an embedded zone", () => {
    const { ctx, errors } = collect();
    const value = time(ctx, { timeZone: "input" }, MOMENT);

    expect(value).toBeInstanceOf(DateTimeValue);
    expect(errorTypes(errors)).toStrictEqual(["bad-option"]);
  });

  it("does not convert between zones", () => {
    const { ctx, errors } = collect();
    const value = datetime(ctx, { timeZone: "Europe/Paris" }, "2024-01-15T13:45:00Z[UTC]");

    expect(value).toBeInstanceOf(FallbackValue);
    expect(errorTypes(errors)).toStrictEqual(["unsupported-operation"]);
  });

  it("inherits the zone of a date/time operand", () => {
    const { ctx, errors } = collect();
    const inner = datetime(ctx, { timeZone: "UTC" }, MOMENT);

    expect(date(ctx, {}, inner).toString()).toBe("Jan 15, 2024");
    expect(date(ctx, { timeZone: "Asia/Tokyo" }, inner)).toBeInstanceOf(FallbackValue);
    expect(errorTypes(errors)).toStrictEqual(["unsupported-operation"]);
  });

  it("inherits hour12 from a date/time operand", () => {
    const { ctx } = collect();
    const inner = datetime(ctx, { timeZone: "UTC", hour12: false }, MOMENT);

    expect(time(ctx, {}, inner).toString()).toBe("13:45");
  });
});
