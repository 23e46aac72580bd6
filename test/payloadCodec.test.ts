import { isOk, unwrapErr, unwrapOk } from "option-t/plain_result";
import { describe, expect, it } from "vitest";
import {
  InvalidDateTimeError,
  InvalidFieldValueError,
  InvalidScheduleError,
  PayloadTooShortError,
  ValueOutOfRangeError,
} from "../src/errors.ts";
import {
  createDateTime,
  dateTimeFromDate,
  dateTimeToDate,
  decodePayload,
  defaultPayloadValue,
  encodePayload,
  formatDateTime,
  formatPayloadValue,
  isoWeekday,
  matchesDataType,
  parsePayloadValue,
  payloadFlag,
  roundHalfEven,
  withFlag,
} from "../src/payloadCodec.ts";
import type { DataType, PayloadValue } from "../src/types/bsb.ts";

const SETTING: DataType = { kind: "Setting" };
const NUMBER: DataType = { kind: "Number" };
const FLOAT_10: DataType = { divisor: 10, kind: "Float" };
const DATE_TIME: DataType = { kind: "DateTime" };
const SCHEDULE: DataType = { kind: "Schedule" };
const ENUM: DataType = { kind: "Enum" };

function encoded(value: PayloadValue): number[] {
  return Array.from(unwrapOk(encodePayload(value)));
}

describe("roundHalfEven", () => {
  it("rounds exact halves to the even neighbour", () => {
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(3.5)).toBe(4);
    expect(roundHalfEven(-2.5)).toBe(-2);
  });

  it("rounds everything else to the nearest integer", () => {
    expect(roundHalfEven(2.4)).toBe(2);
    expect(roundHalfEven(2.6)).toBe(3);
    expect(roundHalfEven(-2.6)).toBe(-3);
    expect(roundHalfEven(7)).toBe(7);
  });
});

describe("numeric payloads", () => {
  it("decodes a Float by dividing the signed raw value", () => {
    expect(unwrapOk(decodePayload([0, 0, 15], FLOAT_10))).toEqual({
      divisor: 10,
      flag: 0,
      type: "Float",
      value: 1.5,
    });
  });

  it("decodes negative values", () => {
    expect(unwrapOk(decodePayload([0, 0xff, 0xf6], FLOAT_10))).toMatchObject({
      value: -1,
    });
    expect(unwrapOk(decodePayload([1, 0x80, 0x00], SETTING))).toEqual({
      flag: 1,
      type: "Setting",
      value: -32768,
    });
  });

  it("decodes a Number and keeps the flag", () => {
    expect(unwrapOk(decodePayload([6, 0x01, 0x2c], NUMBER))).toEqual({
      flag: 6,
      type: "Number",
      value: 300,
    });
  });

  it("ignores bytes beyond the fixed layout", () => {
    expect(unwrapOk(decodePayload([0, 0, 15, 99], FLOAT_10))).toMatchObject({
      value: 1.5,
    });
  });

  it("encodes a Float", () => {
    expect(
      encoded({ divisor: 10, flag: 0, type: "Float", value: 1.5 }),
    ).toEqual([0, 0, 15]);
  });

  it("rounds Float values to the nearest representable value", () => {
    expect(
      encoded({ divisor: 10, flag: 0, type: "Float", value: 1.53 }),
    ).toEqual([0, 0, 15]);
    expect(
      encoded({ divisor: 2, flag: 0, type: "Float", value: 1.25 }),
    ).toEqual([0, 0, 2]);
    expect(
      encoded({ divisor: 2, flag: 0, type: "Float", value: 1.75 }),
    ).toEqual([0, 0, 4]);
  });

  it("encodes negative Settings as two's complement", () => {
    expect(encoded({ flag: 1, type: "Setting", value: -2 })).toEqual([
      1, 0xff, 0xfe,
    ]);
  });

  it("rejects values that do not fit 16 bits", () => {
    const number = unwrapErr(
      encodePayload({ flag: 0, type: "Number", value: 32768 }),
    );
    expect(number).toBeInstanceOf(ValueOutOfRangeError);
    expect(number.message).toBe("Value out of range: Number 32768");

    const float = unwrapErr(
      encodePayload({ divisor: 10, flag: 0, type: "Float", value: 4000 }),
    );
    expect(float).toBeInstanceOf(ValueOutOfRangeError);
  });

  it("rejects a flag that is not a byte", () => {
    expect(
      unwrapErr(encodePayload({ flag: 256, type: "Number", value: 1 })).message,
    ).toBe("Value out of range: flag 256");
  });

  it("reports short payloads", () => {
    const error = unwrapErr(decodePayload([0, 1], FLOAT_10));
    expect(error).toBeInstanceOf(PayloadTooShortError);
    expect(error).toMatchObject({ actual: 2, expected: 3 });
  });
});

describe("Enum payloads", () => {
  it("decodes flag and value", () => {
    expect(unwrapOk(decodePayload([0, 3], ENUM))).toEqual({
      flag: 0,
      type: "Enum",
      value: 3,
    });
  });

  it("encodes flag and value", () => {
    expect(encoded({ flag: 1, type: "Enum", value: 0 })).toEqual([1, 0]);
  });

  it("rejects values above one byte", () => {
    expect(
      unwrapErr(encodePayload({ flag: 0, type: "Enum", value: 256 })),
    ).toBeInstanceOf(ValueOutOfRangeError);
  });

  it("reports short payloads", () => {
    expect(unwrapErr(decodePayload([0], ENUM))).toMatchObject({
      actual: 1,
      expected: 2,
      kind: "PayloadTooShort",
    });
  });
});

describe("DateTime payloads", () => {
  const bytes = [0, 124, 11, 11, 1, 9, 36, 57, 0];

  it("decodes calendar fields", () => {
    const value = unwrapOk(decodePayload(bytes, DATE_TIME));
    expect(value).toEqual({
      dateTime: {
        day: 11,
        hour: 9,
        minute: 36,
        month: 11,
        second: 57,
        weekday: 1,
        year: 2024,
      },
      flag: 0,
      reserved: 0,
      type: "DateTime",
    });
    expect(formatPayloadValue(value)).toBe("2024-11-11T09:36:57");
  });

  it("re-encodes to the same bytes", () => {
    const value = unwrapOk(decodePayload(bytes, DATE_TIME));
    expect(encoded(value)).toEqual(bytes);
  });

  it("carries weekday and reserved byte verbatim", () => {
    const odd = [5, 124, 11, 11, 6, 9, 36, 57, 0x2a];
    const value = unwrapOk(decodePayload(odd, DATE_TIME));
    expect(value).toMatchObject({
      dateTime: { weekday: 6 },
      flag: 5,
      reserved: 0x2a,
    });
    expect(encoded(value)).toEqual(odd);
  });

  it("rejects an impossible time", () => {
    const error = unwrapErr(
      decodePayload([0, 125, 7, 5, 3, 29, 0x19, 0xf0, 0], DATE_TIME),
    );
    expect(error).toBeInstanceOf(InvalidDateTimeError);
    expect(error.message).toBe("Invalid date time: hour 29");
  });

  it("validates the day against the month", () => {
    expect(
      unwrapErr(decodePayload([0, 123, 2, 29, 3, 0, 0, 0, 0], DATE_TIME))
        .message,
    ).toBe("Invalid date time: day 29 of 2023-2");
    expect(
      isOk(decodePayload([0, 124, 2, 29, 4, 0, 0, 0, 0], DATE_TIME)),
    ).toBe(true);
  });

  it("reports short payloads", () => {
    expect(unwrapErr(decodePayload(bytes.slice(0, 8), DATE_TIME))).toMatchObject(
      { actual: 8, expected: 9 },
    );
  });

  it("rejects years outside the wire range", () => {
    const value = unwrapOk(decodePayload(bytes, DATE_TIME));
    if (value.type !== "DateTime") throw new Error("expected DateTime");
    const early = { ...value, dateTime: { ...value.dateTime, year: 1899 } };
    const late = { ...value, dateTime: { ...value.dateTime, year: 2156 } };
    expect(unwrapErr(encodePayload(early)).message).toBe(
      "Value out of range: year 1899",
    );
    expect(unwrapErr(encodePayload(late)).message).toBe(
      "Value out of range: year 2156",
    );
  });

  it("rejects invalid dates on encode", () => {
    const value = unwrapOk(decodePayload(bytes, DATE_TIME));
    if (value.type !== "DateTime") throw new Error("expected DateTime");
    const invalid = { ...value, dateTime: { ...value.dateTime, month: 13 } };
    expect(unwrapErr(encodePayload(invalid))).toBeInstanceOf(
      InvalidDateTimeError,
    );
  });
});

describe("Schedule payloads", () => {
  const twoRanges = [6, 50, 7, 10, 18, 30, 18, 50, 0x98, 0, 24, 0];

  it("decodes the ranges before the end marker", () => {
    const value = unwrapOk(decodePayload(twoRanges, SCHEDULE));
    expect(value).toEqual({
      ranges: [
        { end: { hour: 7, minute: 10 }, start: { hour: 6, minute: 50 } },
        { end: { hour: 18, minute: 50 }, start: { hour: 18, minute: 30 } },
      ],
      type: "Schedule",
    });
    expect(formatPayloadValue(value)).toBe("6:50-7:10,18:30-18:50");
  });

  it("re-encodes with a terminator range", () => {
    const value = unwrapOk(decodePayload(twoRanges, SCHEDULE));
    expect(encoded(value)).toEqual(twoRanges);
  });

  it("stops at the first marked range", () => {
    const value = unwrapOk(decodePayload([8, 0, 12, 0, 0x8d, 0, 18, 0], SCHEDULE));
    expect(formatPayloadValue(value)).toBe("8:0-12:0");
  });

  it("lets the first of several marked ranges decide", () => {
    const value = unwrapOk(
      decodePayload([8, 0, 12, 0, 0x8d, 0, 18, 0, 0x90, 0, 20, 0], SCHEDULE),
    );
    expect(value).toEqual({
      ranges: [{ end: { hour: 12, minute: 0 }, start: { hour: 8, minute: 0 } }],
      type: "Schedule",
    });
    expect(
      unwrapOk(decodePayload([0x88, 0, 12, 0, 0x8d, 0, 18, 0], SCHEDULE)),
    ).toEqual({ ranges: [], type: "Schedule" });
  });

  it("rejects a marker bit on the end hour", () => {
    const error = unwrapErr(
      decodePayload([6, 0, 0x88, 0, 0x98, 0, 24, 0], SCHEDULE),
    );
    expect(error).toBeInstanceOf(InvalidScheduleError);
    expect(error.message).toBe("Invalid schedule: range 6:0-136:0");
  });

  it("decodes a schedule without active ranges", () => {
    const value = unwrapOk(decodePayload([0x98, 0, 24, 0], SCHEDULE));
    expect(value).toEqual({ ranges: [], type: "Schedule" });
    expect(formatPayloadValue(value)).toBe("");
    expect(encoded(value)).toEqual([0x98, 0, 24, 0]);
  });

  it("writes a full schedule without terminator", () => {
    const full = [6, 0, 8, 0, 12, 0, 13, 0, 17, 0, 22, 0];
    const value = unwrapOk(decodePayload(full, SCHEDULE));
    if (value.type !== "Schedule") throw new Error("expected Schedule");
    expect(value.ranges).toHaveLength(3);
    expect(encoded(value)).toEqual(full);
  });

  it("rejects out-of-range times", () => {
    const error = unwrapErr(decodePayload([25, 0, 26, 0], SCHEDULE));
    expect(error).toBeInstanceOf(InvalidScheduleError);
    expect(error.message).toBe("Invalid schedule: range 25:0-26:0");
  });

  it("rejects payload sizes that are not whole ranges", () => {
    expect(unwrapErr(decodePayload([6, 0, 8, 0, 1], SCHEDULE))).toBeInstanceOf(
      InvalidScheduleError,
    );
    expect(
      unwrapErr(decodePayload(new Array(16).fill(0), SCHEDULE)),
    ).toBeInstanceOf(InvalidScheduleError);
  });

  it("reports an empty payload as too short", () => {
    expect(unwrapErr(decodePayload([], SCHEDULE))).toMatchObject({
      actual: 0,
      expected: 4,
      kind: "PayloadTooShort",
    });
  });

  it("rejects more than three ranges on encode", () => {
    const range = { end: { hour: 2, minute: 0 }, start: { hour: 1, minute: 0 } };
    const error = unwrapErr(
      encodePayload({ ranges: [range, range, range, range], type: "Schedule" }),
    );
    expect(error).toBeInstanceOf(ValueOutOfRangeError);
  });
});

describe("parsePayloadValue", () => {
  it("parses numbers", () => {
    expect(unwrapOk(parsePayloadValue(" 42 ", NUMBER))).toEqual({
      flag: 0,
      type: "Number",
      value: 42,
    });
    expect(unwrapOk(parsePayloadValue("1.5", FLOAT_10))).toEqual({
      divisor: 10,
      flag: 0,
      type: "Float",
      value: 1.5,
    });
  });

  it("rejects malformed numbers", () => {
    expect(unwrapErr(parsePayloadValue("abc", FLOAT_10))).toBeInstanceOf(
      InvalidFieldValueError,
    );
    expect(unwrapErr(parsePayloadValue("", FLOAT_10))).toBeInstanceOf(
      InvalidFieldValueError,
    );
    expect(unwrapErr(parsePayloadValue("1.5", NUMBER))).toBeInstanceOf(
      InvalidFieldValueError,
    );
  });

  it("accepts only plain decimals for Float", () => {
    expect(unwrapOk(parsePayloadValue("-0.25", FLOAT_10))).toMatchObject({
      value: -0.25,
    });
    for (const text of ["0x10", "1e3", "Infinity", "1.", ".5"]) {
      expect(unwrapErr(parsePayloadValue(text, FLOAT_10))).toBeInstanceOf(
        InvalidFieldValueError,
      );
    }
  });

  it("rejects integers outside the wire range", () => {
    expect(unwrapErr(parsePayloadValue("40000", SETTING))).toBeInstanceOf(
      ValueOutOfRangeError,
    );
    expect(unwrapErr(parsePayloadValue("256", ENUM))).toBeInstanceOf(
      ValueOutOfRangeError,
    );
  });

  it("parses a date and derives the weekday", () => {
    expect(
      unwrapOk(parsePayloadValue("2024-11-11T09:36:57", DATE_TIME)),
    ).toMatchObject({
      dateTime: { day: 11, hour: 9, month: 11, weekday: 1, year: 2024 },
      reserved: 0,
    });
    expect(
      unwrapErr(parsePayloadValue("2023-02-29T00:00:00", DATE_TIME)),
    ).toBeInstanceOf(InvalidDateTimeError);
    expect(
      unwrapErr(parsePayloadValue("11.11.2024", DATE_TIME)),
    ).toBeInstanceOf(InvalidFieldValueError);
  });

  it("parses schedules", () => {
    const value = unwrapOk(parsePayloadValue("6:50-7:10, 18:30-18:50", SCHEDULE));
    expect(formatPayloadValue(value)).toBe("6:50-7:10,18:30-18:50");
  });

  it("rejects malformed schedules", () => {
    expect(
      unwrapErr(parsePayloadValue("1:0-2:0,3:0-4:0,5:0-6:0,7:0-8:0", SCHEDULE)),
    ).toBeInstanceOf(InvalidScheduleError);
    expect(unwrapErr(parsePayloadValue("25:00-26:00", SCHEDULE))).toBeInstanceOf(
      InvalidScheduleError,
    );
    expect(unwrapErr(parsePayloadValue("morning", SCHEDULE))).toBeInstanceOf(
      InvalidScheduleError,
    );
    expect(unwrapErr(parsePayloadValue("", SCHEDULE)).message).toBe(
      "Invalid schedule: no ranges",
    );
  });
});

describe("date helpers", () => {
  it("computes ISO weekdays", () => {
    expect(isoWeekday(2024, 11, 11)).toBe(1);
    expect(isoWeekday(2024, 11, 17)).toBe(7);
  });

  it("does not shift two-digit years into the 1900s", () => {
    expect(isoWeekday(1, 1, 1)).toBe(1);
    const leapDay = { day: 29, hour: 0, minute: 0, month: 2, second: 0 };
    expect(isOk(createDateTime({ ...leapDay, year: 0 }))).toBe(true);
    expect(isOk(createDateTime({ ...leapDay, year: 1 }))).toBe(false);
  });

  it("builds validated date times", () => {
    expect(
      unwrapOk(
        createDateTime({
          day: 29,
          hour: 0,
          minute: 0,
          month: 2,
          second: 0,
          year: 2024,
        }),
      ).weekday,
    ).toBe(4);
    expect(
      unwrapErr(
        createDateTime({
          day: 1,
          hour: 0,
          minute: 60,
          month: 1,
          second: 0,
          year: 2024,
        }),
      ).message,
    ).toBe("Invalid date time: minute 60");
  });

  it("converts to and from Date in local time", () => {
    const date = new Date(2024, 10, 11, 9, 36, 57);
    const dateTime = dateTimeFromDate(date);
    expect(formatDateTime(dateTime)).toBe("2024-11-11T09:36:57");
    expect(dateTime.weekday).toBe(1);
    expect(dateTimeToDate(dateTime).getTime()).toBe(date.getTime());
  });
});

describe("value helpers", () => {
  it("provides zero values", () => {
    expect(defaultPayloadValue(FLOAT_10)).toEqual({
      divisor: 10,
      flag: 0,
      type: "Float",
      value: 0,
    });
    expect(formatPayloadValue(defaultPayloadValue(DATE_TIME))).toBe(
      "1970-01-01T00:00:00",
    );
    expect(formatPayloadValue(defaultPayloadValue(SCHEDULE))).toBe("0:0-0:0");
  });

  it("reads and replaces flags", () => {
    const value: PayloadValue = { flag: 0, type: "Enum", value: 1 };
    expect(payloadFlag(withFlag(value, 5))).toBe(5);
    const schedule = defaultPayloadValue(SCHEDULE);
    expect(payloadFlag(schedule)).toBeUndefined();
    expect(withFlag(schedule, 5)).toBe(schedule);
  });

  it("matches values to data types", () => {
    const float: PayloadValue = { divisor: 10, flag: 0, type: "Float", value: 1 };
    expect(matchesDataType(float, FLOAT_10)).toBe(true);
    expect(matchesDataType(float, { divisor: 64, kind: "Float" })).toBe(false);
    expect(matchesDataType(float, NUMBER)).toBe(false);
  });
});
