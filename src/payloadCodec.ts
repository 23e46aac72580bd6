/**
 * Payload codec: converts between payload bytes and typed values.
 *
 * The layout is selected by the field's data type:
 *
 * | type            | bytes                                                   |
 * |-----------------|---------------------------------------------------------|
 * | Setting, Number | flag, int16 BE                                          |
 * | Float           | flag, int16 BE (value × divisor)                        |
 * | DateTime        | flag, year-1900, month, day, weekday, h, m, s, reserved |
 * | Schedule        | up to 3 × (start h, start m, end h, end m)              |
 * | Enum            | flag, value                                             |
 */

import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapOk,
} from "option-t/plain_result";
import {
  InvalidDateTimeError,
  InvalidFieldValueError,
  InvalidScheduleError,
  type PayloadDecodeError,
  type PayloadEncodeError,
  PayloadTooShortError,
  ValueOutOfRangeError,
} from "./errors.ts";
import type {
  CalendarDateTime,
  DataType,
  PayloadValue,
  TimeRange,
} from "./types/bsb.ts";

const INT16_MIN = -0x8000;
const INT16_MAX = 0x7fff;

const NUMERIC_PAYLOAD_SIZE = 3;
const DATE_TIME_PAYLOAD_SIZE = 9;
const ENUM_PAYLOAD_SIZE = 2;
const SCHEDULE_RANGE_SIZE = 4;

/** Maximum number of ranges in a schedule payload. */
export const MAX_SCHEDULE_RANGES = 3;

/** Bit on a range's start hour that terminates the schedule. */
export const SCHEDULE_END_MARKER = 0x80;

/** Range written after the last active one when the schedule is not full. */
const SCHEDULE_TERMINATOR = [SCHEDULE_END_MARKER | 24, 0, 24, 0] as const;

const DATE_TIME_YEAR_OFFSET = 1900;

type Bytes = Uint8Array | readonly number[];

function readInt16(bytes: Bytes, offset: number): number {
  return (((bytes[offset] << 8) | bytes[offset + 1]) << 16) >> 16;
}

function isByte(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xff;
}

function isInt16(value: number): boolean {
  return Number.isInteger(value) && value >= INT16_MIN && value <= INT16_MAX;
}

/**
 * Round to the nearest integer; exact halves go to the even neighbour.
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

// Date.UTC maps years 0-99 to 1900-1999; setUTCFullYear does not.
function utcDate(year: number, monthIndex: number, day: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  return date;
}

function daysInMonth(year: number, month: number): number {
  return utcDate(year, month, 0).getUTCDate();
}

/** ISO weekday (Monday = 1 .. Sunday = 7) of a calendar date. */
export function isoWeekday(year: number, month: number, day: number): number {
  const dow = utcDate(year, month - 1, day).getUTCDay();
  return dow === 0 ? 7 : dow;
}

function validateDateTime(
  dt: Omit<CalendarDateTime, "weekday">,
): InvalidDateTimeError | undefined {
  const { year, month, day, hour, minute, second } = dt;
  if (!Number.isInteger(year)) {
    return new InvalidDateTimeError(`year ${year}`);
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    return new InvalidDateTimeError(`month ${month}`);
  }
  if (!Number.isInteger(day) || day < 1 || day > daysInMonth(year, month)) {
    return new InvalidDateTimeError(`day ${day} of ${year}-${month}`);
  }
  if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
    return new InvalidDateTimeError(`hour ${hour}`);
  }
  if (!Number.isInteger(minute) || minute < 0 || minute > 59) {
    return new InvalidDateTimeError(`minute ${minute}`);
  }
  if (!Number.isInteger(second) || second < 0 || second > 59) {
    return new InvalidDateTimeError(`second ${second}`);
  }
  return undefined;
}

/** Parts accepted by {@link createDateTime}; the weekday is derived when absent. */
export type DateTimeParts = Omit<CalendarDateTime, "weekday"> & {
  weekday?: number;
};

/**
 * Build a validated calendar value.
 */
export function createDateTime(
  parts: DateTimeParts,
): Result<CalendarDateTime, InvalidDateTimeError> {
  const invalid = validateDateTime(parts);
  if (invalid) return createErr(invalid);
  return createOk({
    ...parts,
    weekday: parts.weekday ?? isoWeekday(parts.year, parts.month, parts.day),
  });
}

/** Calendar value of a `Date` in local time. */
export function dateTimeFromDate(date: Date): CalendarDateTime {
  const year = date.getFullYear();
  const month = date.getMonth() + 1;
  const day = date.getDate();
  return {
    day,
    hour: date.getHours(),
    minute: date.getMinutes(),
    month,
    second: date.getSeconds(),
    weekday: isoWeekday(year, month, day),
    year,
  };
}

/** Local-time `Date` of a calendar value. */
export function dateTimeToDate(dt: CalendarDateTime): Date {
  const date = new Date(0);
  date.setFullYear(dt.year, dt.month - 1, dt.day);
  date.setHours(dt.hour, dt.minute, dt.second, 0);
  return date;
}

function isValidRange(range: TimeRange): boolean {
  return [range.start, range.end].every(
    ({ hour, minute }) =>
      Number.isInteger(hour) &&
      Number.isInteger(minute) &&
      hour >= 0 &&
      hour <= 24 &&
      minute >= 0 &&
      minute <= 59,
  );
}

function decodeSchedule(
  payload: Bytes,
): Result<PayloadValue, PayloadDecodeError> {
  if (payload.length === 0) {
    return createErr(new PayloadTooShortError(SCHEDULE_RANGE_SIZE, 0));
  }
  if (
    payload.length % SCHEDULE_RANGE_SIZE !== 0 ||
    payload.length > MAX_SCHEDULE_RANGES * SCHEDULE_RANGE_SIZE
  ) {
    return createErr(
      new InvalidScheduleError(`payload of ${payload.length} bytes`),
    );
  }

  const ranges: TimeRange[] = [];
  for (let offset = 0; offset < payload.length; offset += SCHEDULE_RANGE_SIZE) {
    const startHour = payload[offset];
    // The first marked range ends the schedule; it and later ranges are inactive.
    if ((startHour & SCHEDULE_END_MARKER) !== 0) break;
    const range: TimeRange = {
      end: {
        hour: payload[offset + 2],
        minute: payload[offset + 3],
      },
      start: { hour: startHour, minute: payload[offset + 1] },
    };
    if (!isValidRange(range)) {
      return createErr(
        new InvalidScheduleError(`range ${formatRange(range)}`),
      );
    }
    ranges.push(range);
  }
  return createOk({ ranges, type: "Schedule" });
}

/**
 * Decode payload bytes according to the field's data type.
 *
 * The flag byte is carried through unmodified; its meaning is not
 * interpreted here.
 */
export function decodePayload(
  payload: Bytes,
  dataType: DataType,
): Result<PayloadValue, PayloadDecodeError> {
  switch (dataType.kind) {
    case "Setting":
    case "Number":
    case "Float": {
      if (payload.length < NUMERIC_PAYLOAD_SIZE) {
        return createErr(
          new PayloadTooShortError(NUMERIC_PAYLOAD_SIZE, payload.length),
        );
      }
      const flag = payload[0];
      const raw = readInt16(payload, 1);
      if (dataType.kind === "Float") {
        return createOk({
          divisor: dataType.divisor,
          flag,
          type: "Float",
          value: raw / dataType.divisor,
        });
      }
      return createOk({ flag, type: dataType.kind, value: raw });
    }
    case "DateTime": {
      if (payload.length < DATE_TIME_PAYLOAD_SIZE) {
        return createErr(
          new PayloadTooShortError(DATE_TIME_PAYLOAD_SIZE, payload.length),
        );
      }
      const dateTime: CalendarDateTime = {
        day: payload[3],
        hour: payload[5],
        minute: payload[6],
        month: payload[2],
        second: payload[7],
        weekday: payload[4],
        year: DATE_TIME_YEAR_OFFSET + payload[1],
      };
      const invalid = validateDateTime(dateTime);
      if (invalid) return createErr(invalid);
      return createOk({
        dateTime,
        flag: payload[0],
        reserved: payload[8],
        type: "DateTime",
      });
    }
    case "Schedule":
      return decodeSchedule(payload);
    case "Enum": {
      if (payload.length < ENUM_PAYLOAD_SIZE) {
        return createErr(
          new PayloadTooShortError(ENUM_PAYLOAD_SIZE, payload.length),
        );
      }
      return createOk({ flag: payload[0], type: "Enum", value: payload[1] });
    }
  }
}

function int16Bytes(value: number): [number, number] {
  return [(value >> 8) & 0xff, value & 0xff];
}

function checkFlag(flag: number): ValueOutOfRangeError | undefined {
  return isByte(flag) ? undefined : new ValueOutOfRangeError(`flag ${flag}`);
}

/**
 * Encode a value into payload bytes. Inverse of {@link decodePayload}.
 *
 * Float values are scaled by their divisor and rounded half-to-even, so
 * values that are not a multiple of `1 / divisor` come back as the nearest
 * representable value.
 */
export function encodePayload(
  value: PayloadValue,
): Result<Uint8Array, PayloadEncodeError> {
  if (value.type !== "Schedule") {
    const badFlag = checkFlag(value.flag);
    if (badFlag) return createErr(badFlag);
  }

  switch (value.type) {
    case "Setting":
    case "Number": {
      if (!isInt16(value.value)) {
        return createErr(
          new ValueOutOfRangeError(`${value.type} ${value.value}`),
        );
      }
      return createOk(Uint8Array.of(value.flag, ...int16Bytes(value.value)));
    }
    case "Float": {
      if (!Number.isInteger(value.divisor) || value.divisor <= 0) {
        return createErr(new ValueOutOfRangeError(`divisor ${value.divisor}`));
      }
      const scaled = roundHalfEven(value.value * value.divisor);
      if (!isInt16(scaled)) {
        return createErr(
          new ValueOutOfRangeError(`${value.value} × ${value.divisor}`),
        );
      }
      return createOk(Uint8Array.of(value.flag, ...int16Bytes(scaled)));
    }
    case "DateTime": {
      const { dateTime, reserved } = value;
      const invalid = validateDateTime(dateTime);
      if (invalid) return createErr(invalid);
      const yearOffset = dateTime.year - DATE_TIME_YEAR_OFFSET;
      if (!isByte(yearOffset)) {
        return createErr(new ValueOutOfRangeError(`year ${dateTime.year}`));
      }
      if (!isByte(dateTime.weekday)) {
        return createErr(
          new ValueOutOfRangeError(`weekday ${dateTime.weekday}`),
        );
      }
      if (!isByte(reserved)) {
        return createErr(new ValueOutOfRangeError(`reserved ${reserved}`));
      }
      return createOk(
        Uint8Array.of(
          value.flag,
          yearOffset,
          dateTime.month,
          dateTime.day,
          dateTime.weekday,
          dateTime.hour,
          dateTime.minute,
          dateTime.second,
          reserved,
        ),
      );
    }
    case "Schedule": {
      if (value.ranges.length > MAX_SCHEDULE_RANGES) {
        return createErr(
          new ValueOutOfRangeError(`${value.ranges.length} schedule ranges`),
        );
      }
      const bytes: number[] = [];
      for (const range of value.ranges) {
        if (!isValidRange(range)) {
          return createErr(
            new InvalidScheduleError(`range ${formatRange(range)}`),
          );
        }
        bytes.push(
          range.start.hour,
          range.start.minute,
          range.end.hour,
          range.end.minute,
        );
      }
      if (value.ranges.length < MAX_SCHEDULE_RANGES) {
        bytes.push(...SCHEDULE_TERMINATOR);
      }
      return createOk(Uint8Array.from(bytes));
    }
    case "Enum": {
      if (!isByte(value.value)) {
        return createErr(new ValueOutOfRangeError(`Enum ${value.value}`));
      }
      return createOk(Uint8Array.of(value.flag, value.value));
    }
  }
}

function pad2(value: number): string {
  return value.toString().padStart(2, "0");
}

function formatRange({ start, end }: TimeRange): string {
  return `${start.hour}:${start.minute}-${end.hour}:${end.minute}`;
}

/** `YYYY-MM-DDTHH:MM:SS` */
export function formatDateTime(dt: CalendarDateTime): string {
  return `${dt.year.toString().padStart(4, "0")}-${pad2(dt.month)}-${pad2(dt.day)}T${pad2(dt.hour)}:${pad2(dt.minute)}:${pad2(dt.second)}`;
}

/**
 * Human-readable form of a value. Floats render their scaled decimal value,
 * schedules their active ranges as `h:m-h:m` joined by commas.
 */
export function formatPayloadValue(value: PayloadValue): string {
  switch (value.type) {
    case "Setting":
    case "Number":
    case "Float":
    case "Enum":
      return value.value.toString();
    case "DateTime":
      return formatDateTime(value.dateTime);
    case "Schedule":
      return value.ranges.map(formatRange).join(",");
  }
}

const INTEGER_PATTERN = /^-?\d+$/;
const DECIMAL_PATTERN = /^-?\d+(?:\.\d+)?$/;
const DATE_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;
const RANGE_PATTERN = /^(\d{1,2}):(\d{1,2})-(\d{1,2}):(\d{1,2})$/;

/** Errors returned by {@link parsePayloadValue}. */
export type PayloadParseError =
  | InvalidFieldValueError
  | InvalidDateTimeError
  | InvalidScheduleError
  | ValueOutOfRangeError;

function parseSchedule(text: string): Result<PayloadValue, PayloadParseError> {
  if (text === "") return createErr(new InvalidScheduleError("no ranges"));
  const parts = text.split(",");
  if (parts.length > MAX_SCHEDULE_RANGES) {
    return createErr(new InvalidScheduleError(`${parts.length} ranges`));
  }
  const ranges: TimeRange[] = [];
  for (const part of parts) {
    const match = RANGE_PATTERN.exec(part.trim());
    if (!match) {
      return createErr(new InvalidScheduleError(`"${part}"`));
    }
    const [sh, sm, eh, em] = match.slice(1).map(Number);
    const range: TimeRange = {
      end: { hour: eh, minute: em },
      start: { hour: sh, minute: sm },
    };
    if (!isValidRange(range)) {
      return createErr(new InvalidScheduleError(`range ${part}`));
    }
    ranges.push(range);
  }
  return createOk({ ranges, type: "Schedule" });
}

/**
 * Parse the text produced by {@link formatPayloadValue} back into a value of
 * the given data type. Flags, reserved bytes and the weekday are not part of
 * the text form: flags and reserved bytes are 0, the weekday is derived.
 */
export function parsePayloadValue(
  text: string,
  dataType: DataType,
): Result<PayloadValue, PayloadParseError> {
  const input = text.trim();
  switch (dataType.kind) {
    case "Setting":
    case "Number":
    case "Enum": {
      if (!INTEGER_PATTERN.test(input)) {
        return createErr(
          new InvalidFieldValueError(`"${text}" is not an integer`),
        );
      }
      const value = Number(input);
      const inRange = dataType.kind === "Enum" ? isByte(value) : isInt16(value);
      if (!inRange) {
        return createErr(new ValueOutOfRangeError(`${dataType.kind} ${value}`));
      }
      return createOk({ flag: 0, type: dataType.kind, value });
    }
    case "Float": {
      if (!DECIMAL_PATTERN.test(input)) {
        return createErr(new InvalidFieldValueError(`"${text}" is not a number`));
      }
      const value = Number(input);
      return createOk({
        divisor: dataType.divisor,
        flag: 0,
        type: "Float",
        value,
      });
    }
    case "DateTime": {
      const match = DATE_TIME_PATTERN.exec(input);
      if (!match) {
        return createErr(
          new InvalidFieldValueError(`"${text}" is not YYYY-MM-DDTHH:MM:SS`),
        );
      }
      const [year, month, day, hour, minute, second] = match
        .slice(1)
        .map(Number);
      const dateTime = createDateTime({
        day,
        hour,
        minute,
        month,
        second,
        year,
      });
      if (isErr(dateTime)) return dateTime;
      return createOk({
        dateTime: unwrapOk(dateTime),
        flag: 0,
        reserved: 0,
        type: "DateTime",
      });
    }
    case "Schedule":
      return parseSchedule(input);
  }
}

/**
 * Zero value of a data type. DateTime defaults to the Unix epoch and a
 * schedule to a single `0:0-0:0` range.
 */
export function defaultPayloadValue(dataType: DataType): PayloadValue {
  switch (dataType.kind) {
    case "Setting":
    case "Number":
    case "Enum":
      return { flag: 0, type: dataType.kind, value: 0 };
    case "Float":
      return { divisor: dataType.divisor, flag: 0, type: "Float", value: 0 };
    case "DateTime":
      return {
        dateTime: {
          day: 1,
          hour: 0,
          minute: 0,
          month: 1,
          second: 0,
          weekday: 4,
          year: 1970,
        },
        flag: 0,
        reserved: 0,
        type: "DateTime",
      };
    case "Schedule":
      return {
        ranges: [{ end: { hour: 0, minute: 0 }, start: { hour: 0, minute: 0 } }],
        type: "Schedule",
      };
  }
}

/** Flag byte of a value; schedules carry none. */
export function payloadFlag(value: PayloadValue): number | undefined {
  return value.type === "Schedule" ? undefined : value.flag;
}

/** Copy of `value` with its flag replaced; schedules are returned unchanged. */
export function withFlag(value: PayloadValue, flag: number): PayloadValue {
  return value.type === "Schedule" ? value : { ...value, flag };
}

/**
 * True when `value` is the variant produced by decoding `dataType` (for
 * Float, with the same divisor).
 */
export function matchesDataType(
  value: PayloadValue,
  dataType: DataType,
): boolean {
  if (value.type !== dataType.kind) return false;
  if (value.type === "Float" && dataType.kind === "Float") {
    return value.divisor === dataType.divisor;
  }
  return true;
}
