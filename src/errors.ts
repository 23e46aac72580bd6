/**
 * Unified error types for frame and payload codec operations.
 *
 * Codec functions never throw for malformed input; they return these errors
 * inside a `Result`. Each error carries a `kind` so callers can switch on it
 * without `instanceof` chains.
 */

import type { Frame } from "./frame.ts";
import { formatFieldId } from "./utils/format.ts";

/** Discriminant of every error produced by this package. */
export type BsbErrorKind =
  | "InvalidStartByte"
  | "Incomplete"
  | "InvalidLength"
  | "ChecksumMismatch"
  | "UnknownField"
  | "PayloadTooShort"
  | "InvalidDateTime"
  | "InvalidSchedule"
  | "ValueOutOfRange"
  | "InvalidFieldValue"
  | "InvalidFieldTable";

/** Base error class for bus codec errors. */
export abstract class BsbError extends Error {
  abstract readonly kind: BsbErrorKind;

  constructor(message: string) {
    super(message);
    this.name = "BsbError";
  }
}

/** The first byte of the input is not the start-of-frame marker. */
export class InvalidStartByteError extends BsbError {
  readonly kind = "InvalidStartByte";

  constructor(public readonly byte: number) {
    super(
      `Invalid start byte: 0x${byte.toString(16).padStart(2, "0").toUpperCase()}`,
    );
    this.name = "InvalidStartByteError";
  }
}

/** More input is needed before a frame can be parsed. */
export class IncompleteFrameError extends BsbError {
  readonly kind = "Incomplete";

  constructor(public readonly needed: number) {
    super(`Incomplete frame: need ${needed} more byte(s)`);
    this.name = "IncompleteFrameError";
  }
}

/** The declared frame length is outside the accepted range. */
export class InvalidLengthError extends BsbError {
  readonly kind = "InvalidLength";

  constructor(public readonly length: number) {
    super(`Invalid frame length: ${length}`);
    this.name = "InvalidLengthError";
  }
}

/**
 * The transmitted checksum does not match the computed one. The decoded frame
 * is attached so callers may still inspect it.
 */
export class ChecksumMismatchError extends BsbError {
  readonly kind = "ChecksumMismatch";

  constructor(
    public readonly expected: number,
    public readonly received: number,
    public readonly frame: Frame,
  ) {
    super(
      `Checksum mismatch: expected 0x${expected.toString(16).padStart(4, "0")}, got 0x${received.toString(16).padStart(4, "0")}`,
    );
    this.name = "ChecksumMismatchError";
  }
}

/** The field id is not present in the registry. */
export class UnknownFieldError extends BsbError {
  readonly kind = "UnknownField";

  constructor(public readonly field: number | string) {
    super(
      typeof field === "number"
        ? `Unknown field: ${formatFieldId(field)}`
        : `Unknown field: ${field}`,
    );
    this.name = "UnknownFieldError";
  }
}

/** The payload is shorter than the data type's fixed layout. */
export class PayloadTooShortError extends BsbError {
  readonly kind = "PayloadTooShort";

  constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(`Payload too short: expected ${expected} bytes, got ${actual}`);
    this.name = "PayloadTooShortError";
  }
}

/** Decoded date/time parts do not form a valid calendar value. */
export class InvalidDateTimeError extends BsbError {
  readonly kind = "InvalidDateTime";

  constructor(message: string) {
    super(`Invalid date time: ${message}`);
    this.name = "InvalidDateTimeError";
  }
}

/** Schedule bytes or ranges are malformed. */
export class InvalidScheduleError extends BsbError {
  readonly kind = "InvalidSchedule";

  constructor(message: string) {
    super(`Invalid schedule: ${message}`);
    this.name = "InvalidScheduleError";
  }
}

/** A value does not fit the fixed-width wire field. */
export class ValueOutOfRangeError extends BsbError {
  readonly kind = "ValueOutOfRange";

  constructor(message: string) {
    super(`Value out of range: ${message}`);
    this.name = "ValueOutOfRangeError";
  }
}

/** A value's text form or variant does not match the field. */
export class InvalidFieldValueError extends BsbError {
  readonly kind = "InvalidFieldValue";

  constructor(message: string) {
    super(`Invalid field value: ${message}`);
    this.name = "InvalidFieldValueError";
  }
}

/** A row of the field table is malformed. */
export class InvalidFieldTableError extends BsbError {
  readonly kind = "InvalidFieldTable";

  constructor(
    message: string,
    public readonly row?: number,
  ) {
    super(
      row === undefined
        ? `Invalid field table: ${message}`
        : `Invalid field table (row ${row}): ${message}`,
    );
    this.name = "InvalidFieldTableError";
  }
}

/** Errors returned by the frame parser. */
export type FrameParseError =
  | InvalidStartByteError
  | IncompleteFrameError
  | InvalidLengthError
  | ChecksumMismatchError;

/** Errors returned by the payload decoder. */
export type PayloadDecodeError =
  | PayloadTooShortError
  | InvalidDateTimeError
  | InvalidScheduleError;

/** Errors returned by the payload encoder. */
export type PayloadEncodeError =
  | ValueOutOfRangeError
  | InvalidDateTimeError
  | InvalidScheduleError;

/**
 * True for errors that may go away when more input is supplied. Every other
 * kind is terminal for the given input.
 */
export function isRetryable(error: BsbError): error is IncompleteFrameError {
  return error.kind === "Incomplete";
}
