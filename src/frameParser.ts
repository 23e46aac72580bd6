/**
 * Pure functions for parsing bus frames.
 */

import { createErr, createOk, type Result } from "option-t/plain_result";
import { calculateCRC16 } from "./crc.ts";
import {
  ChecksumMismatchError,
  type FrameParseError,
  IncompleteFrameError,
  InvalidLengthError,
  InvalidStartByteError,
} from "./errors.ts";
import {
  CHECKSUM_SIZE,
  DEFAULT_MAX_FRAME_LENGTH,
  FIELD_ID_SIZE,
  type Frame,
  HEADER_SIZE,
  MIN_FRAME_LENGTH,
  SOURCE_ADDRESS_FLAG,
  START_OF_FRAME,
  swapFieldIdBytes,
} from "./frame.ts";
import { hasSwappedFieldId } from "./packetTypes.ts";

/** Offset of the declared length byte. */
const LENGTH_OFFSET = 3;

/** Parser configuration. */
export interface ParseOptions {
  /** Largest declared length accepted (default 69). */
  maxFrameLength?: number;
}

/**
 * Successful parse: the frame plus whatever followed it in the input.
 */
export interface ParsedFrame {
  frame: Frame;
  /** Unconsumed bytes, typically the start of the next frame. */
  rest: Uint8Array;
}

/**
 * Parse one frame from the start of `input`.
 *
 * Returns `Incomplete` when the input is a valid prefix that needs more
 * bytes; all other errors are terminal for this input. A checksum mismatch
 * still carries the decoded frame on the error.
 */
export function parseFrame(
  input: Uint8Array | readonly number[],
  options: ParseOptions = {},
): Result<ParsedFrame, FrameParseError> {
  const { maxFrameLength = DEFAULT_MAX_FRAME_LENGTH } = options;
  const buffer = input instanceof Uint8Array ? input : Uint8Array.from(input);

  if (buffer.length === 0) {
    return createErr(new IncompleteFrameError(1));
  }
  if (buffer[0] !== START_OF_FRAME) {
    return createErr(new InvalidStartByteError(buffer[0]));
  }
  if (buffer.length <= LENGTH_OFFSET) {
    return createErr(new IncompleteFrameError(LENGTH_OFFSET + 1 - buffer.length));
  }

  const length = buffer[LENGTH_OFFSET];
  if (length < MIN_FRAME_LENGTH || length > maxFrameLength) {
    return createErr(new InvalidLengthError(length));
  }
  if (buffer.length < length) {
    return createErr(new IncompleteFrameError(length - buffer.length));
  }

  const packetType = buffer[4];
  const view = new DataView(buffer.buffer, buffer.byteOffset, length);
  const wireFieldId = view.getUint32(HEADER_SIZE);
  const payloadEnd = length - CHECKSUM_SIZE;

  const frame: Frame = Object.freeze({
    destination: buffer[2],
    fieldId: hasSwappedFieldId(packetType)
      ? swapFieldIdBytes(wireFieldId)
      : wireFieldId,
    packetType,
    payload: Object.freeze(
      Array.from(buffer.subarray(HEADER_SIZE + FIELD_ID_SIZE, payloadEnd)),
    ),
    source: buffer[1] ^ SOURCE_ADDRESS_FLAG,
  });

  const received = view.getUint16(payloadEnd);
  const expected = calculateCRC16(buffer.subarray(0, payloadEnd));
  if (received !== expected) {
    return createErr(new ChecksumMismatchError(expected, received, frame));
  }

  return createOk({ frame, rest: buffer.subarray(length) });
}

/**
 * Find the next start-of-frame marker at or after `from`.
 *
 * Used to resynchronise after garbage or a corrupted frame. Returns -1 when
 * the buffer holds no further marker.
 */
export function findFrameStart(
  buffer: Uint8Array | readonly number[],
  from = 0,
): number {
  return buffer.indexOf(START_OF_FRAME, from);
}
