/**
 * Frame shape, wire constants and validated constructors.
 */

import { createErr, createOk, type Result } from "option-t/plain_result";
import { ValueOutOfRangeError } from "./errors.ts";
import { PACKET_TYPES } from "./packetTypes.ts";

/** Start-of-frame marker that begins every frame. */
export const START_OF_FRAME = 0xdc;

/** Bit set on the source address byte on the wire. */
export const SOURCE_ADDRESS_FLAG = 0x80;

/** Start marker, source, destination, length and packet type. */
export const HEADER_SIZE = 5;

/** Size of the big-endian field identifier. */
export const FIELD_ID_SIZE = 4;

/** Size of the trailing checksum. */
export const CHECKSUM_SIZE = 2;

/** Length of a frame with an empty payload. */
export const MIN_FRAME_LENGTH = HEADER_SIZE + FIELD_ID_SIZE + CHECKSUM_SIZE;

/** Default upper bound for the declared frame length. */
export const DEFAULT_MAX_FRAME_LENGTH = 69;

/**
 * One complete bus message. The payload is opaque until decoded through the
 * field registry.
 */
export interface Frame {
  /** Receiving device address. */
  readonly destination: number;
  /** Sending device address (without the on-wire 0x80 bit). */
  readonly source: number;
  /** Packet type code; unknown codes are carried verbatim. */
  readonly packetType: number;
  /** Canonical 32-bit field identifier. */
  readonly fieldId: number;
  /** Raw payload bytes, frozen. */
  readonly payload: readonly number[];
}

/** Input accepted by {@link createFrame}. */
export interface FrameInit {
  destination: number;
  source: number;
  packetType: number;
  fieldId: number;
  payload?: Uint8Array | readonly number[];
}

function isByte(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xff;
}

/**
 * Build a validated, immutable frame.
 *
 * Fails with {@link ValueOutOfRangeError} when an address or the packet type
 * is not a byte, the field id is not an unsigned 32-bit integer, or the
 * payload does not fit in `maxFrameLength`.
 */
export function createFrame(
  init: FrameInit,
  maxFrameLength: number = DEFAULT_MAX_FRAME_LENGTH,
): Result<Frame, ValueOutOfRangeError> {
  const { destination, source, packetType, fieldId } = init;
  if (!isByte(destination)) {
    return createErr(new ValueOutOfRangeError(`destination ${destination}`));
  }
  if (!isByte(source)) {
    return createErr(new ValueOutOfRangeError(`source ${source}`));
  }
  if (!isByte(packetType)) {
    return createErr(new ValueOutOfRangeError(`packet type ${packetType}`));
  }
  if (!Number.isInteger(fieldId) || fieldId < 0 || fieldId > 0xffffffff) {
    return createErr(new ValueOutOfRangeError(`field id ${fieldId}`));
  }

  const bytes = init.payload ?? [];
  for (const byte of bytes) {
    if (!isByte(byte)) {
      return createErr(new ValueOutOfRangeError(`payload byte ${byte}`));
    }
  }
  const maxPayload = maxFrameLength - MIN_FRAME_LENGTH;
  if (bytes.length > maxPayload) {
    return createErr(
      new ValueOutOfRangeError(
        `payload of ${bytes.length} bytes exceeds ${maxPayload}`,
      ),
    );
  }

  return createOk(
    Object.freeze({
      destination,
      fieldId,
      packetType,
      payload: Object.freeze(Array.from(bytes)),
      source,
    }),
  );
}

/** Build a `Get` request for `fieldId`. */
export function createGetFrame(
  destination: number,
  source: number,
  fieldId: number,
): Result<Frame, ValueOutOfRangeError> {
  return createFrame({
    destination,
    fieldId,
    packetType: PACKET_TYPES.Get,
    source,
  });
}

/** Build a `Set` request writing `payload` to `fieldId`. */
export function createSetFrame(
  destination: number,
  source: number,
  fieldId: number,
  payload: Uint8Array | readonly number[],
): Result<Frame, ValueOutOfRangeError> {
  return createFrame({
    destination,
    fieldId,
    packetType: PACKET_TYPES.Set,
    payload,
    source,
  });
}

/** Structural equality of two frames. */
export function framesEqual(a: Frame, b: Frame): boolean {
  return (
    a.destination === b.destination &&
    a.source === b.source &&
    a.packetType === b.packetType &&
    a.fieldId === b.fieldId &&
    a.payload.length === b.payload.length &&
    a.payload.every((byte, i) => byte === b.payload[i])
  );
}

/**
 * Swap the two high-order bytes of a field id. Set and Get requests carry
 * their field id in this order; applying the swap twice is the identity.
 */
export function swapFieldIdBytes(fieldId: number): number {
  return (
    ((fieldId & 0x0000ffff) |
      ((fieldId >>> 8) & 0x00ff0000) |
      ((fieldId << 8) & 0xff000000)) >>>
    0
  );
}
