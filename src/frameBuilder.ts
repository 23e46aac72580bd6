/**
 * Pure functions for serializing bus frames.
 *
 * The serialized bytes carry the start marker, header, field id, payload and
 * the CRC16 of everything before it.
 */

import { calculateCRC16 } from "./crc.ts";
import {
  CHECKSUM_SIZE,
  FIELD_ID_SIZE,
  type Frame,
  HEADER_SIZE,
  MIN_FRAME_LENGTH,
  SOURCE_ADDRESS_FLAG,
  START_OF_FRAME,
  swapFieldIdBytes,
} from "./frame.ts";
import { hasSwappedFieldId } from "./packetTypes.ts";

/**
 * Serialize a frame to its wire representation.
 *
 * The frame is assumed valid (see `createFrame`); the declared length is
 * computed from the payload size and the checksum appended big-endian.
 *
 * @param frame - Frame to serialize.
 * @returns The serialized frame suitable for sending.
 */
export function serializeFrame(frame: Frame): Uint8Array {
  const length = MIN_FRAME_LENGTH + frame.payload.length;
  const bytes = new Uint8Array(length);
  const view = new DataView(bytes.buffer);

  bytes[0] = START_OF_FRAME;
  bytes[1] = (frame.source ^ SOURCE_ADDRESS_FLAG) & 0xff;
  bytes[2] = frame.destination;
  bytes[3] = length;
  bytes[4] = frame.packetType;
  view.setUint32(
    HEADER_SIZE,
    hasSwappedFieldId(frame.packetType)
      ? swapFieldIdBytes(frame.fieldId)
      : frame.fieldId,
  );
  bytes.set(frame.payload, HEADER_SIZE + FIELD_ID_SIZE);

  const checksumOffset = length - CHECKSUM_SIZE;
  view.setUint16(checksumOffset, calculateCRC16(bytes.subarray(0, checksumOffset)));

  return bytes;
}
