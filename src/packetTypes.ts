/**
 * Packet type metadata and utilities.
 *
 * This module centralizes the known packet type codes, their labels,
 * and small predicate helpers used throughout the codebase and tests.
 */

/** Known packet type codes keyed by label. */
export const PACKET_TYPES = {
  Info: 2,
  Set: 3,
  Ack: 4,
  Nack: 5,
  Get: 6,
  Ret: 7,
  Error: 8,
} as const;

/** Label of a known packet type. */
export type PacketTypeName = keyof typeof PACKET_TYPES;

/** Numeric union of known packet type codes. */
export type PacketType = (typeof PACKET_TYPES)[PacketTypeName];

const PACKET_TYPE_NAMES: readonly PacketTypeName[] = [
  "Info",
  "Set",
  "Ack",
  "Nack",
  "Get",
  "Ret",
  "Error",
];

const PACKET_TYPE_LABELS = new Map<number, PacketTypeName>(
  PACKET_TYPE_NAMES.map((name): [number, PacketTypeName] => [
    PACKET_TYPES[name],
    name,
  ]),
);

/**
 * Return true when the provided code is one of the known packet types.
 *
 * @param code - Numeric packet type
 */
export function isPacketType(code: number): code is PacketType {
  return PACKET_TYPE_LABELS.has(code);
}

/**
 * Human-readable label for a packet type; unrecognised codes are "Unknown".
 */
export function packetTypeLabel(code: number): PacketTypeName | "Unknown" {
  return PACKET_TYPE_LABELS.get(code) ?? "Unknown";
}

/**
 * True for request packets (Set/Get) whose field id is transmitted with the
 * first two bytes swapped.
 */
export function hasSwappedFieldId(code: number): code is 3 | 6 {
  return code === PACKET_TYPES.Set || code === PACKET_TYPES.Get;
}
