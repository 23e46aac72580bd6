/**
 * CRC-16 calculation utilities.
 *
 * Exports a precomputed CRC table and small helpers to compute and verify the
 * checksum of a frame. The bus uses CRC-16/XMODEM: polynomial 0x1021, initial
 * value 0x0000, MSB-first, no final xor.
 */

const CRC_TABLE = new Uint16Array(256);

for (let i = 0; i < 256; i++) {
  let crc = i << 8;
  for (let j = 0; j < 8; j++) {
    if ((crc & 0x8000) !== 0) {
      crc = ((crc << 1) ^ 0x1021) & 0xffff;
    } else {
      crc = (crc << 1) & 0xffff;
    }
  }
  CRC_TABLE[i] = crc;
}

/**
 * Calculate the CRC16 for a buffer.
 *
 * @param buffer - Bytes to calculate the CRC for
 * @returns The 16-bit CRC value
 */
export function calculateCRC16(buffer: Uint8Array | readonly number[]): number {
  let crc = 0x0000;
  for (const byte of buffer) {
    crc = ((crc << 8) & 0xffff) ^ CRC_TABLE[((crc >>> 8) ^ byte) & 0xff];
  }
  return crc & 0xffff;
}

/**
 * Recompute the CRC16 of `buffer` and compare it with `expected`.
 */
export function verifyCRC16(
  buffer: Uint8Array | readonly number[],
  expected: number,
): boolean {
  return calculateCRC16(buffer) === (expected & 0xffff);
}
