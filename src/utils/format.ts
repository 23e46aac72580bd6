// Display helpers shared by the monitor and tests. All functions are pure.

/** Space separated `0x..` bytes, e.g. `0xdc 0x80 0x42`. */
export function formatBytes(bytes: Uint8Array | readonly number[]): string {
  return Array.from(bytes)
    .map((b) => `0x${b.toString(16).padStart(2, "0")}`)
    .join(" ");
}

/** Field id as eight upper-case hex digits, e.g. `0x053D19F0`. */
export function formatFieldId(fieldId: number): string {
  return `0x${fieldId.toString(16).toUpperCase().padStart(8, "0")}`;
}
