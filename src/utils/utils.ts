// src/utils/utils.ts

const HEX_TABLE = '0123456789abcdef';

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 * @returns A new Uint8Array containing all elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Reads a big-endian 16-bit unsigned integer.
 * @param buf - Source bytes
 * @param offset - Index of the most significant byte
 */
export function bytesToUint16BE(buf: Uint8Array, offset: number = 0): number {
  return new DataView(buf.buffer, buf.byteOffset, buf.byteLength).getUint16(offset, false);
}

/**
 * Returns a view of part of the input array (shares its buffer).
 */
export function sliceUint8Array(arr: Uint8Array, start: number, end?: number): Uint8Array {
  return arr.subarray(start, end);
}

/**
 * Creates a new Uint8Array of the given size filled with `fill`.
 */
export function allocUint8Array(size: number, fill: number = 0): Uint8Array {
  const arr = new Uint8Array(size);
  if (fill !== 0) {
    arr.fill(fill);
  }
  return arr;
}

/**
 * Converts a Uint8Array to a lowercase hex string.
 * @param uint8arr - Bytes to format
 * @param separator - Placed between bytes
 */
export function toHex(uint8arr: Uint8Array, separator: string = ''): string {
  const parts: string[] = [];
  for (const b of uint8arr) {
    parts.push(`${HEX_TABLE[(b >> 4) & 0xf] ?? ''}${HEX_TABLE[b & 0xf] ?? ''}`);
  }
  return parts.join(separator);
}

/**
 * Formats a number as `0x..` with at least `width` hex digits.
 */
export function hex(value: number, width: number = 2): string {
  return `0x${value.toString(16).toUpperCase().padStart(width, '0')}`;
}

export function isUint8(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xff;
}

export function isUint16(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xffff;
}

export function isUint32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xffffffff;
}
