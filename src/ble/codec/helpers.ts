/**
 * Byte-level helpers for the BLE codec
 */

import { BYTE_CONSTANTS } from '@utils/constants';
import { isInteger } from '@utils/number';

/**
 * Pack a 16-bit unsigned integer big-endian
 *
 * @param value - Integer in [0, 65535]
 * @returns [high byte, low byte]
 * @throws RangeError if value is not a 16-bit unsigned integer
 *
 * @example
 * ```typescript
 * encodeShort(1280); // [5, 0]
 * ```
 */
export function encodeShort(value: number): [number, number] {
  if (!isInteger(value) || value < 0 || value > BYTE_CONSTANTS.U16_MAX) {
    throw new RangeError('Not a 16-bit unsigned integer: ' + String(value));
  }
  return [(value >> 8) & BYTE_CONSTANTS.BYTE_MASK, value & BYTE_CONSTANTS.BYTE_MASK];
}

/**
 * Unpack a big-endian 16-bit pair
 * @param high - High byte
 * @param low - Low byte
 * @returns Integer in [0, 65535]
 */
export function decodeShort(high: number, low: number): number {
  return ((high & BYTE_CONSTANTS.BYTE_MASK) << 8) | (low & BYTE_CONSTANTS.BYTE_MASK);
}

/**
 * Percent-encode a base64 string for the form body, keeping `/` literal
 * @param text - Base64 text
 * @returns Escaped text (`+` → `%2B`, `=` → `%3D`)
 */
export function percentEncode(text: string): string {
  return encodeURIComponent(text).replace(/%2F/g, '/');
}
