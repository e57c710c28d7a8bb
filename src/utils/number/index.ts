/**
 * Number utilities
 *
 * Strict type checks (no coercion) plus the byte folding used by the BLE codec.
 */

import { BYTE_CONSTANTS } from '../constants';

/**
 * Check if a value is a finite number
 *
 * Unlike global isFinite(), this does NOT coerce to number first.
 * - isFiniteNumber(null) = false
 * - isFiniteNumber("5") = false
 *
 * @param value - Value to check
 * @returns true if value is a finite number
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Check if a value is an integer
 * @param value - Value to check
 * @returns true if value is an integer
 */
export function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * Fold any integer into its unsigned byte residue (mod 256)
 *
 * Protocol notes write bytes signed (e.g. -6 for 0xFA); the wire value is the
 * unsigned residue.
 *
 * @param value - Signed or unsigned integer
 * @returns Value in [0, 255]
 *
 * @example
 * ```typescript
 * toUnsignedByte(-6);  // 250
 * toUnsignedByte(256); // 0
 * ```
 */
export function toUnsignedByte(value: number): number {
  const m = BYTE_CONSTANTS.BYTE_MODULUS;
  return ((value % m) + m) % m;
}

/**
 * Interpret an unsigned byte as a signed 8-bit value
 * @param value - Byte in [0, 255]
 * @returns Value in [-128, 127]
 */
export function toSignedByte(value: number): number {
  const b = toUnsignedByte(value);
  return b > 127 ? b - BYTE_CONSTANTS.BYTE_MODULUS : b;
}
