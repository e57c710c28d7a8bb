/**
 * Global constants used throughout the application
 */

export const TIME_CONSTANTS = {
  MS_PER_SECOND: 1000,
} as const;

export const BYTE_CONSTANTS = {
  BYTE_MODULUS: 256,
  BYTE_MASK: 0xFF,
  U16_MAX: 0xFFFF,
} as const;
