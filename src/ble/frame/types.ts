/**
 * Type definitions for BLE frame assembly
 */

import type { PetCareAppConstants } from '$types';

/**
 * Fixed frame bytes supplied by the firmware constants
 */
export type FrameConstants = Pick<PetCareAppConstants, 'BLE_HEADER' | 'BLE_MARKER' | 'BLE_TERMINATOR'>;

/**
 * A frame read back from wire bytes
 */
export interface ParsedFrame {
  /** Opcode as a signed byte */
  opcode: number;
  sequence: number;
  payload: number[];
}
