/**
 * BLE frame builder
 *
 * Layout: header(3) | opcode | marker | sequence | len low | len high | payload | terminator
 * Every byte is folded to its unsigned residue.
 */

import { FrameDecodeError } from '$types';
import { BYTE_CONSTANTS } from '@utils/constants';
import { toSignedByte, toUnsignedByte } from '@utils/number';

import type { FrameConstants, ParsedFrame } from './types';

// header + opcode + marker + sequence + 2 length bytes
const PREFIX_LENGTH = 8;

/**
 * Assemble a complete frame
 *
 * Pure; the caller owns the sequence counter.
 *
 * @param constants - Header, marker and terminator bytes
 * @param opcode - Signed or unsigned opcode
 * @param sequence - Session sequence value
 * @param payload - Payload values (folded mod 256)
 * @returns Unsigned frame bytes
 *
 * @example
 * ```typescript
 * buildFrame(APP_CONSTANTS, -41, 1, []); // [250, 252, 253, 215, 1, 1, 0, 0, 251]
 * ```
 */
export function buildFrame(
  constants: FrameConstants,
  opcode: number,
  sequence: number,
  payload: readonly number[]
): number[] {
  const length = payload.length;

  return [
    ...constants.BLE_HEADER.map(toUnsignedByte),
    toUnsignedByte(opcode),
    toUnsignedByte(constants.BLE_MARKER),
    toUnsignedByte(sequence),
    length & BYTE_CONSTANTS.BYTE_MASK,
    (length >> 8) & BYTE_CONSTANTS.BYTE_MASK,
    ...payload.map(toUnsignedByte),
    toUnsignedByte(constants.BLE_TERMINATOR)
  ];
}

/**
 * Read a frame back into its parts
 *
 * @param constants - Header, marker and terminator bytes
 * @param bytes - Frame bytes
 * @returns Opcode, sequence and payload
 * @throws FrameDecodeError on a bad header, terminator or length field
 */
export function parseFrame(constants: FrameConstants, bytes: readonly number[]): ParsedFrame {
  const frame = bytes.map(toUnsignedByte);

  if (frame.length < PREFIX_LENGTH + 1) {
    throw new FrameDecodeError('Frame too short: ' + frame.length + ' bytes');
  }

  const header = constants.BLE_HEADER.map(toUnsignedByte);
  for (let i = 0; i < header.length; i++) {
    if (frame[i] !== header[i]) {
      throw new FrameDecodeError('Bad frame header at byte ' + i);
    }
  }

  if (frame[frame.length - 1] !== toUnsignedByte(constants.BLE_TERMINATOR)) {
    throw new FrameDecodeError('Missing frame terminator');
  }

  const length = frame[6] | (frame[7] << 8);
  const payload = frame.slice(PREFIX_LENGTH, frame.length - 1);
  if (payload.length !== length) {
    throw new FrameDecodeError('Length field says ' + length + ' but payload has ' + payload.length + ' bytes');
  }

  return {
    opcode: toSignedByte(frame[3]),
    sequence: frame[5],
    payload: payload
  };
}
