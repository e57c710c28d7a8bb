/**
 * Tests for BLE frame assembly
 */

import { APP_CONSTANTS } from '@boot/config';
import { FrameDecodeError } from '$types';

import { buildFrame, parseFrame } from './frame';

describe('BLE frame', () => {
  describe('buildFrame', () => {
    it('should build the first handshake frame', () => {
      expect(buildFrame(APP_CONSTANTS, -41, 1, [])).toEqual([250, 252, 253, 215, 1, 1, 0, 0, 251]);
    });

    it('should build a settings frame', () => {
      const frame = buildFrame(APP_CONSTANTS, -35, 3, [10, 20, 1, 2, 5, 0, 10, 0, 0, 0, 0, 0, 0]);

      expect(frame).toEqual([250, 252, 253, 221, 1, 3, 13, 0, 10, 20, 1, 2, 5, 0, 10, 0, 0, 0, 0, 0, 0, 251]);
    });

    it('should fold payload values and the sequence mod 256', () => {
      const frame = buildFrame(APP_CONSTANTS, -36, 256, [-1, 257]);

      expect(frame).toEqual([250, 252, 253, 220, 1, 0, 2, 0, 255, 1, 251]);
    });

    it('should split long payload lengths across both length bytes', () => {
      const payload = new Array<number>(300).fill(7);

      const frame = buildFrame(APP_CONSTANTS, -35, 1, payload);

      expect(frame[6]).toBe(44);
      expect(frame[7]).toBe(1);
      expect(frame[6] + (frame[7] << 8)).toBe(300);
      expect(frame).toHaveLength(309);
    });
  });

  describe('parseFrame', () => {
    it('should read back opcode, sequence and payload', () => {
      const frame = buildFrame(APP_CONSTANTS, -36, 4, [0, 2]);

      expect(parseFrame(APP_CONSTANTS, frame)).toEqual({ opcode: -36, sequence: 4, payload: [0, 2] });
    });

    it('should read back a payload longer than 255 bytes', () => {
      const payload = Array.from({ length: 260 }, (_, i) => i % 256);

      expect(parseFrame(APP_CONSTANTS, buildFrame(APP_CONSTANTS, -35, 9, payload)).payload).toEqual(payload);
    });

    it('should reject a wrong header', () => {
      expect(() => parseFrame(APP_CONSTANTS, [1, 252, 253, 215, 1, 1, 0, 0, 251])).toThrow(FrameDecodeError);
    });

    it('should reject a missing terminator', () => {
      expect(() => parseFrame(APP_CONSTANTS, [250, 252, 253, 215, 1, 1, 0, 0, 0])).toThrow('Missing frame terminator');
    });

    it('should reject a length mismatch', () => {
      expect(() => parseFrame(APP_CONSTANTS, [250, 252, 253, 215, 1, 1, 2, 0, 9, 251]))
        .toThrow('Length field says 2 but payload has 1 bytes');
    });

    it('should reject a truncated frame', () => {
      expect(() => parseFrame(APP_CONSTANTS, [250, 252, 253])).toThrow('Frame too short: 3 bytes');
    });
  });
});
