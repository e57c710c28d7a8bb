/**
 * Tests for the fountain BLE codec
 */

import { APP_CONSTANTS } from '@boot/config';
import { ControlError, MissingDeviceStateError } from '$types';
import type { FountainSnapshot } from '$types';

import {
  assertCommandAllowed,
  buildSettingsPayload,
  commandCode,
  decodeFrameString,
  encodeCommand,
  encodeFrameString
} from './codec';
import { LIGHT_BRIGHTNESS } from './types';

const OPCODES = APP_CONSTANTS.BLE_OPCODES;

function makeSnapshot(overrides: Partial<FountainSnapshot> = {}): FountainSnapshot {
  return {
    id: 42,
    name: 'Kitchen fountain',
    mac: 'AA:BB:CC:DD:EE:FF',
    typeCode: 2,
    powerStatus: 1,
    mode: 1,
    settings: {
      smartWorkingTime: 10,
      smartSleepTime: 20,
      lampRingSwitch: 1,
      lampRingBrightness: 1,
      lightUpTime: 1280,
      lightOutTime: 2560,
      noDisturbingSwitch: 0,
      noDisturbingStart: 0,
      noDisturbingEnd: 0
    },
    raw: {},
    ...overrides
  };
}

describe('Fountain codec', () => {
  // ═══════════════════════════════════════════════════════════════
  // buildSettingsPayload()
  // ═══════════════════════════════════════════════════════════════

  describe('buildSettingsPayload', () => {
    it('should replace only the brightness field', () => {
      const payload = buildSettingsPayload(makeSnapshot().settings, 'lampRingBrightness', 2);

      expect(payload).toEqual([10, 20, 1, 2, 5, 0, 10, 0, 0, 0, 0, 0, 0]);
    });

    it('should replace only the light switch', () => {
      const payload = buildSettingsPayload(makeSnapshot().settings, 'lampRingSwitch', 0);

      expect(payload).toEqual([10, 20, 0, 1, 5, 0, 10, 0, 0, 0, 0, 0, 0]);
    });

    it('should pack do-not-disturb times big-endian', () => {
      const settings = { ...makeSnapshot().settings, noDisturbingStart: 1320, noDisturbingEnd: 420 };

      const payload = buildSettingsPayload(settings, 'noDisturbingSwitch', 1);

      expect(payload).toEqual([10, 20, 1, 1, 5, 0, 10, 0, 1, 5, 40, 1, 164]);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // encodeCommand()
  // ═══════════════════════════════════════════════════════════════

  describe('encodeCommand', () => {
    it('should encode handshake frames with empty payloads', () => {
      expect(encodeCommand({ kind: 'handshakeFirst' }, null, OPCODES)).toEqual({ opcode: -41, payload: [] });
      expect(encodeCommand({ kind: 'handshakeSecond' }, null, OPCODES)).toEqual({ opcode: -40, payload: [] });
    });

    it('should encode filter reset with an empty payload', () => {
      expect(encodeCommand({ kind: 'resetFilter' }, null, OPCODES)).toEqual({ opcode: -34, payload: [] });
    });

    it('should encode mode changes without device state', () => {
      expect(encodeCommand({ kind: 'normalMode' }, null, OPCODES)).toEqual({ opcode: -36, payload: [1, 1] });
      expect(encodeCommand({ kind: 'smartMode' }, null, OPCODES)).toEqual({ opcode: -36, payload: [1, 2] });
    });

    it('should pause from normal mode', () => {
      const encoded = encodeCommand({ kind: 'pause' }, makeSnapshot({ mode: 1 }), OPCODES);

      expect(encoded).toEqual({ opcode: -36, payload: [0, 1] });
    });

    it('should pause from smart mode', () => {
      const encoded = encodeCommand({ kind: 'pause' }, makeSnapshot({ mode: 2 }), OPCODES);

      expect(encoded).toEqual({ opcode: -36, payload: [0, 2] });
    });

    it('should encode brightness as a settings frame', () => {
      const encoded = encodeCommand(
        { kind: 'lightBrightness', level: LIGHT_BRIGHTNESS.MEDIUM },
        makeSnapshot(),
        OPCODES
      );

      expect(encoded).toEqual({ opcode: -35, payload: [10, 20, 1, 2, 5, 0, 10, 0, 0, 0, 0, 0, 0] });
    });

    it('should encode do-not-disturb on as a settings frame', () => {
      const encoded = encodeCommand({ kind: 'doNotDisturb', on: true }, makeSnapshot(), OPCODES);

      expect(encoded.payload[6]).toBe(1);
      expect(encoded.opcode).toBe(-35);
    });

    it('should require device state for settings-class commands', () => {
      expect(() => encodeCommand({ kind: 'lightPower', on: true }, null, OPCODES))
        .toThrow(MissingDeviceStateError);
    });

    it('should require device state for pause', () => {
      expect(() => encodeCommand({ kind: 'pause' }, null, OPCODES)).toThrow(MissingDeviceStateError);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // assertCommandAllowed()
  // ═══════════════════════════════════════════════════════════════

  describe('assertCommandAllowed', () => {
    it('should refuse to pause a paused fountain', () => {
      const snapshot = makeSnapshot({ powerStatus: 0 });

      expect(() => assertCommandAllowed({ kind: 'pause' }, snapshot)).toThrow(ControlError);
    });

    it('should refuse brightness while the light is off', () => {
      const snapshot = makeSnapshot();
      snapshot.settings.lampRingSwitch = 0;

      try {
        assertCommandAllowed({ kind: 'lightBrightness', level: LIGHT_BRIGHTNESS.HIGH }, snapshot);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ControlError);
        if (err instanceof ControlError) {
          expect(err.reason).toBe('InvalidCommandForState');
        }
      }
    });

    it('should allow light power while the light is off', () => {
      const snapshot = makeSnapshot();
      snapshot.settings.lampRingSwitch = 0;

      expect(() => assertCommandAllowed({ kind: 'lightPower', on: true }, snapshot)).not.toThrow();
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Transport wrapping
  // ═══════════════════════════════════════════════════════════════

  describe('commandCode', () => {
    it('should use the unsigned opcode residue', () => {
      expect(commandCode(-41)).toBe('215');
      expect(commandCode(-40)).toBe('216');
      expect(commandCode(-36)).toBe('220');
      expect(commandCode(-35)).toBe('221');
      expect(commandCode(-34)).toBe('222');
    });
  });

  describe('encodeFrameString', () => {
    it('should base64 then percent-encode', () => {
      expect(encodeFrameString([250, 252, 253, 215, 1, 1, 0, 0, 251])).toBe('%2Bvz91wEBAAD7');
    });

    it('should fold signed bytes first', () => {
      expect(encodeFrameString([-6, -4, -3, -41, 1, 1, 0, 0, -5])).toBe('%2Bvz91wEBAAD7');
    });

    it('should keep slashes and escape padding', () => {
      expect(encodeFrameString([255, 255])).toBe('//8%3D');
    });
  });

  describe('decodeFrameString', () => {
    it('should recover the frame bytes', () => {
      expect(decodeFrameString('%2Bvz91wEBAAD7')).toEqual([250, 252, 253, 215, 1, 1, 0, 0, 251]);
    });

    it('should reverse encodeFrameString for every byte value', () => {
      const all = Array.from({ length: 256 }, (_, i) => i);

      expect(decodeFrameString(encodeFrameString(all))).toEqual(all);
    });
  });
});
