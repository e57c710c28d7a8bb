/**
 * Fountain BLE codec
 *
 * Turns a fountain command plus the fountain's current state into an opcode
 * and payload, and wraps finished frames for cloud transport.
 */

import { ControlError, CONTROL_ERROR_REASONS, MissingDeviceStateError } from '$types';
import type { BleOpcodes, FountainSettings, FountainSnapshot } from '$types';
import { toUnsignedByte } from '@utils/number';

import { encodeShort, percentEncode } from './helpers';
import { MODE_PAYLOADS } from './types';
import type { EncodedCommand, FountainCommand, SettingsField } from './types';

/**
 * Build the 13-byte settings payload
 *
 * Every settings field is echoed; only `field` takes `newValue`. Omitting a
 * field makes the firmware reset it.
 *
 * @param settings - Current fountain settings
 * @param field - Field being written
 * @param newValue - Value for that field
 * @returns Payload bytes
 */
export function buildSettingsPayload(settings: FountainSettings, field: SettingsField, newValue: number): number[] {
  function pick(name: SettingsField): number {
    return name === field ? newValue : settings[name];
  }

  return [
    settings.smartWorkingTime,
    settings.smartSleepTime,
    pick('lampRingSwitch'),
    pick('lampRingBrightness'),
    ...encodeShort(settings.lightUpTime),
    ...encodeShort(settings.lightOutTime),
    pick('noDisturbingSwitch'),
    ...encodeShort(settings.noDisturbingStart),
    ...encodeShort(settings.noDisturbingEnd)
  ];
}

function requireSnapshot(command: FountainCommand, snapshot: FountainSnapshot | null): FountainSnapshot {
  if (snapshot === null) {
    throw new MissingDeviceStateError('Command "' + command.kind + '" needs the fountain\'s current state');
  }
  return snapshot;
}

/**
 * Refuse commands the fountain's current state makes meaningless
 *
 * Runs before any relay traffic so a refused command costs no network call.
 *
 * @param command - Requested command
 * @param snapshot - Current fountain state
 * @throws ControlError (InvalidCommandForState)
 */
export function assertCommandAllowed(command: FountainCommand, snapshot: FountainSnapshot): void {
  if (command.kind === 'pause' && snapshot.powerStatus === 0) {
    throw new ControlError(
      CONTROL_ERROR_REASONS.INVALID_COMMAND_FOR_STATE,
      snapshot.name + ' is already paused'
    );
  }

  if (command.kind === 'lightBrightness' && snapshot.settings.lampRingSwitch === 0) {
    throw new ControlError(
      CONTROL_ERROR_REASONS.INVALID_COMMAND_FOR_STATE,
      'Light brightness cannot be set while the light on ' + snapshot.name + ' is off'
    );
  }
}

/**
 * Resolve a command to its opcode and payload
 *
 * Handshake, mode and filter commands carry fixed payloads. Pause picks the
 * paused variant of the current mode. Settings-class commands echo the
 * current settings.
 *
 * @param command - Command to encode
 * @param snapshot - Current fountain state, or null when none was fetched
 * @param opcodes - Firmware opcode table
 * @returns Opcode and payload
 * @throws MissingDeviceStateError if the command needs state and none was given
 */
export function encodeCommand(
  command: FountainCommand,
  snapshot: FountainSnapshot | null,
  opcodes: BleOpcodes
): EncodedCommand {
  switch (command.kind) {
    case 'handshakeFirst':
      return { opcode: opcodes.HANDSHAKE_FIRST, payload: [] };
    case 'handshakeSecond':
      return { opcode: opcodes.HANDSHAKE_SECOND, payload: [] };
    case 'resetFilter':
      return { opcode: opcodes.RESET_FILTER, payload: [] };
    case 'normalMode':
      return { opcode: opcodes.MODE, payload: [...MODE_PAYLOADS.NORMAL] };
    case 'smartMode':
      return { opcode: opcodes.MODE, payload: [...MODE_PAYLOADS.SMART] };
    case 'pause': {
      const state = requireSnapshot(command, snapshot);
      const payload = state.mode === 1 ? MODE_PAYLOADS.NORMAL_TO_PAUSE : MODE_PAYLOADS.SMART_TO_PAUSE;
      return { opcode: opcodes.MODE, payload: [...payload] };
    }
    case 'lightPower': {
      const state = requireSnapshot(command, snapshot);
      return {
        opcode: opcodes.SETTINGS,
        payload: buildSettingsPayload(state.settings, 'lampRingSwitch', command.on ? 1 : 0)
      };
    }
    case 'lightBrightness': {
      const state = requireSnapshot(command, snapshot);
      return {
        opcode: opcodes.SETTINGS,
        payload: buildSettingsPayload(state.settings, 'lampRingBrightness', command.level)
      };
    }
    case 'doNotDisturb': {
      const state = requireSnapshot(command, snapshot);
      return {
        opcode: opcodes.SETTINGS,
        payload: buildSettingsPayload(state.settings, 'noDisturbingSwitch', command.on ? 1 : 0)
      };
    }
    default: {
      const unhandled: never = command;
      throw new Error('Unhandled fountain command: ' + JSON.stringify(unhandled));
    }
  }
}

/**
 * Command code for the control endpoint: the opcode's unsigned residue in decimal
 * @param opcode - Signed opcode
 * @returns e.g. "215" for -41
 */
export function commandCode(opcode: number): string {
  return String(toUnsignedByte(opcode));
}

/**
 * Wrap frame bytes for transport: base64, then percent-encoding
 * @param frame - Frame bytes (any integers; folded mod 256)
 * @returns Transport string
 */
export function encodeFrameString(frame: readonly number[]): string {
  const bytes = Buffer.from(frame.map(toUnsignedByte));
  return percentEncode(bytes.toString('base64'));
}

/**
 * Recover frame bytes from a transport string
 * @param text - Output of encodeFrameString
 * @returns Unsigned frame bytes
 */
export function decodeFrameString(text: string): number[] {
  return Array.from(Buffer.from(decodeURIComponent(text), 'base64'));
}
