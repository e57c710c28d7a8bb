/**
 * Type definitions for the fountain BLE codec
 */

/**
 * Light ring brightness levels as the firmware numbers them
 */
export const LIGHT_BRIGHTNESS = {
  LOW: 1,
  MEDIUM: 2,
  HIGH: 3
} as const;

export type LightBrightness = typeof LIGHT_BRIGHTNESS[keyof typeof LIGHT_BRIGHTNESS];

/**
 * Fountain command kinds
 */
export const FOUNTAIN_COMMANDS = {
  HANDSHAKE_FIRST: 'handshakeFirst',
  HANDSHAKE_SECOND: 'handshakeSecond',
  PAUSE: 'pause',
  NORMAL_MODE: 'normalMode',
  SMART_MODE: 'smartMode',
  RESET_FILTER: 'resetFilter',
  LIGHT_POWER: 'lightPower',
  LIGHT_BRIGHTNESS: 'lightBrightness',
  DO_NOT_DISTURB: 'doNotDisturb'
} as const;

export type FountainCommandKind = typeof FOUNTAIN_COMMANDS[keyof typeof FOUNTAIN_COMMANDS];

/**
 * Every command the fountain understands, closed
 */
export type FountainCommand =
  | { kind: 'handshakeFirst' }
  | { kind: 'handshakeSecond' }
  | { kind: 'pause' }
  | { kind: 'normalMode' }
  | { kind: 'smartMode' }
  | { kind: 'resetFilter' }
  | { kind: 'lightPower'; on: boolean }
  | { kind: 'lightBrightness'; level: LightBrightness }
  | { kind: 'doNotDisturb'; on: boolean };

/**
 * Single-byte settings fields a settings-class command may overwrite
 */
export type SettingsField = 'lampRingSwitch' | 'lampRingBrightness' | 'noDisturbingSwitch';

/**
 * Mode-transition payloads: [power, mode] with power 1 running / 0 paused, mode 1 normal / 2 smart
 */
export const MODE_PAYLOADS = {
  NORMAL: [1, 1],
  SMART: [1, 2],
  NORMAL_TO_PAUSE: [0, 1],
  SMART_TO_PAUSE: [0, 2]
} as const;

/**
 * Opcode and payload ready for the frame builder
 */
export interface EncodedCommand {
  /** Signed opcode as written in the protocol notes */
  opcode: number;
  payload: number[];
}
