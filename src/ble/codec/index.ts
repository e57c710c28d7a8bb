export {
  buildSettingsPayload,
  assertCommandAllowed,
  encodeCommand,
  commandCode,
  encodeFrameString,
  decodeFrameString
} from './codec';
export { encodeShort, decodeShort, percentEncode } from './helpers';
export { LIGHT_BRIGHTNESS, FOUNTAIN_COMMANDS, MODE_PAYLOADS } from './types';
export type { LightBrightness, FountainCommand, FountainCommandKind, SettingsField, EncodedCommand } from './types';
