import type { PetCareUserConfig, PetCareAppConstants, PetCareConfig } from '$types';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Everything an operator might reasonably tune for transport,
//   relay pacing, litter box behaviour and observability.
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<PetCareUserConfig> = {
  // REGION
  //   Role: Vendor cloud region the account is registered in.
  //   Critical: 'US' or 'CN'; the wrong region rejects every session token.
  //   Recommended: 'US' for accounts created outside mainland China.
  REGION: 'US',

  // REQUEST_TIMEOUT_MS
  //   Role: Per-call timeout for every cloud request.
  //   Critical: 1000–300000 ms. A timed-out relay call counts as one failed attempt.
  //   Recommended: 30000 ms; relay connects are slow when the hub is busy.
  REQUEST_TIMEOUT_MS: 30000,

  // RELAY_POLL_COOLDOWN_SEC
  //   Role: Minimum time between successful relay polls for one appliance
  //         before a data refresh may open another relay session.
  //   Critical: ≥ 300 s. Fountain firmware locks up when the relay is activated too often.
  //   Recommended: 420 s (7 minutes).
  RELAY_POLL_COOLDOWN_SEC: 420,

  // RELAY_MAX_ATTEMPTS
  //   Role: Total attempts for each of the connect and poll steps.
  //   Critical: 1–10. Attempts are sequential, never parallel.
  //   Recommended: 4.
  RELAY_MAX_ATTEMPTS: 4,

  // RELAY_RETRY_DELAY_MS
  //   Role: Wait between two attempts of the same relay step.
  //   Critical: 0–60000 ms.
  //   Recommended: 3000 ms.
  RELAY_RETRY_DELAY_MS: 3000,

  // RELAY_SETTLE_DELAY_MS
  //   Role: Wait after a successful poll before writing frames, and before disconnecting.
  //   Critical: 0–30000 ms. The relay link is asynchronous; writing too early is dropped.
  //   Recommended: 2000 ms.
  RELAY_SETTLE_DELAY_MS: 2000,

  // RELAY_TYPE_CODE
  //   Role: Fixed relay type code sent with every relay call.
  //   Critical: null or a positive integer.
  //   Recommended: null; the code is then derived from the relay and fountain type codes.
  RELAY_TYPE_CODE: null,

  // MANUAL_PAUSE_WINDOW_SEC
  //   Role: How long a manual litter box pause is considered active.
  //   Critical: ≥ 600 s; the device itself resumes after 10 minutes.
  //   Recommended: 660 s (10-minute pause + 1-minute cleaning margin).
  MANUAL_PAUSE_WINDOW_SEC: 660,

  // DUAL_STAGE_RESUME_MODELS
  //   Role: Litter box models whose firmware ignores START while paused and needs
  //         START followed by RESUME.
  //   Critical: Lower-case model strings as listed in the roster.
  //   Recommended: ['t4'].
  DUAL_STAGE_RESUME_MODELS: ['t4'],

  // CONSOLE_ENABLED / CONSOLE_LOG_LEVEL / CONSOLE_TIMESTAMPS
  //   Role: Console sink switch, its minimum level and ISO timestamp prefix.
  //   Critical: Level 0–3.
  //   Recommended: enabled, INFO (1), timestamps on.
  CONSOLE_ENABLED: true,
  CONSOLE_LOG_LEVEL: 1,
  CONSOLE_TIMESTAMPS: true,

  // GLOBAL_LOG_LEVEL
  //   Role: Logger-wide threshold applied before any sink.
  //   Critical: 0–3.
  //   Recommended: 1 (INFO); 0 while debugging relay sessions.
  GLOBAL_LOG_LEVEL: 1,
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Wire-level and vendor constants. The BLE values are fixed by
//   the fountain firmware and must not change.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<PetCareAppConstants> = {
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  REGION_URLS: {
    US: 'http://api.petkt.com/latest',
    CN: 'http://api.petkit.cn/6',
  },

  ENDPOINTS: {
    DEVICE_ROSTER: '/discovery/device_roster',
    BLE_DEVICES: '/ble/ownSupportBleDevices',
    BLE_CONNECT: '/ble/connect',
    BLE_POLL: '/ble/poll',
    BLE_CANCEL: '/ble/cancel',
    BLE_CONTROL: '/ble/controlDevice',
    FOUNTAIN_DETAIL: '/w5/deviceData',
    DEVICE_DETAIL: '/{model}/device_detail',
    DEVICE_CONTROL: '/{model}/controlDevice',
    DEVICE_RECORD: '/{model}/getDeviceRecord',
    MANUAL_FEED: '/{model}/saveDailyFeed',
    DESICCANT_RESET: '/{model}/desiccantReset',
    FEEDER_SETTINGS: '/{model}/updateSettings',
    CANCEL_FEED: '/{model}/cancelRealtimeFeed',
    MINI_MANUAL_FEED: '/feedermini/save_dailyfeed',
    MINI_DESICCANT_RESET: '/feedermini/desiccant_reset',
    MINI_FEEDER_SETTINGS: '/feedermini/update',
  },

  VENDOR_HEADERS: {
    'Accept': '*/*',
    'Accept-Language': 'en-US;q=1, it-US;q=0.9',
    'Accept-Encoding': 'gzip, deflate',
    'X-Api-Version': '8.28.0',
    'Content-Type': 'application/x-www-form-urlencoded',
    'User-Agent': 'PETKIT/8.28.0 (iPhone; iOS 15.1; Scale/3.00)',
    'X-Client': 'ios(15.1;iPhone14,3)',
  },

  // Session expired (5) and bad credentials (122)
  AUTH_ERROR_CODES: [5, 122],
  // Servers busy
  SERVER_ERROR_CODES: [1],
  // Relay could not reach the appliance
  BLUETOOTH_ERROR_CODES: [3003],

  APPLIANCE_MODELS: {
    fountain: ['w5'],
    feeder: ['d3', 'd4', 'feedermini'],
    litterBox: ['t3', 't4'],
    purifier: ['k2'],
  },

  MINI_FEEDER_MODEL: 'feedermini',
  MINI_NESTED_SETTINGS: ['manualLock', 'lightMode'],

  BLE_HEADER: [-6, -4, -3],
  BLE_MARKER: 1,
  BLE_TERMINATOR: -5,
  BLE_OPCODES: {
    HANDSHAKE_FIRST: -41,
    HANDSHAKE_SECOND: -40,
    MODE: -36,
    SETTINGS: -35,
    RESET_FILTER: -34,
  },

  // pim: 1 = powered, idle, main; 2 = running on battery
  RELAY_PIM_ONLINE: 1,
  RELAY_PIM_BATTERY: 2,
  CONNECT_OK_STATE: 1,
  POLL_OK_RESULT: 0,

  LITTER_EVENT_CLEAN_OVER: 'clean_over',
  LITTER_RESULT_PAUSED: 2,
};

// ─────────────────────────────────────────────────────────────
// COMBINED CONFIG (DEFAULT EXPORT)
// ─────────────────────────────────────────────────────────────

const CONFIG: PetCareConfig = { ...APP_CONSTANTS, ...USER_CONFIG };

export default CONFIG;

/**
 * Merge operator overrides into the default configuration
 * @param overrides - Values loaded from the environment or passed by an embedding application
 * @returns Complete configuration
 */
export function buildConfig(overrides: Partial<PetCareUserConfig> = {}): PetCareConfig {
  return { ...APP_CONSTANTS, ...USER_CONFIG, ...overrides };
}
