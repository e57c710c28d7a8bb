/**
 * Type definition for the pet-care controller configuration
 */

import type { LogLevel, LogLevels } from '@logging';

import type { ApplianceKind } from './appliance';

/**
 * Vendor cloud regions
 */
export type RegionName = 'US' | 'CN';

/**
 * User-configurable settings
 * Everything an operator might reasonably tune for transport, relay pacing and observability
 */
export interface PetCareUserConfig {
  // ───────── CLOUD TRANSPORT ─────────
  readonly REGION: RegionName;
  readonly REQUEST_TIMEOUT_MS: number;

  // ───────── BLE RELAY ─────────
  readonly RELAY_POLL_COOLDOWN_SEC: number;
  readonly RELAY_MAX_ATTEMPTS: number;
  readonly RELAY_RETRY_DELAY_MS: number;
  readonly RELAY_SETTLE_DELAY_MS: number;
  readonly RELAY_TYPE_CODE: number | null;

  // ───────── LITTER BOX ─────────
  readonly MANUAL_PAUSE_WINDOW_SEC: number;
  readonly DUAL_STAGE_RESUME_MODELS: readonly string[];

  // ───────── CONSOLE SETTINGS ─────────
  readonly CONSOLE_ENABLED: boolean;
  readonly CONSOLE_LOG_LEVEL: LogLevel;
  readonly CONSOLE_TIMESTAMPS: boolean;

  // ───────── GLOBAL LOGGING SETTINGS ─────────
  readonly GLOBAL_LOG_LEVEL: LogLevel;
}

/**
 * Cloud endpoint paths
 * Paths containing `{model}` are expanded with the appliance's lower-cased model
 */
export interface PetCareEndpoints {
  readonly DEVICE_ROSTER: string;
  readonly BLE_DEVICES: string;
  readonly BLE_CONNECT: string;
  readonly BLE_POLL: string;
  readonly BLE_CANCEL: string;
  readonly BLE_CONTROL: string;
  readonly FOUNTAIN_DETAIL: string;
  readonly DEVICE_DETAIL: string;
  readonly DEVICE_CONTROL: string;
  readonly DEVICE_RECORD: string;
  readonly MANUAL_FEED: string;
  readonly DESICCANT_RESET: string;
  readonly FEEDER_SETTINGS: string;
  readonly CANCEL_FEED: string;
  /** The mini feeder has its own fixed paths */
  readonly MINI_MANUAL_FEED: string;
  readonly MINI_DESICCANT_RESET: string;
  readonly MINI_FEEDER_SETTINGS: string;
}

/**
 * BLE frame opcodes, written signed as in the vendor protocol notes
 */
export interface BleOpcodes {
  readonly HANDSHAKE_FIRST: number;
  readonly HANDSHAKE_SECOND: number;
  readonly MODE: number;
  readonly SETTINGS: number;
  readonly RESET_FILTER: number;
}

/**
 * Application constants
 * Wire-level and vendor constants that should rarely change
 */
export interface PetCareAppConstants {
  // ───────── LOGGING CONSTANTS ─────────
  readonly LOG_LEVELS: LogLevels;

  // ───────── CLOUD CONSTANTS ─────────
  readonly REGION_URLS: Readonly<Record<RegionName, string>>;
  readonly ENDPOINTS: PetCareEndpoints;
  readonly VENDOR_HEADERS: Readonly<Record<string, string>>;
  readonly AUTH_ERROR_CODES: readonly number[];
  readonly SERVER_ERROR_CODES: readonly number[];
  readonly BLUETOOTH_ERROR_CODES: readonly number[];
  /** Lower-cased roster model strings per appliance family */
  readonly APPLIANCE_MODELS: Readonly<Record<ApplianceKind, readonly string[]>>;
  /** Feeder model served by the MINI_* endpoints */
  readonly MINI_FEEDER_MODEL: string;
  /** Settings the mini feeder keeps under `settings.` */
  readonly MINI_NESTED_SETTINGS: readonly string[];

  // ───────── BLE FRAME CONSTANTS ─────────
  readonly BLE_HEADER: readonly number[];
  readonly BLE_MARKER: number;
  readonly BLE_TERMINATOR: number;
  readonly BLE_OPCODES: BleOpcodes;

  // ───────── RELAY PROTOCOL CONSTANTS ─────────
  readonly RELAY_PIM_ONLINE: number;
  readonly RELAY_PIM_BATTERY: number;
  readonly CONNECT_OK_STATE: number;
  readonly POLL_OK_RESULT: number;

  // ───────── LITTER BOX CONSTANTS ─────────
  readonly LITTER_EVENT_CLEAN_OVER: string;
  readonly LITTER_RESULT_PAUSED: number;
}

/**
 * Complete controller configuration
 * Combines user config and app constants
 */
export type PetCareConfig = PetCareUserConfig & PetCareAppConstants;
