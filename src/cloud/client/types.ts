/**
 * Cloud client type definitions
 */

import type {
  Appliance,
  ApplianceId,
  ApplianceRoster,
  FeederSetting,
  FountainSnapshot,
  JSONObject,
  LitterAction,
  LitterEventRecord,
  PetCareConfig,
  RelayCandidate,
  RelayLink
} from '$types';

/**
 * Supplies a valid session token on demand; login and refresh live elsewhere
 */
export interface TokenProvider {
  getToken(): Promise<string>;
}

/**
 * Configuration slice the client reads
 */
export type CloudClientConfig = Pick<
  PetCareConfig,
  | 'REGION'
  | 'REGION_URLS'
  | 'ENDPOINTS'
  | 'VENDOR_HEADERS'
  | 'REQUEST_TIMEOUT_MS'
  | 'AUTH_ERROR_CODES'
  | 'SERVER_ERROR_CODES'
  | 'BLUETOOTH_ERROR_CODES'
  | 'APPLIANCE_MODELS'
  | 'MINI_FEEDER_MODEL'
  | 'MINI_NESTED_SETTINGS'
  | 'CONNECT_OK_STATE'
  | 'POLL_OK_RESULT'
>;

/**
 * Optional collaborators
 */
export interface CloudClientOptions {
  /** Date source for the `day` fields (defaults to the system clock) */
  clock?: () => Date;
}

/**
 * Control frame sent through the relay
 */
export interface ControlFrameRequest extends RelayLink {
  /** Opcode residue as a decimal string */
  cmd: string;
  /** Transport-encoded frame */
  data: string;
}

/**
 * Relay calls used by a BLE session
 *
 * Every call accepts an abort signal; the per-call timeout is applied by
 * the implementation.
 */
export interface RelayTransport {
  listRelayCandidates(signal?: AbortSignal): Promise<RelayCandidate[]>;
  /** True when the relay reports the link connected */
  connect(link: RelayLink, signal?: AbortSignal): Promise<boolean>;
  /** True when the relay acknowledges the poll */
  poll(link: RelayLink, signal?: AbortSignal): Promise<boolean>;
  cancel(link: RelayLink, signal?: AbortSignal): Promise<void>;
  sendControlFrame(request: ControlFrameRequest, signal?: AbortSignal): Promise<void>;
  getFountain(id: ApplianceId, signal?: AbortSignal): Promise<FountainSnapshot>;
}

/**
 * Full cloud surface used by the orchestrator
 */
export interface CloudApi extends RelayTransport {
  getRoster(signal?: AbortSignal): Promise<ApplianceRoster>;
  getDeviceDetail(appliance: Appliance, signal?: AbortSignal): Promise<JSONObject>;
  controlLitterBox(appliance: Appliance, action: LitterAction, signal?: AbortSignal): Promise<void>;
  getLatestLitterEvent(appliance: Appliance, signal?: AbortSignal): Promise<LitterEventRecord | null>;
  manualFeed(appliance: Appliance, amountGrams: number, signal?: AbortSignal): Promise<void>;
  /** Stop a manual feed in progress */
  cancelManualFeed(appliance: Appliance, signal?: AbortSignal): Promise<void>;
  resetDesiccant(appliance: Appliance, signal?: AbortSignal): Promise<void>;
  updateFeederSetting(appliance: Appliance, setting: FeederSetting, value: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Form field values accepted by the vendor endpoints
 */
export type FormFields = Record<string, string | number>;
