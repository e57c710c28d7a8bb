/**
 * Device orchestrator type definitions
 */

import type { FountainCommand } from '@ble/codec';
import type { RefreshPath, RelaySession } from '@ble/session';
import type { CloudApi } from '@cloud/client';
import type { LitterCommand } from '@litter/commands';
import type { Logger } from '@logging';
import type { ApplianceStore } from '@system/state/state';
import type {
  Appliance,
  ApplianceId,
  FeederSetting,
  FountainSnapshot,
  JSONObject,
  PetCareConfig,
  TimestampSec
} from '$types';

/**
 * Fountain commands a user may send; handshake frames stay internal to the relay session
 */
export type UserFountainCommand = Exclude<FountainCommand, { kind: 'handshakeFirst' | 'handshakeSecond' }>;

/**
 * Feeder commands, sent over the plain cloud path
 */
export type FeederCommand =
  | { kind: 'manualFeed'; amountGrams: number }
  | { kind: 'cancelManualFeed' }
  | { kind: 'resetDesiccant' }
  | { kind: 'updateFeederSetting'; setting: FeederSetting; value: number };

/**
 * Any command the orchestrator routes
 */
export type ApplianceCommand = UserFountainCommand | LitterCommand | FeederCommand;

/**
 * Configuration slice the orchestrator reads
 */
export type OrchestratorConfig = Pick<
  PetCareConfig,
  | 'MANUAL_PAUSE_WINDOW_SEC'
  | 'DUAL_STAGE_RESUME_MODELS'
  | 'LITTER_EVENT_CLEAN_OVER'
  | 'LITTER_RESULT_PAUSED'
  | 'MINI_FEEDER_MODEL'
>;

/**
 * Orchestrator collaborators
 */
export interface OrchestratorDependencies {
  api: CloudApi;
  relay: RelaySession;
  store: ApplianceStore;
  logger: Logger;
  /** Current time in seconds */
  timeSource?: () => TimestampSec;
}

export interface FountainState {
  kind: 'fountain';
  appliance: Appliance;
  snapshot: FountainSnapshot;
  /** How the data was obtained */
  path: RefreshPath;
}

export interface LitterBoxState {
  kind: 'litterBox';
  appliance: Appliance;
  detail: JSONObject;
  manuallyPaused: boolean;
  pauseEndsAt: TimestampSec | null;
}

export interface FeederState {
  kind: 'feeder';
  appliance: Appliance;
  detail: JSONObject;
}

export interface PurifierState {
  kind: 'purifier';
  appliance: Appliance;
  detail: JSONObject;
}

/**
 * State handed to the controlling application for one appliance
 */
export type AppliancePublicState = FountainState | LitterBoxState | FeederState | PurifierState;

/**
 * Result of a roster-wide refresh, keyed by appliance id
 */
export interface RosterState {
  fountains: Map<ApplianceId, FountainState>;
  feeders: Map<ApplianceId, FeederState>;
  litterBoxes: Map<ApplianceId, LitterBoxState>;
  purifiers: Map<ApplianceId, PurifierState>;
}

/**
 * Device orchestrator
 */
export interface DeviceOrchestrator {
  /**
   * Read one appliance; fountains go through the relay session
   */
  refresh(appliance: Appliance, signal?: AbortSignal): Promise<AppliancePublicState>;
  /**
   * Read the roster, record the account relay flag and refresh every appliance
   */
  refreshAll(signal?: AbortSignal): Promise<RosterState>;
  /**
   * Send a command to an appliance of the matching family
   * @throws ControlError when the command is refused or cannot be delivered
   */
  sendCommand(appliance: Appliance, command: ApplianceCommand, signal?: AbortSignal): Promise<void>;
}
