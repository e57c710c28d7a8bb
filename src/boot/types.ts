/**
 * Boot type definitions
 */

import type { RelaySession, SessionPhase } from '@ble/session';
import type { CloudApi, TokenProvider } from '@cloud/client';
import type { ConsoleAPI, Logger } from '@logging';
import type { DeviceOrchestrator } from '@system/orchestrator';
import type { ApplianceStore } from '@system/state/state';
import type { ApplianceId, PetCareConfig, PetCareUserConfig, TimestampSec } from '$types';

/**
 * Everything a running controller is made of
 */
export interface PetCareController {
  config: PetCareConfig;
  logger: Logger;
  store: ApplianceStore;
  api: CloudApi;
  relay: RelaySession;
  orchestrator: DeviceOrchestrator;
}

/**
 * Initialization inputs
 */
export interface InitOptions {
  /** Supplies the session token for every cloud call */
  tokenProvider: TokenProvider;
  /** Values replacing the defaults in USER_CONFIG */
  overrides?: Partial<PetCareUserConfig>;
  /** Cloud API to use instead of the HTTP client */
  api?: CloudApi;
  /** Console used by the console sink (defaults to the global console) */
  consoleApi?: ConsoleAPI;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  timeSource?: () => TimestampSec;
  onPhase?: (id: ApplianceId, phase: SessionPhase) => void;
}
