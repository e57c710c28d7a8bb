/**
 * Relay session type definitions
 */

import type { FountainCommand } from '@ble/codec';
import type { RelayTransport } from '@cloud/client';
import type { Logger } from '@logging';
import type { ApplianceStore } from '@system/state/state';
import type { Appliance, ApplianceId, FountainSnapshot, PetCareConfig, TimestampSec } from '$types';

/**
 * Session phases
 *
 * idle → resolvingRelay → connecting → polling → handshakeOrCommand → disconnecting → idle
 * A failed connect or poll passes through `failed` on its way back to idle.
 */
export const SESSION_PHASES = {
  IDLE: 'idle',
  RESOLVING_RELAY: 'resolvingRelay',
  CONNECTING: 'connecting',
  POLLING: 'polling',
  HANDSHAKE_OR_COMMAND: 'handshakeOrCommand',
  DISCONNECTING: 'disconnecting',
  FAILED: 'failed'
} as const;

export type SessionPhase = typeof SESSION_PHASES[keyof typeof SESSION_PHASES];

/**
 * How a refresh obtained its data
 */
export const REFRESH_PATHS = {
  RELAY: 'relay',
  COOLDOWN: 'cooldown',
  NO_RELAY: 'noRelay',
  MAIN_OFFLINE: 'mainOffline',
  LINK_FAILED: 'linkFailed'
} as const;

export type RefreshPath = typeof REFRESH_PATHS[keyof typeof REFRESH_PATHS];

/**
 * Configuration slice the session reads
 */
export type RelaySessionConfig = Pick<
  PetCareConfig,
  | 'RELAY_MAX_ATTEMPTS'
  | 'RELAY_RETRY_DELAY_MS'
  | 'RELAY_SETTLE_DELAY_MS'
  | 'RELAY_POLL_COOLDOWN_SEC'
  | 'RELAY_TYPE_CODE'
  | 'RELAY_PIM_ONLINE'
  | 'RELAY_PIM_BATTERY'
  | 'BLE_HEADER'
  | 'BLE_MARKER'
  | 'BLE_TERMINATOR'
  | 'BLE_OPCODES'
>;

/**
 * Session collaborators
 */
export interface RelaySessionDependencies {
  transport: RelayTransport;
  store: ApplianceStore;
  logger: Logger;
  /** Real wait used for retry and settle delays */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Current time in seconds */
  timeSource?: () => TimestampSec;
  /** Called on every phase change */
  onPhase?: (id: ApplianceId, phase: SessionPhase) => void;
}

/**
 * What a session needs to know about the fountain and its account
 */
export interface RelayContext {
  fountain: Appliance;
  /** Current roster, used to find the relay's power indicator and type code */
  roster: readonly Appliance[];
  hasRelay: boolean;
}

/**
 * Result of a refresh
 */
export interface RefreshOutcome {
  snapshot: FountainSnapshot;
  path: RefreshPath;
  /** Relay type code used, null when no session was opened */
  relayTypeCode: number | null;
}

/**
 * Relay session state machine, one session slot per appliance
 */
export interface RelaySession {
  /**
   * Read the fountain, priming it through the relay when allowed
   *
   * Falls back to the latest cloud data during the poll cool-down, when no
   * relay is usable, or when the link cannot be opened.
   */
  refresh(context: RelayContext, signal?: AbortSignal): Promise<RefreshOutcome>;
  /**
   * Send one command through the relay
   * @throws ControlError for a refused command, no usable relay, or a failed link
   */
  sendCommand(
    context: RelayContext,
    command: FountainCommand,
    snapshot: FountainSnapshot,
    signal?: AbortSignal
  ): Promise<void>;
  phaseOf(id: ApplianceId): SessionPhase;
  /** Frame sequence counter; 0 whenever no session is running */
  sequenceOf(id: ApplianceId): number;
}
