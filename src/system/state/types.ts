/**
 * Per-appliance process-lifetime state
 */

import type { ApplianceId, TimestampSec } from '$types';

/**
 * Relay bookkeeping for one appliance
 */
export interface RelayAvailabilityRecord {
  /** Time of the last poll the relay acknowledged, null before the first one */
  lastSuccessfulPoll: TimestampSec | null;
  /** Set once the "relay unavailable" warning has been logged, cleared when a relay is back */
  missingRelayWarned: boolean;
}

/**
 * Manual pause bookkeeping for one litter box
 * `pauseEndsAt` is non-null exactly when `paused` is true
 */
export interface ManualPauseState {
  paused: boolean;
  pauseEndsAt: TimestampSec | null;
}

/**
 * Store owned by the orchestrator and passed to the relay and pause components
 */
export interface ApplianceStore {
  /** Relay record for `id`, created on first access */
  relay(id: ApplianceId): RelayAvailabilityRecord;
  /** Pause state for `id`, created unpaused on first access */
  pause(id: ApplianceId): ManualPauseState;
  /** Account-level relay flag from the last roster read */
  hasRelay: boolean;
}
