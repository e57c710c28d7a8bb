/**
 * Relay availability type definitions
 */

import type { Appliance, ApplianceId, PetCareAppConstants, RelayCandidate } from '$types';

/**
 * Inputs the resolver decides from
 */
export interface RelayInputs {
  /** Account-level relay flag from the roster */
  hasRelay: boolean;
  candidates: readonly RelayCandidate[];
  /** Current roster, used to read each candidate's power indicator */
  roster: readonly Appliance[];
}

export const RELAY_DECISIONS = {
  NO_RELAY_REPORTED: 'NoRelayReported',
  MAIN_OFFLINE: 'MainOffline',
  AVAILABLE: 'Available'
} as const;

/**
 * Whether a relay session may be opened
 */
export type RelayDecision =
  | { kind: typeof RELAY_DECISIONS.NO_RELAY_REPORTED }
  | { kind: typeof RELAY_DECISIONS.MAIN_OFFLINE; relayId: ApplianceId; onBattery: boolean }
  | { kind: typeof RELAY_DECISIONS.AVAILABLE; relay: Appliance };

/**
 * Power-indicator values that classify a relay
 */
export type RelayPimCodes = Pick<PetCareAppConstants, 'RELAY_PIM_ONLINE' | 'RELAY_PIM_BATTERY'>;
