/**
 * Appliance state store
 *
 * Records live for the life of the process and are keyed by appliance id.
 * Callers mutate the returned records in place.
 */

import type { ApplianceId } from '$types';

import type { ApplianceStore, ManualPauseState, RelayAvailabilityRecord } from './types';

export * from './types';

/**
 * Create an empty store
 * @returns Store with no appliances and no relay reported
 *
 * @example
 * ```typescript
 * const store = createApplianceStore();
 * store.relay(42).lastSuccessfulPoll = now();
 * ```
 */
export function createApplianceStore(): ApplianceStore {
  const relays = new Map<ApplianceId, RelayAvailabilityRecord>();
  const pauses = new Map<ApplianceId, ManualPauseState>();

  return {
    hasRelay: false,

    relay: function(id: ApplianceId): RelayAvailabilityRecord {
      let record = relays.get(id);
      if (record === undefined) {
        record = { lastSuccessfulPoll: null, missingRelayWarned: false };
        relays.set(id, record);
      }
      return record;
    },

    pause: function(id: ApplianceId): ManualPauseState {
      let state = pauses.get(id);
      if (state === undefined) {
        state = { paused: false, pauseEndsAt: null };
        pauses.set(id, state);
      }
      return state;
    }
  };
}
