/**
 * Relay availability resolver
 *
 * Decides whether a relay session can be opened for an appliance and keeps
 * the per-appliance warning flag so an unavailable relay is reported once,
 * not on every refresh.
 */

import type { Logger } from '@logging';
import type { ApplianceId, TimestampSec } from '$types';
import type { ApplianceStore, RelayAvailabilityRecord } from '@system/state/state';

import { RELAY_DECISIONS } from './types';
import type { RelayDecision, RelayInputs, RelayPimCodes } from './types';

/**
 * Classify relay availability
 *
 * Pure. A relay is usable when some candidate is listed in the roster with
 * the online power indicator. Otherwise the first candidate is reported
 * offline, flagged when it runs on battery.
 *
 * @param inputs - Relay flag, candidates and roster
 * @param pim - Power-indicator codes
 * @returns Decision
 */
export function decideRelay(inputs: RelayInputs, pim: RelayPimCodes): RelayDecision {
  const first = inputs.candidates[0];
  if (!inputs.hasRelay || first === undefined) {
    return { kind: RELAY_DECISIONS.NO_RELAY_REPORTED };
  }

  for (const candidate of inputs.candidates) {
    const relay = inputs.roster.find(function(appliance) { return appliance.id === candidate.id; });
    if (relay !== undefined && relay.pim === pim.RELAY_PIM_ONLINE) {
      return { kind: RELAY_DECISIONS.AVAILABLE, relay: relay };
    }
  }

  const firstEntry = inputs.roster.find(function(appliance) { return appliance.id === first.id; });
  return {
    kind: RELAY_DECISIONS.MAIN_OFFLINE,
    relayId: first.id,
    onBattery: firstEntry !== undefined && firstEntry.pim === pim.RELAY_PIM_BATTERY
  };
}

function describeUnavailable(
  decision: Exclude<RelayDecision, { kind: typeof RELAY_DECISIONS.AVAILABLE }>,
  applianceId: ApplianceId
): string {
  switch (decision.kind) {
    case RELAY_DECISIONS.NO_RELAY_REPORTED:
      return 'No relay reported for appliance ' + applianceId + '; using latest cloud data';
    case RELAY_DECISIONS.MAIN_OFFLINE:
      return decision.onBattery
        ? 'Main relay ' + decision.relayId + ' is running on battery power; using latest cloud data'
        : 'Main relay ' + decision.relayId + ' is offline; using latest cloud data';
    default: {
      const unhandled: never = decision;
      return String(unhandled);
    }
  }
}

/**
 * Decide and update the warning flag
 *
 * Logs a warning the first time the relay is unavailable for an appliance
 * and stays quiet until a relay is available again.
 *
 * @param store - Appliance state store
 * @param applianceId - Appliance the session is for
 * @param inputs - Relay flag, candidates and roster
 * @param pim - Power-indicator codes
 * @param logger - Logger
 * @returns Decision
 */
export function resolveRelay(
  store: ApplianceStore,
  applianceId: ApplianceId,
  inputs: RelayInputs,
  pim: RelayPimCodes,
  logger: Logger
): RelayDecision {
  const decision = decideRelay(inputs, pim);
  const record = store.relay(applianceId);

  if (decision.kind === RELAY_DECISIONS.AVAILABLE) {
    if (record.missingRelayWarned) {
      logger.info('[Relay] Relay ' + decision.relay.id + ' available again for appliance ' + applianceId);
      record.missingRelayWarned = false;
    }
    return decision;
  }

  if (!record.missingRelayWarned) {
    logger.warning('[Relay] ' + describeUnavailable(decision, applianceId));
    record.missingRelayWarned = true;
  }

  return decision;
}

/**
 * Check the poll cool-down
 * @param record - Relay record of the appliance
 * @param now - Current time in seconds
 * @param cooldownSec - Minimum seconds between successful polls
 * @returns True while a refresh must not open a relay session
 */
export function isPollCoolingDown(record: RelayAvailabilityRecord, now: TimestampSec, cooldownSec: number): boolean {
  if (record.lastSuccessfulPoll === null) {
    return false;
  }
  return now - record.lastSuccessfulPoll < cooldownSec;
}
