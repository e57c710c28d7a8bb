/**
 * Manual pause tracker
 *
 * ## Business Context
 * A manual pause on a litter box suspends automatic cleaning for ten
 * minutes, after which the device resumes on its own and finishes the cycle.
 * The window tracked here is the device pause plus a cleaning margin.
 *
 * Nothing runs in the background: expiry is checked whenever the pause flag
 * is read or a command is about to be issued. An explicit resume clears the
 * pause immediately.
 */

import type { ApplianceId, TimestampSec } from '$types';
import type { ApplianceStore } from '@system/state/state';

import type { PauseExpiryResult } from './types';

/**
 * Record an explicit pause
 * @param store - Appliance state store
 * @param id - Litter box id
 * @param now - Current time in seconds
 * @param windowSec - Pause window length
 */
export function notePause(store: ApplianceStore, id: ApplianceId, now: TimestampSec, windowSec: number): void {
  const state = store.pause(id);
  state.paused = true;
  state.pauseEndsAt = now + windowSec;
}

/**
 * End the pause if its window has passed
 * @param store - Appliance state store
 * @param id - Litter box id
 * @param now - Current time in seconds
 * @returns Whether the pause ended now, and the resulting state
 */
export function checkExpiry(store: ApplianceStore, id: ApplianceId, now: TimestampSec): PauseExpiryResult {
  const state = store.pause(id);
  let expired = false;

  if (state.pauseEndsAt !== null && now >= state.pauseEndsAt) {
    state.paused = false;
    state.pauseEndsAt = null;
    expired = true;
  }

  return { expired: expired, paused: state.paused, pauseEndsAt: state.pauseEndsAt };
}

/**
 * Clear the pause regardless of its window (explicit resume or start succeeded)
 * @param store - Appliance state store
 * @param id - Litter box id
 */
export function clearPause(store: ApplianceStore, id: ApplianceId): void {
  const state = store.pause(id);
  state.paused = false;
  state.pauseEndsAt = null;
}

/**
 * Read the pause flag after applying expiry
 * @param store - Appliance state store
 * @param id - Litter box id
 * @param now - Current time in seconds
 * @returns True while a manual pause is active
 */
export function isPaused(store: ApplianceStore, id: ApplianceId, now: TimestampSec): boolean {
  return checkExpiry(store, id, now).paused;
}
