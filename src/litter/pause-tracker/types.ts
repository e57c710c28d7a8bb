/**
 * Manual pause tracker type definitions
 */

import type { TimestampSec } from '$types';

/**
 * Outcome of a lazy expiry check
 */
export interface PauseExpiryResult {
  /** True if this check ended the pause */
  expired: boolean;
  /** Pause state after the check */
  paused: boolean;
  pauseEndsAt: TimestampSec | null;
}
