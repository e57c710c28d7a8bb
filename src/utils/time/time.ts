/**
 * Time utility functions
 */

import { TIME_CONSTANTS } from '../constants';

/**
 * Get current Unix timestamp in seconds
 * @returns Current time in seconds since epoch
 */
export function now(): number {
  return Math.floor(Date.now() / TIME_CONSTANTS.MS_PER_SECOND);
}
