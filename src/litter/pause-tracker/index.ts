export { notePause, checkExpiry, clearPause, isPaused } from './pause-tracker';
export type { PauseExpiryResult } from './types';
