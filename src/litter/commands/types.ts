/**
 * Litter box command type definitions
 */

/**
 * Litter box command kinds
 */
export const LITTER_COMMANDS = {
  POWER: 'power',
  START_CLEAN: 'startClean',
  PAUSE_CLEAN: 'pauseClean',
  RESUME_CLEAN: 'resumeClean',
  ODOR_REMOVAL: 'odorRemoval',
  RESET_DEODORIZER: 'resetDeodorizer'
} as const;

export type LitterCommandKind = typeof LITTER_COMMANDS[keyof typeof LITTER_COMMANDS];

/**
 * Every command a litter box accepts over the plain cloud path
 */
export type LitterCommand =
  | { kind: 'power'; on: boolean }
  | { kind: 'startClean' }
  | { kind: 'pauseClean' }
  | { kind: 'resumeClean' }
  | { kind: 'odorRemoval' }
  | { kind: 'resetDeodorizer' };
