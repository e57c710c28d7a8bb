/**
 * Litter box command mapping
 *
 * Each command becomes a `(key, type, value)` triple for the control
 * endpoint. Odor removal and deodorizer reset ride on the start action with
 * their own values.
 */

import type { LitterAction } from '$types';

import { LITTER_COMMANDS } from './types';
import type { LitterCommand, LitterCommandKind } from './types';

/**
 * Map a command to its control triple
 * @param command - Litter box command
 * @returns Action posted to the control endpoint
 *
 * @example
 * ```typescript
 * toLitterAction({ kind: 'odorRemoval' }); // { key: 'start_action', type: 'start', value: 2 }
 * ```
 */
export function toLitterAction(command: LitterCommand): LitterAction {
  switch (command.kind) {
    case 'power':
      return { key: 'power_action', type: 'power', value: command.on ? 1 : 0 };
    case 'startClean':
      return { key: 'start_action', type: 'start', value: 0 };
    case 'pauseClean':
      return { key: 'stop_action', type: 'stop', value: 0 };
    case 'resumeClean':
      return { key: 'continue_action', type: 'continue', value: 0 };
    case 'odorRemoval':
      return { key: 'start_action', type: 'start', value: 2 };
    case 'resetDeodorizer':
      return { key: 'start_action', type: 'start', value: 6 };
    default: {
      const unhandled: never = command;
      throw new Error('Unhandled litter command: ' + JSON.stringify(unhandled));
    }
  }
}

const KINDS: readonly string[] = Object.values(LITTER_COMMANDS);

/**
 * Check whether a command kind belongs to the litter box family
 * @param kind - Command kind
 * @returns True for litter box kinds
 */
export function isLitterCommandKind(kind: string): kind is LitterCommandKind {
  return KINDS.includes(kind);
}

/**
 * Check whether a command ends a manual pause once it succeeds
 * @param command - Litter box command
 * @returns True for start and resume
 */
export function endsManualPause(command: LitterCommand): boolean {
  return command.kind === 'startClean' || command.kind === 'resumeClean';
}
