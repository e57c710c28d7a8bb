/**
 * Device orchestrator helpers
 */

import { FOUNTAIN_COMMANDS } from '@ble/codec';
import { isLitterCommandKind } from '@litter/commands';
import type { LitterCommand } from '@litter/commands';
import type { ApplianceKind, LitterEventRecord } from '$types';

import type { ApplianceCommand, FeederCommand, OrchestratorConfig, UserFountainCommand } from './types';

const FOUNTAIN_KINDS: readonly string[] = Object.values(FOUNTAIN_COMMANDS);
const FEEDER_KINDS: readonly string[] = ['manualFeed', 'cancelManualFeed', 'resetDesiccant', 'updateFeederSetting'] satisfies FeederCommand['kind'][];

export function isFountainCommand(command: ApplianceCommand): command is UserFountainCommand {
  return FOUNTAIN_KINDS.includes(command.kind);
}

export function isLitterCommand(command: ApplianceCommand): command is LitterCommand {
  return isLitterCommandKind(command.kind);
}

export function isFeederCommand(command: ApplianceCommand): command is FeederCommand {
  return FEEDER_KINDS.includes(command.kind);
}

/**
 * Appliance family a command is meant for
 * @param command - Command
 * @returns Family
 */
export function commandFamily(command: ApplianceCommand): ApplianceKind {
  if (isFountainCommand(command)) {
    return 'fountain';
  }
  if (isLitterCommand(command)) {
    return 'litterBox';
  }
  return 'feeder';
}

/**
 * Check whether a litter box model needs START followed by RESUME to leave a pause
 * @param model - Lower-cased model
 * @param config - Orchestrator config
 * @returns True for dual-stage models
 */
export function needsDualStageResume(model: string, config: OrchestratorConfig): boolean {
  return config.DUAL_STAGE_RESUME_MODELS.includes(model);
}

/**
 * Check whether the latest event says a cleaning cycle ended in the paused state
 * @param event - Latest event, or null when the device reported none
 * @param config - Orchestrator config
 * @returns True when the resume leg must follow
 */
export function endedPaused(event: LitterEventRecord | null, config: OrchestratorConfig): boolean {
  return event !== null &&
    event.eventType === config.LITTER_EVENT_CLEAN_OVER &&
    event.result === config.LITTER_RESULT_PAUSED;
}
