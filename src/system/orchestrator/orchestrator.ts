/**
 * Device orchestrator
 *
 * ## Business Context
 * The controlling application asks two things: "what is this appliance
 * doing" and "do this". Fountains are only reachable over the BLE relay, so
 * their reads and commands go through the relay session. Litter boxes,
 * feeders and purifiers are plain cloud calls, with the litter box's manual
 * pause tracked locally because the cloud does not report it.
 */

import type { RelayContext } from '@ble/session';
import { endsManualPause, toLitterAction } from '@litter/commands';
import type { LitterCommand } from '@litter/commands';
import { checkExpiry, clearPause, notePause } from '@litter/pause-tracker';
import { ControlError, CONTROL_ERROR_REASONS } from '$types';
import type { Appliance, ApplianceId, FountainSnapshot } from '$types';
import { createKeyedLock } from '@utils/lock';
import { isInteger } from '@utils/number';
import { now } from '@utils/time';

import { commandFamily, endedPaused, isFeederCommand, isFountainCommand, needsDualStageResume } from './helpers';
import type {
  ApplianceCommand,
  AppliancePublicState,
  DeviceOrchestrator,
  FeederCommand,
  LitterBoxState,
  OrchestratorConfig,
  OrchestratorDependencies,
  RosterState,
  UserFountainCommand
} from './types';

/**
 * Create the device orchestrator
 *
 * @param config - Pause window, dual-stage models and litter event constants
 * @param dependencies - Cloud API, relay session, state store and logger
 * @returns Orchestrator
 *
 * @example
 * ```typescript
 * const orchestrator = createDeviceOrchestrator(CONFIG, { api, relay, store, logger });
 * const { fountains } = await orchestrator.refreshAll();
 * ```
 */
export function createDeviceOrchestrator(
  config: OrchestratorConfig,
  dependencies: OrchestratorDependencies
): DeviceOrchestrator {
  const { api, relay, store, logger } = dependencies;
  const timeSource = dependencies.timeSource ?? now;
  const litterLock = createKeyedLock<ApplianceId>();
  const fountainCache = new Map<ApplianceId, FountainSnapshot>();

  async function loadRoster(signal?: AbortSignal): Promise<Appliance[]> {
    const result = await api.getRoster(signal);
    store.hasRelay = result.hasRelay;
    logger.debug('[Orchestrator] Roster: ' + result.appliances.length + ' appliances, relay ' + (result.hasRelay ? 'yes' : 'no'));
    return result.appliances;
  }

  /**
   * Relay availability follows the relay's current power indicator, so the
   * roster is read again unless the caller has just read it
   */
  async function relayContext(fountain: Appliance, roster: Appliance[] | null, signal?: AbortSignal): Promise<RelayContext> {
    const appliances = roster ?? await loadRoster(signal);
    return { fountain: fountain, roster: appliances, hasRelay: store.hasRelay };
  }

  function refusal(message: string): ControlError {
    return new ControlError(CONTROL_ERROR_REASONS.INVALID_COMMAND_FOR_STATE, message);
  }

  // ───────── REFRESH ─────────

  function litterPauseState(appliance: Appliance): Pick<LitterBoxState, 'manuallyPaused' | 'pauseEndsAt'> {
    const result = checkExpiry(store, appliance.id, timeSource());
    if (result.expired) {
      logger.info('[Pause] Manual pause on ' + appliance.name + ' has ended');
    }
    return { manuallyPaused: result.paused, pauseEndsAt: result.pauseEndsAt };
  }

  async function readAppliance(
    appliance: Appliance,
    roster: Appliance[] | null,
    signal?: AbortSignal
  ): Promise<AppliancePublicState> {
    switch (appliance.kind) {
      case 'fountain': {
        const outcome = await relay.refresh(await relayContext(appliance, roster, signal), signal);
        fountainCache.set(appliance.id, outcome.snapshot);
        return { kind: 'fountain', appliance: appliance, snapshot: outcome.snapshot, path: outcome.path };
      }
      case 'litterBox': {
        const detail = await api.getDeviceDetail(appliance, signal);
        return { kind: 'litterBox', appliance: appliance, detail: detail, ...litterPauseState(appliance) };
      }
      case 'feeder':
        return { kind: 'feeder', appliance: appliance, detail: await api.getDeviceDetail(appliance, signal) };
      case 'purifier':
        return { kind: 'purifier', appliance: appliance, detail: await api.getDeviceDetail(appliance, signal) };
      default: {
        const unhandled: never = appliance.kind;
        throw new Error('Unhandled appliance kind: ' + String(unhandled));
      }
    }
  }

  function refresh(appliance: Appliance, signal?: AbortSignal): Promise<AppliancePublicState> {
    return readAppliance(appliance, null, signal);
  }

  async function refreshAll(signal?: AbortSignal): Promise<RosterState> {
    const appliances = await loadRoster(signal);
    const states = await Promise.all(appliances.map(function(appliance) { return readAppliance(appliance, appliances, signal); }));

    const result: RosterState = {
      fountains: new Map(),
      feeders: new Map(),
      litterBoxes: new Map(),
      purifiers: new Map()
    };

    for (const state of states) {
      const id = state.appliance.id;
      switch (state.kind) {
        case 'fountain':
          result.fountains.set(id, state);
          break;
        case 'feeder':
          result.feeders.set(id, state);
          break;
        case 'litterBox':
          result.litterBoxes.set(id, state);
          break;
        case 'purifier':
          result.purifiers.set(id, state);
          break;
      }
    }

    return result;
  }

  // ───────── COMMANDS ─────────

  async function sendFountainCommand(
    appliance: Appliance,
    command: UserFountainCommand,
    signal?: AbortSignal
  ): Promise<void> {
    const snapshot = fountainCache.get(appliance.id) ?? await api.getFountain(appliance.id, signal);
    await relay.sendCommand(await relayContext(appliance, null, signal), command, snapshot, signal);
    // Mode and settings have changed; the next command reads them again
    fountainCache.delete(appliance.id);
  }

  async function runLitterCommand(appliance: Appliance, command: LitterCommand, signal?: AbortSignal): Promise<void> {
    const { paused } = checkExpiry(store, appliance.id, timeSource());

    if (command.kind === 'pauseClean' && paused) {
      throw refusal(appliance.name + ' is already manually paused');
    }

    if (command.kind === 'resumeClean' && needsDualStageResume(appliance.model, config)) {
      await api.controlLitterBox(appliance, toLitterAction({ kind: 'startClean' }), signal);
      const event = await api.getLatestLitterEvent(appliance, signal);
      if (endedPaused(event, config)) {
        await api.controlLitterBox(appliance, toLitterAction(command), signal);
      }
    } else {
      await api.controlLitterBox(appliance, toLitterAction(command), signal);
    }

    if (command.kind === 'pauseClean') {
      notePause(store, appliance.id, timeSource(), config.MANUAL_PAUSE_WINDOW_SEC);
      logger.info('[Pause] ' + appliance.name + ' paused for ' + config.MANUAL_PAUSE_WINDOW_SEC + 's');
    } else if (endsManualPause(command)) {
      clearPause(store, appliance.id);
      if (paused) {
        logger.info('[Pause] ' + appliance.name + ' resumed');
      }
    }
  }

  async function sendFeederCommand(appliance: Appliance, command: FeederCommand, signal?: AbortSignal): Promise<void> {
    switch (command.kind) {
      case 'manualFeed':
        if (!isInteger(command.amountGrams) || command.amountGrams <= 0) {
          throw refusal('Feed amount must be a positive whole number of grams (got ' + command.amountGrams + ')');
        }
        await api.manualFeed(appliance, command.amountGrams, signal);
        break;
      case 'cancelManualFeed':
        if (appliance.model === config.MINI_FEEDER_MODEL) {
          throw refusal(appliance.name + ' cannot cancel a manual feed');
        }
        await api.cancelManualFeed(appliance, signal);
        break;
      case 'resetDesiccant':
        await api.resetDesiccant(appliance, signal);
        break;
      case 'updateFeederSetting':
        if (!isInteger(command.value) || command.value < 0) {
          throw refusal('Setting "' + command.setting + '" needs a whole number of 0 or more (got ' + command.value + ')');
        }
        await api.updateFeederSetting(appliance, command.setting, command.value, signal);
        break;
      default: {
        const unhandled: never = command;
        throw new Error('Unhandled feeder command: ' + JSON.stringify(unhandled));
      }
    }
  }

  async function sendCommand(appliance: Appliance, command: ApplianceCommand, signal?: AbortSignal): Promise<void> {
    const family = commandFamily(command);
    if (family !== appliance.kind) {
      throw refusal('Command "' + command.kind + '" does not apply to ' + appliance.kind + ' ' + appliance.name);
    }

    if (isFountainCommand(command)) {
      await sendFountainCommand(appliance, command, signal);
    } else if (isFeederCommand(command)) {
      await sendFeederCommand(appliance, command, signal);
    } else {
      const litterCommand = command;
      await litterLock.run(appliance.id, function() { return runLitterCommand(appliance, litterCommand, signal); });
    }

    logger.debug('[Orchestrator] "' + command.kind + '" done for ' + appliance.name);
  }

  return {
    refresh: refresh,
    refreshAll: refreshAll,
    sendCommand: sendCommand
  };
}
