/**
 * Relay session state machine
 *
 * ## Business Context
 * The fountain has no network connection of its own. Another appliance on
 * the account relays BLE frames for it, driven through the cloud:
 * connect, poll, write frames, cancel. The relay link is asynchronous, so
 * frames are only written after a settle delay, and opening it too often
 * locks up the fountain firmware, hence the poll cool-down on refreshes.
 *
 * One session runs per appliance at a time; the frame sequence counter is
 * only touched inside that session and is back at 0 when it ends.
 */

import { assertCommandAllowed, commandCode, encodeCommand, encodeFrameString } from '@ble/codec';
import type { EncodedCommand, FountainCommand } from '@ble/codec';
import { isPollCoolingDown, RELAY_DECISIONS, resolveRelay } from '@ble/availability';
import type { RelayDecision } from '@ble/availability';
import { buildFrame } from '@ble/frame';
import { deriveRelayTypeCode } from '@cloud/client';
import { describeError } from '@logging';
import { BluetoothError, ControlError, CONTROL_ERROR_REASONS, isTransientRelayFailure } from '$types';
import type { ApplianceId, FountainSnapshot, RelayLink } from '$types';
import { createKeyedLock } from '@utils/lock';
import { now, sleep as realSleep } from '@utils/time';

import { runWithRetries } from './helpers';
import { REFRESH_PATHS, SESSION_PHASES } from './types';
import type {
  RefreshOutcome,
  RefreshPath,
  RelayContext,
  RelaySession,
  RelaySessionConfig,
  RelaySessionDependencies,
  SessionPhase
} from './types';

/**
 * Link state after connect and poll
 */
interface OpenedLink {
  connected: boolean;
  polled: boolean;
}

/**
 * Create the relay session state machine
 *
 * @param config - Retry, delay, cool-down and frame constants
 * @param dependencies - Transport, state store, logger and optional clock/sleep hooks
 * @returns Relay session
 *
 * @example
 * ```typescript
 * const relay = createRelaySession(CONFIG, { transport: client, store, logger });
 * const { snapshot } = await relay.refresh({ fountain, roster, hasRelay: true });
 * await relay.sendCommand({ fountain, roster, hasRelay: true }, { kind: 'smartMode' }, snapshot);
 * ```
 */
export function createRelaySession(
  config: RelaySessionConfig,
  dependencies: RelaySessionDependencies
): RelaySession {
  const { transport, store, logger } = dependencies;
  const sleep = dependencies.sleep ?? realSleep;
  const timeSource = dependencies.timeSource ?? now;
  const lock = createKeyedLock<ApplianceId>();
  const phases = new Map<ApplianceId, SessionPhase>();
  const sequences = new Map<ApplianceId, number>();

  function setPhase(id: ApplianceId, phase: SessionPhase): void {
    if (phases.get(id) === phase) {
      return;
    }
    phases.set(id, phase);
    dependencies.onPhase?.(id, phase);
  }

  function sequenceOf(id: ApplianceId): number {
    return sequences.get(id) ?? 0;
  }

  // ───────── RELAY RESOLUTION ─────────

  async function resolve(context: RelayContext, signal?: AbortSignal): Promise<RelayDecision> {
    setPhase(context.fountain.id, SESSION_PHASES.RESOLVING_RELAY);
    const candidates = context.hasRelay ? await transport.listRelayCandidates(signal) : [];

    return resolveRelay(
      store,
      context.fountain.id,
      { hasRelay: context.hasRelay, candidates: candidates, roster: context.roster },
      config,
      logger
    );
  }

  // ───────── LINK ─────────

  /**
   * Connect, then poll; `opened` records progress even when a step throws
   */
  async function openLink(
    id: ApplianceId,
    name: string,
    link: RelayLink,
    opened: OpenedLink,
    signal?: AbortSignal
  ): Promise<void> {
    const policy = { maxAttempts: config.RELAY_MAX_ATTEMPTS, delayMs: config.RELAY_RETRY_DELAY_MS, sleep: sleep };

    setPhase(id, SESSION_PHASES.CONNECTING);
    const connected = await runWithRetries(
      'Connect to ' + name,
      function() { return transport.connect(link, signal); },
      policy,
      logger,
      signal
    );
    if (!connected) {
      return;
    }
    opened.connected = true;

    setPhase(id, SESSION_PHASES.POLLING);
    const polled = await runWithRetries(
      'Poll ' + name,
      function() { return transport.poll(link, signal); },
      policy,
      logger,
      signal
    );

    opened.polled = polled;
  }

  async function closeLink(id: ApplianceId, name: string, link: RelayLink, signal?: AbortSignal): Promise<void> {
    setPhase(id, SESSION_PHASES.DISCONNECTING);
    if (!signal?.aborted) {
      try {
        await sleep(config.RELAY_SETTLE_DELAY_MS, signal);
      } catch (err) {
        logger.debug('[Relay] Settle before disconnect from ' + name + ' cut short: ' + describeError(err));
      }
    }
    // Still cancel after an abort; the cancel call gets no signal
    try {
      await transport.cancel(link);
    } catch (err) {
      logger.warning('[Relay] Disconnect from ' + name + ' failed: ' + describeError(err));
    }
    signal?.throwIfAborted();
  }

  // ───────── FRAMES ─────────

  async function sendFrame(id: ApplianceId, link: RelayLink, encoded: EncodedCommand, signal?: AbortSignal): Promise<void> {
    const sequence = sequenceOf(id);
    const frame = buildFrame(config, encoded.opcode, sequence, encoded.payload);
    sequences.set(id, (sequence + 1) % 256);

    await transport.sendControlFrame(
      { ...link, cmd: commandCode(encoded.opcode), data: encodeFrameString(frame) },
      signal
    );
  }

  async function sendHandshake(id: ApplianceId, link: RelayLink, signal?: AbortSignal): Promise<void> {
    if (sequenceOf(id) !== 0) {
      sequences.set(id, 1);
    }
    await sendFrame(id, link, encodeCommand({ kind: 'handshakeFirst' }, null, config.BLE_OPCODES), signal);
    await sendFrame(id, link, encodeCommand({ kind: 'handshakeSecond' }, null, config.BLE_OPCODES), signal);
  }

  function finish(id: ApplianceId): void {
    sequences.set(id, 0);
    setPhase(id, SESSION_PHASES.IDLE);
  }

  // ───────── REFRESH ─────────

  async function fallback(context: RelayContext, path: RefreshPath, signal?: AbortSignal): Promise<RefreshOutcome> {
    const snapshot = await transport.getFountain(context.fountain.id, signal);
    return { snapshot: snapshot, path: path, relayTypeCode: null };
  }

  async function runRefresh(context: RelayContext, signal?: AbortSignal): Promise<RefreshOutcome> {
    const { fountain } = context;
    const record = store.relay(fountain.id);

    if (isPollCoolingDown(record, timeSource(), config.RELAY_POLL_COOLDOWN_SEC)) {
      logger.debug('[Relay] ' + fountain.name + ' polled recently; using latest cloud data');
      return fallback(context, REFRESH_PATHS.COOLDOWN, signal);
    }

    const decision = await resolve(context, signal);
    if (decision.kind === RELAY_DECISIONS.NO_RELAY_REPORTED) {
      setPhase(fountain.id, SESSION_PHASES.IDLE);
      return fallback(context, REFRESH_PATHS.NO_RELAY, signal);
    }
    if (decision.kind === RELAY_DECISIONS.MAIN_OFFLINE) {
      setPhase(fountain.id, SESSION_PHASES.IDLE);
      return fallback(context, REFRESH_PATHS.MAIN_OFFLINE, signal);
    }

    const current = await transport.getFountain(fountain.id, signal);
    const relayTypeCode = deriveRelayTypeCode(decision.relay.typeCode, current.typeCode, config.RELAY_TYPE_CODE);
    const link: RelayLink = { bleId: fountain.id, mac: current.mac, type: relayTypeCode };

    const opened: OpenedLink = { connected: false, polled: false };
    try {
      await openLink(fountain.id, fountain.name, link, opened, signal);
      if (!opened.polled) {
        setPhase(fountain.id, SESSION_PHASES.FAILED);
        logger.warning('[Relay] BLE link to ' + fountain.name + ' failed; will try again on next refresh');
        return { snapshot: current, path: REFRESH_PATHS.LINK_FAILED, relayTypeCode: relayTypeCode };
      }

      store.relay(fountain.id).lastSuccessfulPoll = timeSource();
      await sleep(config.RELAY_SETTLE_DELAY_MS, signal);

      setPhase(fountain.id, SESSION_PHASES.HANDSHAKE_OR_COMMAND);
      const handshakeError = await sendHandshake(fountain.id, link, signal).then(
        function() { return null; },
        function(err: unknown) { return err; }
      );

      const fresh = await transport.getFountain(fountain.id, signal);

      if (handshakeError instanceof BluetoothError) {
        logger.debug('[Relay] Handshake with ' + fountain.name + ' failed: ' + describeError(handshakeError));
      } else if (handshakeError !== null) {
        throw handshakeError;
      }

      return { snapshot: fresh, path: REFRESH_PATHS.RELAY, relayTypeCode: relayTypeCode };
    } finally {
      if (opened.connected) {
        await closeLink(fountain.id, fountain.name, link, signal);
      }
    }
  }

  // ───────── COMMAND ─────────

  async function runCommand(
    context: RelayContext,
    command: FountainCommand,
    snapshot: FountainSnapshot,
    signal?: AbortSignal
  ): Promise<void> {
    const { fountain } = context;

    assertCommandAllowed(command, snapshot);
    const encoded = encodeCommand(command, snapshot, config.BLE_OPCODES);

    const decision = await resolve(context, signal);
    if (decision.kind !== RELAY_DECISIONS.AVAILABLE) {
      throw new ControlError(
        CONTROL_ERROR_REASONS.NO_RELAY_AVAILABLE,
        fountain.name + ' has no usable BLE relay (' + decision.kind + ')'
      );
    }

    const link: RelayLink = {
      bleId: fountain.id,
      mac: snapshot.mac,
      type: deriveRelayTypeCode(decision.relay.typeCode, snapshot.typeCode, config.RELAY_TYPE_CODE)
    };

    const opened: OpenedLink = { connected: false, polled: false };
    try {
      await openLink(fountain.id, fountain.name, link, opened, signal);
      if (!opened.polled) {
        setPhase(fountain.id, SESSION_PHASES.FAILED);
        throw new ControlError(
          CONTROL_ERROR_REASONS.BLUETOOTH_LINK_FAILED,
          'BLE link to ' + fountain.name + ' failed after ' + config.RELAY_MAX_ATTEMPTS + ' attempts'
        );
      }

      store.relay(fountain.id).lastSuccessfulPoll = timeSource();
      await sleep(config.RELAY_SETTLE_DELAY_MS, signal);

      setPhase(fountain.id, SESSION_PHASES.HANDSHAKE_OR_COMMAND);
      try {
        await sendFrame(fountain.id, link, encoded, signal);
      } catch (err) {
        if (isTransientRelayFailure(err)) {
          throw new ControlError(
            CONTROL_ERROR_REASONS.BLUETOOTH_LINK_FAILED,
            'Sending "' + command.kind + '" to ' + fountain.name + ' failed',
            { cause: err }
          );
        }
        throw err;
      }
      logger.info('[Relay] Sent "' + command.kind + '" to ' + fountain.name);
    } finally {
      if (opened.connected) {
        await closeLink(fountain.id, fountain.name, link, signal);
      }
    }
  }

  /**
   * Run a session body, leaving the appliance idle with its counter at 0
   */
  async function inSession<T>(id: ApplianceId, body: () => Promise<T>): Promise<T> {
    try {
      return await body();
    } finally {
      finish(id);
    }
  }

  return {
    refresh: function(context: RelayContext, signal?: AbortSignal): Promise<RefreshOutcome> {
      return lock.run(context.fountain.id, function() {
        return inSession(context.fountain.id, function() { return runRefresh(context, signal); });
      });
    },
    sendCommand: function(
      context: RelayContext,
      command: FountainCommand,
      snapshot: FountainSnapshot,
      signal?: AbortSignal
    ): Promise<void> {
      return lock.run(context.fountain.id, function() {
        return inSession(context.fountain.id, function() { return runCommand(context, command, snapshot, signal); });
      });
    },
    phaseOf: function(id: ApplianceId): SessionPhase {
      return phases.get(id) ?? SESSION_PHASES.IDLE;
    },
    sequenceOf: sequenceOf
  };
}
