/**
 * Unit tests for the relay availability resolver
 */

import { APP_CONSTANTS } from '@boot/config';
import { createLogger } from '@logging';
import type { LogSink } from '@logging';
import { createApplianceStore } from '@system/state/state';
import type { Appliance } from '$types';

import { decideRelay, isPollCoolingDown, resolveRelay } from './availability';
import type { RelayInputs } from './types';

const FOUNTAIN_ID = 42;

function makeAppliance(overrides: Partial<Appliance>): Appliance {
  return {
    id: 1,
    kind: 'feeder',
    model: 'd4',
    name: 'Relay feeder',
    typeCode: 1,
    pim: 1,
    ...overrides
  };
}

function inputs(overrides: Partial<RelayInputs> = {}): RelayInputs {
  return {
    hasRelay: true,
    candidates: [{ id: 7 }],
    roster: [makeAppliance({ id: 7, pim: 1 })],
    ...overrides
  };
}

function makeRecordingLogger(): { lines: string[]; logger: ReturnType<typeof createLogger> } {
  const lines: string[] = [];
  const sink: LogSink = {
    write: function(message: string) { lines.push(message); }
  };
  const logger = createLogger(
    { level: APP_CONSTANTS.LOG_LEVELS.DEBUG },
    { sinks: [{ sink: sink, minLevel: APP_CONSTANTS.LOG_LEVELS.DEBUG }] },
    APP_CONSTANTS.LOG_LEVELS
  );
  return { lines, logger };
}

describe('Relay availability', () => {
  // ═══════════════════════════════════════════════════════════════
  // decideRelay()
  // ═══════════════════════════════════════════════════════════════

  describe('decideRelay', () => {
    it('should report no relay when the candidate list is empty', () => {
      expect(decideRelay(inputs({ candidates: [] }), APP_CONSTANTS)).toEqual({ kind: 'NoRelayReported' });
    });

    it('should report no relay when the account has no relay', () => {
      expect(decideRelay(inputs({ hasRelay: false }), APP_CONSTANTS)).toEqual({ kind: 'NoRelayReported' });
    });

    it('should pick an online candidate', () => {
      const decision = decideRelay(inputs(), APP_CONSTANTS);

      expect(decision).toEqual({ kind: 'Available', relay: makeAppliance({ id: 7, pim: 1 }) });
    });

    it('should skip offline candidates for an online one', () => {
      const decision = decideRelay(inputs({
        candidates: [{ id: 7 }, { id: 8 }],
        roster: [makeAppliance({ id: 7, pim: 0 }), makeAppliance({ id: 8, pim: 1 })]
      }), APP_CONSTANTS);

      expect(decision.kind).toBe('Available');
      if (decision.kind === 'Available') {
        expect(decision.relay.id).toBe(8);
      }
    });

    it('should report the main relay offline', () => {
      const decision = decideRelay(inputs({ roster: [makeAppliance({ id: 7, pim: 0 })] }), APP_CONSTANTS);

      expect(decision).toEqual({ kind: 'MainOffline', relayId: 7, onBattery: false });
    });

    it('should flag a relay running on battery', () => {
      const decision = decideRelay(inputs({ roster: [makeAppliance({ id: 7, pim: 2 })] }), APP_CONSTANTS);

      expect(decision).toEqual({ kind: 'MainOffline', relayId: 7, onBattery: true });
    });

    it('should treat a candidate missing from the roster as offline', () => {
      const decision = decideRelay(inputs({ roster: [] }), APP_CONSTANTS);

      expect(decision).toEqual({ kind: 'MainOffline', relayId: 7, onBattery: false });
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // resolveRelay()
  // ═══════════════════════════════════════════════════════════════

  describe('resolveRelay', () => {
    it('should warn once while the relay stays unavailable', () => {
      const store = createApplianceStore();
      const { lines, logger } = makeRecordingLogger();

      resolveRelay(store, FOUNTAIN_ID, inputs({ candidates: [] }), APP_CONSTANTS, logger);
      resolveRelay(store, FOUNTAIN_ID, inputs({ candidates: [] }), APP_CONSTANTS, logger);
      resolveRelay(store, FOUNTAIN_ID, inputs({ roster: [] }), APP_CONSTANTS, logger);

      expect(lines).toEqual([
        '[WARNING]  [Relay] No relay reported for appliance 42; using latest cloud data'
      ]);
      expect(store.relay(FOUNTAIN_ID).missingRelayWarned).toBe(true);
    });

    it('should clear the warning flag when a relay is back', () => {
      const store = createApplianceStore();
      const { lines, logger } = makeRecordingLogger();

      resolveRelay(store, FOUNTAIN_ID, inputs({ roster: [makeAppliance({ id: 7, pim: 2 })] }), APP_CONSTANTS, logger);
      resolveRelay(store, FOUNTAIN_ID, inputs(), APP_CONSTANTS, logger);

      expect(lines).toEqual([
        '[WARNING]  [Relay] Main relay 7 is running on battery power; using latest cloud data',
        '[INFO]     [Relay] Relay 7 available again for appliance 42'
      ]);
      expect(store.relay(FOUNTAIN_ID).missingRelayWarned).toBe(false);
    });

    it('should warn again after a recovery', () => {
      const store = createApplianceStore();
      const { lines, logger } = makeRecordingLogger();

      resolveRelay(store, FOUNTAIN_ID, inputs({ roster: [] }), APP_CONSTANTS, logger);
      resolveRelay(store, FOUNTAIN_ID, inputs(), APP_CONSTANTS, logger);
      resolveRelay(store, FOUNTAIN_ID, inputs({ roster: [] }), APP_CONSTANTS, logger);

      expect(lines.filter((line) => line.startsWith('[WARNING]'))).toHaveLength(2);
    });

    it('should keep warnings per appliance', () => {
      const store = createApplianceStore();
      const { lines, logger } = makeRecordingLogger();

      resolveRelay(store, 1, inputs({ candidates: [] }), APP_CONSTANTS, logger);
      resolveRelay(store, 2, inputs({ candidates: [] }), APP_CONSTANTS, logger);

      expect(lines).toHaveLength(2);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // isPollCoolingDown()
  // ═══════════════════════════════════════════════════════════════

  describe('isPollCoolingDown', () => {
    it('should not block before the first successful poll', () => {
      expect(isPollCoolingDown({ lastSuccessfulPoll: null, missingRelayWarned: false }, 1000, 420)).toBe(false);
    });

    it('should block inside the cool-down', () => {
      expect(isPollCoolingDown({ lastSuccessfulPoll: 1000, missingRelayWarned: false }, 1419, 420)).toBe(true);
    });

    it('should allow once the cool-down has elapsed', () => {
      expect(isPollCoolingDown({ lastSuccessfulPoll: 1000, missingRelayWarned: false }, 1420, 420)).toBe(false);
      expect(isPollCoolingDown({ lastSuccessfulPoll: 1000, missingRelayWarned: false }, 1500, 420)).toBe(false);
    });
  });
});
