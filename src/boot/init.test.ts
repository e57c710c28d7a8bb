/**
 * Tests for controller initialization
 */

import type { CloudApi } from '@cloud/client';
import { ConfigValidationError } from '$types';

import { initialize } from './init';

const tokenProvider = { getToken: async () => 'test-token' };

function makeConsole() {
  return { log: vi.fn(), warn: vi.fn() };
}

function makeApi(): CloudApi {
  return {
    getRoster: vi.fn().mockResolvedValue({ hasRelay: true, appliances: [] }),
    getDeviceDetail: vi.fn(),
    controlLitterBox: vi.fn(),
    getLatestLitterEvent: vi.fn(),
    manualFeed: vi.fn(),
    resetDesiccant: vi.fn(),
    cancelManualFeed: vi.fn(),
    updateFeederSetting: vi.fn(),
    listRelayCandidates: vi.fn(),
    connect: vi.fn(),
    poll: vi.fn(),
    cancel: vi.fn(),
    sendControlFrame: vi.fn(),
    getFountain: vi.fn()
  };
}

describe('initialize', () => {
  it('should wire a controller and announce it', () => {
    const consoleApi = makeConsole();

    const controller = initialize({ tokenProvider, consoleApi, overrides: { CONSOLE_TIMESTAMPS: false } });

    expect(controller.config.RELAY_POLL_COOLDOWN_SEC).toBe(420);
    expect(controller.relay.phaseOf(42)).toBe('idle');
    expect(consoleApi.log).toHaveBeenCalledWith('[INFO]     [Boot] Pet-care controller ready (region US, cool-down 420s)');
  });

  it('should apply overrides to the merged configuration', () => {
    const controller = initialize({
      tokenProvider,
      consoleApi: makeConsole(),
      overrides: { REGION: 'CN', RELAY_TYPE_CODE: 14 }
    });

    expect(controller.config.REGION).toBe('CN');
    expect(controller.config.RELAY_TYPE_CODE).toBe(14);
  });

  it('should refuse an invalid configuration', () => {
    const consoleApi = makeConsole();

    let caught: unknown = null;
    try {
      initialize({ tokenProvider, consoleApi, overrides: { RELAY_MAX_ATTEMPTS: 0 } });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    expect(caught).toMatchObject({ problems: ['RELAY_MAX_ATTEMPTS must be between 1 and 10 (got 0)'] });
    expect(consoleApi.log).not.toHaveBeenCalled();
  });

  it('should log configuration warnings', () => {
    const consoleApi = makeConsole();

    initialize({ tokenProvider, consoleApi, overrides: { CONSOLE_TIMESTAMPS: false, RELAY_MAX_ATTEMPTS: 6 } });

    expect(consoleApi.warn).toHaveBeenCalledWith(
      '[WARNING]  [Config] RELAY_MAX_ATTEMPTS is outside recommended range 3-5 (got 6)'
    );
  });

  it('should stay quiet with the console disabled', () => {
    const consoleApi = makeConsole();

    initialize({ tokenProvider, consoleApi, overrides: { CONSOLE_ENABLED: false } });

    expect(consoleApi.log).not.toHaveBeenCalled();
    expect(consoleApi.warn).not.toHaveBeenCalled();
  });

  it('should route the orchestrator through an injected API', async () => {
    const api = makeApi();
    const controller = initialize({ tokenProvider, api, consoleApi: makeConsole() });

    const result = await controller.orchestrator.refreshAll();

    expect(api.getRoster).toHaveBeenCalledTimes(1);
    expect(controller.store.hasRelay).toBe(true);
    expect(result.fountains.size).toBe(0);
  });
});
