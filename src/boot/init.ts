/**
 * Controller initialization
 *
 * Validates the configuration, then wires the logger, cloud client, state
 * store, relay session and orchestrator together.
 */

import { createRelaySession } from '@ble/session';
import { createCloudClient } from '@cloud/client';
import { createConsoleSink, createLogger } from '@logging';
import type { SinkWithLevel } from '@logging';
import { createDeviceOrchestrator } from '@system/orchestrator';
import { createApplianceStore } from '@system/state/state';
import { ConfigValidationError } from '$types';
import { validateConfig } from '@validation';

import { buildConfig, USER_CONFIG } from './config';
import type { InitOptions, PetCareController } from './types';

/**
 * Build a controller
 *
 * @param options - Token provider and optional overrides or collaborators
 * @returns Wired controller
 * @throws ConfigValidationError if the merged user configuration is invalid
 *
 * @example
 * ```typescript
 * const controller = initialize({ tokenProvider: { getToken: async () => token } });
 * const state = await controller.orchestrator.refreshAll();
 * ```
 */
export function initialize(options: InitOptions): PetCareController {
  const config = buildConfig(options.overrides);

  const validation = validateConfig({ ...USER_CONFIG, ...options.overrides });
  if (!validation.valid) {
    throw new ConfigValidationError(validation.errors.map(function(err) { return err.message; }));
  }

  const sinks: SinkWithLevel[] = [];
  if (config.CONSOLE_ENABLED) {
    sinks.push({
      sink: createConsoleSink(options.consoleApi ?? console, {
        timestamps: config.CONSOLE_TIMESTAMPS,
        warnLevel: config.LOG_LEVELS.WARNING
      }),
      minLevel: config.CONSOLE_LOG_LEVEL
    });
  }

  const logger = createLogger({ level: config.GLOBAL_LOG_LEVEL }, { sinks: sinks }, config.LOG_LEVELS);

  for (const warning of validation.warnings) {
    logger.warning('[Config] ' + warning.message);
  }

  const store = createApplianceStore();
  const api = options.api ?? createCloudClient(config, options.tokenProvider);

  const relay = createRelaySession(config, {
    transport: api,
    store: store,
    logger: logger,
    sleep: options.sleep,
    timeSource: options.timeSource,
    onPhase: options.onPhase
  });

  const orchestrator = createDeviceOrchestrator(config, {
    api: api,
    relay: relay,
    store: store,
    logger: logger,
    timeSource: options.timeSource
  });

  logger.info('[Boot] Pet-care controller ready (region ' + config.REGION + ', cool-down ' + config.RELAY_POLL_COOLDOWN_SEC + 's)');

  return { config, logger, store, api, relay, orchestrator };
}
