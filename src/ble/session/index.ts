export { createRelaySession } from './session';
export { runWithRetries } from './helpers';
export type { RetryPolicy } from './helpers';
export { SESSION_PHASES, REFRESH_PATHS } from './types';
export type {
  SessionPhase,
  RefreshPath,
  RelaySessionConfig,
  RelaySessionDependencies,
  RelayContext,
  RefreshOutcome,
  RelaySession
} from './types';
