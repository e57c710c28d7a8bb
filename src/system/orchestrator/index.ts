export { createDeviceOrchestrator } from './orchestrator';
export { commandFamily, needsDualStageResume, endedPaused } from './helpers';
export type {
  UserFountainCommand,
  FeederCommand,
  ApplianceCommand,
  OrchestratorConfig,
  OrchestratorDependencies,
  FountainState,
  LitterBoxState,
  FeederState,
  PurifierState,
  AppliancePublicState,
  RosterState,
  DeviceOrchestrator
} from './types';
