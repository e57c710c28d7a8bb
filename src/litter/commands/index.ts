export { toLitterAction, isLitterCommandKind, endsManualPause } from './commands';
export { LITTER_COMMANDS } from './types';
export type { LitterCommand, LitterCommandKind } from './types';
