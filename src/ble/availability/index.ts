export { decideRelay, resolveRelay, isPollCoolingDown } from './availability';
export { RELAY_DECISIONS } from './types';
export type { RelayInputs, RelayDecision, RelayPimCodes } from './types';
