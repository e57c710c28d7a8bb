export { createKeyedLock } from './keyed-lock';
export type { KeyedLock } from './keyed-lock';
