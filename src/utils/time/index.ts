export { now } from './time';
export { sleep } from './helpers';
