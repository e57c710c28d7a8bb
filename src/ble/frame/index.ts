export { buildFrame, parseFrame } from './frame';
export type { FrameConstants, ParsedFrame } from './types';
