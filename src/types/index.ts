export * from './common';
export * from './appliance';
export * from './config';
export * from './errors';
