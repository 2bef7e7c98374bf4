export * from './types/bridge.js';
export * from './types/errors.js';
export * from './constants.js';
export * from './schemas.js';
export * from './message.js';
export * from './callback-name.js';
