export * from './config.js';
export * from './logger.js';
export * from './security-gate.js';
export * from './environment.js';
export * from './feature.js';
export * from './dispatch-sink.js';
export * from './store.js';
export * from './bridge-handler.js';
export * from './navigation-policy.js';
export * from './session.js';
export * from './presenter.js';
export * from './surface-server.js';
