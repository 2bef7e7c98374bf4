export * from './page-bridge.js';
