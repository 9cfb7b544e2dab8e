export * from './fingerprint.js';
export * from './parsing-state.js';
export * from './fetch-controller.js';
export * from './run-logger.js';
export * from './orchestrator.js';
