export * from './simulator.js';
export * from './logger.js';
