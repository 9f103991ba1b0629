export * from './random-agent.js';
export * from './termination.js';
export * from './factory.js';
