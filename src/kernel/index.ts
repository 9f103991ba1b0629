export * from './types.js';
export * from './player.js';
export * from './point.js';
export * from './move.js';
export * from './geometry.js';
export * from './group.js';
export * from './zobrist.js';
export * from './board.js';
export * from './scoring.js';
export * from './situation-history.js';
export * from './turn-order.js';
export * from './schemas.js';
export * from './game-state.js';
export * from './notation.js';
export * from './eyes.js';
export * from './prng.js';
export * from './runtime-error.js';
