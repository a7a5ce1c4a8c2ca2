export * from './types.js';
export * from './errors.js';
export * from './model.js';
export * from './difficulty.js';
export * from './search.js';
export * from './capo.js';
export * from './sequencer.js';
