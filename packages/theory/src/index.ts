export * from './errors.js';
export * from './pitchClass.js';
export * from './chord.js';
export * from './instrument.js';
export * from './presets.js';
