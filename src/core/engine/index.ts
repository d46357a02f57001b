export * from './types.js';
export * from './lint.js';
