export * from './types.js';
export * from './ordering.js';
