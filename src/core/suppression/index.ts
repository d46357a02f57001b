export * from './types.js';
export * from './parser.js';
export * from './matcher.js';
