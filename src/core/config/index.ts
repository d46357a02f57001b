export * from './schema.js';
export * from './version.js';
export * from './loader.js';
