export * from './types.js';
export * from './partition.js';
export * from './compile-errors.js';
export { TsMorphUnitLoader, type TsUnit, type TsMorphUnitLoaderOptions } from './ts-loader.js';
