/**
 * unitcheck - runs pluggable checkers over typed program units and
 * aggregates their diagnostics.
 * Main library exports barrel file.
 */

// Diagnostics
export * from './core/diagnostics/index.js';

// Program units and loaders
export * from './core/units/index.js';

// Suppression rules
export * from './core/suppression/index.js';

// Checker contract
export * from './core/checkers/index.js';

// Engine
export * from './core/engine/index.js';

// Reporting policy
export * from './core/report/index.js';

// Configuration
export * from './core/config/index.js';

// Bundled checkers
export * from './checkers/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export * from './cli/index.js';
export { createFormatter, TextFormatter, StylishFormatter, JsonFormatter } from './cli/formatters/index.js';
export type { IFormatter, FormatOptions, OutputFormat, ReportedDiagnostic } from './cli/formatters/index.js';
