/**
 * Formatter type definitions.
 */
import type { Diagnostic } from '../../core/diagnostics/types.js';
import type { ReportSummary, Severity } from '../../core/report/policy.js';

/**
 * Output format options.
 */
export type OutputFormat = 'text' | 'stylish' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'stylish', 'json'];

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Filenames are printed relative to this directory when inside it */
  cwd: string;
}

export interface ReportedDiagnostic extends Diagnostic {
  severity: Severity;
}

/**
 * Receives the final diagnostics one at a time. Returns the text to print,
 * or an empty string when nothing is due yet.
 */
export interface IFormatter {
  format(diagnostic: ReportedDiagnostic): string;

  /** End-of-run summary, for formatters that print one */
  stats?(summary: ReportSummary): string;
}
