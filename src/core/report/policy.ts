/**
 * Severity classification and exit policy.
 */
import type { Diagnostic } from '../diagnostics/types.js';
import type { CheckerRegistry } from '../checkers/types.js';
import type { ProgramUnit } from '../units/types.js';

export const ExitCodes = {
  SUCCESS: 0,
  /** Hard-classified diagnostics were found, or the run failed */
  FAILURE: 1,
  /** Invalid command line or project configuration */
  INVALID_CONFIG: 2,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

export type Severity = 'error' | 'warning';

export interface ReportSummary {
  total: number;
  errors: number;
  warnings: number;
}

/**
 * A diagnostic is an error when its checker is unregistered (the compiler,
 * for one) or registered as a hard failure.
 */
export function severityOf<U extends ProgramUnit>(
  diagnostic: Diagnostic,
  registry: CheckerRegistry<U>,
): Severity {
  const registration = registry.get(diagnostic.checker);
  return !registration || registration.hardFailure ? 'error' : 'warning';
}

export function summarize<U extends ProgramUnit>(
  diagnostics: readonly Diagnostic[],
  registry: CheckerRegistry<U>,
): ReportSummary {
  let errors = 0;
  let warnings = 0;
  for (const diagnostic of diagnostics) {
    if (severityOf(diagnostic, registry) === 'error') {
      errors++;
    } else {
      warnings++;
    }
  }
  return { total: diagnostics.length, errors, warnings };
}

/**
 * The run fails iff at least one diagnostic is an error, whatever the
 * number of warnings.
 */
export function exitCodeFor(summary: ReportSummary): ExitCode {
  return summary.errors > 0 ? ExitCodes.FAILURE : ExitCodes.SUCCESS;
}
