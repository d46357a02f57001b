/**
 * Engine input and output types.
 */
import type { Diagnostic } from '../diagnostics/types.js';

export interface RunOptions {
  /** Active build tags */
  tags: string[];
  /** Whether test sources are loaded */
  includeTests: boolean;
  /** Suppression rule text, see parseSuppressions */
  suppressions: string;
  /** Minor version N of the target language version `1.N` */
  targetVersion: number;
  /** Keep suppressed diagnostics, tagged, instead of dropping them */
  returnSuppressed: boolean;
}

export interface LintResult {
  /** Sorted, deduplicated diagnostics */
  diagnostics: Diagnostic[];
  /** Number of units handed to checkers */
  unitsChecked: number;
  /** Number of units that failed to type check */
  unitsFailed: number;
}
