/**
 * Diagnostic record shared by checkers, the engine and formatters.
 */

export interface Position {
  filename: string;
  /** 1-indexed */
  line: number;
  /** 1-indexed */
  column: number;
}

export interface Diagnostic {
  position: Position;
  message: string;
  /** Id of the checker that produced it, or `compiler` for synthesized ones */
  checker: string;
  /** Id of the individual check within the checker */
  check: string;
  /** Identity of the owning program unit, matched by suppression rules */
  unit: string;
  /** Set only when suppressed diagnostics are returned on request */
  suppressed: boolean;
}

/** Checker id of diagnostics synthesized from type-check errors. */
export const COMPILER_CHECKER = 'compiler';

/** Check id of diagnostics synthesized from type-check errors. */
export const COMPILE_CHECK = 'compile';
