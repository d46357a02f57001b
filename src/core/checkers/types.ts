/**
 * Checker contract.
 *
 * A checker is one independent analysis pass over the well-typed units of a
 * run. It reads the units, never mutates them, and reports its findings as
 * data. Given the same units and config it returns the same diagnostics.
 */
import type { Diagnostic } from '../diagnostics/types.js';
import type { SuppressionRule } from '../suppression/types.js';
import type { ProgramUnit } from '../units/types.js';

/**
 * Per-run configuration handed to each checker. Every checker receives its
 * own frozen copy.
 */
export interface CheckerConfig {
  readonly tags: readonly string[];
  /** Minor version N of the target language version `1.N` */
  readonly targetVersion: number;
  readonly suppressions: readonly SuppressionRule[];
  readonly returnSuppressed: boolean;
}

export interface Checker<U extends ProgramUnit = ProgramUnit> {
  /** Stable identifier, also used as the `checker` field of diagnostics */
  readonly id: string;
  readonly name: string;
  readonly description: string;
  run(units: readonly U[], config: CheckerConfig): Diagnostic[] | Promise<Diagnostic[]>;
}

export interface CheckerRegistration<U extends ProgramUnit = ProgramUnit> {
  checker: Checker<U>;
  /** Findings of a hard-failure checker make the run fail */
  hardFailure: boolean;
}

export type CheckerRegistry<U extends ProgramUnit = ProgramUnit> = ReadonlyMap<string, CheckerRegistration<U>>;
