/**
 * Program units and the loader contract.
 *
 * A program unit is a compilable group of sources with resolved types. Units
 * are produced by a loader, are read-only for the rest of the run, and form
 * a dependency graph through `imports`.
 */
import { z } from 'zod';

export interface ProgramUnit {
  /** Hierarchical, path-like identity (e.g. `src/core/engine`) */
  readonly id: string;
  /** Absolute paths of the unit's source files */
  readonly files: readonly string[];
  /** Set by the loader when type checking failed for this unit */
  readonly illTyped: boolean;
  /**
   * Errors attached by the loader. Usually type-check errors, but the
   * loader may attach values of any shape; see TypeCheckErrorSchema.
   */
  readonly errors: readonly unknown[];
  /** Direct dependencies, in declaration order */
  readonly imports: readonly ProgramUnit[];
}

/**
 * The one error shape that is turned into a diagnostic.
 */
export const TypeCheckErrorSchema = z.object({
  position: z.object({
    filename: z.string(),
    line: z.number().int(),
    column: z.number().int(),
  }),
  message: z.string(),
});

export type TypeCheckError = z.infer<typeof TypeCheckErrorSchema>;

export interface LoadOptions {
  /** Active build tags */
  tags: readonly string[];
  /** Whether test sources are part of the units */
  includeTests: boolean;
}

/**
 * Front-end that parses and type checks sources.
 * Must reject when the requested paths cannot be resolved.
 */
export interface UnitLoader<U extends ProgramUnit = ProgramUnit> {
  load(paths: readonly string[], options: LoadOptions): Promise<U[]>;
}
