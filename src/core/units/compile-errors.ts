/**
 * Turn the type-check failures of ill-typed units into diagnostics.
 */
import { COMPILE_CHECK, COMPILER_CHECKER, type Diagnostic } from '../diagnostics/types.js';
import { logger } from '../../utils/logger.js';
import { TypeCheckErrorSchema, type ProgramUnit } from './types.js';
import { createIllTypedPredicate, type IllTypedPredicate } from './partition.js';

/**
 * Synthesize diagnostics for an ill-typed unit.
 *
 * A unit with explicit errors yields one diagnostic per recognised error.
 * A unit without any (transitively ill-typed) yields the diagnostics of its
 * ill-typed dependencies, in import order. A unit with neither yields
 * nothing. Errors of an unrecognised shape are logged and skipped.
 */
export function synthesizeCompileErrors(
  unit: ProgramUnit,
  isIllTyped: IllTypedPredicate = createIllTypedPredicate(),
  visited: Set<string> = new Set(),
): Diagnostic[] {
  if (visited.has(unit.id)) {
    return [];
  }
  visited.add(unit.id);

  if (unit.errors.length === 0) {
    const diagnostics: Diagnostic[] = [];
    for (const dep of unit.imports) {
      if (isIllTyped(dep)) {
        diagnostics.push(...synthesizeCompileErrors(dep, isIllTyped, visited));
      }
    }
    return diagnostics;
  }

  const diagnostics: Diagnostic[] = [];
  for (const error of unit.errors) {
    const parsed = TypeCheckErrorSchema.safeParse(error);
    if (!parsed.success) {
      logger.warn(`internal error: unhandled error value attached to unit ${unit.id}`, {
        unit: unit.id,
        error: describeUnknown(error),
      });
      continue;
    }

    diagnostics.push({
      position: { ...parsed.data.position },
      message: parsed.data.message,
      checker: COMPILER_CHECKER,
      check: COMPILE_CHECK,
      unit: unit.id,
      suppressed: false,
    });
  }
  return diagnostics;
}

function describeUnknown(value: unknown): string {
  if (value instanceof Error) {
    return `${value.name}: ${value.message}`;
  }
  if (value === null) {
    return 'null';
  }
  if (typeof value !== 'object') {
    return `${typeof value} ${String(value)}`;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}
