/**
 * Split a loaded unit graph into units that checkers may see and units that
 * only contribute compile errors.
 */
import type { ProgramUnit } from './types.js';

export interface UnitPartition<U extends ProgramUnit> {
  wellTyped: U[];
  illTyped: U[];
}

export type IllTypedPredicate = (unit: ProgramUnit) => boolean;

/**
 * Build a memoised predicate telling whether a unit is ill-typed: flagged
 * by the loader, carrying explicit errors, or depending on an ill-typed
 * unit, transitively.
 *
 * The walk keeps a visited set keyed by unit id, so a cyclic graph
 * terminates and still sees every unit reachable through the cycle.
 */
export function createIllTypedPredicate(): IllTypedPredicate {
  const settled = new Map<string, boolean>();

  return (unit: ProgramUnit): boolean => {
    const known = settled.get(unit.id);
    if (known !== undefined) {
      return known;
    }

    const visited = new Set<string>([unit.id]);
    const stack: ProgramUnit[] = [unit];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;

      if (settled.get(current.id) === true || current.illTyped || current.errors.length > 0) {
        settled.set(unit.id, true);
        return true;
      }
      for (const dep of current.imports) {
        // A unit settled clean has a clean closure; no need to walk it again.
        if (visited.has(dep.id) || settled.get(dep.id) === false) continue;
        visited.add(dep.id);
        stack.push(dep);
      }
    }

    // Nothing reachable failed, so every visited unit is clean as well.
    for (const id of visited) {
      settled.set(id, false);
    }
    return false;
  };
}

/**
 * Partition units, preserving input order in both halves.
 */
export function partitionUnits<U extends ProgramUnit>(
  units: readonly U[],
  isIllTyped: IllTypedPredicate = createIllTypedPredicate(),
): UnitPartition<U> {
  const wellTyped: U[] = [];
  const illTyped: U[] = [];

  for (const unit of units) {
    if (isIllTyped(unit)) {
      illTyped.push(unit);
    } else {
      wellTyped.push(unit);
    }
  }

  return { wellTyped, illTyped };
}
