/**
 * Analysis engine orchestrator: loads units, synthesizes compile errors for
 * ill-typed ones, runs every checker over the well-typed ones, and returns
 * one sorted, deduplicated diagnostic list.
 */
import { LoadError, UnitcheckError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { dedupeDiagnostics, sortDiagnostics } from '../diagnostics/ordering.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { freezeCheckerConfig, runChecker } from '../checkers/runner.js';
import type { CheckerConfig, CheckerRegistry } from '../checkers/types.js';
import { applySuppressions, createSuppressionMatcher } from '../suppression/matcher.js';
import { parseSuppressions } from '../suppression/parser.js';
import { synthesizeCompileErrors } from '../units/compile-errors.js';
import { createIllTypedPredicate, partitionUnits } from '../units/partition.js';
import type { ProgramUnit, UnitLoader } from '../units/types.js';
import { DEFAULT_TARGET_VERSION, parseTargetVersion } from '../config/version.js';
import type { LintResult, RunOptions } from './types.js';

export const DEFAULT_RUN_OPTIONS: RunOptions = {
  tags: [],
  includeTests: true,
  suppressions: '',
  targetVersion: parseTargetVersion(DEFAULT_TARGET_VERSION),
  returnSuppressed: false,
};

/**
 * Sort and deduplicate a raw diagnostic list.
 */
export function aggregateDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  return dedupeDiagnostics(sortDiagnostics(diagnostics));
}

/**
 * Run the checkers of a registry over already-loaded units.
 */
export async function lintUnits<U extends ProgramUnit>(
  registry: CheckerRegistry<U>,
  units: readonly U[],
  options: Partial<RunOptions> = {},
): Promise<LintResult> {
  const opts: RunOptions = { ...DEFAULT_RUN_OPTIONS, ...options };
  const rules = parseSuppressions(opts.suppressions);
  const matcher = createSuppressionMatcher(rules);

  const isIllTyped = createIllTypedPredicate();
  const { wellTyped, illTyped } = partitionUnits(units, isIllTyped);

  const compileErrors = illTyped.flatMap((unit) => synthesizeCompileErrors(unit, isIllTyped));
  const diagnostics = applySuppressions(compileErrors, matcher, opts.returnSuppressed);

  if (wellTyped.length === 0) {
    logger.debug('no well-typed units, skipping checkers', { unitsFailed: illTyped.length });
    return { diagnostics: aggregateDiagnostics(diagnostics), unitsChecked: 0, unitsFailed: illTyped.length };
  }

  const config: CheckerConfig = {
    tags: opts.tags,
    targetVersion: opts.targetVersion,
    suppressions: rules,
    returnSuppressed: opts.returnSuppressed,
  };

  const perChecker = await Promise.all(
    [...registry.values()].map(({ checker }) => runChecker(checker, wellTyped, freezeCheckerConfig(config))),
  );
  for (const found of perChecker) {
    diagnostics.push(...found);
  }

  return {
    diagnostics: aggregateDiagnostics(diagnostics),
    unitsChecked: wellTyped.length,
    unitsFailed: illTyped.length,
  };
}

/**
 * Load `paths` and run every registered checker over them.
 *
 * Malformed suppression text fails before anything is loaded. A loader
 * failure is fatal for the run. Units that fail to type check are reported
 * as compile diagnostics and never stop the run.
 */
export async function lint<U extends ProgramUnit>(
  registry: CheckerRegistry<U>,
  paths: readonly string[],
  options: Partial<RunOptions>,
  loader: UnitLoader<U>,
): Promise<LintResult> {
  const opts: RunOptions = { ...DEFAULT_RUN_OPTIONS, ...options };
  parseSuppressions(opts.suppressions);

  let units: U[];
  try {
    units = await loader.load(paths, { tags: opts.tags, includeTests: opts.includeTests });
  } catch (error) {
    if (error instanceof UnitcheckError) {
      throw error;
    }
    throw new LoadError(ErrorCodes.LOADER_FAILED, errorMessage(error), { paths: [...paths] });
  }

  return lintUnits(registry, units, opts);
}
