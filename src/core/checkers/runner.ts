/**
 * Runs a single checker over the well-typed units.
 */
import { CheckerError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { applySuppressions, createSuppressionMatcher } from '../suppression/matcher.js';
import type { ProgramUnit } from '../units/types.js';
import type { Checker, CheckerConfig } from './types.js';

async function invoke<U extends ProgramUnit>(
  checker: Checker<U>,
  units: readonly U[],
  config: CheckerConfig,
): Promise<Diagnostic[]> {
  return await checker.run(units, config);
}

/**
 * Run a checker and apply the config's suppression rules to its output.
 *
 * A checker failure never escapes. When the run over all units fails, the
 * checker is re-run one unit at a time so only the units it cannot analyse
 * lose their findings.
 */
export async function runChecker<U extends ProgramUnit>(
  checker: Checker<U>,
  units: readonly U[],
  config: CheckerConfig,
): Promise<Diagnostic[]> {
  const log = logger.child(checker.id);
  let diagnostics: Diagnostic[];

  try {
    diagnostics = await invoke(checker, units, config);
  } catch (error) {
    log.warn(`checker failed, retrying unit by unit: ${errorMessage(error)}`);
    diagnostics = [];
    for (const unit of units) {
      try {
        diagnostics.push(...(await invoke(checker, [unit], config)));
      } catch (unitError) {
        const failure = new CheckerError(
          ErrorCodes.CHECKER_FAILED,
          `no diagnostics for unit ${unit.id}: ${errorMessage(unitError)}`,
          { checker: checker.id, unit: unit.id },
        );
        log.warn(failure.message, failure.toJSON());
      }
    }
  }

  const matcher = createSuppressionMatcher(config.suppressions);
  return applySuppressions(diagnostics, matcher, config.returnSuppressed);
}

/**
 * Build the frozen copy of the run config a single checker receives.
 */
export function freezeCheckerConfig(config: CheckerConfig): CheckerConfig {
  return Object.freeze({
    tags: Object.freeze([...config.tags]),
    targetVersion: config.targetVersion,
    suppressions: Object.freeze(
      config.suppressions.map((rule) => Object.freeze({ pattern: rule.pattern, checks: [...rule.checks] })),
    ),
    returnSuppressed: config.returnSuppressed,
  });
}
