/**
 * Suppression matching over (unit path, check id) pairs.
 */
import * as path from 'node:path';
import { minimatch } from 'minimatch';
import type { Diagnostic } from '../diagnostics/types.js';
import type { SuppressionMatcher, SuppressionRule } from './types.js';

const MATCH_ALL = '*';

function matchesUnit(rule: SuppressionRule, unitPath: string, filename?: string): boolean {
  if (rule.pattern === MATCH_ALL) {
    return true;
  }
  if (minimatch(unitPath, rule.pattern, { dot: true })) {
    return true;
  }
  if (filename === undefined) {
    return false;
  }
  const qualified = path.posix.join(unitPath, path.posix.basename(filename.replace(/\\/g, '/')));
  return minimatch(qualified, rule.pattern, { dot: true });
}

function matchesCheck(rule: SuppressionRule, check: string): boolean {
  return rule.checks.some((pattern) => minimatch(check, pattern));
}

/**
 * Build a matcher from parsed rules. A finding is suppressed when any rule
 * matches both its unit and its check.
 */
export function createSuppressionMatcher(rules: readonly SuppressionRule[]): SuppressionMatcher {
  const frozen = rules.map((rule) => ({ pattern: rule.pattern, checks: [...rule.checks] }));

  return {
    isSuppressed(unitPath: string, check: string, filename?: string): boolean {
      return frozen.some((rule) => matchesUnit(rule, unitPath, filename) && matchesCheck(rule, check));
    },

    rules(): SuppressionRule[] {
      return frozen.map((rule) => ({ pattern: rule.pattern, checks: [...rule.checks] }));
    },
  };
}

/**
 * Filter suppressed diagnostics out, or keep them tagged as suppressed when
 * `returnSuppressed` is set.
 */
export function applySuppressions(
  diagnostics: readonly Diagnostic[],
  matcher: SuppressionMatcher,
  returnSuppressed: boolean,
): Diagnostic[] {
  const kept: Diagnostic[] = [];
  for (const diagnostic of diagnostics) {
    if (!matcher.isSuppressed(diagnostic.unit, diagnostic.check, diagnostic.position.filename)) {
      kept.push(diagnostic);
    } else if (returnSuppressed) {
      kept.push({ ...diagnostic, suppressed: true });
    }
  }
  return kept;
}
