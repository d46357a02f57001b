/**
 * Parser for suppression rule text.
 *
 * Format: whitespace separated tokens `<unit-glob>:<check>,<check>,...`,
 * e.g. `src/legacy/*:duration-names,bool-compare src/gen/*.ts:*`.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { SuppressionRule } from './types.js';

/**
 * Parse suppression text. Empty text yields no rules; a token without
 * exactly one `:` is a configuration error.
 */
export function parseSuppressions(text: string): SuppressionRule[] {
  const rules: SuppressionRule[] = [];

  for (const token of text.split(/\s+/).filter(Boolean)) {
    const parts = token.split(':');
    if (parts.length !== 2) {
      throw new ConfigError(
        ErrorCodes.MALFORMED_SUPPRESSION,
        `malformed suppression rule "${token}": expected <path>:<check>[,<check>...]`,
        { token }
      );
    }

    const [pattern, checks] = parts;
    rules.push({ pattern, checks: checks.split(',') });
  }

  return rules;
}
