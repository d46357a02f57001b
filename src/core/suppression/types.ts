/**
 * Suppression rule types.
 */

export interface SuppressionRule {
  /** Glob over the unit path, or over `<unit path>/<file name>` */
  pattern: string;
  /** Globs over check ids */
  checks: string[];
}

export interface SuppressionMatcher {
  /**
   * Whether a finding of `check` in `unitPath` is suppressed. When a
   * filename is given, the pattern may also match `<unitPath>/<basename>`.
   */
  isSuppressed(unitPath: string, check: string, filename?: string): boolean;

  /** The rules this matcher was built from */
  rules(): SuppressionRule[];
}
