/**
 * Barrel export for the bundled checkers.
 */
export { StyleChecker, STYLE_CHECKER_ID, checkDurationNames } from './style.js';
export {
  SimpleChecker,
  SIMPLE_CHECKER_ID,
  INCLUDES_MIN_VERSION,
  checkBoolCompare,
  checkPreferIncludes,
  type SimpleCheckerOptions,
} from './simple.js';
export { ErrcheckChecker, ERRCHECK_CHECKER_ID, checkFloatingPromise } from './errcheck.js';
export { isGenerated, toDiagnostic, type Finding } from './helpers.js';
