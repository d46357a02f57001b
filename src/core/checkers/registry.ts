/**
 * Registry of checkers keyed by checker id.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { ProgramUnit } from '../units/types.js';
import type { CheckerRegistration, CheckerRegistry } from './types.js';

/**
 * Build a registry, rejecting duplicate checker ids.
 */
export function createCheckerRegistry<U extends ProgramUnit>(
  registrations: Iterable<CheckerRegistration<U>>,
): CheckerRegistry<U> {
  const registry = new Map<string, CheckerRegistration<U>>();
  for (const registration of registrations) {
    const id = registration.checker.id;
    if (registry.has(id)) {
      throw new ConfigError(ErrorCodes.DUPLICATE_CHECKER, `checker "${id}" is registered more than once`, { id });
    }
    registry.set(id, registration);
  }
  return registry;
}

/**
 * Apply severity overrides (checker id → hard) from the project config.
 * Unknown ids are ignored.
 */
export function withSeverityOverrides<U extends ProgramUnit>(
  registry: CheckerRegistry<U>,
  overrides: Readonly<Record<string, { hard: boolean }>>,
): CheckerRegistry<U> {
  const next = new Map<string, CheckerRegistration<U>>();
  for (const [id, registration] of registry) {
    const override = overrides[id];
    next.set(id, override ? { ...registration, hardFailure: override.hard } : registration);
  }
  return next;
}
