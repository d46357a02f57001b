/**
 * Target language version handling. Versions are written `1.N`; only the
 * minor number N is kept.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_TARGET_VERSION = '1.12';

const VERSION_PATTERN = /^1\.(\d+)$/;

export function parseTargetVersion(value: string): number {
  const match = VERSION_PATTERN.exec(value.trim());
  if (!match) {
    throw new ConfigError(
      ErrorCodes.INVALID_TARGET_VERSION,
      `invalid target version "${value}": expected the form 1.N`,
      { value }
    );
  }
  return Number.parseInt(match[1], 10);
}

export function formatTargetVersion(minor: number): string {
  return `1.${minor}`;
}
