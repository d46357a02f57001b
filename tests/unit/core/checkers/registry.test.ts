/**
 * Tests for the checker registry.
 */
import { describe, it, expect } from 'vitest';
import { createCheckerRegistry, withSeverityOverrides } from '../../../../src/core/checkers/registry.js';
import { ConfigError } from '../../../../src/utils/errors.js';
import { StaticChecker } from '../../../helpers/builders.js';

describe('createCheckerRegistry', () => {
  it('keys registrations by checker id', () => {
    const style = new StaticChecker('style', () => []);
    const simple = new StaticChecker('simple', () => []);

    const registry = createCheckerRegistry([
      { checker: style, hardFailure: false },
      { checker: simple, hardFailure: true },
    ]);

    expect([...registry.keys()]).toEqual(['style', 'simple']);
    expect(registry.get('simple')?.hardFailure).toBe(true);
  });

  it('rejects duplicate ids', () => {
    expect(() =>
      createCheckerRegistry([
        { checker: new StaticChecker('style', () => []), hardFailure: false },
        { checker: new StaticChecker('style', () => []), hardFailure: true },
      ])
    ).toThrow(ConfigError);
  });
});

describe('withSeverityOverrides', () => {
  it('replaces the hard flag of listed checkers and ignores unknown ids', () => {
    const registry = createCheckerRegistry([
      { checker: new StaticChecker('style', () => []), hardFailure: false },
      { checker: new StaticChecker('simple', () => []), hardFailure: true },
    ]);

    const overridden = withSeverityOverrides(registry, { style: { hard: true }, ghost: { hard: false } });

    expect(overridden.get('style')?.hardFailure).toBe(true);
    expect(overridden.get('simple')?.hardFailure).toBe(true);
    expect(overridden.has('ghost')).toBe(false);
    expect(registry.get('style')?.hardFailure).toBe(false);
  });
});
