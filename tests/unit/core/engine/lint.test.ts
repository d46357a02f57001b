/**
 * Tests for the analysis engine orchestrator.
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { aggregateDiagnostics, lint, lintUnits } from '../../../../src/core/engine/lint.js';
import { createCheckerRegistry } from '../../../../src/core/checkers/registry.js';
import type { ProgramUnit } from '../../../../src/core/units/types.js';
import { ConfigError, LoadError } from '../../../../src/utils/errors.js';
import { Logger } from '../../../../src/utils/logger.js';
import { StaticChecker, StaticLoader, makeDiagnostic, makeUnit, typeError } from '../../../helpers/builders.js';

function perUnit(message: string, check = 'duration-names') {
  return (units: readonly ProgramUnit[]) =>
    units.map((u) => makeDiagnostic({ filename: `/work/${u.id}/index.ts`, unit: u.id, message, check }));
}

function registryOf(...checkers: StaticChecker[]) {
  return createCheckerRegistry(checkers.map((checker) => ({ checker, hardFailure: true })));
}

describe('aggregateDiagnostics', () => {
  it('sorts and removes duplicates regardless of checker', () => {
    const later = makeDiagnostic({ line: 9, message: 'late' });
    const first = makeDiagnostic({ line: 2, message: 'same', checker: 'style' });
    const copy = makeDiagnostic({ line: 2, message: 'same', checker: 'simple' });

    expect(aggregateDiagnostics([later, first, copy])).toEqual([first, later]);
  });
});

describe('lintUnits', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports checker findings for a clean graph', async () => {
    const style = new StaticChecker('style', perUnit('style finding'));

    const result = await lintUnits(registryOf(style), [makeUnit('b'), makeUnit('a')]);

    expect(result.diagnostics.map((d) => d.unit)).toEqual(['a', 'b']);
    expect(result.unitsChecked).toBe(2);
    expect(result.unitsFailed).toBe(0);
  });

  it('reports compile errors for ill-typed units and checks only the rest', async () => {
    const broken = makeUnit('b', { errors: [typeError('/work/b/index.ts', 3, 4, 'cannot find name x')] });
    const dependent = makeUnit('c', { imports: [broken] });
    const style = new StaticChecker('style', perUnit('style finding'));

    const result = await lintUnits(registryOf(style), [makeUnit('a'), broken, dependent]);

    expect(style.calls.map((c) => c.units)).toEqual([['a']]);
    expect(result.diagnostics).toEqual([
      makeDiagnostic({ filename: '/work/a/index.ts', unit: 'a', message: 'style finding' }),
      {
        position: { filename: '/work/b/index.ts', line: 3, column: 4 },
        message: 'cannot find name x',
        checker: 'compiler',
        check: 'compile',
        unit: 'b',
        suppressed: false,
      },
    ]);
    expect(result.unitsChecked).toBe(1);
    expect(result.unitsFailed).toBe(2);
  });

  it('never calls a checker when every unit is ill-typed', async () => {
    const broken = makeUnit('b', { illTyped: true, errors: [typeError('/work/b/index.ts', 1, 1, 'bad')] });
    const style = new StaticChecker('style', perUnit('style finding'));

    const result = await lintUnits(registryOf(style), [broken]);

    expect(style.calls).toEqual([]);
    expect(result.diagnostics.map((d) => d.message)).toEqual(['bad']);
    expect(result.unitsChecked).toBe(0);
  });

  it('suppresses compile errors like any other finding', async () => {
    const broken = makeUnit('b', { errors: [typeError('/work/b/index.ts', 1, 1, 'bad')] });

    const result = await lintUnits(registryOf(), [broken], { suppressions: 'b:compile' });

    expect(result.diagnostics).toEqual([]);
  });

  it('keeps suppressed findings tagged when asked to', async () => {
    const style = new StaticChecker('style', perUnit('style finding'));

    const result = await lintUnits(registryOf(style), [makeUnit('a'), makeUnit('b')], {
      suppressions: 'a:duration-names',
      returnSuppressed: true,
    });

    expect(result.diagnostics.map((d) => [d.unit, d.suppressed])).toEqual([
      ['a', true],
      ['b', false],
    ]);
  });

  it('keeps a live finding when another checker reports it suppressed', async () => {
    const x = new StaticChecker('x', perUnit('same message', 'quiet'));
    const y = new StaticChecker('y', perUnit('same message', 'loud'));
    const registry = createCheckerRegistry([
      { checker: x, hardFailure: false },
      { checker: y, hardFailure: true },
    ]);

    const result = await lintUnits(registry, [makeUnit('a')], { suppressions: 'a:quiet', returnSuppressed: true });

    expect(result.diagnostics.map((d) => [d.check, d.suppressed])).toEqual([['loud', false]]);
  });

  it('merges findings of several checkers into one ordered list', async () => {
    const style = new StaticChecker('style', perUnit('style finding'));
    const simple = new StaticChecker('simple', perUnit('simple finding', 'bool-compare'));
    const units = [makeUnit('a'), makeUnit('b')];

    const forward = await lintUnits(registryOf(style, simple), units);
    const backward = await lintUnits(registryOf(simple, style), units);

    expect(forward.diagnostics.map((d) => `${d.unit} ${d.message}`)).toEqual([
      'a simple finding',
      'a style finding',
      'b simple finding',
      'b style finding',
    ]);
    expect(backward.diagnostics).toEqual(forward.diagnostics);
  });

  it('gives every checker the same frozen configuration', async () => {
    const style = new StaticChecker('style', () => []);
    const simple = new StaticChecker('simple', () => []);

    await lintUnits(registryOf(style, simple), [makeUnit('a')], {
      tags: ['integration'],
      targetVersion: 9,
      suppressions: 'x:y',
    });

    for (const checker of [style, simple]) {
      const config = checker.calls[0].config;
      expect(config).toEqual({
        tags: ['integration'],
        targetVersion: 9,
        suppressions: [{ pattern: 'x', checks: ['y'] }],
        returnSuppressed: false,
      });
      expect(Object.isFrozen(config)).toBe(true);
    }
  });

  it('returns the same result when run twice', async () => {
    const style = new StaticChecker('style', perUnit('style finding'));
    const units = [makeUnit('a'), makeUnit('b', { errors: [typeError('/work/b/index.ts', 1, 1, 'bad')] })];

    const first = await lintUnits(registryOf(style), units);
    const second = await lintUnits(registryOf(style), units);

    expect(second).toEqual(first);
  });

  it('keeps going when one checker fails', async () => {
    vi.spyOn(Logger.prototype, 'warn').mockImplementation(() => {});
    const failing = new StaticChecker('failing', () => {
      throw new Error('boom');
    });
    const style = new StaticChecker('style', perUnit('style finding'));

    const result = await lintUnits(registryOf(failing, style), [makeUnit('a')]);

    expect(result.diagnostics.map((d) => d.message)).toEqual(['style finding']);
  });

  it('rejects malformed suppression text', async () => {
    await expect(lintUnits(registryOf(), [makeUnit('a')], { suppressions: 'no-colon' })).rejects.toBeInstanceOf(
      ConfigError,
    );
  });
});

describe('lint', () => {
  it('loads the requested paths with the run tags', async () => {
    const loader = new StaticLoader([makeUnit('a')]);
    const style = new StaticChecker('style', perUnit('style finding'));

    const result = await lint(registryOf(style), ['a/...'], { tags: ['e2e'], includeTests: false }, loader);

    expect(loader.calls).toEqual([{ paths: ['a/...'], tags: ['e2e'], includeTests: false }]);
    expect(result.diagnostics).toHaveLength(1);
  });

  it('checks suppression text before loading anything', async () => {
    const loader = new StaticLoader([makeUnit('a')]);

    await expect(lint(registryOf(), ['.'], { suppressions: 'a:b:c' }, loader)).rejects.toBeInstanceOf(ConfigError);
    expect(loader.calls).toEqual([]);
  });

  it('wraps unexpected loader failures', async () => {
    const loader = new StaticLoader(new Error('disk on fire'));

    const failure = await lint(registryOf(), ['.'], {}, loader).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(LoadError);
    expect(failure).toMatchObject({ code: 'L002', message: 'disk on fire', details: { paths: ['.'] } });
  });

  it('passes loader errors of its own through', async () => {
    const original = new LoadError('L001', 'no such directory');
    const loader = new StaticLoader(original);

    await expect(lint(registryOf(), ['missing'], {}, loader)).rejects.toBe(original);
  });
});
