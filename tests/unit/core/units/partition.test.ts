/**
 * Tests for splitting units into well-typed and ill-typed halves.
 */
import { describe, it, expect } from 'vitest';
import { createIllTypedPredicate, partitionUnits } from '../../../../src/core/units/partition.js';
import { makeUnit, typeError } from '../../../helpers/builders.js';

describe('partitionUnits', () => {
  it('keeps units without errors well-typed', () => {
    const a = makeUnit('a');
    const b = makeUnit('b');

    const { wellTyped, illTyped } = partitionUnits([a, b]);

    expect(wellTyped.map((u) => u.id)).toEqual(['a', 'b']);
    expect(illTyped).toEqual([]);
  });

  it('marks units with explicit errors ill-typed', () => {
    const broken = makeUnit('broken', { errors: [typeError('/work/broken/index.ts', 1, 1, 'boom')] });

    const { wellTyped, illTyped } = partitionUnits([broken, makeUnit('ok')]);

    expect(illTyped.map((u) => u.id)).toEqual(['broken']);
    expect(wellTyped.map((u) => u.id)).toEqual(['ok']);
  });

  it('honours the loader flag even without errors', () => {
    const flagged = makeUnit('flagged', { illTyped: true });

    expect(partitionUnits([flagged]).illTyped).toEqual([flagged]);
  });

  it('propagates failure through dependencies transitively', () => {
    const leaf = makeUnit('leaf', { errors: [typeError('/work/leaf/index.ts', 5, 1, 'undefined: foo')] });
    const middle = makeUnit('middle', { imports: [leaf] });
    const top = makeUnit('top', { imports: [middle] });
    const unrelated = makeUnit('unrelated');

    const { wellTyped, illTyped } = partitionUnits([top, unrelated, middle]);

    expect(illTyped.map((u) => u.id)).toEqual(['top', 'middle']);
    expect(wellTyped.map((u) => u.id)).toEqual(['unrelated']);
  });

  it('terminates on a clean dependency cycle', () => {
    const a = makeUnit('a');
    const b = makeUnit('b', { imports: [a] });
    a.imports.push(b);

    const { wellTyped, illTyped } = partitionUnits([a, b]);

    expect(wellTyped.map((u) => u.id)).toEqual(['a', 'b']);
    expect(illTyped).toEqual([]);
  });

  it('sees a failure reachable through a cycle from every member', () => {
    const failing = makeUnit('failing', { errors: [typeError('/work/failing/index.ts', 1, 1, 'bad')] });
    const a = makeUnit('a');
    const b = makeUnit('b', { imports: [a, failing] });
    a.imports.push(b);

    const { wellTyped, illTyped } = partitionUnits([a, b]);

    expect(illTyped.map((u) => u.id)).toEqual(['a', 'b']);
    expect(wellTyped).toEqual([]);
  });
});

describe('createIllTypedPredicate', () => {
  it('remembers results across queries', () => {
    const isIllTyped = createIllTypedPredicate();
    const dep = makeUnit('dep', { errors: [typeError('/work/dep/index.ts', 1, 1, 'bad')] });
    const user = makeUnit('user', { imports: [dep] });

    expect(isIllTyped(user)).toBe(true);
    // The cached answer is keyed by unit id.
    dep.errors = [];
    expect(isIllTyped(user)).toBe(true);
  });
});
