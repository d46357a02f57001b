/**
 * Tests for the simplification checker.
 */
import { describe, it, expect } from 'vitest';
import { SimpleChecker } from '../../../src/checkers/simple.js';
import type { CheckerConfig } from '../../../src/core/checkers/types.js';
import type { Diagnostic } from '../../../src/core/diagnostics/types.js';
import { lines, makeTsUnit } from '../../helpers/ts-project.js';

const config: CheckerConfig = { tags: [], targetVersion: 12, suppressions: [], returnSuppressed: false };

const SOURCE = lines(
  'export function f(ready: boolean, name: string, xs: number[]): boolean[] {',
  '  const a = ready === true;',
  '  const b = ready != false;',
  '  const c = false === ready;',
  "  const d = name.indexOf('x') !== -1;",
  '  const e = xs.indexOf(3) === -1;',
  '  const g = xs.indexOf(3) >= 0;',
  '  const h = xs.indexOf(3) > 2;',
  '  return [a, b, c, d, e, g, h];',
  '}'
);

function summary(diagnostics: readonly Diagnostic[]): string[] {
  return diagnostics.map((d) => `${d.position.line}:${d.position.column} ${d.check} ${d.message}`);
}

describe('SimpleChecker', () => {
  it('reports bool comparisons and indexOf tests', async () => {
    const unit = makeTsUnit('a', { 'index.ts': SOURCE });

    const diagnostics = await new SimpleChecker().run([unit], config);

    expect(summary(diagnostics)).toEqual([
      '2:13 bool-compare should omit comparison to bool constant, can be simplified to ready',
      '3:13 bool-compare should omit comparison to bool constant, can be simplified to ready',
      '4:13 bool-compare should omit comparison to bool constant, can be simplified to !ready',
      "5:13 prefer-includes should use name.includes('x') instead of comparing indexOf",
      '6:13 prefer-includes should use !xs.includes(3) instead of comparing indexOf',
      '7:13 prefer-includes should use xs.includes(3) instead of comparing indexOf',
    ]);
    expect(diagnostics.every((d) => d.checker === 'simple' && d.unit === 'a')).toBe(true);
  });

  it('does not suggest includes below the minimum target version', async () => {
    const unit = makeTsUnit('a', { 'index.ts': SOURCE });

    const diagnostics = await new SimpleChecker().run([unit], { ...config, targetVersion: 6 });

    expect(diagnostics.map((d) => d.check)).toEqual(['bool-compare', 'bool-compare', 'bool-compare']);
  });

  it('skips generated files unless asked to check them', async () => {
    const generated = lines(
      '// Code generated by schema-gen. DO NOT EDIT.',
      '',
      'export const same = (a: boolean): boolean => a === true;'
    );
    const unit = makeTsUnit('a', { 'gen.ts': generated });

    expect(await new SimpleChecker().run([unit], config)).toEqual([]);
    expect(summary(await new SimpleChecker({ checkGenerated: true }).run([unit], config))).toEqual([
      '3:46 bool-compare should omit comparison to bool constant, can be simplified to a',
    ]);
  });
});
