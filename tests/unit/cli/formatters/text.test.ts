/**
 * Tests for the plain text formatter.
 */
import { describe, it, expect } from 'vitest';
import { TextFormatter } from '../../../../src/cli/formatters/text.js';
import { displayFilename } from '../../../../src/cli/formatters/position.js';
import { makeDiagnostic } from '../../../helpers/builders.js';

describe('TextFormatter', () => {
  it('should print file:line:col: message (check) relative to cwd', () => {
    const formatter = new TextFormatter({ cwd: '/work' });

    const line = formatter.format({
      ...makeDiagnostic({ filename: '/work/a/index.ts', line: 3, column: 7, message: 'should use x' }),
      severity: 'error',
    });

    expect(line).toBe('a/index.ts:3:7: should use x (duration-names)');
  });

  it('should keep paths outside cwd absolute', () => {
    const line = new TextFormatter({ cwd: '/elsewhere' }).format({ ...makeDiagnostic(), severity: 'error' });

    expect(line).toBe('/work/a/index.ts:1:1: finding (duration-names)');
  });

  it('should tag suppressed diagnostics', () => {
    const line = new TextFormatter({ cwd: '/work' }).format({
      ...makeDiagnostic({ suppressed: true }),
      severity: 'warning',
    });

    expect(line).toBe('a/index.ts:1:1: finding (duration-names) [suppressed]');
  });
});

describe('displayFilename', () => {
  it('should print - for positions without a file', () => {
    expect(displayFilename('', '/work')).toBe('-');
  });
});
