/**
 * Plain text formatter, one line per diagnostic:
 * `file:line:col: message (check)`.
 */
import type { IFormatter, FormatOptions, ReportedDiagnostic } from './types.js';
import { formatPosition } from './position.js';

export class TextFormatter implements IFormatter {
  private cwd: string;

  constructor(options: Partial<FormatOptions> = {}) {
    this.cwd = options.cwd ?? process.cwd();
  }

  format(diagnostic: ReportedDiagnostic): string {
    const tag = diagnostic.suppressed ? ' [suppressed]' : '';
    return `${formatPosition(diagnostic.position, this.cwd)}: ${diagnostic.message} (${diagnostic.check})${tag}`;
  }
}
