/**
 * Stylish formatter: diagnostics grouped under their file with aligned
 * columns, and a summary line at the end of the run.
 */
import chalk from 'chalk';
import type { ReportSummary } from '../../core/report/policy.js';
import type { IFormatter, FormatOptions, ReportedDiagnostic } from './types.js';
import { displayFilename } from './position.js';

const COLUMN_PADDING = 2;

interface Row {
  position: string;
  check: string;
  message: string;
}

export class StylishFormatter implements IFormatter {
  private options: FormatOptions;
  private currentFile: string | undefined;
  private rows: Row[] = [];

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      cwd: options.cwd ?? process.cwd(),
    };
  }

  format(diagnostic: ReportedDiagnostic): string {
    const file = displayFilename(diagnostic.position.filename, this.options.cwd);
    const lines: string[] = [];

    if (file !== this.currentFile) {
      if (this.currentFile !== undefined) {
        lines.push(...this.flush(), '');
      }
      lines.push(this.options.colors ? chalk.underline(file) : file);
      this.currentFile = file;
    }

    const tag = diagnostic.suppressed ? ' [suppressed]' : '';
    this.rows.push({
      position: `  (${diagnostic.position.line}, ${diagnostic.position.column})`,
      check: diagnostic.check,
      message: `${diagnostic.message}${tag}`,
    });

    return lines.join('\n');
  }

  stats(summary: ReportSummary): string {
    const lines: string[] = [];
    if (this.currentFile !== undefined) {
      lines.push(...this.flush(), '');
      this.currentFile = undefined;
    }

    const line = ` ✖ ${summary.total} problems (${summary.errors} errors, ${summary.warnings} warnings)`;
    lines.push(this.options.colors && summary.errors > 0 ? chalk.red(line) : line);
    return lines.join('\n');
  }

  /**
   * Emit the buffered rows of the current file, padded to common widths.
   */
  private flush(): string[] {
    const positionWidth = Math.max(...this.rows.map((r) => r.position.length)) + COLUMN_PADDING;
    const checkWidth = Math.max(...this.rows.map((r) => r.check.length)) + COLUMN_PADDING;
    const lines = this.rows.map((row) => {
      const position = row.position.padEnd(positionWidth);
      const check = row.check.padEnd(checkWidth);
      return this.options.colors
        ? `${chalk.dim(position)}${chalk.yellow(check)}${row.message}`
        : `${position}${check}${row.message}`;
    });
    this.rows = [];
    return lines;
  }
}
