/**
 * JSON output formatter for machine consumption: one object per line.
 */
import type { IFormatter, ReportedDiagnostic } from './types.js';

export class JsonFormatter implements IFormatter {
  format(diagnostic: ReportedDiagnostic): string {
    return JSON.stringify({
      checker: diagnostic.checker,
      code: diagnostic.check,
      severity: diagnostic.suppressed ? 'ignored' : diagnostic.severity,
      location: {
        file: diagnostic.position.filename,
        line: diagnostic.position.line,
        column: diagnostic.position.column,
      },
      message: diagnostic.message,
    });
  }
}
