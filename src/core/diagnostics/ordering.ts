/**
 * Total ordering and adjacent-duplicate removal for diagnostics.
 *
 * Identity is (position, message). The checker and check ids are not part
 * of it, so two checkers reporting the same message at the same spot
 * collapse into one diagnostic.
 */
import type { Diagnostic } from './types.js';

/**
 * Compares UTF-16 code units, not UTF-8 bytes. The two orders differ only
 * between astral characters and BMP characters at U+E000 and above.
 */
function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order by filename, line, column, then message.
 */
export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  const pa = a.position;
  const pb = b.position;

  if (pa.filename !== pb.filename) {
    return compareStrings(pa.filename, pb.filename);
  }
  if (pa.line !== pb.line) {
    return pa.line - pb.line;
  }
  if (pa.column !== pb.column) {
    return pa.column - pb.column;
  }
  return compareStrings(a.message, b.message);
}

export function sameDiagnostic(a: Diagnostic, b: Diagnostic): boolean {
  return (
    a.position.filename === b.position.filename &&
    a.position.line === b.position.line &&
    a.position.column === b.position.column &&
    a.message === b.message
  );
}

/**
 * Return a sorted copy. Array.prototype.sort is stable, so diagnostics that
 * compare equal keep their input order.
 */
export function sortDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  return [...diagnostics].sort(compareDiagnostics);
}

/**
 * Drop every diagnostic equal to its predecessor, keeping the first, except
 * that an unsuppressed copy replaces a suppressed one: a finding some
 * checker still reports live must not come out tagged as suppressed.
 * Expects sorted input.
 */
export function dedupeDiagnostics(sorted: readonly Diagnostic[]): Diagnostic[] {
  if (sorted.length < 2) {
    return [...sorted];
  }

  const unique: Diagnostic[] = [sorted[0]];
  let prev = sorted[0];
  for (const diagnostic of sorted.slice(1)) {
    if (sameDiagnostic(prev, diagnostic)) {
      if (prev.suppressed && !diagnostic.suppressed) {
        unique[unique.length - 1] = diagnostic;
        prev = diagnostic;
      }
      continue;
    }
    prev = diagnostic;
    unique.push(diagnostic);
  }
  return unique;
}
