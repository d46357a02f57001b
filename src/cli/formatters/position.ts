/**
 * Position rendering shared by the formatters.
 */
import * as path from 'node:path';
import type { Position } from '../../core/diagnostics/types.js';

/**
 * Filename relative to `cwd` when the file lives below it, `-` when the
 * position has no file.
 */
export function displayFilename(filename: string, cwd: string): string {
  if (filename === '') {
    return '-';
  }
  const relative = path.relative(cwd, filename);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative) ? relative : filename;
}

export function formatPosition(position: Position, cwd: string): string {
  return `${displayFilename(position.filename, cwd)}:${position.line}:${position.column}`;
}
