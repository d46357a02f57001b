/**
 * Shared helpers for the bundled ts-morph checkers.
 */
import type { Node, SourceFile } from 'ts-morph';
import type { Diagnostic } from '../core/diagnostics/types.js';
import type { TsUnit } from '../core/units/ts-loader.js';

const GENERATED_HEADER = /^\/\/ Code generated .* DO NOT EDIT\.$/m;

export interface Finding {
  node: Node;
  check: string;
  message: string;
}

/**
 * Build a diagnostic positioned at the start of `node`.
 */
export function toDiagnostic(checker: string, unit: TsUnit, finding: Finding): Diagnostic {
  const sourceFile = finding.node.getSourceFile();
  const { line, column } = sourceFile.getLineAndColumnAtPos(finding.node.getStart());
  return {
    position: { filename: sourceFile.getFilePath(), line, column },
    message: finding.message,
    checker,
    check: finding.check,
    unit: unit.id,
    suppressed: false,
  };
}

/**
 * Whether a file carries the conventional generated-code header.
 */
export function isGenerated(sourceFile: SourceFile): boolean {
  return GENERATED_HEADER.test(sourceFile.getFullText());
}
