/**
 * Unchecked error values: promises whose rejection nobody handles.
 */
import { Node, SyntaxKind, type CallExpression } from 'ts-morph';
import type { Checker, CheckerConfig } from '../core/checkers/types.js';
import type { Diagnostic } from '../core/diagnostics/types.js';
import type { TsUnit } from '../core/units/ts-loader.js';
import { toDiagnostic, type Finding } from './helpers.js';

export const ERRCHECK_CHECKER_ID = 'errcheck';

function isPromise(call: CallExpression): boolean {
  const type = call.getType();
  return type.getSymbol()?.getName() === 'Promise';
}

function handlesRejection(call: CallExpression): boolean {
  const callee = call.getExpression();
  if (!Node.isPropertyAccessExpression(callee)) {
    return false;
  }
  const method = callee.getName();
  return method === 'catch' || (method === 'then' && call.getArguments().length >= 2);
}

/**
 * A call used as a statement whose promise is neither awaited, returned,
 * voided nor given a rejection handler.
 */
export function checkFloatingPromise(call: CallExpression): Finding | undefined {
  if (!Node.isExpressionStatement(call.getParent())) {
    return undefined;
  }
  if (!isPromise(call) || handlesRejection(call)) {
    return undefined;
  }

  return {
    node: call,
    check: 'floating-promise',
    message: `unhandled promise returned by ${call.getExpression().getText()}`,
  };
}

export class ErrcheckChecker implements Checker<TsUnit> {
  readonly id = ERRCHECK_CHECKER_ID;
  readonly name = 'Errcheck';
  readonly description = 'Unchecked promise rejections';

  run(units: readonly TsUnit[], _config: CheckerConfig): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];

    for (const unit of units) {
      for (const sourceFile of unit.sourceFiles) {
        for (const call of sourceFile.getDescendantsOfKind(SyntaxKind.CallExpression)) {
          const finding = checkFloatingPromise(call);
          if (finding) {
            diagnostics.push(toDiagnostic(this.id, unit, finding));
          }
        }
      }
    }

    return diagnostics;
  }
}
