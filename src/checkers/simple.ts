/**
 * Checks for code that can be written more simply.
 */
import { Node, SyntaxKind, type BinaryExpression, type Expression } from 'ts-morph';
import type { Checker, CheckerConfig } from '../core/checkers/types.js';
import type { Diagnostic } from '../core/diagnostics/types.js';
import type { TsUnit } from '../core/units/ts-loader.js';
import { isGenerated, toDiagnostic, type Finding } from './helpers.js';

export const SIMPLE_CHECKER_ID = 'simple';

/** Lowest target minor version for which `includes` is suggested. */
export const INCLUDES_MIN_VERSION = 7;

const EQUALITY_OPERATORS = new Set<SyntaxKind>([
  SyntaxKind.EqualsEqualsEqualsToken,
  SyntaxKind.EqualsEqualsToken,
  SyntaxKind.ExclamationEqualsEqualsToken,
  SyntaxKind.ExclamationEqualsToken,
]);

const NEGATED_OPERATORS = new Set<SyntaxKind>([SyntaxKind.ExclamationEqualsEqualsToken, SyntaxKind.ExclamationEqualsToken]);

export interface SimpleCheckerOptions {
  /** Also report in files carrying a generated-code header */
  checkGenerated?: boolean;
}

function isBoolLiteral(node: Expression): boolean {
  return node.getKind() === SyntaxKind.TrueKeyword || node.getKind() === SyntaxKind.FalseKeyword;
}

function negate(node: Expression): string {
  const text = node.getText();
  return Node.isIdentifier(node) || Node.isPropertyAccessExpression(node) || Node.isCallExpression(node)
    ? `!${text}`
    : `!(${text})`;
}

/**
 * `x === true`, `x !== false` and friends, where x is a boolean.
 */
export function checkBoolCompare(expr: BinaryExpression): Finding | undefined {
  const operator = expr.getOperatorToken().getKind();
  if (!EQUALITY_OPERATORS.has(operator)) {
    return undefined;
  }

  const left = expr.getLeft();
  const right = expr.getRight();
  const [literal, operand] = isBoolLiteral(right) ? [right, left] : isBoolLiteral(left) ? [left, right] : [];
  if (!literal || !operand || isBoolLiteral(operand) || !operand.getType().isBoolean()) {
    return undefined;
  }

  const comparesToTrue = literal.getKind() === SyntaxKind.TrueKeyword;
  const keepsValue = comparesToTrue !== NEGATED_OPERATORS.has(operator);
  const simplified = keepsValue ? operand.getText() : negate(operand);

  return {
    node: expr,
    check: 'bool-compare',
    message: `should omit comparison to bool constant, can be simplified to ${simplified}`,
  };
}

function isMinusOne(node: Expression): boolean {
  return (
    Node.isPrefixUnaryExpression(node) &&
    node.getOperatorToken() === SyntaxKind.MinusToken &&
    node.getOperand().getText() === '1'
  );
}

/**
 * `xs.indexOf(v) !== -1`, `xs.indexOf(v) >= 0` and `xs.indexOf(v) === -1`
 * on strings and arrays.
 */
export function checkPreferIncludes(expr: BinaryExpression): Finding | undefined {
  const call = expr.getLeft();
  if (!Node.isCallExpression(call)) {
    return undefined;
  }
  const callee = call.getExpression();
  if (!Node.isPropertyAccessExpression(callee) || callee.getName() !== 'indexOf' || call.getArguments().length !== 1) {
    return undefined;
  }

  const receiver = callee.getExpression();
  const receiverType = receiver.getType();
  if (!receiverType.isString() && !receiverType.isArray()) {
    return undefined;
  }

  const operator = expr.getOperatorToken().getKind();
  const right = expr.getRight();
  let negated: boolean;
  if (NEGATED_OPERATORS.has(operator) && isMinusOne(right)) {
    negated = false;
  } else if (operator === SyntaxKind.GreaterThanEqualsToken && right.getText() === '0') {
    negated = false;
  } else if (EQUALITY_OPERATORS.has(operator) && !NEGATED_OPERATORS.has(operator) && isMinusOne(right)) {
    negated = true;
  } else {
    return undefined;
  }

  const suggestion = `${receiver.getText()}.includes(${call.getArguments()[0].getText()})`;
  return {
    node: expr,
    check: 'prefer-includes',
    message: `should use ${negated ? '!' : ''}${suggestion} instead of comparing indexOf`,
  };
}

export class SimpleChecker implements Checker<TsUnit> {
  readonly id = SIMPLE_CHECKER_ID;
  readonly name = 'Simple';
  readonly description = 'Code that can be written more simply';
  private readonly checkGenerated: boolean;

  constructor(options: SimpleCheckerOptions = {}) {
    this.checkGenerated = options.checkGenerated ?? false;
  }

  run(units: readonly TsUnit[], config: CheckerConfig): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    const includesAvailable = config.targetVersion >= INCLUDES_MIN_VERSION;

    for (const unit of units) {
      for (const sourceFile of unit.sourceFiles) {
        if (!this.checkGenerated && isGenerated(sourceFile)) continue;

        for (const expr of sourceFile.getDescendantsOfKind(SyntaxKind.BinaryExpression)) {
          const findings = [checkBoolCompare(expr), includesAvailable ? checkPreferIncludes(expr) : undefined];
          for (const finding of findings) {
            if (finding) {
              diagnostics.push(toDiagnostic(this.id, unit, finding));
            }
          }
        }
      }
    }

    return diagnostics;
  }
}
