/**
 * Style checks. Findings here are advisory: the checker is registered as a
 * soft failure by the bundled executables.
 */
import {
  Node,
  SyntaxKind,
  type ParameterDeclaration,
  type PropertyDeclaration,
  type PropertySignature,
  type VariableDeclaration,
} from 'ts-morph';
import type { Checker, CheckerConfig } from '../core/checkers/types.js';
import type { Diagnostic } from '../core/diagnostics/types.js';
import type { TsUnit } from '../core/units/ts-loader.js';
import { toDiagnostic, type Finding } from './helpers.js';

export const STYLE_CHECKER_ID = 'style';

/** Checked in order; the first matching suffix is reported. */
const UNIT_SUFFIXES = [
  'Sec', 'Secs', 'Seconds',
  'Msec', 'Msecs',
  'Milli', 'Millis', 'Milliseconds',
  'Usec', 'Usecs', 'Microseconds',
  'MS', 'Ms',
];

const DURATION_TYPE = 'Duration';

type NamedDeclaration = VariableDeclaration | ParameterDeclaration | PropertyDeclaration | PropertySignature;

function durationTypeName(decl: NamedDeclaration): string | undefined {
  const typeNode = decl.getTypeNode();
  if (typeNode) {
    const text = typeNode.getText();
    return text === DURATION_TYPE || text.endsWith(`.${DURATION_TYPE}`) ? text : undefined;
  }

  const type = decl.getType();
  const name = type.getAliasSymbol()?.getName() ?? type.getSymbol()?.getName();
  return name === DURATION_TYPE ? DURATION_TYPE : undefined;
}

/**
 * Names of values typed as a Duration must not carry a unit suffix: the
 * type already says what the value measures.
 */
export function checkDurationNames(decl: NamedDeclaration): Finding | undefined {
  const nameNode = decl.getNameNode();
  if (!Node.isIdentifier(nameNode)) {
    return undefined;
  }

  const typeName = durationTypeName(decl);
  if (!typeName) {
    return undefined;
  }

  const name = nameNode.getText();
  const suffix = UNIT_SUFFIXES.find((s) => name.endsWith(s) && name.length > s.length);
  if (!suffix) {
    return undefined;
  }

  return {
    node: nameNode,
    check: 'duration-names',
    message: `var ${name} is of type ${typeName}; don't use unit-specific suffix "${suffix}"`,
  };
}

export class StyleChecker implements Checker<TsUnit> {
  readonly id = STYLE_CHECKER_ID;
  readonly name = 'Style';
  readonly description = 'Naming and style conventions';

  run(units: readonly TsUnit[], _config: CheckerConfig): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];

    for (const unit of units) {
      for (const sourceFile of unit.sourceFiles) {
        const declarations: NamedDeclaration[] = [
          ...sourceFile.getDescendantsOfKind(SyntaxKind.VariableDeclaration),
          ...sourceFile.getDescendantsOfKind(SyntaxKind.Parameter),
          ...sourceFile.getDescendantsOfKind(SyntaxKind.PropertyDeclaration),
          ...sourceFile.getDescendantsOfKind(SyntaxKind.PropertySignature),
        ];
        for (const decl of declarations) {
          const finding = checkDurationNames(decl);
          if (finding) {
            diagnostics.push(toDiagnostic(this.id, unit, finding));
          }
        }
      }
    }

    return diagnostics;
  }
}
