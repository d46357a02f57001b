/**
 * CLI entry points: the lint command and the bundled executables' setups.
 */
import type { Command } from 'commander';
import { createCheckerRegistry } from '../core/checkers/registry.js';
import { TsMorphUnitLoader, type TsUnit } from '../core/units/ts-loader.js';
import type { UnitLoader } from '../core/units/types.js';
import { ErrcheckChecker } from '../checkers/errcheck.js';
import { SimpleChecker } from '../checkers/simple.js';
import { StyleChecker } from '../checkers/style.js';
import { createLintCommand } from './lint-command.js';

export { createLintCommand, runLintCommand, type LintCommandOptions, type LintCommandSetup } from './lint-command.js';
export { VERSION } from './version.js';

function tsLoader(projectRoot: string): UnitLoader<TsUnit> {
  return new TsMorphUnitLoader({ projectRoot });
}

/** Create the CLI program running every bundled checker. */
export function createCli(): Command {
  return createLintCommand<TsUnit>('unitcheck', {
    description: 'Run every bundled checker over TypeScript program units',
    registry: () =>
      createCheckerRegistry<TsUnit>([
        { checker: new StyleChecker(), hardFailure: false },
        { checker: new SimpleChecker(), hardFailure: true },
        { checker: new ErrcheckChecker(), hardFailure: true },
      ]),
    createLoader: tsLoader,
  });
}

/** Create the CLI program running only the simplification checks. */
export function createSimpleCli(): Command {
  return createLintCommand<TsUnit>('unitcheck-simple', {
    description: 'Detect code that could be written in a simpler way',
    registry: (flags) =>
      createCheckerRegistry<TsUnit>([
        { checker: new SimpleChecker({ checkGenerated: flags.generated === true }), hardFailure: true },
      ]),
    createLoader: tsLoader,
  }).option('--generated', 'Check generated code');
}

/** Create the CLI program running only the unhandled-promise check. */
export function createErrcheckCli(): Command {
  return createLintCommand<TsUnit>('unitcheck-errcheck', {
    description: 'Detect promises whose rejection is never handled',
    registry: () => createCheckerRegistry<TsUnit>([{ checker: new ErrcheckChecker(), hardFailure: true }]),
    createLoader: tsLoader,
  });
}
