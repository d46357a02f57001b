/**
 * The lint command shared by every unitcheck executable.
 *
 * Each executable registers its own checkers; the flags, configuration
 * handling, reporting and exit policy are the same for all of them.
 */
import { Command } from 'commander';
import { lint } from '../core/engine/lint.js';
import { loadConfig } from '../core/config/loader.js';
import { DEFAULT_TARGET_VERSION, parseTargetVersion } from '../core/config/version.js';
import { withSeverityOverrides } from '../core/checkers/registry.js';
import type { CheckerRegistry } from '../core/checkers/types.js';
import { parseSuppressions } from '../core/suppression/parser.js';
import { ExitCodes, exitCodeFor, severityOf, summarize, type ExitCode } from '../core/report/policy.js';
import type { ProgramUnit, UnitLoader } from '../core/units/types.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { createFormatter } from './formatters/index.js';
import { VERSION } from './version.js';

export interface LintCommandOptions {
  tags?: string;
  suppress?: string;
  tests: boolean;
  target?: string;
  format?: string;
  showSuppressed?: boolean;
  version?: boolean;
  verbose?: boolean;
  config?: string;
}

export interface LintCommandSetup<U extends ProgramUnit> {
  description: string;
  /** Builds the registry once flags are parsed, so extra flags can tune checkers */
  registry: (flags: Record<string, unknown>) => CheckerRegistry<U>;
  createLoader: (projectRoot: string) => UnitLoader<U>;
}

/**
 * Create the lint command for an executable called `name`.
 */
export function createLintCommand<U extends ProgramUnit>(name: string, setup: LintCommandSetup<U>): Command {
  return new Command(name)
    .description(setup.description)
    .argument('[paths...]', 'directories (dir/... for every directory below dir) or files of a single unit')
    .option('--tags <tags>', 'List of build tags, separated by spaces or commas')
    .option(
      '--suppress <rules>',
      "Space separated list of suppression rules, in the format 'unit/path:check1,check2,...'. " +
        "Both the unit path and the check names support globbing, e.g. 'src/gen/*:*'"
    )
    .option('--no-tests', 'Skip test files')
    .option('--target <version>', `Target language version in the format '1.N' (default: ${DEFAULT_TARGET_VERSION})`)
    .option('-f, --format <format>', "Output format (valid choices are 'text', 'stylish' and 'json')")
    .option('--show-suppressed', "Don't filter suppressed diagnostics")
    .option('--version', 'Print version and exit')
    .option('--verbose', 'Log debug output to stderr')
    .option('--config <file>', 'Path to the project config file (default: .unitcheck.yaml)')
    .action(async (paths: string[], options: LintCommandOptions, command: Command) => {
      const code = await runLintCommand(name, paths, options, command, setup);
      process.exit(code);
    });
}

/**
 * Run one lint invocation and return its exit code. Never throws.
 */
export async function runLintCommand<U extends ProgramUnit>(
  name: string,
  paths: string[],
  options: LintCommandOptions,
  command: Command,
  setup: LintCommandSetup<U>,
): Promise<ExitCode> {
  if (options.version) {
    console.log(`${name} ${VERSION}`);
    return ExitCodes.SUCCESS;
  }

  logger.setLevel(options.verbose ? 'debug' : 'warn');
  const projectRoot = process.cwd();

  try {
    const config = await loadConfig(projectRoot, options.config);
    const fromCli = (key: string): boolean => command.getOptionValueSource(key) === 'cli';

    const formatter = createFormatter(options.format ?? config.format, {
      colors: process.stdout.isTTY === true,
      cwd: projectRoot,
    });
    const targetVersion = parseTargetVersion(options.target ?? config.target ?? DEFAULT_TARGET_VERSION);
    const suppressions = options.suppress ?? config.suppress;
    parseSuppressions(suppressions);

    const tags = options.tags !== undefined ? options.tags.split(/[\s,]+/).filter(Boolean) : config.tags;
    const includeTests = fromCli('tests') ? options.tests : config.tests;
    const registry = withSeverityOverrides(setup.registry(command.opts()), config.checks);

    const result = await lint(
      registry,
      paths,
      {
        tags,
        includeTests,
        suppressions,
        targetVersion,
        returnSuppressed: options.showSuppressed ?? false,
      },
      setup.createLoader(projectRoot),
    );

    for (const diagnostic of result.diagnostics) {
      const text = formatter.format({ ...diagnostic, severity: severityOf(diagnostic, registry) });
      if (text) {
        console.log(text);
      }
    }

    const summary = summarize(result.diagnostics, registry);
    if (formatter.stats) {
      console.log(formatter.stats(summary));
    }
    logger.info('run finished', { ...summary, unitsChecked: result.unitsChecked, unitsFailed: result.unitsFailed });

    return exitCodeFor(summary);
  } catch (error) {
    logger.error(errorMessage(error));
    return error instanceof ConfigError ? ExitCodes.INVALID_CONFIG : ExitCodes.FAILURE;
  }
}
