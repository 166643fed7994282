import { Command, Option } from 'commander';
import chalk from 'chalk';
import {
  DEFAULT_CONFIG_FILE,
  type LogLevel,
  type OmpliftConfig,
  type ReportFormat,
  loadConfig,
  loadPatches,
  logLevelSchema,
  reportFormatSchema,
} from '../lib/config';
import { ConfigError, OmpliftError } from '../lib/errors';
import { parallelizeFile } from '../lib/parallelizer';
import { createCLILogger } from './logger';
import { formatReport } from './report';

export const DEFAULT_OUTPUT_FILE = 'output_parallel.cpp';

export const EXIT_OK = 0;
export const EXIT_IO = 2;
export const EXIT_CONFIG = 3;

export interface CliFlags {
  config: string;
  patches?: string;
  skipAnnotated?: boolean;
  dryRun?: boolean;
  format?: ReportFormat;
  logLevel?: LogLevel;
}

/**
 * Load config and patches, run the pipeline, print the report.
 * Resolves to the process exit code.
 */
export async function runCli(
  input: string,
  output: string,
  flags: CliFlags,
  options: { configRequired?: boolean } = {}
): Promise<number> {
  let config: OmpliftConfig;
  let patches: OmpliftConfig['patches'];

  try {
    config = await loadConfig(flags.config, { required: options.configRequired });
    patches = flags.patches
      ? [...config.patches, ...await loadPatches(flags.patches)]
      : config.patches;
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(chalk.red(error.message));
      return EXIT_CONFIG;
    }
    throw error;
  }

  const format = flags.format ?? config.logging.format;
  const logger = createCLILogger({
    level: flags.logLevel ?? config.logging.level,
    format,
  });

  try {
    const result = await parallelizeFile(input, output, {
      runtimeHeader: config.runtimeHeader,
      directive: config.directive,
      returnTypes: config.returnTypes,
      inductionTypes: config.inductionTypes,
      ioKeywords: config.ioKeywords,
      skipAnnotated: flags.skipAnnotated ?? config.skipAnnotated,
      patches,
      dryRun: flags.dryRun ?? false,
      onPhase: phase => logger.onPhase(phase),
    });

    for (const diagnostic of result.diagnostics) {
      logger.onDiagnostic(diagnostic);
    }

    console.log(formatReport(result, format));
    return EXIT_OK;
  } catch (error) {
    if (error instanceof OmpliftError) {
      logger.error(error.message);
      return EXIT_IO;
    }
    throw error;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('omplift')
    .description('Annotate parallelizable counting loops in C/C++ source with OpenMP directives')
    .version('1.0.0')
    .argument('<input>', 'C/C++ source file to analyze')
    .argument('[output]', 'Path for the annotated source', DEFAULT_OUTPUT_FILE)
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_FILE)
    .option('-p, --patches <path>', 'YAML or JSON list of text patches to apply after rewriting')
    .option('--skip-annotated', 'Do not add a directive to a loop that already has one')
    .option('--dry-run', 'Analyze and report without writing the output')
    .addOption(new Option('--format <format>', 'Report format').choices(reportFormatSchema.options))
    .addOption(new Option('--log-level <level>', 'Log level').choices(logLevelSchema.options))
    .action(async (input: string, output: string, flags: CliFlags, command: Command) => {
      process.exitCode = await runCli(input, output, flags, {
        configRequired: command.getOptionValueSource('config') === 'cli',
      });
    });

  return program;
}
