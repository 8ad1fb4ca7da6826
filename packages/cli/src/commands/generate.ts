/**
 * Generate command - run the generation jobs of a config file
 */

import { Command } from 'commander';
import {
  ConfigError,
  Generator,
  closeLogger,
  createLogger,
  isLogLevel,
  loadConfig,
  loadRegistrySnapshot,
  LOG_LEVELS,
  type GenerationResult,
  type LogLevel,
} from '@opbind/core';
import { exitWithFailure } from '../utils/errorFormatter.js';

export interface GenerateOptions {
  config: string;
  job?: string[];
  quiet?: boolean;
  verbose?: boolean;
  logLevel?: string;
  logFile?: string;
}

/**
 * Determine log level from CLI options.
 * Priority: --log-level > --quiet > --verbose > config logLevel > 'info'
 */
export function getLogLevel(
  options: Pick<GenerateOptions, 'quiet' | 'verbose' | 'logLevel'>,
  configLevel?: LogLevel
): LogLevel {
  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      throw new ConfigError(
        `Invalid --log-level "${options.logLevel}"`,
        'ERR_CONFIG_INVALID',
        {},
        `Use one of: ${LOG_LEVELS.join(', ')}`
      );
    }
    return options.logLevel;
  }
  if (options.quiet) return 'errors';
  if (options.verbose) return 'debug';
  return configLevel ?? 'info';
}

/**
 * Load config and registry, then run the selected jobs (all jobs when none
 * are named). Throws on the first failure.
 */
export async function runGenerate(options: GenerateOptions): Promise<GenerationResult[]> {
  const config = loadConfig(options.config);
  const logger = createLogger(getLogLevel(options, config.logLevel), {
    ...(options.logFile !== undefined ? { logFile: options.logFile } : {}),
  });

  try {
    let jobs = config.jobs;
    if (options.job && options.job.length > 0) {
      const known = new Set(config.jobs.map(j => j.name));
      const unknown = options.job.filter(name => !known.has(name));
      if (unknown.length > 0) {
        throw new ConfigError(
          `Unknown job: ${unknown.join(', ')}`,
          'ERR_CONFIG_INVALID',
          { filePath: config.configPath },
          `Available jobs: ${[...known].join(', ')}`
        );
      }
      const selected = new Set(options.job);
      jobs = config.jobs.filter(j => selected.has(j.name));
    }

    logger.debug('Loaded config', { configPath: config.configPath, jobs: jobs.length });
    const registry = loadRegistrySnapshot(config.registry);
    logger.info('Loaded registry', { path: config.registry, operators: registry.listAllOpNames().length });

    const generator = new Generator({
      registry,
      renames: config.reservedNames,
      denyList: config.denyList,
      logger,
    });
    return generator.run(jobs);
  } finally {
    await closeLogger(logger);
  }
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export const generateCommand = new Command('generate')
  .description('Generate operator bindings from a config file')
  .option('-c, --config <path>', 'Config file, or directory containing opbind.config.yaml', '.')
  .option('-j, --job <name>', 'Run only this job (repeatable)', collect, [])
  .option('-q, --quiet', 'Only print errors')
  .option('-v, --verbose', 'Show debug logging')
  .option('--log-level <level>', 'Set log level (silent, errors, warnings, info, debug)')
  .option('--log-file <path>', 'Write all log output to a file')
  .addHelpText('after', `
Examples:
  opbind generate                          Run every job in ./opbind.config.yaml
  opbind generate -c bindings/opbind.config.yaml
  opbind generate --job graph-typed        Run one job
  opbind generate --log-file gen.log       Mirror logs to a file
`)
  .action(async (options: GenerateOptions) => {
    try {
      const results = await runGenerate(options);
      if (!options.quiet) {
        for (const result of results) {
          console.log(`✓ ${result.job}: ${result.members.length} members → ${result.output}`);
        }
      }
    } catch (err) {
      exitWithFailure(err);
    }
  });
