/**
 * Run Command
 *
 * Usage:
 *   pipjoin run [options]
 *
 * Options:
 *   -c, --config <path>   Configuration file (default: pipjoin.config.json)
 *   --log-level <level>   Overrides `logLevel` from the file
 *   --pretty              Human-readable logs
 *
 * Exit codes: 0 when the join completes, 1 on invalid configuration, index
 * initialisation failure or a failed join, 130 when stopped by SIGINT.
 */

import { Option } from 'commander';
import type { Command } from 'commander';
import { createLogger } from '@pipjoin/core';
import type { PointIndex } from '@pipjoin/core';
import { LOG_LEVELS, loadConfig } from '../config/JoinConfig.js';
import type { JoinConfig, LogLevel } from '../config/JoinConfig.js';
import { buildJoin, createIndex } from '../wiring/buildJoin.js';

export interface RunOptions {
  readonly config: string;
  readonly logLevel?: LogLevel;
  readonly pretty?: boolean;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Join every indexed point to its enclosing polygon and append the results to the output file')
    .option('-c, --config <path>', 'configuration file', 'pipjoin.config.json')
    .addOption(new Option('--log-level <level>', 'minimum log level').choices(LOG_LEVELS))
    .option('--pretty', 'human-readable logs')
    .action(async (options: RunOptions) => {
      process.exitCode = await executeRun(options);
    });
}

/** Run one join to completion. Resolves with the process exit code. */
export async function executeRun(options: RunOptions, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const logger = createLogger({ level: options.logLevel, pretty: options.pretty });

  let config: JoinConfig;
  try {
    config = await loadConfig(options.config, env);
  } catch (error) {
    logger.fatal({ err: error }, 'configuration rejected');
    return EXIT_FAILURE;
  }
  if (options.logLevel === undefined) {
    logger.level = config.logLevel;
  }

  let index: PointIndex;
  try {
    index = await createIndex(config.index, logger);
  } catch (error) {
    logger.fatal({ err: error, backend: config.index.backend }, 'index initialisation failed');
    return EXIT_FAILURE;
  }

  const engine = buildJoin(config, index, logger);
  const onInterrupt = (): void => {
    if (engine.getStatus().status !== 'RUNNING') return;
    logger.warn('interrupt received, stopping after the group in flight');
    engine.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    await engine.start();
    return engine.getStatus().status === 'ABORTED' ? EXIT_INTERRUPTED : EXIT_OK;
  } catch (error) {
    logger.fatal({ err: error, output: config.outputFile }, 'join failed');
    return EXIT_FAILURE;
  } finally {
    process.off('SIGINT', onInterrupt);
    await index.close?.();
  }
}
