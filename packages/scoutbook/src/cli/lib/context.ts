/**
 * Command context
 *
 * Every command opens the service from the global options, runs, prints its
 * reply to stdout and closes the service. Failures go to stderr and set the
 * process exit code; the process is never killed mid-transaction.
 *
 * @module cli/lib/context
 */

import { InvalidArgumentError, type Command } from 'commander';
import { loadConfig, type ScoutbookConfig } from '../../core/config.js';
import { createScoutbookService, type ScoutbookService } from '../../core/scoutbook-service.js';
import { createLogger } from '../../core/utils/logger.js';
import { describeError, EXIT_CODES, exitCodeFor } from './exit-codes.js';

/**
 * Options declared on the root program
 */
export interface GlobalOptions {
  readonly config?: string;
  readonly database?: string;
  readonly timeout?: number;
  readonly verbose?: boolean;
}

export function configFromOptions(options: GlobalOptions): ScoutbookConfig {
  return loadConfig({
    configPath: options.config,
    overrides: {
      databaseUrl: options.database,
      timeoutMs: options.timeout,
      verbose: options.verbose,
    },
  });
}

async function openService(options: GlobalOptions): Promise<ScoutbookService | null> {
  try {
    const config = configFromOptions(options);
    return await createScoutbookService(config, {
      logger: createLogger({ module: 'cli', level: config.logLevel }),
    });
  } catch (error) {
    console.error(`Configuration error: ${describeError(error)}`);
    return null;
  }
}

/**
 * Run a command body against an open service and print what it returns
 */
export async function runWithService(
  command: Command,
  body: (service: ScoutbookService) => Promise<string>
): Promise<void> {
  const service = await openService(command.optsWithGlobals<GlobalOptions>());
  if (!service) {
    process.exitCode = EXIT_CODES.CONFIG_ERROR;
    return;
  }

  try {
    console.log(await body(service));
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);
    process.exitCode = exitCodeFor(error);
  } finally {
    await service.close();
  }
}

/**
 * Commander argument parser for positive integer ids
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`expected a positive integer, got "${value}"`);
  }
  return parsed;
}
