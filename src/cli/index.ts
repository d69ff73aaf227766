/**
 * Command line driver
 * Builds a sieve up to N, looks up N and prints the verdict
 */

import { loadConfig } from '../config';
import { Sieve } from '../engine';
import { getLogger, setLogLevel } from '../utils/logger';
import { setDebugMode } from '../utils/debugMode';
import { getErrorReport } from '../utils/errorExplainer';
import { CliConfig } from '../types';
import { parseArgs, UsageError, USAGE } from './parseArgs';

const logger = getLogger(module);

export enum ExitCode {
  SUCCESS = 0,
  FAILURE = 1,
  USAGE = 2,
}

export function formatVerdict(target: number, isPrime: boolean): string {
  return isPrime ? `${target} is prime` : `${target} is not prime`;
}

/**
 * Run the CLI against positional arguments.
 * The verdict is handed to `print`; diagnostics go to the logger.
 */
export function run(
  argv: readonly string[],
  config: CliConfig,
  print: (line: string) => void = console.log
): ExitCode {
  try {
    const { target } = parseArgs(argv);

    const sieve = Sieve.create(target);
    logger.debug(`Built ${sieve}`);

    print(formatVerdict(target, sieve.lookup(target)));
    return ExitCode.SUCCESS;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));

    if (err instanceof UsageError) {
      logger.error(`${err.message}\n${USAGE}`);
    } else {
      logger.error('Failed to test primality', err);
    }

    if (config.debugMode) {
      logger.info(getErrorReport(err));
    }

    return err instanceof UsageError ? ExitCode.USAGE : ExitCode.FAILURE;
  }
}

/**
 * Load the config, apply it to logging and debug mode, then run.
 * A rejected config is reported at the default level and exits with FAILURE.
 */
export function main(
  argv: readonly string[],
  print: (line: string) => void = console.log
): ExitCode {
  let config: CliConfig;
  try {
    config = loadConfig();
  } catch (error) {
    logger.error('Fatal error starting prime-sieve', error);
    return ExitCode.FAILURE;
  }

  setLogLevel(config.logLevel);
  setDebugMode(config.debugMode);

  return run(argv, config, print);
}
