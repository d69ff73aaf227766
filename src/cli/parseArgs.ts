import { isSafeInteger } from 'lodash';
import { CliArgs } from '../types';

export const USAGE = 'Usage: prime-sieve <N>  (N is a non-negative integer)';

const NON_NEGATIVE_INTEGER = /^\+?\d+$/;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Parse the positional arguments (argv without the node binary and
 * script path). Exactly one non-negative integer is accepted.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  if (argv.length === 0) {
    throw new UsageError('Too few args passed!');
  }
  if (argv.length > 1) {
    throw new UsageError(`Expected exactly one argument, got ${argv.length}`);
  }

  const raw = argv[0].trim();
  if (!NON_NEGATIVE_INTEGER.test(raw)) {
    throw new UsageError(`"${argv[0]}" is not a non-negative integer`);
  }

  const target = Number(raw);
  if (!isSafeInteger(target)) {
    throw new UsageError(`"${argv[0]}" is too large`);
  }

  return { target };
}
