/**
 * Sieve of Eratosthenes
 * Fixed-size primality table over 0..=limit with a one-shot fill and
 * bounds-checked queries
 */

import { isInteger, isSafeInteger, sum } from "lodash";
import invariant from "tiny-invariant";
import { getLogger } from "../utils/logger";
import { debugLog } from "../utils/debugMode";
import { NotPopulatedError, OutOfBoundsError } from "./errors";

const logger = getLogger(module);

const PRIME = 1;
const COMPOSITE = 0;

/**
 * Sieve class
 * Starts Unfilled; `fill()` moves it to Filled, which is terminal.
 * Queries are only answered once Filled.
 */
export class Sieve {
  private readonly _limit: number;
  // One byte per index, PRIME or COMPOSITE.
  private readonly table: Uint8Array;
  private populated = false;

  private constructor(limit: number) {
    invariant(
      isSafeInteger(limit) && limit >= 0,
      () => `limit must be a non-negative integer, got ${limit}`
    );
    this._limit = limit;
    this.table = new Uint8Array(limit + 1).fill(PRIME);
  }

  /**
   * Create a sieve over 0..=limit without populating it.
   * Every lookup fails with NotPopulatedError until `fill()` is called.
   */
  static unfilled(limit: number): Sieve {
    return new Sieve(limit);
  }

  /**
   * Create and populate a sieve over 0..=limit.
   */
  static create(limit: number): Sieve {
    const sieve = Sieve.unfilled(limit);
    sieve.fill();
    return sieve;
  }

  get limit(): number {
    return this._limit;
  }

  get isPopulated(): boolean {
    return this.populated;
  }

  /**
   * Get the max value of this sieve
   */
  max(): number {
    return this._limit;
  }

  /**
   * Populate the table. Has no effect on an already-filled sieve.
   */
  fill(): void {
    if (this.populated) {
      return;
    }

    const started = Date.now();
    const table = this.table;
    const limit = this._limit;

    table[0] = COMPOSITE;
    if (limit >= 1) {
      table[1] = COMPOSITE;
    }

    // Every composite <= limit has a prime factor <= sqrt(limit).
    const bound = Math.floor(Math.sqrt(limit));
    for (let i = 2; i <= bound; i++) {
      if (table[i] === COMPOSITE) {
        continue;
      }
      for (let multiple = 2 * i; multiple <= limit; multiple += i) {
        table[multiple] = COMPOSITE;
      }
    }

    this.populated = true;

    logger.debug(`Sieve: filled 0..=${limit} in ${Date.now() - started}ms`);
    debugLog(() => `Sieve: ${sum(table)} primes up to ${limit}`);
  }

  /**
   * Determine whether `target` is prime.
   * @throws NotPopulatedError if the sieve has not been filled
   * @throws OutOfBoundsError if `target` is not an integer in 0..=limit
   */
  lookup(target: number): boolean {
    if (!this.populated) {
      throw new NotPopulatedError();
    }
    if (!isInteger(target) || target < 0 || target > this._limit) {
      throw new OutOfBoundsError(target, this._limit);
    }
    return this.table[target] === PRIME;
  }

  /**
   * Keep only the prime candidates, in their original order and with
   * duplicates retained. The first failing lookup aborts the whole call.
   */
  filter(candidates: Iterable<number>): number[] {
    const primes: number[] = [];
    for (const candidate of candidates) {
      if (this.lookup(candidate)) {
        primes.push(candidate);
      }
    }
    return primes;
  }

  toString(): string {
    return `Sieve(limit=${this._limit}, populated=${this.populated})`;
  }
}
