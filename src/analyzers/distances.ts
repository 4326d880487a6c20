/**
 * Repeat-distance and factor analysis.
 *
 * A pattern that repeats at a constant distance was most likely enciphered
 * by the same stretch of key each time, so the key length divides that
 * distance. Patterns with uneven spacing are treated as coincidences.
 */

import type { PatternTable } from '../types/index.js';
import { InvalidArgumentError } from '../utils/errors.js';

/**
 * The constant distance between consecutive occurrences, or `null` when the
 * spacing varies (or there are fewer than two occurrences).
 */
export function patternPeriod(indices: readonly number[]): number | null {
  if (indices.length < 2) return null;
  const period = indices[1] - indices[0];
  for (let i = 2; i < indices.length; i++) {
    if (indices[i] - indices[i - 1] !== period) return null;
  }
  return period;
}

/**
 * Periods of every evenly spaced pattern in the table, de-duplicated, in the
 * order first seen.
 */
export function patternDistances(patterns: PatternTable): number[] {
  const periods: number[] = [];
  for (const indices of patterns.values()) {
    const period = patternPeriod(indices);
    if (period !== null && !periods.includes(period)) {
      periods.push(period);
    }
  }
  return periods;
}

/** Divisors of `n`, ascending, from 1 to `n` inclusive. */
export function factorsOf(n: number): number[] {
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError(`Cannot factor ${n}: expected a positive integer`, { n });
  }
  const factors: number[] = [];
  for (let i = 1; i <= n; i++) {
    if (n % i === 0) factors.push(i);
  }
  return factors;
}

/**
 * Divisors shared by every period, largest first.
 *
 * @throws InvalidArgumentError when `periods` is empty: there is nothing to
 *   intersect.
 */
export function intersectFactors(periods: readonly number[]): number[] {
  if (periods.length === 0) {
    throw new InvalidArgumentError(
      'No evenly repeating patterns found; cannot derive key lengths',
    );
  }

  let common = new Set(factorsOf(periods[0]));
  for (const period of periods.slice(1)) {
    const factors = new Set(factorsOf(period));
    common = new Set([...common].filter((f) => factors.has(f)));
  }

  return [...common].sort((a, b) => b - a);
}
