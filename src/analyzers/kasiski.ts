/**
 * Kasiski examination.
 *
 * Orchestrates: pattern seeding → widening → redundancy removal → repeat
 * distances → factor intersection, yielding candidate Vigenère key lengths.
 */

import type {
  KasiskiObserver,
  KasiskiReport,
  PatternEntry,
} from '../types/index.js';
import { InvalidArgumentError } from '../utils/errors.js';
import {
  initializePatterns,
  maximizePatterns,
  removeRedundantPatterns,
} from './patterns.js';
import {
  intersectFactors,
  patternDistances,
  patternPeriod,
} from './distances.js';

// ── Options ─────────────────────────────────────────────────────────────────

/** Configuration for a Kasiski examination. */
export interface KasiskiOptions {
  /** Length of the seed patterns. Default: 3 */
  minPatternLength?: number;
  /** Longest pattern the widening pass may build. Default: 6 */
  maxPatternLength?: number;
  /** Called after each stage with the number of items it produced. */
  onStage?: KasiskiObserver;
}

export const DEFAULT_KASISKI_OPTIONS: Required<Omit<KasiskiOptions, 'onStage'>> = {
  minPatternLength: 3,
  maxPatternLength: 6,
};

export function assertPatternBounds(min: number, max: number): void {
  if (!Number.isInteger(min) || min < 1) {
    throw new InvalidArgumentError(
      `Minimum pattern length must be a positive integer, got ${min}`,
      { minPatternLength: min },
    );
  }
  if (!Number.isInteger(max) || max < min) {
    throw new InvalidArgumentError(
      `Maximum pattern length must be an integer >= ${min}, got ${max}`,
      { minPatternLength: min, maxPatternLength: max },
    );
  }
}

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * Run the full examination and return every intermediate result.
 *
 * @throws InvalidArgumentError for bad pattern bounds, or when no pattern
 *   repeats at a constant distance.
 */
export function examine(cryptText: string, options?: KasiskiOptions): KasiskiReport {
  const minPatternLength =
    options?.minPatternLength ?? DEFAULT_KASISKI_OPTIONS.minPatternLength;
  const maxPatternLength =
    options?.maxPatternLength ?? DEFAULT_KASISKI_OPTIONS.maxPatternLength;
  const onStage = options?.onStage;
  assertPatternBounds(minPatternLength, maxPatternLength);

  const seeded = initializePatterns(cryptText, minPatternLength);
  onStage?.({ stage: 'initialize', count: seeded.size });

  const maximized = maximizePatterns(cryptText, seeded, maxPatternLength);
  onStage?.({ stage: 'maximize', count: maximized.size });

  const final = removeRedundantPatterns(maximized);
  onStage?.({ stage: 'deduplicate', count: final.size });

  const periods = patternDistances(final);
  onStage?.({ stage: 'distances', count: periods.length });

  const keyLengths = intersectFactors(periods);
  onStage?.({ stage: 'factors', count: keyLengths.length });

  const patterns: PatternEntry[] = [...final.entries()].map(([pattern, indices]) => ({
    pattern,
    indices,
    period: patternPeriod(indices),
  }));

  return {
    ciphertextLength: cryptText.length,
    minPatternLength,
    maxPatternLength,
    patterns,
    periods,
    keyLengths,
  };
}

/**
 * Plausible Vigenère key lengths for `cryptText`, longest first.
 */
export function kasiskiTest(
  cryptText: string,
  minPatternLength = DEFAULT_KASISKI_OPTIONS.minPatternLength,
  maxPatternLength = DEFAULT_KASISKI_OPTIONS.maxPatternLength,
): number[] {
  return examine(cryptText, { minPatternLength, maxPatternLength }).keyLengths;
}
