/**
 * Repeated-pattern index for Kasiski examination.
 *
 * A table is built in three passes over one ciphertext:
 *  1. {@link initializePatterns} seeds it with every repeated substring of
 *     the minimum length.
 *  2. {@link maximizePatterns} widens those patterns one character at a time
 *     until no longer repeat is found.
 *  3. {@link removeRedundantPatterns} drops shorter patterns whose every
 *     occurrence sits inside an occurrence of a longer one.
 *
 * Every pass returns a new table; inputs are never mutated.
 */

import type { PatternTable } from '../types/index.js';

// ── Seeding ─────────────────────────────────────────────────────────────────

/**
 * Group every substring of length `minPatternLength` by content and keep the
 * ones occurring at least twice, most frequent first (ties by first
 * appearance).
 */
export function initializePatterns(
  text: string,
  minPatternLength = 3,
): PatternTable {
  const occurrences = new Map<string, number[]>();

  for (let index = 0; index + minPatternLength <= text.length; index++) {
    const pattern = text.slice(index, index + minPatternLength);
    const existing = occurrences.get(pattern);
    if (existing) {
      existing.push(index);
    } else {
      occurrences.set(pattern, [index]);
    }
  }

  const ranked = [...occurrences.entries()]
    .filter(([, indices]) => indices.length > 1)
    .sort((a, b) => b[1].length - a[1].length);

  return new Map(ranked);
}

// ── Widening ────────────────────────────────────────────────────────────────

/**
 * The subset of `candidateIndices` at which `pattern` occurs in full.
 */
export function findMatches(
  text: string,
  pattern: string,
  candidateIndices: readonly number[],
): number[] {
  return candidateIndices.filter(
    (index) =>
      index + pattern.length <= text.length && text.startsWith(pattern, index),
  );
}

/**
 * Extend every pattern by one character at each of its occurrences and keep
 * the extensions that still repeat, round after round, until a round finds
 * nothing new or patterns reach `maxPatternLength`.
 *
 * An extension can only occur where its prefix does, so each candidate is
 * matched against its base pattern's indices rather than the whole text.
 *
 * @returns The input patterns followed by every extension found, shortest
 *   first.
 */
export function maximizePatterns(
  text: string,
  patterns: PatternTable,
  maxPatternLength: number,
): PatternTable {
  const result: PatternTable = new Map(patterns);
  let frontier: PatternTable = patterns;

  while (frontier.size > 0) {
    const extended: PatternTable = new Map();

    for (const [pattern, indices] of frontier) {
      const length = pattern.length + 1;
      if (length > maxPatternLength) continue;

      for (const index of indices) {
        if (index + length > text.length) continue;
        const candidate = text.slice(index, index + length);
        if (extended.has(candidate)) continue;

        const matches = findMatches(text, candidate, indices);
        if (matches.length > 1) {
          extended.set(candidate, matches);
        }
      }
    }

    for (const [pattern, indices] of extended) {
      result.set(pattern, indices);
    }
    frontier = extended;
  }

  return result;
}

// ── Redundancy elimination ──────────────────────────────────────────────────

/** Every offset at which `inner` occurs inside `outer`. */
function offsetsWithin(inner: string, outer: string): number[] {
  const offsets: number[] = [];
  let offset = outer.indexOf(inner);
  while (offset !== -1) {
    offsets.push(offset);
    offset = outer.indexOf(inner, offset + 1);
  }
  return offsets;
}

function sameIndices(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

/**
 * Whether every occurrence of `shorter` is explained by an occurrence of
 * `longer` containing it.
 */
export function isRedundant(
  shorter: string,
  shorterIndices: readonly number[],
  longer: string,
  longerIndices: readonly number[],
): boolean {
  if (shorter.length >= longer.length) return false;
  if (shorterIndices.length !== longerIndices.length) return false;

  return offsetsWithin(shorter, longer).some((offset) =>
    sameIndices(
      shorterIndices.map((index) => index - offset),
      longerIndices,
    ),
  );
}

/**
 * Drop every pattern that is redundant with respect to a longer one.
 *
 * Each pass judges all patterns against a snapshot of the table and removes
 * the redundant ones from a copy; passes repeat until nothing changes.
 */
export function removeRedundantPatterns(patterns: PatternTable): PatternTable {
  let current: PatternTable = new Map(patterns);

  for (;;) {
    const snapshot = [...current.entries()];
    const redundant = new Set<string>();

    for (const [suspect, suspectIndices] of snapshot) {
      const explained = snapshot.some(([larger, largerIndices]) =>
        isRedundant(suspect, suspectIndices, larger, largerIndices),
      );
      if (explained) redundant.add(suspect);
    }

    if (redundant.size === 0) return current;

    current = new Map(snapshot.filter(([pattern]) => !redundant.has(pattern)));
  }
}
