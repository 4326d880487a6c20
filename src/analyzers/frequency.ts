/**
 * Letter frequency analysis.
 *
 * Counts Latin letters, ranks them, and measures how far a text's letter
 * distribution is from English with a chi-squared statistic.
 */

import type { LetterCounts, RankedCount } from '../types/index.js';

/** Relative frequency (percent) of each letter in English text. */
export const ENGLISH_LETTER_FREQUENCIES: Readonly<Record<string, number>> = {
  A: 8.167, B: 1.492, C: 2.782, D: 4.253, E: 12.702, F: 2.228, G: 2.015,
  H: 6.094, I: 6.966, J: 0.153, K: 0.772, L: 4.025, M: 2.406, N: 6.749,
  O: 7.507, P: 1.929, Q: 0.095, R: 5.987, S: 6.327, T: 9.056, U: 2.758,
  V: 0.978, W: 2.36, X: 0.15, Y: 1.974, Z: 0.074,
};

export const UPPERCASE_LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

/**
 * Count each letter of `text`, case-insensitively. The result always holds
 * all 26 upper-case letters, in alphabetical order.
 */
export function letterCounts(text: string): LetterCounts {
  const counts: LetterCounts = {};
  for (const letter of UPPERCASE_LETTERS) counts[letter] = 0;

  for (const ch of text.toUpperCase()) {
    if (ch >= 'A' && ch <= 'Z') counts[ch] += 1;
  }
  return counts;
}

/** Sum of all counts. */
export function totalCount(counts: LetterCounts): number {
  return Object.values(counts).reduce((sum, n) => sum + n, 0);
}

/**
 * Rank `[key, count]` pairs by count, descending. Equal counts keep their
 * original order.
 */
export function sortByCount(counts: Record<string, number>): RankedCount[] {
  return Object.entries(counts).sort((a, b) => b[1] - a[1]);
}

/**
 * Chi-squared statistic of `text`'s letter counts against English.
 *
 * Lower means closer to English. Text without letters scores `Infinity`.
 */
export function chiSquared(text: string): number {
  const counts = letterCounts(text);
  const total = totalCount(counts);
  if (total === 0) return Infinity;

  let statistic = 0;
  for (const letter of UPPERCASE_LETTERS) {
    const expected = (total * ENGLISH_LETTER_FREQUENCIES[letter]) / 100;
    const diff = counts[letter] - expected;
    statistic += (diff * diff) / expected;
  }
  return statistic;
}
