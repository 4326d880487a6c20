/**
 * JSON formatters.
 *
 * Serialise command results to pretty-printed JSON for piping or
 * downstream consumption by other tools.
 */

import type { CrackResult, FrequencyResult, KasiskiReport } from '../types/index.js';

/**
 * Format a Kasiski report as pretty-printed JSON.
 *
 * @returns A JSON string (2-space indented).
 */
export function formatKasiskiJson(report: KasiskiReport): string {
  return JSON.stringify(report, null, 2);
}

export function formatCrackJson(result: CrackResult): string {
  return JSON.stringify(result, null, 2);
}

export function formatFrequencyJson(result: FrequencyResult): string {
  return JSON.stringify(
    {
      totalLetters: result.totalLetters,
      letters: result.ranked.map(([letter, count]) => ({ letter, count })),
      ngramSize: result.ngramSize,
      ngrams: result.ngrams.map(([ngram, count]) => ({ ngram, count })),
      substitution: result.substitution,
      guess: result.guess,
    },
    null,
    2,
  );
}
