/**
 * N-graph counting (digraphs for n = 2, trigraphs for n = 3, …) over a list
 * of words.
 */

import type { RankedCount } from '../types/index.js';

function bump(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

/** Every n-graph of every word, including ones seen only once. */
export function getNGraphs(words: string[], n = 2): Map<string, number> {
  const counts = new Map<string, number>();
  for (const word of words) {
    for (let i = 0; i + n <= word.length; i++) {
      bump(counts, word.slice(i, i + n));
    }
  }
  return counts;
}

/** The leading n-graph of each word at least `n` long. */
export function getNGraphPrefixes(words: string[], n = 2): Map<string, number> {
  const counts = new Map<string, number>();
  for (const word of words) {
    if (word.length < n) continue;
    bump(counts, word.slice(0, n));
  }
  return counts;
}

/** The trailing n-graph of each word at least `n` long. */
export function getNGraphSuffixes(words: string[], n = 2): Map<string, number> {
  const counts = new Map<string, number>();
  for (const word of words) {
    if (word.length < n) continue;
    bump(counts, word.slice(word.length - n));
  }
  return counts;
}

function repeatedByCount(counts: Map<string, number>): RankedCount[] {
  return [...counts.entries()]
    .filter(([, count]) => count > 1)
    .sort((a, b) => b[1] - a[1]);
}

/** N-graphs seen more than once, most frequent first. */
export function getNGraphsByCount(words: string[], n = 2): RankedCount[] {
  return repeatedByCount(getNGraphs(words, n));
}

export function getNGraphPrefixesByCount(words: string[], n = 2): RankedCount[] {
  return repeatedByCount(getNGraphPrefixes(words, n));
}

export function getNGraphSuffixesByCount(words: string[], n = 2): RankedCount[] {
  return repeatedByCount(getNGraphSuffixes(words, n));
}

/** Split text into upper-case runs of letters. */
export function splitWords(text: string): string[] {
  return text.toUpperCase().split(/[^A-Z]+/).filter((w) => w.length > 0);
}
