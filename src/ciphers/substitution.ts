/**
 * Monoalphabetic substitution helpers.
 */

import type { RankedCount } from '../types/index.js';

/** English letters from most to least frequent. */
export const ENGLISH_FREQUENCY_ORDER = 'ETAOINSHRDLCUMWFGYPBVKJXQZ';

/** Placeholder for cipher letters that have no plaintext guess. */
export const UNMAPPED = '-';

/**
 * Replace every character that is a key of `mapping` with its value.
 * Characters without an entry pass through unchanged.
 */
export function substituteAlphabet(
  text: string,
  mapping: Record<string, string>,
): string {
  let updated = '';
  for (const ch of text) {
    updated += Object.hasOwn(mapping, ch) ? mapping[ch] : ch;
  }
  return updated;
}

/**
 * Guess a substitution table by lining up observed letter frequency with
 * English letter frequency: the most common cipher letter becomes `E`, the
 * next `T`, and so on.
 *
 * @param sortedFrequencyCounts - `[letter, count]` pairs, most frequent first.
 * @returns Upper-case cipher letter → plaintext letter. Letters never seen in
 *   the ciphertext map to {@link UNMAPPED}.
 */
export function naiveSubstitution(
  sortedFrequencyCounts: RankedCount[],
): Record<string, string> {
  const mapping: Record<string, string> = {};
  for (let code = 65; code <= 90; code++) {
    mapping[String.fromCharCode(code)] = UNMAPPED;
  }

  const limit = Math.min(sortedFrequencyCounts.length, ENGLISH_FREQUENCY_ORDER.length);
  for (let i = 0; i < limit; i++) {
    const [letter, count] = sortedFrequencyCounts[i];
    if (count === 0) break;
    mapping[letter] = ENGLISH_FREQUENCY_ORDER[i];
  }

  return mapping;
}
