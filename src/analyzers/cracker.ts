/**
 * Vigenère and Caesar key recovery.
 *
 * Candidate key lengths come from the Kasiski examination. For each length
 * the ciphertext is split into columns enciphered by the same key letter,
 * and each column's shift is chosen by chi-squared fit against English.
 * Candidates are then ranked by the fit of their full decryption.
 */

import type { CaesarCandidate, KeyCandidate } from '../types/index.js';
import { ALPHABET_SIZE, rotate } from '../ciphers/caesar.js';
import { vigenereDecode } from '../ciphers/vigenere.js';
import { InvalidArgumentError } from '../utils/errors.js';
import { chiSquared } from './frequency.js';
import { DEFAULT_KASISKI_OPTIONS, kasiskiTest } from './kasiski.js';
import type { KasiskiOptions } from './kasiski.js';

// ── Options ─────────────────────────────────────────────────────────────────

export interface CrackOptions extends Omit<KasiskiOptions, 'onStage'> {
  /** Shortest key length to try (inclusive). Default: 1 */
  minKeySize?: number;
  /** Longest key length to try (inclusive). Default: 20 */
  maxKeySize?: number;
}

export const DEFAULT_CRACK_OPTIONS: Required<CrackOptions> = {
  ...DEFAULT_KASISKI_OPTIONS,
  minKeySize: 1,
  maxKeySize: 20,
};

const LOWER_A = 'a'.charCodeAt(0);

// ── Helpers ─────────────────────────────────────────────────────────────────

/** Characters at positions `offset`, `offset + step`, `offset + 2·step`, … */
function column(text: string, offset: number, step: number): string {
  let letters = '';
  for (let i = offset; i < text.length; i += step) letters += text[i];
  return letters;
}

/** Shortest key that repeats to `key`, e.g. `lemonlemon` → `lemon`. */
export function smallestPeriod(key: string): string {
  for (let size = 1; size < key.length; size++) {
    if (key.length % size !== 0) continue;
    const unit = key.slice(0, size);
    if (unit.repeat(key.length / size) === key) return unit;
  }
  return key;
}

/** The shift whose reversal makes `letters` look most like English. */
function bestShift(letters: string): number {
  let best = 0;
  let bestScore = Infinity;
  for (let shift = 0; shift < ALPHABET_SIZE; shift++) {
    const score = chiSquared(rotate(letters, -shift));
    if (score < bestScore) {
      best = shift;
      bestScore = score;
    }
  }
  return best;
}

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * Best-fitting key of exactly `keyLength` letters, chosen column by column.
 */
export function solveKeyForLength(cryptText: string, keyLength: number): string {
  if (!Number.isInteger(keyLength) || keyLength < 1 || keyLength > cryptText.length) {
    throw new InvalidArgumentError(
      `Key length must be between 1 and ${cryptText.length}, got ${keyLength}`,
      { keyLength, textLength: cryptText.length },
    );
  }

  let key = '';
  for (let i = 0; i < keyLength; i++) {
    key += String.fromCharCode(LOWER_A + bestShift(column(cryptText, i, keyLength)));
  }
  return key;
}

/** Key size bounds for {@link rankKeyCandidates}. */
export type KeySizeBounds = Pick<CrackOptions, 'minKeySize' | 'maxKeySize'>;

/**
 * Solve and rank one key per proposed length.
 *
 * Lengths outside `[minKeySize, maxKeySize]` or longer than the text are
 * skipped. Keys that merely repeat a shorter key collapse into it. The
 * result is ordered best first; it is empty when no length falls within
 * bounds.
 */
export function rankKeyCandidates(
  cryptText: string,
  keyLengths: readonly number[],
  bounds?: KeySizeBounds,
): KeyCandidate[] {
  const minKeySize = bounds?.minKeySize ?? DEFAULT_CRACK_OPTIONS.minKeySize;
  const maxKeySize = bounds?.maxKeySize ?? DEFAULT_CRACK_OPTIONS.maxKeySize;
  if (minKeySize > maxKeySize) {
    throw new InvalidArgumentError(
      `Minimum key size (${minKeySize}) exceeds maximum (${maxKeySize})`,
      { minKeySize, maxKeySize },
    );
  }

  const inRange = keyLengths.filter(
    (length) =>
      length >= minKeySize && length <= maxKeySize && length <= cryptText.length,
  );

  const byKey = new Map<string, KeyCandidate>();
  for (const length of inRange) {
    const key = smallestPeriod(solveKeyForLength(cryptText, length));
    const plaintext = vigenereDecode(cryptText, key);
    const candidate: KeyCandidate = {
      keyLength: key.length,
      key,
      score: chiSquared(plaintext),
      plaintext,
    };
    const existing = byKey.get(key);
    if (!existing || candidate.score < existing.score) {
      byKey.set(key, candidate);
    }
  }

  return [...byKey.values()].sort(
    (a, b) => a.score - b.score || a.keyLength - b.keyLength,
  );
}

/**
 * Recover likely Vigenère keys for `cryptText`, trying the lengths proposed
 * by {@link kasiskiTest}. See {@link rankKeyCandidates} for the ranking.
 */
export function crackVigenereCipher(
  cryptText: string,
  options?: CrackOptions,
): KeyCandidate[] {
  const keyLengths = kasiskiTest(
    cryptText,
    options?.minPatternLength ?? DEFAULT_CRACK_OPTIONS.minPatternLength,
    options?.maxPatternLength ?? DEFAULT_CRACK_OPTIONS.maxPatternLength,
  );
  return rankKeyCandidates(cryptText, keyLengths, options);
}

/**
 * Every Caesar shift of `cryptText`, ranked by chi-squared fit. `shift` is
 * the amount the plaintext was rotated by.
 */
export function crackCaesar(cryptText: string): CaesarCandidate[] {
  const candidates: CaesarCandidate[] = [];
  for (let shift = 0; shift < ALPHABET_SIZE; shift++) {
    const plaintext = rotate(cryptText, -shift);
    candidates.push({ shift, score: chiSquared(plaintext), plaintext });
  }
  return candidates.sort((a, b) => a.score - b.score || a.shift - b.shift);
}
