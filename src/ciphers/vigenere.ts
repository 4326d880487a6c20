/**
 * Vigenère cipher.
 *
 * Each character of the text is rotated by the value of the key letter at
 * the same position, the key repeating as often as needed. Non-letters are
 * left as they are but still consume a key position.
 */

import { InvalidArgumentError } from '../utils/errors.js';
import { ALPHABET_SIZE, rotateLetter } from './caesar.js';

const LOWER_A = 'a'.charCodeAt(0);

function assertKey(text: string, key: string): void {
  if (key.length === 0) {
    throw new InvalidArgumentError('Key must not be empty');
  }
  if (!/^[A-Za-z]+$/.test(key)) {
    throw new InvalidArgumentError(`Key must contain only letters, got "${key}"`, {
      key,
    });
  }
  if (key.length > text.length) {
    throw new InvalidArgumentError(
      `Key length (${key.length}) exceeds text length (${text.length})`,
      { keyLength: key.length, textLength: text.length },
    );
  }
}

/** Letter values of a key: `a`/`A` = 0 … `z`/`Z` = 25. */
export function keyShifts(key: string): number[] {
  return [...key.toLowerCase()].map((ch) => ch.charCodeAt(0) - LOWER_A);
}

/**
 * The additive inverse of a key, e.g. `cat` → `yah`. Encoding under the
 * inverse key undoes encoding under the original.
 */
export function invertKey(key: string): string {
  return keyShifts(key)
    .map((shift) =>
      String.fromCharCode(((ALPHABET_SIZE - shift) % ALPHABET_SIZE) + LOWER_A),
    )
    .join('');
}

/**
 * Encode `text` under `key`.
 *
 * @throws InvalidArgumentError if the key is empty, holds a non-letter or is
 *   longer than the text.
 */
export function vigenereEncode(text: string, key: string): string {
  assertKey(text, key);
  const shifts = keyShifts(key);
  let encoded = '';
  for (let i = 0; i < text.length; i++) {
    encoded += rotateLetter(text[i], shifts[i % shifts.length]);
  }
  return encoded;
}

/** Decode `cryptText` by encoding it under the inverted key. */
export function vigenereDecode(cryptText: string, key: string): string {
  assertKey(cryptText, key);
  return vigenereEncode(cryptText, invertKey(key));
}
