/**
 * Caesar rotation.
 *
 * Letters are shifted within their own case; every other character passes
 * through untouched.
 */

import { InvalidArgumentError } from '../utils/errors.js';

export const ALPHABET_SIZE = 26;

const LOWER_A = 'a'.charCodeAt(0);
const UPPER_A = 'A'.charCodeAt(0);

/** Normalize any integer shift into `[0, 26)`. */
export function normalizeShift(shiftAmount: number): number {
  if (!Number.isInteger(shiftAmount)) {
    throw new InvalidArgumentError(
      `Shift amount must be an integer, got ${shiftAmount}`,
      { shiftAmount },
    );
  }
  return ((shiftAmount % ALPHABET_SIZE) + ALPHABET_SIZE) % ALPHABET_SIZE;
}

/**
 * Shift a single Latin letter by `shiftAmount` places, preserving case.
 * Anything that is not exactly one Latin letter is returned unchanged.
 */
export function rotateLetter(letter: string, shiftAmount: number): string {
  const shift = normalizeShift(shiftAmount);
  let base: number;
  if (/^[a-z]$/.test(letter)) {
    base = LOWER_A;
  } else if (/^[A-Z]$/.test(letter)) {
    base = UPPER_A;
  } else {
    return letter;
  }
  const offset = letter.charCodeAt(0) - base;
  return String.fromCharCode(((offset + shift) % ALPHABET_SIZE) + base);
}

/** Apply {@link rotateLetter} to every character of `text`. */
export function rotate(text: string, shiftAmount: number): string {
  let rotated = '';
  for (const ch of text) {
    rotated += rotateLetter(ch, shiftAmount);
  }
  return rotated;
}

/** All 26 rotations of `text`; the array index is the shift applied. */
export function allRotations(text: string): string[] {
  return Array.from({ length: ALPHABET_SIZE }, (_, shift) => rotate(text, shift));
}
