/**
 * Shared string utility helpers.
 */

/** Capitalize the first letter of a string. */
export function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

/** Truncate a string to `max` characters, appending `...` if truncated. */
export function truncate(s: string, max: number): string {
  if (s.length <= max) return s;
  return s.slice(0, max - 3) + '...';
}

/** Keep only Latin letters, upper-cased. */
export function lettersOnly(s: string): string {
  return s.replace(/[^A-Za-z]/g, '').toUpperCase();
}

/** `1 pattern` / `3 patterns`. */
export function plural(n: number, noun: string): string {
  return `${n} ${noun}${n === 1 ? '' : 's'}`;
}
