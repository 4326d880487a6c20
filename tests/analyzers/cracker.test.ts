import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  crackVigenereCipher,
  crackCaesar,
  rankKeyCandidates,
  solveKeyForLength,
  smallestPeriod,
  DEFAULT_CRACK_OPTIONS,
} from '../../src/analyzers/cracker.js';
import { rotate } from '../../src/ciphers/caesar.js';
import { InvalidArgumentError } from '../../src/utils/errors.js';

// ── Helpers ─────────────────────────────────────────────────────────────────

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURES_DIR = join(__dirname, '..', 'fixtures');

function fixture(name: string): string {
  return readFileSync(join(FIXTURES_DIR, name), 'utf-8').trim();
}

const PLAINTEXT = fixture('baker_plaintext.txt');
const CIPHERTEXT = fixture('baker_lemon.txt');

// ── Tests ───────────────────────────────────────────────────────────────────

describe('smallestPeriod', () => {
  it('collapses repeated keys', () => {
    expect(smallestPeriod('lemonlemon')).toBe('lemon');
    expect(smallestPeriod('abab')).toBe('ab');
    expect(smallestPeriod('aaaa')).toBe('a');
  });

  it('leaves non-repeating keys alone', () => {
    expect(smallestPeriod('abc')).toBe('abc');
    expect(smallestPeriod('abca')).toBe('abca');
    expect(smallestPeriod('')).toBe('');
  });
});

describe('solveKeyForLength', () => {
  it('recovers the key at its true length', () => {
    expect(solveKeyForLength(CIPHERTEXT, 5)).toBe('lemon');
  });

  it('recovers a repeated key at a multiple of its length', () => {
    expect(solveKeyForLength(CIPHERTEXT, 10)).toBe('lemonlemon');
  });

  it('rejects lengths outside 1..text length', () => {
    expect(() => solveKeyForLength('ABC', 0)).toThrow(InvalidArgumentError);
    expect(() => solveKeyForLength('ABC', 4)).toThrow(
      'Key length must be between 1 and 3, got 4',
    );
  });
});

describe('crackVigenereCipher', () => {
  it('ranks the true key first', () => {
    const candidates = crackVigenereCipher(CIPHERTEXT);

    expect(candidates.map((c) => c.key)).toEqual(['lemon', 'dl', 'n']);
    expect(candidates[0].keyLength).toBe(5);
    expect(candidates[0].plaintext).toBe(PLAINTEXT);
    expect(candidates[0].score).toBeCloseTo(67.909, 3);
  });

  it('orders candidates by ascending score', () => {
    const scores = crackVigenereCipher(CIPHERTEXT).map((c) => c.score);
    expect(scores).toEqual([...scores].sort((a, b) => a - b));
  });

  it('restricts key lengths to the requested range', () => {
    const keys = crackVigenereCipher(CIPHERTEXT, { minKeySize: 2, maxKeySize: 12 });
    expect(keys.map((c) => [c.keyLength, c.key])).toEqual([
      [5, 'lemon'],
      [2, 'dl'],
    ]);
  });

  it('collapses repeated keys into their shortest form', () => {
    // Only length 10 is in range; it solves to lemonlemon.
    const keys = crackVigenereCipher(CIPHERTEXT, { minKeySize: 6, maxKeySize: 12 });
    expect(keys.map((c) => [c.keyLength, c.key])).toEqual([[5, 'lemon']]);
  });

  it('returns nothing when no proposed length is in range', () => {
    expect(crackVigenereCipher(CIPHERTEXT, { minKeySize: 11, maxKeySize: 20 })).toEqual([]);
  });

  it('rejects inverted key bounds', () => {
    expect(() =>
      crackVigenereCipher(CIPHERTEXT, { minKeySize: 8, maxKeySize: 3 }),
    ).toThrow('Minimum key size (8) exceeds maximum (3)');
  });

  it('falls back to defaults for options set to undefined', () => {
    const keys = crackVigenereCipher(CIPHERTEXT, {
      minKeySize: undefined,
      maxKeySize: undefined,
      minPatternLength: undefined,
    });
    expect(keys.map((c) => c.key)).toEqual(['lemon', 'dl', 'n']);
  });

  it('exposes its defaults', () => {
    expect(DEFAULT_CRACK_OPTIONS).toEqual({
      minPatternLength: 3,
      maxPatternLength: 6,
      minKeySize: 1,
      maxKeySize: 20,
    });
  });
});

describe('rankKeyCandidates', () => {
  it('ranks the given lengths without re-examining the text', () => {
    const keys = rankKeyCandidates(CIPHERTEXT, [10, 5, 1]);
    expect(keys.map((c) => [c.keyLength, c.key])).toEqual([
      [5, 'lemon'],
      [1, 'n'],
    ]);
  });

  it('skips lengths outside the bounds', () => {
    const keys = rankKeyCandidates(CIPHERTEXT, [10, 5, 1], { minKeySize: 2, maxKeySize: 4 });
    expect(keys).toEqual([]);
  });

  it('skips lengths longer than the text', () => {
    expect(rankKeyCandidates('LXFOP', [10, 1]).map((c) => c.keyLength)).toEqual([1]);
  });

  it('rejects inverted key bounds', () => {
    expect(() =>
      rankKeyCandidates(CIPHERTEXT, [5], { minKeySize: 6, maxKeySize: 5 }),
    ).toThrow('Minimum key size (6) exceeds maximum (5)');
  });
});

describe('crackCaesar', () => {
  it('ranks the true shift first', () => {
    const ranked = crackCaesar(rotate(PLAINTEXT, 7));

    expect(ranked).toHaveLength(26);
    expect(ranked[0].shift).toBe(7);
    expect(ranked[0].plaintext).toBe(PLAINTEXT);
  });

  it('covers every shift exactly once', () => {
    const shifts = crackCaesar('KHOOR').map((c) => c.shift);
    expect([...shifts].sort((a, b) => a - b)).toEqual(
      Array.from({ length: 26 }, (_, i) => i),
    );
  });
});
