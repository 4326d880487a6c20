import { describe, it, expect, vi } from 'vitest';
import {
  examine,
  kasiskiTest,
  assertPatternBounds,
  DEFAULT_KASISKI_OPTIONS,
} from '../../src/analyzers/kasiski.js';
import { vigenereEncode } from '../../src/ciphers/vigenere.js';
import { InvalidArgumentError } from '../../src/utils/errors.js';
import type { KasiskiStageEvent } from '../../src/types/index.js';

const CIPHERTEXT = vigenereEncode('cryptoisshortforcryptography', 'abcd');

describe('kasiskiTest', () => {
  it('proposes the true key length among its candidates', () => {
    const lengths = kasiskiTest(CIPHERTEXT, 3, 6);
    expect(lengths).toEqual([16, 8, 4, 2, 1]);
    expect(lengths).toContain(4);
  });

  it('uses the default bounds when none are given', () => {
    expect(kasiskiTest(CIPHERTEXT)).toEqual([16, 8, 4, 2, 1]);
  });

  it('throws when nothing repeats', () => {
    expect(() => kasiskiTest('ABCDEFGHIJ')).toThrow(InvalidArgumentError);
  });
});

describe('examine', () => {
  it('reports every intermediate result', () => {
    const report = examine(CIPHERTEXT);

    expect(report).toEqual({
      ciphertextLength: 28,
      minPatternLength: 3,
      maxPatternLength: 6,
      patterns: [{ pattern: 'csastp', indices: [0, 16], period: 16 }],
      periods: [16],
      keyLengths: [16, 8, 4, 2, 1],
    });
  });

  it('honours custom pattern bounds', () => {
    const report = examine('ABCDEABCDFABCDE', {
      minPatternLength: 3,
      maxPatternLength: 10,
    });

    expect(report.patterns).toEqual([
      { pattern: 'ABCD', indices: [0, 5, 10], period: 5 },
      { pattern: 'ABCDE', indices: [0, 10], period: 10 },
    ]);
    expect(report.periods).toEqual([5, 10]);
    expect(report.keyLengths).toEqual([5, 1]);
  });

  it('falls back to default bounds for options set to undefined', () => {
    const report = examine(CIPHERTEXT, {
      minPatternLength: undefined,
      maxPatternLength: undefined,
    });
    expect(report.minPatternLength).toBe(3);
    expect(report.maxPatternLength).toBe(6);
    expect(report.keyLengths).toEqual([16, 8, 4, 2, 1]);
  });

  it('notifies the observer after each stage', () => {
    const events: KasiskiStageEvent[] = [];
    examine(CIPHERTEXT, { onStage: (event) => events.push(event) });

    expect(events).toEqual([
      { stage: 'initialize', count: 4 },
      { stage: 'maximize', count: 10 },
      { stage: 'deduplicate', count: 1 },
      { stage: 'distances', count: 1 },
      { stage: 'factors', count: 5 },
    ]);
  });

  it('stops notifying when a stage throws', () => {
    const onStage = vi.fn();
    expect(() => examine('ABCDEFGHIJ', { onStage })).toThrow(
      'No evenly repeating patterns found; cannot derive key lengths',
    );
    expect(onStage.mock.calls.map(([event]) => event.stage)).toEqual([
      'initialize',
      'maximize',
      'deduplicate',
      'distances',
    ]);
  });
});

describe('assertPatternBounds', () => {
  it('accepts the defaults', () => {
    expect(() =>
      assertPatternBounds(
        DEFAULT_KASISKI_OPTIONS.minPatternLength,
        DEFAULT_KASISKI_OPTIONS.maxPatternLength,
      ),
    ).not.toThrow();
  });

  it('accepts equal bounds', () => {
    expect(() => assertPatternBounds(4, 4)).not.toThrow();
  });

  it('rejects a non-positive minimum', () => {
    expect(() => assertPatternBounds(0, 6)).toThrow(
      'Minimum pattern length must be a positive integer, got 0',
    );
  });

  it('rejects a maximum below the minimum', () => {
    expect(() => assertPatternBounds(5, 4)).toThrow(
      'Maximum pattern length must be an integer >= 5, got 4',
    );
  });

  it('is applied by examine', () => {
    expect(() => examine(CIPHERTEXT, { minPatternLength: 2.5 })).toThrow(
      InvalidArgumentError,
    );
  });
});
