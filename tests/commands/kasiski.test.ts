import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

// ── Resolve fixture directory ────────────────────────────────────────────────

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURES_DIR = path.resolve(__dirname, '..', 'fixtures');

// ── Mock ora to suppress spinner output ──────────────────────────────────────

interface SpinnerStub {
  texts: string[];
  succeed: unknown;
  fail: unknown;
  warn: unknown;
}

const spinners = vi.hoisted(() => {
  const created: SpinnerStub[] = [];
  return created;
});

vi.mock('ora', () => ({
  default: () => {
    const spinner = {
      start: vi.fn().mockReturnThis(),
      succeed: vi.fn().mockReturnThis(),
      fail: vi.fn().mockReturnThis(),
      warn: vi.fn().mockReturnThis(),
      stop: vi.fn().mockReturnThis(),
      text: '',
      texts: [] as string[],
    };
    spinners.push(spinner);
    // Record every assignment to `.text`
    return new Proxy(spinner, {
      set(target, prop, value) {
        if (prop === 'text') {
          target.text = String(value);
          target.texts.push(String(value));
          return true;
        }
        return Reflect.set(target, prop, value);
      },
    });
  },
}));

// ── Import after mocks ──────────────────────────────────────────────────────

import { runKasiski, describeStage } from '../../src/commands/kasiski.js';

// ── Helpers ──────────────────────────────────────────────────────────────────

/** `vigenereEncode('cryptoisshortforcryptography', 'abcd')` */
const CIPHERTEXT = 'csastpkvsiqutgqucsastpiuaqjb';
const OUTPUT_DIR = path.join(os.tmpdir(), 'kasiski-kit-kasiski-command-test');

function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1B\[[0-9;]*[a-zA-Z]/g, '');
}

// ── Tests ────────────────────────────────────────────────────────────────────

describe('describeStage', () => {
  it('names the stage and pluralises its count', () => {
    expect(describeStage({ stage: 'maximize', count: 10 })).toBe(
      'Maximize: 10 widened patterns',
    );
    expect(describeStage({ stage: 'factors', count: 1 })).toBe('Factors: 1 key length');
    expect(describeStage({ stage: 'distances', count: 2 })).toBe('Distances: 2 periods');
  });
});

describe('runKasiski', () => {
  let logSpy: MockInstance<Parameters<typeof console.log>, void>;
  let errorSpy: MockInstance<Parameters<typeof console.error>, void>;
  let exitSpy: MockInstance<Parameters<typeof process.exit>, never>;

  beforeEach(() => {
    spinners.length = 0;
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    exitSpy = vi
      .spyOn(process, 'exit')
      .mockImplementation(((code?: number) => {
        throw new Error(`process.exit(${code})`);
      }) as never);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(OUTPUT_DIR, { recursive: true, force: true });
  });

  // ── Success cases ───────────────────────────────────────────────────────

  it('returns the report for argument text', async () => {
    const report = await runKasiski({ text: CIPHERTEXT });

    expect(report.ciphertextLength).toBe(28);
    expect(report.patterns).toEqual([
      { pattern: 'CSASTP', indices: [0, 16], period: 16 },
    ]);
    expect(report.keyLengths).toEqual([16, 8, 4, 2, 1]);
  });

  it('reports each stage on the spinner', async () => {
    await runKasiski({ text: CIPHERTEXT });

    expect(spinners[0].texts).toEqual([
      'Examining 28 characters…',
      'Initialize: 4 seed patterns',
      'Maximize: 10 widened patterns',
      'Deduplicate: 1 distinct pattern',
      'Distances: 1 period',
      'Factors: 5 key lengths',
    ]);
  });

  it('reads ciphertext from --input-file', async () => {
    const report = await runKasiski({
      inputFile: path.join(FIXTURES_DIR, 'baker_lemon.txt'),
    });

    expect(report.ciphertextLength).toBe(500);
    expect(report.keyLengths).toEqual([250, 125, 50, 25, 10, 5, 2, 1]);
  });

  it('prints JSON when asked', async () => {
    await runKasiski({ text: CIPHERTEXT, format: 'json' });

    const printed = String(logSpy.mock.calls[logSpy.mock.calls.length - 1][0]);
    expect(JSON.parse(printed).keyLengths).toEqual([16, 8, 4, 2, 1]);
  });

  it('honours custom pattern lengths', async () => {
    const report = await runKasiski({ text: CIPHERTEXT, minLength: 4, maxLength: 5 });

    expect(report.minPatternLength).toBe(4);
    expect(report.maxPatternLength).toBe(5);
    expect(report.patterns.map((p) => p.pattern)).toEqual(['CSAST', 'SASTP']);
  });

  it('writes the report to --output', async () => {
    const output = path.join(OUTPUT_DIR, 'nested', 'report.md');
    await runKasiski({ text: CIPHERTEXT, format: 'markdown', output });

    const written = await fs.readFile(output, 'utf-8');
    expect(written.split('\n')[0]).toBe('# Kasiski Examination');
    expect(written).toContain('| `CSASTP` | 16 | 0, 16 |');

    const logged = logSpy.mock.calls.map((call) => stripAnsi(String(call[0])));
    expect(logged).toContain(`Report written to: ${output}`);
  });

  // ── Error cases ─────────────────────────────────────────────────────────

  it('exits with 0 on empty ciphertext', async () => {
    await expect(runKasiski({ text: '1234 !?' })).rejects.toThrow('process.exit');
    expect(exitSpy).toHaveBeenNthCalledWith(1, 0);
    expect(spinners[0].warn).toHaveBeenCalledWith('Ciphertext is empty.');
  });

  it('exits with 1 when nothing repeats evenly', async () => {
    await expect(runKasiski({ text: 'ABCDEFGHIJ' })).rejects.toThrow('process.exit(1)');

    expect(spinners[0].fail).toHaveBeenCalledWith('Examination failed');
    const message = stripAnsi(String(errorSpy.mock.calls[0][0]));
    expect(message).toBe(
      '\nError: No evenly repeating patterns found; cannot derive key lengths',
    );
  });

  it('exits with 1 for inverted pattern bounds', async () => {
    await expect(
      runKasiski({ text: CIPHERTEXT, minLength: 5, maxLength: 3 }),
    ).rejects.toThrow('process.exit(1)');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('exits with 1 for a missing input file', async () => {
    const missing = path.join(FIXTURES_DIR, 'does-not-exist.txt');
    await expect(runKasiski({ inputFile: missing })).rejects.toThrow('process.exit(1)');
    expect(stripAnsi(String(errorSpy.mock.calls[0][0]))).toBe(
      `\nError: Input file not found: ${missing}`,
    );
  });
});
