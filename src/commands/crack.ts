/**
 * `kasiski-kit crack` command implementation.
 *
 * Orchestrates: input resolution → Kasiski key lengths → per-length key
 * solving → ranked candidates → formatted output.
 */

import ora from 'ora';
import chalk from 'chalk';
import { DEFAULT_CRACK_OPTIONS, rankKeyCandidates } from '../analyzers/cracker.js';
import { kasiskiTest } from '../analyzers/kasiski.js';
import { formatCrackTable } from '../formatters/table.js';
import { formatCrackJson } from '../formatters/json.js';
import { formatCrackMarkdown } from '../formatters/markdown.js';
import { resolveInput } from '../utils/input.js';
import { errorMessage } from '../utils/errors.js';
import type { CrackCommandOptions, CrackResult } from '../types/index.js';

/**
 * Run the `crack` command.
 *
 * @param options - CLI options parsed by Commander.
 * @returns Ranked key candidates (also printed to stdout).
 */
export async function runCrack(options: CrackCommandOptions): Promise<CrackResult> {
  const spinner = ora('Reading ciphertext…').start();

  try {
    // 1 ── Resolve input ─────────────────────────────────────────────────────
    const text = await resolveInput(options);
    if (text.length === 0) {
      spinner.warn('Ciphertext is empty.');
      process.exit(0);
    }

    const crackOptions = {
      minPatternLength: options.minLength ?? DEFAULT_CRACK_OPTIONS.minPatternLength,
      maxPatternLength: options.maxLength ?? DEFAULT_CRACK_OPTIONS.maxPatternLength,
      minKeySize: options.minKey ?? DEFAULT_CRACK_OPTIONS.minKeySize,
      maxKeySize: options.maxKey ?? DEFAULT_CRACK_OPTIONS.maxKeySize,
    };

    // 2 ── Candidate key lengths ─────────────────────────────────────────────
    spinner.text = 'Running Kasiski examination…';
    const keyLengths = kasiskiTest(
      text,
      crackOptions.minPatternLength,
      crackOptions.maxPatternLength,
    );

    // 3 ── Solve and rank keys ───────────────────────────────────────────────
    spinner.text = `Scoring keys for ${keyLengths.length} candidate lengths…`;
    const candidates = rankKeyCandidates(text, keyLengths, crackOptions);
    const top = options.top ?? candidates.length;

    const result: CrackResult = {
      ciphertextLength: text.length,
      keyLengths,
      candidates: candidates.slice(0, top),
    };

    if (candidates.length === 0) {
      spinner.warn('No key lengths within the requested bounds.');
    } else {
      spinner.succeed(`Best key: ${candidates[0].key}`);
    }
    console.log('');

    // 4 ── Formatted output ──────────────────────────────────────────────────
    switch (options.format) {
      case 'json':
        console.log(formatCrackJson(result));
        break;
      case 'markdown':
        console.log(formatCrackMarkdown(result));
        break;
      default:
        console.log(formatCrackTable(result));
        break;
    }

    return result;
  } catch (error) {
    spinner.fail('Key recovery failed');
    console.error(chalk.red(`\nError: ${errorMessage(error)}`));
    process.exit(1);
  }
}
