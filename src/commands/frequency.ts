/**
 * `kasiski-kit frequency` command implementation.
 *
 * Orchestrates: input resolution → letter counts → n-graph counts → naive
 * substitution guess → formatted output.
 */

import chalk from 'chalk';
import { letterCounts, sortByCount, totalCount } from '../analyzers/frequency.js';
import { getNGraphsByCount, splitWords } from '../analyzers/ngrams.js';
import { naiveSubstitution, substituteAlphabet } from '../ciphers/substitution.js';
import { formatFrequencyTable } from '../formatters/table.js';
import { formatFrequencyJson } from '../formatters/json.js';
import { formatFrequencyMarkdown } from '../formatters/markdown.js';
import { resolveInput } from '../utils/input.js';
import { errorMessage, InvalidArgumentError } from '../utils/errors.js';
import type { FrequencyCommandOptions, FrequencyResult } from '../types/index.js';

/**
 * Analyse the letter statistics of `text`.
 *
 * Word boundaries are kept for n-graph counting, so pass the text with its
 * spacing when it has any.
 */
export function analyzeText(text: string, ngramSize = 2): FrequencyResult {
  if (!Number.isInteger(ngramSize) || ngramSize < 1) {
    throw new InvalidArgumentError(`N-graph size must be a positive integer, got ${ngramSize}`);
  }

  const counts = letterCounts(text);
  const ranked = sortByCount(counts);
  const substitution = naiveSubstitution(ranked);

  return {
    totalLetters: totalCount(counts),
    ranked,
    ngramSize,
    ngrams: getNGraphsByCount(splitWords(text), ngramSize),
    substitution,
    guess: substituteAlphabet(text.toUpperCase(), substitution),
  };
}

/**
 * Run the `frequency` command.
 *
 * @param options - CLI options parsed by Commander.
 * @returns The frequency analysis (also printed to stdout).
 */
export async function runFrequency(
  options: FrequencyCommandOptions,
): Promise<FrequencyResult> {
  try {
    // Word boundaries matter for n-graphs, so the text is never stripped here.
    const text = await resolveInput({ ...options, raw: true });
    const result = analyzeText(text, options.ngram ?? 2);

    switch (options.format) {
      case 'json':
        console.log(formatFrequencyJson(result));
        break;
      case 'markdown':
        console.log(formatFrequencyMarkdown(result));
        break;
      default:
        console.log(formatFrequencyTable(result));
        break;
    }

    return result;
  } catch (error) {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exit(1);
  }
}
