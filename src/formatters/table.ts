/**
 * Table formatters for terminal output.
 *
 * Uses chalk for colours, boxen for bordered boxes.
 */

import chalk from 'chalk';
import boxen from 'boxen';
import type {
  CrackResult,
  FrequencyResult,
  KasiskiReport,
} from '../types/index.js';
import { plural, truncate } from '../utils/strings.js';

const PLAINTEXT_PREVIEW = 48;

function header(title: string, stats: string[]): string {
  const divider = chalk.dim('─'.repeat(55));
  return boxen(`${chalk.bold.cyan(title)}\n${divider}\n${stats.join('\n')}`, {
    padding: 1,
    borderStyle: 'round',
    borderColor: 'cyan',
  });
}

/**
 * Format a Kasiski report as a styled terminal table.
 *
 * @returns A multi-line string ready for `console.log`.
 */
export function formatKasiskiTable(report: KasiskiReport): string {
  const output: string[] = [];

  output.push(
    header('KASISKI EXAMINATION', [
      `${chalk.bold('Ciphertext length:')} ${report.ciphertextLength.toLocaleString()}`,
      `${chalk.bold('Pattern lengths:')} ${report.minPatternLength}-${report.maxPatternLength}`,
      `${chalk.bold('Repeated patterns:')} ${report.patterns.length}`,
    ]),
  );
  output.push('');

  output.push(chalk.bold('REPEATED PATTERNS'));
  output.push('');
  output.push(
    `${chalk.dim('Pattern'.padEnd(10))}  ${chalk.dim('Period')}  ${chalk.dim('Positions')}`,
  );
  output.push(chalk.dim('─'.repeat(60)));

  for (const entry of report.patterns) {
    const period =
      entry.period === null ? chalk.dim('mixed'.padStart(6)) : chalk.green(String(entry.period).padStart(6));
    output.push(
      `${chalk.yellow(entry.pattern.padEnd(10))}  ${period}  ${entry.indices.join(', ')}`,
    );
  }

  output.push('');
  output.push(
    `${chalk.bold('Periods:')} ${report.periods.join(', ')}`,
  );
  output.push(
    `${chalk.bold('Candidate key lengths:')} ${chalk.green(report.keyLengths.join(', '))}`,
  );
  output.push('');
  output.push(
    chalk.cyan("Use 'kasiski-kit crack' to recover a key for these lengths."),
  );

  return output.join('\n');
}

/** Format ranked key candidates as a styled terminal table. */
export function formatCrackTable(result: CrackResult): string {
  const output: string[] = [];

  output.push(
    header('VIGENÈRE KEY RECOVERY', [
      `${chalk.bold('Ciphertext length:')} ${result.ciphertextLength.toLocaleString()}`,
      `${chalk.bold('Kasiski key lengths:')} ${result.keyLengths.join(', ')}`,
      `${chalk.bold('Candidates:')} ${result.candidates.length}`,
    ]),
  );
  output.push('');

  if (result.candidates.length === 0) {
    output.push(chalk.dim('  No key lengths within the requested bounds.'));
    return output.join('\n');
  }

  output.push(
    `${chalk.dim('Rank')}  ${chalk.dim('Length')}  ${chalk.dim('Chi²'.padStart(9))}  ${chalk.dim('Key'.padEnd(12))}  ${chalk.dim('Plaintext')}`,
  );
  output.push(chalk.dim('─'.repeat(84)));

  result.candidates.forEach((c, i) => {
    const rank = String(i + 1).padStart(4);
    const length = String(c.keyLength).padStart(6);
    const score = c.score.toFixed(2).padStart(9);
    output.push(
      `${chalk.yellow(rank)}  ${length}  ${chalk.green(score)}  ${chalk.bold(c.key.padEnd(12))}  ${truncate(c.plaintext, PLAINTEXT_PREVIEW)}`,
    );
  });

  return output.join('\n');
}

/** Format letter and n-graph frequencies as a styled terminal table. */
export function formatFrequencyTable(result: FrequencyResult): string {
  const output: string[] = [];

  output.push(
    header('LETTER FREQUENCY', [
      `${chalk.bold('Letters:')} ${result.totalLetters.toLocaleString()}`,
      `${chalk.bold('Repeated n-graphs:')} ${plural(result.ngrams.length, `${result.ngramSize}-graph`)}`,
    ]),
  );
  output.push('');

  output.push(
    `${chalk.dim('Letter')}  ${chalk.dim('Count')}  ${chalk.dim('Share')}  ${chalk.dim('Guess')}`,
  );
  output.push(chalk.dim('─'.repeat(34)));

  for (const [letter, count] of result.ranked) {
    if (count === 0) break;
    const share = result.totalLetters > 0 ? ((count / result.totalLetters) * 100).toFixed(1) : '0.0';
    output.push(
      `${chalk.yellow(letter.padStart(6))}  ${String(count).padStart(5)}  ${share.padStart(4)}%  ${chalk.green(result.substitution[letter])}`,
    );
  }

  if (result.ngrams.length > 0) {
    output.push('');
    output.push(chalk.bold(`REPEATED ${result.ngramSize}-GRAPHS`));
    output.push('');
    for (const [ngram, count] of result.ngrams) {
      output.push(`  ${chalk.yellow(ngram)}  ${chalk.dim(`(${count}×)`)}`);
    }
  }

  output.push('');
  output.push(`${chalk.bold('Naive substitution:')} ${result.guess}`);

  return output.join('\n');
}
