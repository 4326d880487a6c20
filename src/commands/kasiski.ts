/**
 * `kasiski-kit kasiski` command implementation.
 *
 * Orchestrates: input resolution → Kasiski examination (spinner follows each
 * stage) → formatted output → optional report file.
 */

import ora from 'ora';
import chalk from 'chalk';
import { examine, DEFAULT_KASISKI_OPTIONS } from '../analyzers/kasiski.js';
import { formatKasiskiTable } from '../formatters/table.js';
import { formatKasiskiJson } from '../formatters/json.js';
import { formatKasiskiMarkdown } from '../formatters/markdown.js';
import { resolveInput } from '../utils/input.js';
import { writeFileSafe } from '../utils/file-operations.js';
import { errorMessage } from '../utils/errors.js';
import { capitalize, plural } from '../utils/strings.js';
import type {
  KasiskiCommandOptions,
  KasiskiReport,
  KasiskiStageEvent,
} from '../types/index.js';

const STAGE_NOUNS: Record<KasiskiStageEvent['stage'], string> = {
  initialize: 'seed pattern',
  maximize: 'widened pattern',
  deduplicate: 'distinct pattern',
  distances: 'period',
  factors: 'key length',
};

/** Spinner text for a finished stage, e.g. `Maximize: 10 widened patterns`. */
export function describeStage(event: KasiskiStageEvent): string {
  return `${capitalize(event.stage)}: ${plural(event.count, STAGE_NOUNS[event.stage])}`;
}

/**
 * Run the `kasiski` command.
 *
 * @param options - CLI options parsed by Commander.
 * @returns The examination report (also printed to stdout).
 */
export async function runKasiski(
  options: KasiskiCommandOptions,
): Promise<KasiskiReport> {
  const spinner = ora('Reading ciphertext…').start();

  try {
    // 1 ── Resolve input ─────────────────────────────────────────────────────
    const text = await resolveInput(options);
    if (text.length === 0) {
      spinner.warn('Ciphertext is empty.');
      process.exit(0);
    }

    // 2 ── Examine ───────────────────────────────────────────────────────────
    spinner.text = `Examining ${text.length} characters…`;
    const report = examine(text, {
      minPatternLength: options.minLength ?? DEFAULT_KASISKI_OPTIONS.minPatternLength,
      maxPatternLength: options.maxLength ?? DEFAULT_KASISKI_OPTIONS.maxPatternLength,
      onStage: (event) => {
        spinner.text = describeStage(event);
      },
    });

    spinner.succeed('Examination complete!');
    console.log('');

    // 3 ── Formatted output ──────────────────────────────────────────────────
    let content: string;
    switch (options.format) {
      case 'json':
        content = formatKasiskiJson(report);
        break;
      case 'markdown':
        content = formatKasiskiMarkdown(report);
        break;
      default:
        content = formatKasiskiTable(report);
        break;
    }

    // 4 ── Output ────────────────────────────────────────────────────────────
    if (options.output) {
      await writeFileSafe(options.output, content + '\n');
      console.log(chalk.green(`Report written to: ${options.output}`));
    } else {
      console.log(content);
    }

    return report;
  } catch (error) {
    spinner.fail('Examination failed');
    console.error(chalk.red(`\nError: ${errorMessage(error)}`));
    process.exit(1);
  }
}
