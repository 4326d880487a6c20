#!/usr/bin/env node
/**
 * kasiski-kit command-line entry point.
 *
 * Wires Commander sub-commands to their `run*` implementations.
 */

import { Command, InvalidArgumentError as CommanderArgumentError, Option } from 'commander';
import { runKasiski } from './commands/kasiski.js';
import { runCrack } from './commands/crack.js';
import { runVigenere } from './commands/vigenere.js';
import { runCaesar } from './commands/caesar.js';
import { runFrequency } from './commands/frequency.js';
import { runRoute } from './commands/route.js';
import type {
  CipherMode,
  CrackCommandOptions,
  FrequencyCommandOptions,
  KasiskiCommandOptions,
  OutputFormat,
} from './types/index.js';

// ── Argument parsers ────────────────────────────────────────────────────────

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new CommanderArgumentError('Not an integer.');
  }
  return parsed;
}

function parsePositiveInteger(value: string): number {
  const parsed = parseInteger(value);
  if (parsed < 1) {
    throw new CommanderArgumentError('Must be at least 1.');
  }
  return parsed;
}

const FORMATS: OutputFormat[] = ['table', 'json', 'markdown'];
const MODES: CipherMode[] = ['encode', 'decode'];

function formatOption(defaultFormat: OutputFormat): Option {
  return new Option('-f, --format <format>', 'output format')
    .choices(FORMATS)
    .default(defaultFormat);
}

function parseMode(value: string): CipherMode {
  const mode = MODES.find((m) => m === value);
  if (!mode) {
    throw new CommanderArgumentError(`Expected one of: ${MODES.join(', ')}.`);
  }
  return mode;
}

// ── Program ─────────────────────────────────────────────────────────────────

const program = new Command();

program
  .name('kasiski-kit')
  .description('Classical cipher toolkit: Caesar, Vigenère and route ciphers, Kasiski examination and key recovery')
  .version('0.1.0');

program
  .command('kasiski')
  .description('Run a Kasiski examination and list candidate Vigenère key lengths')
  .argument('[text]', 'ciphertext (or use --input-file)')
  .option('-i, --input-file <path>', 'read the ciphertext from a file')
  .option('--min-length <n>', 'seed pattern length', parsePositiveInteger, 3)
  .option('--max-length <n>', 'longest pattern to build', parsePositiveInteger, 6)
  .option('--raw', 'keep non-letters and case instead of normalising the input')
  .addOption(formatOption('table'))
  .option('-o, --output <path>', 'write the report to a file')
  .action(async (text: string | undefined, opts: Omit<KasiskiCommandOptions, 'text'>) => {
    await runKasiski({ text, ...opts });
  });

program
  .command('crack')
  .description('Recover likely Vigenère keys with Kasiski examination and chi-squared scoring')
  .argument('[text]', 'ciphertext (or use --input-file)')
  .option('-i, --input-file <path>', 'read the ciphertext from a file')
  .option('--min-length <n>', 'seed pattern length', parsePositiveInteger, 3)
  .option('--max-length <n>', 'longest pattern to build', parsePositiveInteger, 6)
  .option('--min-key <n>', 'shortest key length to try', parsePositiveInteger, 1)
  .option('--max-key <n>', 'longest key length to try', parsePositiveInteger, 20)
  .option('-t, --top <n>', 'number of candidates to show', parsePositiveInteger)
  .option('--raw', 'keep non-letters and case instead of normalising the input')
  .addOption(formatOption('table'))
  .action(async (text: string | undefined, opts: Omit<CrackCommandOptions, 'text'>) => {
    await runCrack({ text, ...opts });
  });

program
  .command('vigenere')
  .description('Encode or decode text with a Vigenère key')
  .argument('<mode>', 'encode | decode', parseMode)
  .argument('<text>', 'text to transform')
  .requiredOption('-k, --key <key>', 'key letters')
  .action((mode: CipherMode, text: string, opts: { key: string }) => {
    runVigenere({ mode, text, key: opts.key });
  });

program
  .command('caesar')
  .description('Rotate text, list every rotation, or rank rotations by fit to English')
  .argument('<text>', 'text to rotate')
  .option('-s, --shift <n>', 'rotation amount (default 13)', parseInteger)
  .option('-a, --all', 'print all 26 rotations')
  .option('-c, --crack', 'rank rotations by how English they look')
  .action((text: string, opts: { shift?: number; all?: boolean; crack?: boolean }) => {
    runCaesar({ text, ...opts });
  });

program
  .command('frequency')
  .description('Count letters and n-graphs and guess a substitution')
  .argument('[text]', 'text (or use --input-file)')
  .option('-i, --input-file <path>', 'read the text from a file')
  .option('-n, --ngram <n>', 'n-graph size', parsePositiveInteger, 2)
  .addOption(formatOption('table'))
  .action(async (text: string | undefined, opts: Omit<FrequencyCommandOptions, 'text'>) => {
    await runFrequency({ text, ...opts });
  });

program
  .command('route')
  .description('Encode or decode a spiral route cipher')
  .argument('<mode>', 'encode | decode', parseMode)
  .argument('<text>', 'text to transform')
  .requiredOption('-w, --width <n>', 'grid width', parsePositiveInteger)
  .requiredOption('-H, --height <n>', 'grid height', parsePositiveInteger)
  .option('--counterclockwise', 'walk each ring counter-clockwise')
  .option('--outward', 'spiral from the centre outwards')
  .option('-p, --padding <char>', 'character used to fill the grid', 'X')
  .action(
    (
      mode: CipherMode,
      text: string,
      opts: {
        width: number;
        height: number;
        counterclockwise?: boolean;
        outward?: boolean;
        padding: string;
      },
    ) => {
      runRoute({
        mode,
        text,
        width: opts.width,
        height: opts.height,
        clockwise: !opts.counterclockwise,
        inward: !opts.outward,
        padding: opts.padding,
      });
    },
  );

await program.parseAsync(process.argv);
