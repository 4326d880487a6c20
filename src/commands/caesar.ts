/**
 * `kasiski-kit caesar` command implementation.
 *
 * Three modes:
 *  - `--shift <n>`: rotate the text by `n` (default 13).
 *  - `--all`: print all 26 rotations.
 *  - `--crack`: rank rotations by how English they look and print the best five.
 */

import chalk from 'chalk';
import { allRotations, rotate } from '../ciphers/caesar.js';
import { crackCaesar } from '../analyzers/cracker.js';
import { errorMessage } from '../utils/errors.js';
import type { CaesarCommandOptions } from '../types/index.js';

const CRACK_RESULTS = 5;

/**
 * Run the `caesar` command.
 *
 * @returns `[shift, text]` pairs in the order printed.
 */
export function runCaesar(options: CaesarCommandOptions): Array<[number, string]> {
  try {
    let rows: Array<[number, string]>;

    if (options.crack) {
      rows = crackCaesar(options.text)
        .slice(0, CRACK_RESULTS)
        .map((c): [number, string] => [c.shift, c.plaintext]);
    } else if (options.all) {
      rows = allRotations(options.text).map((rotation, shift): [number, string] => [shift, rotation]);
    } else {
      const shift = options.shift ?? 13;
      const rotated = rotate(options.text, shift);
      console.log(rotated);
      return [[shift, rotated]];
    }

    rows.forEach(([shift, text], i) => {
      const line = options.crack && i === 0 ? chalk.green(text) : text;
      console.log(`${chalk.yellow(String(shift).padStart(2))}  ${line}`);
    });
    return rows;
  } catch (error) {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exit(1);
  }
}
