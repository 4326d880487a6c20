/**
 * `kasiski-kit vigenere` command implementation.
 */

import chalk from 'chalk';
import { vigenereDecode, vigenereEncode } from '../ciphers/vigenere.js';
import { errorMessage } from '../utils/errors.js';
import type { VigenereCommandOptions } from '../types/index.js';

/**
 * Run the `vigenere` command: encode or decode `text` under `key` and print
 * the result.
 *
 * @returns The transformed text.
 */
export function runVigenere(options: VigenereCommandOptions): string {
  try {
    const output =
      options.mode === 'encode'
        ? vigenereEncode(options.text, options.key)
        : vigenereDecode(options.text, options.key);
    console.log(output);
    return output;
  } catch (error) {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exit(1);
  }
}
