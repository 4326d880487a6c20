/**
 * Input text resolution for commands.
 *
 * Resolution order:
 *  1. `--input-file <path>` if supplied.
 *  2. The positional text argument.
 */

import type { InputOptions } from '../types/index.js';
import { InvalidArgumentError } from './errors.js';
import { readFileIfExists } from './file-operations.js';
import { lettersOnly } from './strings.js';

/**
 * Load the text a command should work on.
 *
 * File contents lose surrounding whitespace. Unless `raw` is set, the text
 * is reduced to upper-case letters.
 *
 * @throws InvalidArgumentError when there is no input or the file is missing.
 */
export async function resolveInput(options: InputOptions): Promise<string> {
  let text: string;

  if (options.inputFile) {
    const content = await readFileIfExists(options.inputFile);
    if (content === null) {
      throw new InvalidArgumentError(`Input file not found: ${options.inputFile}`, {
        inputFile: options.inputFile,
      });
    }
    text = content.trim();
  } else if (options.text !== undefined) {
    text = options.text;
  } else {
    throw new InvalidArgumentError('No input: pass the text as an argument or use --input-file');
  }

  if (!options.raw) text = lettersOnly(text);
  return text;
}
