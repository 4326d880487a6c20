/**
 * `kasiski-kit route` command implementation: spiral route cipher.
 */

import chalk from 'chalk';
import { spiralDecode, spiralEncode } from '../transposition/spiral.js';
import { errorMessage } from '../utils/errors.js';
import type { RouteCommandOptions } from '../types/index.js';

/**
 * Run the `route` command.
 *
 * @returns The transformed text.
 */
export function runRoute(options: RouteCommandOptions): string {
  try {
    const routeOptions = {
      clockwise: options.clockwise ?? true,
      inward: options.inward ?? true,
      padding: options.padding ?? 'X',
    };
    const output =
      options.mode === 'encode'
        ? spiralEncode(options.text, options.width, options.height, routeOptions)
        : spiralDecode(options.text, options.width, options.height, routeOptions);
    console.log(output);
    return output;
  } catch (error) {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exit(1);
  }
}
