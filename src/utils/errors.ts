/**
 * Error types raised by the cipher and analysis library.
 */

/**
 * A caller passed a value outside an operation's domain: a key longer than
 * its text, an empty period list, inverted pattern bounds and so on.
 */
export class InvalidArgumentError extends Error {
  name: string;
  context: Record<string, unknown>;

  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'InvalidArgumentError';
    this.context = context;
  }
}

/** Extract a printable message from anything thrown. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
