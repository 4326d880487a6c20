/**
 * Safe file read/write utilities.
 *
 * Used to load ciphertext from `--input-file` and to write reports to
 * `--output`.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

// ── Directory helpers ────────────────────────────────────────────────────────

/**
 * Ensure a directory exists, creating it (and parents) if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

// ── Read helpers ─────────────────────────────────────────────────────────────

/**
 * Read a file's contents as UTF-8 text.
 * Returns `null` if the file does not exist.
 */
export async function readFileIfExists(
  filePath: string,
): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return null;
    throw error;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

// ── Write helpers ────────────────────────────────────────────────────────────

/**
 * Write text content to a file, creating parent directories as needed.
 */
export async function writeFileSafe(
  filePath: string,
  content: string,
): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, content, 'utf-8');
}
