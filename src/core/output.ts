/**
 * Plain-text result persistence
 */

import { writeFile } from 'fs/promises';
import { IoError } from './errors.js';

/**
 * One hostname per line, newline-terminated. No hostnames, no lines.
 */
export function formatHostnames(hostnames: readonly string[]): string {
  return hostnames.map((hostname) => `${hostname}\n`).join('');
}

/**
 * Write hostnames to `path`, replacing whatever the file held before
 */
export async function writeHostnames(path: string, hostnames: readonly string[]): Promise<void> {
  try {
    await writeFile(path, formatHostnames(hostnames), { encoding: 'utf-8', flag: 'w' });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new IoError(`Cannot write results to ${path}: ${reason}`, path, error);
  }
}
