import { FileAccessError } from '../../errors.js';
import type { IFileSystem } from '../../types.js';
import { compareKeys, parseNumericKey } from './numeric.js';

/**
 * Split file content into lines. A final newline does not produce an
 * extra empty line, so empty content has no lines at all.
 */
export function splitLines(content: string): string[] {
  if (content === '') {
    return [];
  }
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Sort lines by leading numeric value, ascending. Lines with equal keys
 * keep their input order. The input array is left untouched.
 */
export function numericSort(lines: readonly string[]): string[] {
  // Parse each key once; Array.prototype.sort is stable
  const keyed = lines.map((line) => ({ line, key: parseNumericKey(line) }));
  keyed.sort((a, b) => compareKeys(a.key, b.key));
  return keyed.map(({ line }) => line);
}

/**
 * Read `filePath` and return its lines in numeric order.
 *
 * The whole file is read before anything is yielded, so a read failure
 * rejects with {@link FileAccessError} before the first line. The returned
 * iterator is single-pass.
 */
export async function sortFileLines(fs: IFileSystem, filePath: string): Promise<IterableIterator<string>> {
  let content: string;
  try {
    content = await fs.readFile(filePath);
  } catch (error) {
    throw FileAccessError.fromError(filePath, error);
  }
  return numericSort(splitLines(content)).values();
}
