import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { OutputWriter } from './cli/test-sorted.js';

/**
 * Creates a unique temp directory for testing
 */
export async function createTestDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'test-sorted-'));
}

/**
 * Cleans up the temp directory
 */
export async function cleanupTestDir(testDir: string): Promise<void> {
  await fs.rm(testDir, { recursive: true, force: true });
}

/**
 * Writes files relative to testDir, creating parent directories
 */
export async function writeFiles(testDir: string, files: Record<string, string>): Promise<void> {
  for (const [filePath, content] of Object.entries(files)) {
    const fullPath = path.join(testDir, filePath);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, content);
  }
}

/**
 * Writer that keeps everything written to it
 */
export class CapturedOutput implements OutputWriter {
  text = '';

  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}
