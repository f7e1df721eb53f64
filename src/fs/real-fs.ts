import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { IFileSystem } from './interface.js';

/**
 * File system backed by the host disk.
 */
export class RealFs implements IFileSystem {
  async readFile(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf-8');
  }

  resolvePath(base: string, filePath: string): string {
    return path.resolve(base, filePath);
  }
}
