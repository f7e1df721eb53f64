import * as path from 'node:path';
import type { IFileSystem } from './interface.js';

function fsError(code: string, syscall: string, filePath: string): Error {
  const description = code === 'EISDIR' ? 'illegal operation on a directory' : 'no such file or directory';
  return Object.assign(new Error(`${code}: ${description}, ${syscall} '${filePath}'`), {
    code,
    path: filePath,
  });
}

/**
 * In-memory file system seeded from a path → content map.
 * Parent directories of every seeded file exist implicitly.
 */
export class VirtualFs implements IFileSystem {
  private files = new Map<string, string>();
  private directories = new Set<string>(['/']);

  constructor(initialFiles: Record<string, string> = {}) {
    for (const [filePath, content] of Object.entries(initialFiles)) {
      this.writeFileSync(filePath, content);
    }
  }

  writeFileSync(filePath: string, content: string): void {
    const normalized = this.normalizePath(filePath);
    this.files.set(normalized, content);

    let dir = path.posix.dirname(normalized);
    while (!this.directories.has(dir)) {
      this.directories.add(dir);
      dir = path.posix.dirname(dir);
    }
  }

  mkdirSync(dirPath: string): void {
    let dir = this.normalizePath(dirPath);
    while (!this.directories.has(dir)) {
      this.directories.add(dir);
      dir = path.posix.dirname(dir);
    }
  }

  async readFile(filePath: string): Promise<string> {
    const normalized = this.normalizePath(filePath);
    const content = this.files.get(normalized);
    if (content !== undefined) {
      return content;
    }
    if (this.directories.has(normalized)) {
      throw fsError('EISDIR', 'read', filePath);
    }
    throw fsError('ENOENT', 'open', filePath);
  }

  resolvePath(base: string, filePath: string): string {
    return path.posix.resolve(base, filePath);
  }

  private normalizePath(filePath: string): string {
    return path.posix.resolve('/', filePath);
  }
}
