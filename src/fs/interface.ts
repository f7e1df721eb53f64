/**
 * Minimal read-only file system surface used by commands.
 */
export interface IFileSystem {
  /**
   * Read a whole file as UTF-8 text.
   * Rejects with a Node-style error (carrying `code`) when the path is
   * missing, a directory, or unreadable.
   */
  readFile(path: string): Promise<string>;

  /** Resolve `path` against `base`, returning an absolute path. */
  resolvePath(base: string, path: string): string;
}
