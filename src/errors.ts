/**
 * File Access Errors
 *
 * Raised when an input file cannot be read. Commands catch these and turn
 * them into a non-zero exit code with a `<command>: <file>: <reason>`
 * message on stderr.
 */

export type FileAccessReason =
  | 'not-found'
  | 'is-directory'
  | 'permission-denied'
  | 'unreadable';

const reasonsByCode: Record<string, FileAccessReason> = {
  ENOENT: 'not-found',
  ENOTDIR: 'not-found',
  EISDIR: 'is-directory',
  EACCES: 'permission-denied',
  EPERM: 'permission-denied',
};

const reasonText: Record<Exclude<FileAccessReason, 'unreadable'>, string> = {
  'not-found': 'No such file or directory',
  'is-directory': 'Is a directory',
  'permission-denied': 'Permission denied',
};

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error thrown when a file cannot be opened or read.
 */
export class FileAccessError extends Error {
  readonly name = 'FileAccessError';

  constructor(
    public readonly path: string,
    public readonly reason: FileAccessReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  /**
   * Wrap an error raised by a file system read.
   */
  static fromError(path: string, error: unknown): FileAccessError {
    const code = errorCode(error);
    const reason = (code !== undefined && reasonsByCode[code]) || 'unreadable';
    const message = reason === 'unreadable' ? getErrorMessage(error) : reasonText[reason];
    return new FileAccessError(path, reason, message, { cause: error });
  }
}
