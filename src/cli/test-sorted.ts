/**
 * Command-line front end for test-sorted.
 *
 * Usage:
 *   test-sorted <file>            check report, ends with DONE!
 *   test-sorted <file> <any>      TEST: label per line
 */

import { getErrorMessage } from '../errors.js';
import { RealFs } from '../fs/real-fs.js';
import { TestSortedEnv } from '../TestSortedEnv.js';
import type { IFileSystem } from '../types.js';

export interface OutputWriter {
  write(chunk: string): unknown;
}

export interface ErrorWriter extends OutputWriter {
  isTTY?: boolean;
}

const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
};

export interface CliIO {
  stdout: OutputWriter;
  stderr: OutputWriter;
  cwd: string;
  /** Defaults to the host file system */
  fs?: IFileSystem;
}

/**
 * Run test-sorted with `argv` (program arguments only) and return the exit
 * code. Nothing is written until the input has been read and sorted.
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  const env = new TestSortedEnv({ fs: io.fs ?? new RealFs(), cwd: io.cwd });
  const result = await env.run(argv);

  if (result.stdout) {
    io.stdout.write(result.stdout);
  }
  if (result.stderr) {
    io.stderr.write(result.stderr);
  }
  return result.exitCode;
}

/**
 * Print an error that escaped `runCli`, red on a terminal, and return the
 * exit code to use.
 */
export function reportUnexpectedError(error: unknown, stderr: ErrorWriter): number {
  const message = `Error: ${getErrorMessage(error)}`;
  stderr.write(stderr.isTTY ? `${colors.red}${message}${colors.reset}\n` : `${message}\n`);
  return 1;
}
