import { FileAccessError } from '../../errors.js';
import type { Command, CommandContext, ExecResult } from '../../types.js';
import { sortFileLines } from '../sort/sort.js';
import { formatReport, selectMode } from './format.js';

export const testSortedCommand: Command = {
  name: 'test-sorted',

  async execute(args: string[], ctx: CommandContext): Promise<ExecResult> {
    // Mode depends on the argument count only; the second value is ignored
    const mode = selectMode(args.length);

    if (args.length === 0) {
      return {
        stdout: '',
        stderr: 'test-sorted: missing file operand\n',
        exitCode: 1,
      };
    }

    const file = args[0];
    let lines: IterableIterator<string>;
    try {
      lines = await sortFileLines(ctx.fs, ctx.fs.resolvePath(ctx.cwd, file));
    } catch (error) {
      if (error instanceof FileAccessError) {
        return {
          stdout: '',
          stderr: `test-sorted: ${file}: ${error.message}\n`,
          exitCode: 1,
        };
      }
      throw error;
    }

    return { stdout: formatReport(mode, lines), stderr: '', exitCode: 0 };
  },
};
