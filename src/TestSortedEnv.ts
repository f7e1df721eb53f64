import { VirtualFs } from './fs/virtual-fs.js';
import { testSortedCommand } from './commands/test-sorted/test-sorted.js';
import type { CommandContext, ExecResult, IFileSystem } from './types.js';

export interface TestSortedEnvOptions {
  /**
   * Input files keyed by absolute path, served from memory.
   * Ignored when `fs` is set.
   */
  files?: Record<string, string>;
  /**
   * Working directory that relative input paths resolve against
   */
  cwd?: string;
  /**
   * Where input files are read from, e.g. the CLI's `RealFs`.
   * Without it, a `VirtualFs` holding `files` is used.
   */
  fs?: IFileSystem;
}

export class TestSortedEnv {
  private fs: IFileSystem;
  private cwd: string;

  constructor(options: TestSortedEnvOptions = {}) {
    const fs = options.fs ?? new VirtualFs(options.files);
    this.fs = fs;
    this.cwd = options.cwd || '/';

    if (this.cwd !== '/' && fs instanceof VirtualFs) {
      fs.mkdirSync(this.cwd);
    }
  }

  getCwd(): string {
    return this.cwd;
  }

  /**
   * Run the command with `args` as its argument list.
   */
  async run(args: string[]): Promise<ExecResult> {
    const ctx: CommandContext = { fs: this.fs, cwd: this.cwd };
    return testSortedCommand.execute(args, ctx);
  }
}
