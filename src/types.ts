import type { IFileSystem } from './fs/interface.js';

export type { IFileSystem };

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandContext {
  fs: IFileSystem;
  cwd: string;
}

export interface Command {
  name: string;
  execute(args: string[], ctx: CommandContext): Promise<ExecResult>;
}
