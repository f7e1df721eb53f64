export { TestSortedEnv, type TestSortedEnvOptions } from './TestSortedEnv.js';
export { RealFs, VirtualFs } from './fs/index.js';
export { FileAccessError, type FileAccessReason } from './errors.js';
export { compareNumeric, parseNumericKey, type NumericKey } from './commands/sort/numeric.js';
export { numericSort, sortFileLines, splitLines } from './commands/sort/sort.js';
export { formatLine, formatReport, selectMode, type OutputMode } from './commands/test-sorted/format.js';
export { testSortedCommand } from './commands/test-sorted/test-sorted.js';
export type { Command, CommandContext, ExecResult, IFileSystem } from './types.js';
