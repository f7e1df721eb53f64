import { sprintf } from 'sprintf-js';

/**
 * Output variant, fixed for the whole run.
 * - label: `TEST: <line>` per line
 * - check: a two-line pass report per line, then `DONE!`
 */
export type OutputMode = 'label' | 'check';

const LABEL_FORMAT = 'TEST: %s\n';
const CHECK_FORMAT = "Test case '%s'..\n  Pass (Result image matches reference)\n";
const CHECK_DONE = 'DONE!\n';

/**
 * Exactly two arguments selects label mode; any other count, including
 * none, selects check mode.
 */
export function selectMode(argCount: number): OutputMode {
  return argCount === 2 ? 'label' : 'check';
}

/**
 * Strip leading and trailing blanks the way a shell `read` does.
 */
export function trimBlanks(line: string): string {
  return line.replace(/^[ \t]+|[ \t]+$/g, '');
}

export function formatLine(mode: OutputMode, line: string): string {
  switch (mode) {
    case 'label':
      return sprintf(LABEL_FORMAT, trimBlanks(line));
    case 'check':
      return sprintf(CHECK_FORMAT, trimBlanks(line));
  }
}

/**
 * Render the full report for already sorted lines.
 */
export function formatReport(mode: OutputMode, lines: Iterable<string>): string {
  let output = '';
  for (const line of lines) {
    output += formatLine(mode, line);
  }
  if (mode === 'check') {
    output += CHECK_DONE;
  }
  return output;
}
