// Numeric key extraction and comparison for line sorting

const LEADING_NUMBER = /^[ \t]*(-?)(\d*)(?:\.(\d*))?/;

/**
 * Exact decimal sort key, kept as digit strings so that precision never
 * depends on the size of the number.
 * - integer: no leading zeros
 * - fraction: no trailing zeros
 * Zero is never negative.
 */
export interface NumericKey {
  negative: boolean;
  integer: string;
  fraction: string;
}

/**
 * Parse the number at the start of a line.
 *
 * Leading blanks are skipped, then an optional minus sign, digits and an
 * optional fractional part are read. Returns `null` for lines without a
 * number (empty, blank, or starting with anything else); those sort first.
 */
export function parseNumericKey(line: string): NumericKey | null {
  const match = LEADING_NUMBER.exec(line);
  if (!match) {
    return null;
  }
  const [, sign, integerDigits, fractionDigits = ''] = match;
  if (integerDigits === '' && fractionDigits === '') {
    return null;
  }

  const integer = integerDigits.replace(/^0+/, '');
  const fraction = fractionDigits.replace(/0+$/, '');
  const isZero = integer === '' && fraction === '';
  return { negative: sign === '-' && !isZero, integer, fraction };
}

function compareMagnitude(a: NumericKey, b: NumericKey): number {
  if (a.integer.length !== b.integer.length) {
    return a.integer.length < b.integer.length ? -1 : 1;
  }
  if (a.integer !== b.integer) {
    return a.integer < b.integer ? -1 : 1;
  }
  if (a.fraction !== b.fraction) {
    return a.fraction < b.fraction ? -1 : 1;
  }
  return 0;
}

/**
 * Ascending order on parsed keys; `null` is below every number.
 */
export function compareKeys(a: NumericKey | null, b: NumericKey | null): number {
  if (a === null || b === null) {
    if (a === b) return 0;
    return a === null ? -1 : 1;
  }
  if (a.negative !== b.negative) {
    return a.negative ? -1 : 1;
  }
  const magnitude = compareMagnitude(a, b);
  return a.negative ? -magnitude : magnitude;
}

/**
 * Ascending comparator on the leading numeric value of two lines.
 */
export function compareNumeric(a: string, b: string): number {
  return compareKeys(parseNumericKey(a), parseNumericKey(b));
}
