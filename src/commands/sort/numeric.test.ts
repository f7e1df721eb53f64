import { describe, it, expect } from 'vitest';
import { compareKeys, compareNumeric, parseNumericKey } from './numeric.js';

describe('parseNumericKey', () => {
  it('should parse plain integers', () => {
    expect(parseNumericKey('42')).toEqual({ negative: false, integer: '42', fraction: '' });
    expect(parseNumericKey('-17')).toEqual({ negative: true, integer: '17', fraction: '' });
  });

  it('should skip leading blanks and ignore trailing text', () => {
    expect(parseNumericKey('  7 apples')).toEqual({ negative: false, integer: '7', fraction: '' });
    expect(parseNumericKey('\t-3.5x')).toEqual({ negative: true, integer: '3', fraction: '5' });
  });

  it('should parse decimal forms', () => {
    expect(parseNumericKey('.5')).toEqual({ negative: false, integer: '', fraction: '5' });
    expect(parseNumericKey('-.25')).toEqual({ negative: true, integer: '', fraction: '25' });
    expect(parseNumericKey('3.')).toEqual({ negative: false, integer: '3', fraction: '' });
  });

  it('should strip leading integer zeros and trailing fraction zeros', () => {
    expect(parseNumericKey('007.500')).toEqual({ negative: false, integer: '7', fraction: '5' });
  });

  it('should never mark zero as negative', () => {
    expect(parseNumericKey('-0')).toEqual({ negative: false, integer: '', fraction: '' });
    expect(parseNumericKey('-0.000')).toEqual({ negative: false, integer: '', fraction: '' });
  });

  it('should stop at exponents and separators', () => {
    expect(parseNumericKey('1e3')).toEqual({ negative: false, integer: '1', fraction: '' });
    expect(parseNumericKey('1,000')).toEqual({ negative: false, integer: '1', fraction: '' });
  });

  it('should return null for lines without a number', () => {
    for (const line of ['', '   ', 'abc', '-', '.', '-.', '+4']) {
      expect(parseNumericKey(line)).toBeNull();
    }
  });
});

describe('compareKeys', () => {
  it('should order null below every number', () => {
    expect(compareKeys(null, parseNumericKey('-100'))).toBe(-1);
    expect(compareKeys(parseNumericKey('0'), null)).toBe(1);
    expect(compareKeys(null, null)).toBe(0);
  });
});

describe('compareNumeric', () => {
  it('should compare numerically rather than lexically', () => {
    expect(compareNumeric('10', '9')).toBe(1);
    expect(compareNumeric('9', '10')).toBe(-1);
  });

  it('should order non-numeric lines before negative numbers', () => {
    expect(compareNumeric('abc', '-100')).toBe(-1);
  });

  it('should treat two non-numeric lines as equal', () => {
    expect(compareNumeric('', 'xyz')).toBe(0);
  });

  it('should treat -0 and 0 as equal', () => {
    expect(compareNumeric('-0', '0')).toBe(0);
    expect(compareNumeric('-0.0', '00')).toBe(0);
  });

  it('should order negative numbers by decreasing magnitude', () => {
    expect(compareNumeric('-10', '-9')).toBe(-1);
    expect(compareNumeric('-1.5', '-1.25')).toBe(-1);
    expect(compareNumeric('-1', '0')).toBe(-1);
  });

  it('should compare fractions digit by digit', () => {
    expect(compareNumeric('1.25', '1.3')).toBe(-1);
    expect(compareNumeric('1.5', '1.50')).toBe(0);
    expect(compareNumeric('1', '1.01')).toBe(-1);
  });

  it('should compare integers beyond double precision exactly', () => {
    expect(compareNumeric('9007199254740993', '9007199254740992')).toBe(1);
    expect(compareNumeric('0009007199254740992', '9007199254740992')).toBe(0);
  });

  it('should compare integers beyond the double range', () => {
    const big = '1' + '0'.repeat(400);
    const bigger = '2' + '0'.repeat(400);
    expect(compareNumeric(bigger, big)).toBe(1);
    expect(compareNumeric('-' + bigger, '-' + big)).toBe(-1);
  });
});
