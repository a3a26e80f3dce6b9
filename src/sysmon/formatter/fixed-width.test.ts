/**
 * Fixed-Width Formatter Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  assertFormatSpec,
  fieldWidth,
  formatField,
  formatFixedWidth,
  integerRange,
  placeholderField,
  roundHalfEven,
} from './fixed-width.js';
import { centerRow, fitRow, padInteger } from './layout.js';

describe('formatFixedWidth', () => {
  describe('Reference values', () => {
    it('should right-justify the integer part and zero-fill decimals', () => {
      expect(formatFixedWidth(123.45, 4, 3)).toBe(' 123.450');
    });

    it('should clamp the integer part to the largest two-digit value', () => {
      expect(formatFixedWidth(123.45, 2, 1)).toBe('99.4');
      expect(formatFixedWidth(9999.9, 2, 1)).toBe('99.9');
    });

    it('should clamp negatives to the smallest value that leaves room for the sign', () => {
      expect(formatFixedWidth(-23.45, 2, 3)).toBe('-9.450');
      expect(formatFixedWidth(-23.456, 2, 3)).toBe('-9.456');
    });

    it('should clamp large magnitudes at wider fields', () => {
      expect(formatFixedWidth(1e6, 4, 1)).toBe('9999.0');
      expect(formatFixedWidth(-1e6, 4, 1)).toBe('-999.0');
    });
  });

  describe('Decimal portion', () => {
    it('should keep leading zeros of the fraction', () => {
      expect(formatFixedWidth(7.05, 2, 2)).toBe(' 7.05');
    });

    it('should pad short fractions to the full decimal width', () => {
      expect(formatFixedWidth(3.4, 1, 2)).toBe('3.40');
      expect(formatFixedWidth(12, 3, 1)).toBe(' 12.0');
    });

    it('should render no decimals when decimalDigits is 0', () => {
      expect(formatFixedWidth(42.2, 3, 0)).toBe(' 42.');
    });

    it('should resolve ties to the even digit', () => {
      expect(formatFixedWidth(2.25, 1, 1)).toBe('2.2');
      expect(formatFixedWidth(2.35, 1, 1)).toBe('2.4');
    });
  });

  describe('Rounding carry', () => {
    it('should carry a fraction that rounds up into the integer part', () => {
      expect(formatFixedWidth(0.996, 2, 2)).toBe(' 1.00');
      expect(formatFixedWidth(8.996, 1, 2)).toBe('9.00');
      expect(formatFixedWidth(42.7, 3, 0)).toBe(' 43.');
    });

    it('should carry away from zero for negatives', () => {
      expect(formatFixedWidth(-0.996, 2, 2)).toBe('-1.00');
    });

    it('should saturate the decimals when the value is already clamped', () => {
      expect(formatFixedWidth(123.996, 2, 2)).toBe('99.99');
    });
  });

  describe('Sign handling', () => {
    it('should keep the sign of negatives between -1 and 0', () => {
      expect(formatFixedWidth(-0.4, 2, 1)).toBe('-0.4');
    });

    it('should drop the sign when the field rounds to zero', () => {
      expect(formatFixedWidth(-0.01, 2, 1)).toBe(' 0.0');
    });

    it('should clamp negatives to zero when there is no room for a sign', () => {
      expect(formatFixedWidth(-5.25, 1, 2)).toBe('0.25');
    });
  });

  describe('Non-finite input', () => {
    it('should render the placeholder at field width', () => {
      expect(formatFixedWidth(Number.NaN, 3, 1)).toBe('  NaN');
      expect(formatFixedWidth(Number.POSITIVE_INFINITY, 2, 2)).toBe('  NaN');
      expect(formatFixedWidth(Number.NEGATIVE_INFINITY, 1, 0)).toBe('Na');
    });
  });

  describe('Invalid field specs', () => {
    it('should reject fields without integer digits', () => {
      expect(() => formatFixedWidth(1, 0, 1)).toThrow(RangeError);
    });

    it('should reject negative or fractional digit counts', () => {
      expect(() => formatFixedWidth(1, 2, -1)).toThrow(RangeError);
      expect(() => formatFixedWidth(1, 2.5, 1)).toThrow(RangeError);
    });

    it('should reject widths beyond safe integer precision', () => {
      expect(() => assertFormatSpec({ integerDigits: 16, decimalDigits: 0 })).toThrow(RangeError);
      expect(() => assertFormatSpec({ integerDigits: 2, decimalDigits: 10 })).toThrow(RangeError);
    });
  });

  it('should accept the spec as one value', () => {
    expect(formatField(36.6, { integerDigits: 3, decimalDigits: 1 })).toBe(' 36.6');
  });
});

describe('Formatter helpers', () => {
  it('should compute field width including the decimal point', () => {
    expect(fieldWidth({ integerDigits: 4, decimalDigits: 1 })).toBe(6);
    expect(fieldWidth({ integerDigits: 2, decimalDigits: 0 })).toBe(3);
  });

  it('should compute the representable integer range', () => {
    expect(integerRange(2)).toEqual({ min: -9, max: 99 });
    expect(integerRange(4)).toEqual({ min: -999, max: 9999 });
  });

  it('should round half to even after removing binary noise', () => {
    expect(roundHalfEven(4.5000000000000284)).toBe(4);
    expect(roundHalfEven(449.9999999999993)).toBe(450);
    expect(roundHalfEven(5.5)).toBe(6);
    expect(roundHalfEven(5.49)).toBe(5);
  });

  it('should right-justify the placeholder', () => {
    expect(placeholderField({ integerDigits: 2, decimalDigits: 2 })).toBe('  NaN');
  });

  it('should fit rows to exactly 16 characters', () => {
    expect(fitRow('abc')).toBe('abc             ');
    expect(fitRow('0123456789abcdefXYZ')).toBe('0123456789abcdef');
  });

  it('should center labels with the odd space on the right', () => {
    expect(centerRow('CPU  Usage')).toBe('   CPU  Usage   ');
    expect(centerRow('Load AVG')).toBe('    Load AVG    ');
    expect(centerRow('NaN')).toBe('      NaN       ');
  });

  it('should pad and clamp integers', () => {
    expect(padInteger(7, 2)).toBe(' 7');
    expect(padInteger(12345, 4)).toBe('9999');
    expect(padInteger(-3, 2)).toBe(' 0');
  });
});
