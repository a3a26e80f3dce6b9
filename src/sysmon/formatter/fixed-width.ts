/**
 * Fixed-Width Number Formatter
 *
 * Renders readings into exact-width text fields for a character LCD. The
 * integer portion is right-justified in `integerDigits` characters (sign
 * included) and clamped to the largest value that fits; the decimal portion
 * is always exactly `decimalDigits` characters.
 */

import type { FormatSpec } from '../types/index.js';

/** Text shown in place of a reading that is unavailable */
export const PLACEHOLDER_TEXT = 'NaN';

/** Largest supported integer width; 10^15 - 1 is still a safe integer */
export const MAX_INTEGER_DIGITS = 15;

/** Largest supported decimal width */
export const MAX_DECIMAL_DIGITS = 9;

// Differences below this are binary representation noise, not digits
const ROUNDING_NOISE_DIGITS = 9;

/**
 * Total characters of a field: integer portion, decimal point, decimals.
 */
export function fieldWidth(spec: FormatSpec): number {
  return spec.integerDigits + 1 + spec.decimalDigits;
}

/**
 * Throws a RangeError unless the digit counts describe a representable field.
 */
export function assertFormatSpec(spec: FormatSpec): void {
  const { integerDigits, decimalDigits } = spec;
  if (!Number.isInteger(integerDigits) || integerDigits < 1 || integerDigits > MAX_INTEGER_DIGITS) {
    throw new RangeError(
      `integerDigits must be an integer between 1 and ${MAX_INTEGER_DIGITS}, got ${integerDigits}`,
    );
  }
  if (!Number.isInteger(decimalDigits) || decimalDigits < 0 || decimalDigits > MAX_DECIMAL_DIGITS) {
    throw new RangeError(
      `decimalDigits must be an integer between 0 and ${MAX_DECIMAL_DIGITS}, got ${decimalDigits}`,
    );
  }
}

/**
 * The placeholder text right-justified to the width of the field.
 */
export function placeholderField(spec: FormatSpec): string {
  const width = fieldWidth(spec);
  return PLACEHOLDER_TEXT.padStart(width, ' ').slice(0, width);
}

/**
 * Rounds to the nearest integer, ties to even, after discarding noise such as
 * 0.45 * 10 = 4.5000000000000284.
 */
export function roundHalfEven(scaled: number): number {
  const cleaned = Number(scaled.toFixed(ROUNDING_NOISE_DIGITS));
  const floor = Math.floor(cleaned);
  const diff = cleaned - floor;

  if (diff > 0.5) {
    return floor + 1;
  }
  if (diff < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Smallest and largest integer portion that fit in `integerDigits`
 * characters. Negative values give up one character to the sign.
 */
export function integerRange(integerDigits: number): { min: number; max: number } {
  const max = 10 ** integerDigits - 1;
  return { min: -Math.floor(max / 10), max };
}

/**
 * Formats `value` as `integerDigits` + '.' + `decimalDigits` characters.
 *
 * - Values outside the integer range clamp to the bound; the decimals still
 *   come from the value's own fraction.
 * - A fraction that rounds up to a whole number carries into the integer
 *   portion. When the value was clamped, the decimals saturate to nines.
 * - NaN and infinities render the placeholder field.
 *
 * @example formatFixedWidth(123.45, 4, 3) // ' 123.450'
 * @example formatFixedWidth(123.45, 2, 1) // '99.4'
 * @example formatFixedWidth(-23.45, 2, 3) // '-9.450'
 */
export function formatFixedWidth(value: number, integerDigits: number, decimalDigits: number): string {
  const spec: FormatSpec = { integerDigits, decimalDigits };
  assertFormatSpec(spec);

  if (!Number.isFinite(value)) {
    return placeholderField(spec);
  }

  const { min, max } = integerRange(integerDigits);
  const scale = 10 ** decimalDigits;

  const truncated = Math.trunc(value);
  const clamped = value < min || value > max;
  let integerPart = value < min ? min : value > max ? max : truncated;
  let fraction = roundHalfEven((Math.abs(value) - Math.abs(truncated)) * scale);

  if (fraction >= scale) {
    if (clamped) {
      fraction = scale - 1;
    } else {
      fraction = 0;
      integerPart = Math.min(max, Math.max(min, value < 0 ? integerPart - 1 : integerPart + 1));
    }
  }

  // -0.4 keeps its sign; a field that rounds to all zeros does not
  const showSign = value < 0 && min < 0 && (integerPart !== 0 || fraction !== 0);
  const integerText = `${showSign ? '-' : ''}${Math.abs(integerPart)}`.padStart(integerDigits, ' ');
  const decimalText = decimalDigits > 0 ? String(fraction).padStart(decimalDigits, '0') : '';

  return `${integerText}.${decimalText}`;
}

/**
 * Same as formatFixedWidth, taking the field contract as one value.
 */
export function formatField(value: number, spec: FormatSpec): string {
  return formatFixedWidth(value, spec.integerDigits, spec.decimalDigits);
}
