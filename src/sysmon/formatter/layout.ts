/**
 * Row layout helpers for the 16-character LCD.
 */

import { ROW_WIDTH } from '../types/index.js';

/**
 * Pads with spaces or truncates so the row is exactly ROW_WIDTH characters.
 */
export function fitRow(text: string, width: number = ROW_WIDTH): string {
  return text.length >= width ? text.slice(0, width) : text.padEnd(width, ' ');
}

/**
 * Centers a label in the row; an odd remainder goes to the right.
 */
export function centerRow(label: string, width: number = ROW_WIDTH): string {
  if (label.length >= width) {
    return label.slice(0, width);
  }
  const left = Math.floor((width - label.length) / 2);
  return fitRow(' '.repeat(left) + label, width);
}

/**
 * Right-justifies a non-negative integer, clamping it to the largest value
 * with `digits` digits.
 */
export function padInteger(value: number, digits: number): string {
  const max = 10 ** digits - 1;
  const clamped = Math.min(max, Math.max(0, Math.trunc(value)));
  return String(clamped).padStart(digits, ' ');
}
