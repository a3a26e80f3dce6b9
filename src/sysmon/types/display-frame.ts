/**
 * Display Frame Types
 *
 * Defines the fixed-width payload rendered by a 16x2 character LCD and the
 * numeric field contract used to build it.
 */

/** Characters per LCD row */
export const ROW_WIDTH = 16;

export interface FormatSpec {
  /** Width of the integer portion, sign included (>= 1) */
  integerDigits: number;
  /** Digits after the decimal point (>= 0) */
  decimalDigits: number;
}

export const FRAME_KINDS = ['cpu-usage', 'load-average', 'memory-usage', 'uptime', 'temperature'] as const;

export type FrameKind = (typeof FRAME_KINDS)[number];

export interface DisplayFrame {
  kind: FrameKind;
  /** Exactly two rows of ROW_WIDTH characters each */
  rows: [string, string];
}

export interface FrameBuilder {
  readonly kind: FrameKind;
  build(): DisplayFrame;
}

export interface ScheduleEntry {
  builder: FrameBuilder;
  /** Wait after transmitting this entry's frame, in milliseconds */
  dwellMs: number;
}
