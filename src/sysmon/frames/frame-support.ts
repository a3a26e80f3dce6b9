/**
 * Shared helpers for frame builders: guarded metric reads and fields that
 * fall back to the placeholder.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import { formatField, placeholderField } from '../formatter/fixed-width.js';
import { fitRow } from '../formatter/layout.js';
import type { DisplayFrame, FormatSpec, FrameKind } from '../types/index.js';

const log = createSubsystemLogger('sysmon/frames');

/**
 * Runs a metrics read; a thrown error is logged and becomes `undefined` so
 * the frame can still be rendered.
 */
export function readMetric<T>(kind: FrameKind, metric: string, read: () => T): T | undefined {
  try {
    return read();
  } catch (error) {
    log.warn('Metric unavailable, rendering placeholder', {
      frame: kind,
      metric,
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}

/**
 * Formats a reading, or the placeholder when there is none.
 */
export function fieldOrPlaceholder(value: number | undefined, spec: FormatSpec): string {
  return value === undefined ? placeholderField(spec) : formatField(value, spec);
}

/**
 * Builds a frame with both rows normalised to the display width.
 */
export function makeFrame(kind: FrameKind, row1: string, row2: string): DisplayFrame {
  return { kind, rows: [fitRow(row1), fitRow(row2)] };
}
