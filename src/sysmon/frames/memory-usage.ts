/**
 * Memory usage frame
 *
 *   '   MEM  Usage   '
 *   'XX.XXXGiB XXX.X%'
 */

import { centerRow } from '../formatter/layout.js';
import type { FormatSpec, FrameBuilder, MetricsProvider } from '../types/index.js';
import { fieldOrPlaceholder, makeFrame, readMetric } from './frame-support.js';

const GIB_FIELD: FormatSpec = { integerDigits: 2, decimalDigits: 3 };
const PERCENT_FIELD: FormatSpec = { integerDigits: 3, decimalDigits: 1 };

export const BYTES_PER_GIB = 2 ** 30;

export function createMemoryUsageFrameBuilder(metrics: MetricsProvider): FrameBuilder {
  return {
    kind: 'memory-usage',
    build() {
      const memory = readMetric('memory-usage', 'memoryUsage', () => metrics.getMemoryUsage());
      const usedGib = memory === undefined ? undefined : memory.usedBytes / BYTES_PER_GIB;

      return makeFrame(
        'memory-usage',
        centerRow('MEM  Usage'),
        `${fieldOrPlaceholder(usedGib, GIB_FIELD)}GiB ${fieldOrPlaceholder(memory?.percent, PERCENT_FIELD)}%`,
      );
    },
  };
}
