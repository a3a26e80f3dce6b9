/**
 * CPU usage frame
 *
 *   '   CPU  Usage   '
 *   'XXXX.XMHz XXX.X%'
 */

import { centerRow } from '../formatter/layout.js';
import type { FormatSpec, FrameBuilder, MetricsProvider } from '../types/index.js';
import { fieldOrPlaceholder, makeFrame, readMetric } from './frame-support.js';

const FREQUENCY_FIELD: FormatSpec = { integerDigits: 4, decimalDigits: 1 };
const PERCENT_FIELD: FormatSpec = { integerDigits: 3, decimalDigits: 1 };

export function createCpuUsageFrameBuilder(metrics: MetricsProvider): FrameBuilder {
  return {
    kind: 'cpu-usage',
    build() {
      const frequency = readMetric('cpu-usage', 'cpuFrequency', () => metrics.getCpuFrequency());
      const percent = readMetric('cpu-usage', 'cpuPercent', () => metrics.getCpuPercent());

      return makeFrame(
        'cpu-usage',
        centerRow('CPU  Usage'),
        `${fieldOrPlaceholder(frequency, FREQUENCY_FIELD)}MHz ${fieldOrPlaceholder(percent, PERCENT_FIELD)}%`,
      );
    },
  };
}
