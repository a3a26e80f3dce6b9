/**
 * Load average frame
 *
 *   '    Load AVG    '
 *   'XX.XX XX.XX XX.X'
 */

import { centerRow } from '../formatter/layout.js';
import type { FormatSpec, FrameBuilder, MetricsProvider } from '../types/index.js';
import { fieldOrPlaceholder, makeFrame, readMetric } from './frame-support.js';

const SHORT_TERM_FIELD: FormatSpec = { integerDigits: 2, decimalDigits: 2 };
// One decimal less so the three fields fit in 16 characters
const LONG_TERM_FIELD: FormatSpec = { integerDigits: 2, decimalDigits: 1 };

export function createLoadAverageFrameBuilder(metrics: MetricsProvider): FrameBuilder {
  return {
    kind: 'load-average',
    build() {
      const load = readMetric('load-average', 'loadAverage', () => metrics.getLoadAverage());

      return makeFrame(
        'load-average',
        centerRow('Load AVG'),
        [
          fieldOrPlaceholder(load?.[0], SHORT_TERM_FIELD),
          fieldOrPlaceholder(load?.[1], SHORT_TERM_FIELD),
          fieldOrPlaceholder(load?.[2], LONG_TERM_FIELD),
        ].join(' '),
      );
    },
  };
}
