/**
 * Uptime frame
 *
 *   '     Uptime     '
 *   'XXXX d XX h XX m'
 */

import { PLACEHOLDER_TEXT } from '../formatter/fixed-width.js';
import { centerRow, padInteger } from '../formatter/layout.js';
import type { FrameBuilder, MetricsProvider } from '../types/index.js';
import { makeFrame, readMetric } from './frame-support.js';

const MS_PER_MINUTE = 60_000;
const MINUTES_PER_HOUR = 60;
const MINUTES_PER_DAY = 24 * MINUTES_PER_HOUR;

export interface UptimeParts {
  days: number;
  hours: number;
  minutes: number;
}

/**
 * Splits elapsed milliseconds into whole days, hours and minutes. Seconds
 * are dropped, never rounded; negative input counts as zero.
 */
export function splitUptime(elapsedMs: number): UptimeParts {
  const totalMinutes = Math.floor(Math.max(0, elapsedMs) / MS_PER_MINUTE);

  return {
    days: Math.floor(totalMinutes / MINUTES_PER_DAY),
    hours: Math.floor((totalMinutes % MINUTES_PER_DAY) / MINUTES_PER_HOUR),
    minutes: totalMinutes % MINUTES_PER_HOUR,
  };
}

export function createUptimeFrameBuilder(
  metrics: MetricsProvider,
  now: () => Date = () => new Date(),
): FrameBuilder {
  return {
    kind: 'uptime',
    build() {
      const bootTime = readMetric('uptime', 'bootTime', () => metrics.getBootTime());
      if (bootTime === undefined) {
        return makeFrame('uptime', centerRow('Uptime'), centerRow(PLACEHOLDER_TEXT));
      }

      const { days, hours, minutes } = splitUptime(now().getTime() - bootTime.getTime());

      return makeFrame(
        'uptime',
        centerRow('Uptime'),
        `${padInteger(days, 4)} d ${padInteger(hours, 2)} h ${padInteger(minutes, 2)} m`,
      );
    },
  };
}
