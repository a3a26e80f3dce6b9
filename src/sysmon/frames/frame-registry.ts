/**
 * Frame Registry
 *
 * Turns the configured list of frame kinds into an ordered schedule.
 */

import type {
  FrameBuilder,
  FrameKind,
  MetricsProvider,
  ScheduleEntry,
  SysmonConfiguration,
} from '../types/index.js';
import { createCpuUsageFrameBuilder } from './cpu-usage.js';
import { createLoadAverageFrameBuilder } from './load-average.js';
import { createMemoryUsageFrameBuilder } from './memory-usage.js';
import { createTemperatureFrameBuilder, type TemperatureSensors } from './temperature.js';
import { createUptimeFrameBuilder } from './uptime.js';

export interface FrameBuilderDependencies {
  metrics: MetricsProvider;
  sensors: TemperatureSensors;
  /** Wall clock for the uptime frame */
  now?: () => Date;
}

export function createFrameBuilder(kind: FrameKind, deps: FrameBuilderDependencies): FrameBuilder {
  switch (kind) {
    case 'cpu-usage':
      return createCpuUsageFrameBuilder(deps.metrics);
    case 'load-average':
      return createLoadAverageFrameBuilder(deps.metrics);
    case 'memory-usage':
      return createMemoryUsageFrameBuilder(deps.metrics);
    case 'uptime':
      return createUptimeFrameBuilder(deps.metrics, deps.now);
    case 'temperature':
      return createTemperatureFrameBuilder(deps.metrics, deps.sensors);
    default: {
      const unknown: never = kind;
      throw new Error(`Unknown frame kind: ${String(unknown)}`);
    }
  }
}

/**
 * One entry per configured frame, in configured order, all sharing the
 * configured dwell.
 */
export function createScheduleEntries(
  config: Pick<SysmonConfiguration, 'frames' | 'dwellMs' | 'sensors'>,
  deps: Omit<FrameBuilderDependencies, 'sensors'>,
): ScheduleEntry[] {
  const builderDeps: FrameBuilderDependencies = { ...deps, sensors: config.sensors };
  return config.frames.map((kind) => ({
    builder: createFrameBuilder(kind, builderDeps),
    dwellMs: config.dwellMs,
  }));
}
