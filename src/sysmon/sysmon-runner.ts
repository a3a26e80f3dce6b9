/**
 * Sysmon Runner
 *
 * Wires configuration, metrics, frame builders, the serial link and the
 * scheduler together, and owns the port for the duration of a run.
 */

import { createSubsystemLogger } from '../logging/subsystem.js';
import { ConfigurationError } from './errors.js';
import { createScheduleEntries } from './frames/frame-registry.js';
import { HostMetricsProvider } from './metrics/host-metrics-provider.js';
import type { SchedulerClock } from './scheduler/clock.js';
import {
  TransmissionScheduler,
  validateSchedule,
  type SchedulerRunSummary,
} from './scheduler/transmission-scheduler.js';
import { SerialPortLink, type SerialLink, type SerialLinkOptions } from './serial-link/serial-link.js';
import type { DisplayFrame, MetricsProvider, SysmonConfiguration } from './types/index.js';

const log = createSubsystemLogger('sysmon/runner');

export interface SysmonRunnerDependencies {
  metrics?: MetricsProvider;
  openLink?: (options: SerialLinkOptions) => Promise<SerialLink>;
  clock?: SchedulerClock;
  now?: () => Date;
  /** Stop after this many full cycles */
  cycles?: number;
}

/**
 * Opens the port, runs the schedule until `signal` aborts, and closes the
 * port. A transmission failure rejects after the port has been closed.
 */
export async function runSysmon(
  config: SysmonConfiguration,
  signal?: AbortSignal,
  deps: SysmonRunnerDependencies = {},
): Promise<SchedulerRunSummary> {
  const metrics = deps.metrics ?? new HostMetricsProvider();
  const entries = createScheduleEntries(config, { metrics, now: deps.now });
  const schedulerOptions = {
    warmUpMs: config.warmUpMs,
    encoding: config.serial.encoding,
    clock: deps.clock,
    cycles: deps.cycles,
  };

  const errors = validateSchedule(entries, schedulerOptions);
  if (errors.length > 0) {
    throw new ConfigurationError('Invalid transmission schedule', errors);
  }

  const openLink = deps.openLink ?? ((options: SerialLinkOptions) => SerialPortLink.open(options));
  const link = await openLink({ path: config.serial.path, baudRate: config.serial.baudRate });

  try {
    const scheduler = new TransmissionScheduler(entries, link, schedulerOptions);
    return await scheduler.run(signal);
  } finally {
    try {
      await link.close();
    } catch (error) {
      log.warn('Failed to close serial link', {
        path: link.path,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/**
 * Builds every configured frame once, in schedule order.
 */
export function renderFrames(
  config: Pick<SysmonConfiguration, 'frames' | 'dwellMs' | 'sensors'>,
  metrics: MetricsProvider = new HostMetricsProvider(),
  now?: () => Date,
): DisplayFrame[] {
  return createScheduleEntries(config, { metrics, now }).map((entry) => entry.builder.build());
}

export interface ShutdownSignal {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * An AbortSignal that fires on SIGINT or SIGTERM. The handlers are removed
 * after the first signal; a second one gets Node's default handling and ends
 * the process, even with a write stuck on the device.
 */
export function createShutdownSignal(): ShutdownSignal {
  const controller = new AbortController();
  const dispose = (): void => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
  const onSignal = (name: NodeJS.Signals): void => {
    dispose();
    log.info('Shutdown requested; signal again to exit immediately', { signal: name });
    controller.abort();
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  return { signal: controller.signal, dispose };
}
