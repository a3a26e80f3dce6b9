/**
 * Sysmon Runner Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createShutdownSignal, renderFrames, runSysmon } from './sysmon-runner.js';
import { DEFAULT_CONFIGURATION } from './config/configuration.js';
import { ConfigurationError, TransmissionError } from './errors.js';
import type { SchedulerClock } from './scheduler/clock.js';
import type { SerialLink, SerialLinkOptions } from './serial-link/serial-link.js';
import type { SysmonConfiguration } from './types/index.js';
import { FakeMetricsProvider, type FakeReadings } from './test-setup.js';

const { warn } = vi.hoisted(() => ({ warn: vi.fn() }));

vi.mock('../logging/subsystem.js', () => ({
  createSubsystemLogger: vi.fn(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn,
    error: vi.fn(),
    fatal: vi.fn(),
  })),
}));

const readings: FakeReadings = {
  loadAverage: [0.5, 0.25, 0.125],
  cpuFrequency: 3000,
  cpuPercent: 12.5,
  memory: { usedBytes: 2 ** 30, percent: 12.5 },
  bootTime: new Date(0),
  sensors: { 'k10temp[0]': 45.5, 'thinkpad[0]': 38 },
};

class FakeLink implements SerialLink {
  readonly writes: string[] = [];
  closed = 0;
  failWrites = false;
  failClose = false;

  constructor(readonly path: string) {}

  async write(bytes: Uint8Array): Promise<void> {
    if (this.failWrites) {
      throw new Error('device unplugged');
    }
    this.writes.push(Buffer.from(bytes).toString('latin1'));
  }

  async close(): Promise<void> {
    this.closed++;
    if (this.failClose) {
      throw new Error('already gone');
    }
  }
}

const instantClock: SchedulerClock = {
  now: () => 0,
  sleep: async () => {},
};

describe('runSysmon', () => {
  let link: FakeLink | undefined;
  let openLink: (options: SerialLinkOptions) => Promise<SerialLink>;
  let opened: SerialLinkOptions[];

  beforeEach(() => {
    warn.mockClear();
    link = undefined;
    opened = [];
    openLink = async (options) => {
      opened.push(options);
      link = new FakeLink(options.path);
      return link;
    };
  });

  it('should open the configured port, stream the frames and close it', async () => {
    const config: SysmonConfiguration = { ...DEFAULT_CONFIGURATION, frames: ['load-average', 'temperature'] };

    const summary = await runSysmon(config, undefined, {
      metrics: new FakeMetricsProvider(readings),
      openLink,
      clock: instantClock,
      cycles: 2,
    });

    expect(opened).toEqual([{ path: '/dev/ttyACM0', baudRate: 9600 }]);
    expect(summary).toEqual({ cycles: 2, framesSent: 4, cancelled: false });
    expect(link?.writes).toEqual([
      '    Load AVG     0.50  0.25  0.1',
      'CPU  Temp  45.5CMoBo Temp  38.0C',
      '    Load AVG     0.50  0.25  0.1',
      'CPU  Temp  45.5CMoBo Temp  38.0C',
    ]);
    expect(link?.closed).toBe(1);
  });

  it('should close the port and rethrow when a write fails', async () => {
    openLink = async (options) => {
      link = new FakeLink(options.path);
      link.failWrites = true;
      return link;
    };

    await expect(
      runSysmon(DEFAULT_CONFIGURATION, undefined, {
        metrics: new FakeMetricsProvider(readings),
        openLink,
        clock: instantClock,
      }),
    ).rejects.toBeInstanceOf(TransmissionError);
    expect(link?.writes).toEqual([]);
    expect(link?.closed).toBe(1);
  });

  it('should stop when the signal aborts', async () => {
    const controller = new AbortController();
    controller.abort();

    const summary = await runSysmon(DEFAULT_CONFIGURATION, controller.signal, {
      metrics: new FakeMetricsProvider(readings),
      openLink,
      clock: instantClock,
    });

    expect(summary).toEqual({ cycles: 0, framesSent: 0, cancelled: true });
    expect(link?.closed).toBe(1);
  });

  it('should reject an invalid schedule before opening the port', async () => {
    const config: SysmonConfiguration = { ...DEFAULT_CONFIGURATION, dwellMs: 0 };

    await expect(
      runSysmon(config, undefined, { metrics: new FakeMetricsProvider(readings), openLink, clock: instantClock }),
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(opened).toEqual([]);
  });

  it('should log, not throw, when closing the port fails', async () => {
    openLink = async (options) => {
      link = new FakeLink(options.path);
      link.failClose = true;
      return link;
    };

    const summary = await runSysmon(DEFAULT_CONFIGURATION, undefined, {
      metrics: new FakeMetricsProvider(readings),
      openLink,
      clock: instantClock,
      cycles: 1,
    });

    expect(summary.framesSent).toBe(5);
    expect(warn).toHaveBeenCalledWith('Failed to close serial link', {
      path: '/dev/ttyACM0',
      error: 'already gone',
    });
  });
});

describe('renderFrames', () => {
  it('should build each configured frame once in order', () => {
    const frames = renderFrames(
      { frames: ['uptime', 'memory-usage', 'cpu-usage'], dwellMs: 3000, sensors: DEFAULT_CONFIGURATION.sensors },
      new FakeMetricsProvider(readings),
      () => new Date(((2 * 24 + 3) * 60 + 4) * 60_000 + 59_000),
    );

    expect(frames).toEqual([
      { kind: 'uptime', rows: ['     Uptime     ', '   2 d  3 h  4 m'] },
      { kind: 'memory-usage', rows: ['   MEM  Usage   ', ' 1.000GiB  12.5%'] },
      { kind: 'cpu-usage', rows: ['   CPU  Usage   ', '3000.0MHz  12.5%'] },
    ]);
  });
});

describe('createShutdownSignal', () => {
  it('should abort on SIGTERM and hand later signals back to the default handler', () => {
    const before = process.listenerCount('SIGTERM');
    const shutdown = createShutdownSignal();

    const added = process.listeners('SIGTERM').slice(before);
    expect(added).toHaveLength(1);
    for (const listener of added) listener('SIGTERM');

    expect(shutdown.signal.aborted).toBe(true);
    expect(process.listenerCount('SIGTERM')).toBe(before);
    expect(process.listeners('SIGINT')).not.toContain(added[0]);
    shutdown.dispose();
  });

  it('should stop listening once disposed', () => {
    const before = process.listenerCount('SIGINT');
    const shutdown = createShutdownSignal();

    expect(process.listenerCount('SIGINT')).toBe(before + 1);
    shutdown.dispose();

    expect(process.listenerCount('SIGINT')).toBe(before);
    expect(shutdown.signal.aborted).toBe(false);
  });
});
