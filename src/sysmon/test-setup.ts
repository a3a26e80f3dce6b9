/**
 * Property-Based Testing Setup
 *
 * Common generators and stand-ins for testing the display pipeline with
 * fast-check.
 */

import * as fc from 'fast-check';
import { ROW_WIDTH } from './types/index.js';
import type {
  DisplayFrame,
  FormatSpec,
  LoadAverage,
  MemoryUsage,
  MetricsProvider,
  SensorReading,
  SensorRef,
} from './types/index.js';

/**
 * Readings served by FakeMetricsProvider. `undefined` makes the read throw;
 * a sensor missing from `sensors` is reported absent.
 */
export interface FakeReadings {
  loadAverage?: LoadAverage;
  cpuFrequency?: number;
  cpuPercent?: number;
  memory?: MemoryUsage;
  bootTime?: Date;
  /** Keyed by `chip[index]` */
  sensors: Record<string, number>;
}

export function sensorKey(sensor: SensorRef): string {
  return `${sensor.chip}[${sensor.index}]`;
}

function present<T>(value: T | undefined, metric: string): T {
  if (value === undefined) {
    throw new Error(`${metric} unavailable`);
  }
  return value;
}

/**
 * In-memory MetricsProvider that also records how often each reading is taken.
 */
export class FakeMetricsProvider implements MetricsProvider {
  readonly calls: string[] = [];

  constructor(public readings: FakeReadings) {}

  getLoadAverage(): LoadAverage {
    this.calls.push('loadAverage');
    return present(this.readings.loadAverage, 'loadAverage');
  }

  getCpuFrequency(): number {
    this.calls.push('cpuFrequency');
    return present(this.readings.cpuFrequency, 'cpuFrequency');
  }

  getCpuPercent(): number {
    this.calls.push('cpuPercent');
    return present(this.readings.cpuPercent, 'cpuPercent');
  }

  getMemoryUsage(): MemoryUsage {
    this.calls.push('memory');
    return present(this.readings.memory, 'memory');
  }

  getBootTime(): Date {
    this.calls.push('bootTime');
    return present(this.readings.bootTime, 'bootTime');
  }

  readSensor(sensor: SensorRef): SensorReading {
    this.calls.push(`sensor:${sensorKey(sensor)}`);
    const value = this.readings.sensors[sensorKey(sensor)];
    return value === undefined
      ? { present: false, reason: `no sensor ${sensorKey(sensor)}` }
      : { present: true, value };
  }
}

export const defaultSensors = {
  cpu: { chip: 'k10temp', index: 0 },
  mainboard: { chip: 'thinkpad', index: 0 },
};

/**
 * In-memory stand-in for the parts of `node:fs` the metrics code reads.
 * Files stored as an Error throw that error when read.
 */
export class VirtualFs {
  private readonly files = new Map<string, string | Error>();
  private readonly dirs = new Map<string, string[]>();

  reset(): void {
    this.files.clear();
    this.dirs.clear();
  }

  addFile(path: string, content: string | Error): void {
    this.files.set(path, content);
    this.link(path);
  }

  removeFile(path: string): void {
    this.files.delete(path);
  }

  exists(path: string): boolean {
    return this.files.has(path) || this.dirs.has(path);
  }

  read(path: string): string {
    const content = this.files.get(path);
    if (content === undefined) {
      throw new Error(`ENOENT: no such file or directory, open '${path}'`);
    }
    if (content instanceof Error) {
      throw content;
    }
    return content;
  }

  list(path: string): string[] {
    const entries = this.dirs.get(path);
    if (!entries) {
      throw new Error(`ENOENT: no such file or directory, scandir '${path}'`);
    }
    return [...entries];
  }

  private link(path: string): void {
    const slash = path.lastIndexOf('/');
    if (slash <= 0) {
      return;
    }
    const parent = path.slice(0, slash);
    const name = path.slice(slash + 1);
    const entries = this.dirs.get(parent);
    if (entries) {
      if (!entries.includes(name)) entries.push(name);
      return;
    }
    this.dirs.set(parent, [name]);
    this.link(parent);
  }
}

export const virtualFs = new VirtualFs();

/** Module shape for `vi.mock('node:fs', ...)` */
export const virtualFsModule = {
  existsSync: (path: string) => virtualFs.exists(path),
  readFileSync: (path: string) => virtualFs.read(path),
  readdirSync: (path: string) => virtualFs.list(path),
};

/**
 * Fast-check generators
 */

export const formatSpecArbitrary: fc.Arbitrary<FormatSpec> = fc.record({
  integerDigits: fc.integer({ min: 1, max: 8 }),
  decimalDigits: fc.integer({ min: 0, max: 6 }),
});

// Any double, including NaN, infinities and -0
export const anyNumberArbitrary = fc.double();

const reading = fc.double({ min: -1e6, max: 1e6, noNaN: true });

export const fakeReadingsArbitrary: fc.Arbitrary<FakeReadings> = fc.record({
  loadAverage: fc.option(fc.tuple(reading, reading, reading), { nil: undefined }),
  cpuFrequency: fc.option(fc.double({ min: 0, max: 1e5, noNaN: true }), { nil: undefined }),
  cpuPercent: fc.option(fc.double({ min: 0, max: 100, noNaN: true }), { nil: undefined }),
  memory: fc.option(
    fc.record({
      usedBytes: fc.integer({ min: 0, max: 2 ** 50 }),
      percent: fc.double({ min: 0, max: 100, noNaN: true }),
    }),
    { nil: undefined },
  ),
  bootTime: fc.option(
    fc.integer({ min: 0, max: 2_000_000_000_000 }).map((ms) => new Date(ms)),
    { nil: undefined },
  ),
  sensors: fc.dictionary(
    fc.constantFrom('k10temp[0]', 'thinkpad[0]', 'coretemp[0]'),
    fc.double({ min: -300, max: 5000, noNaN: true }),
  ),
});

/**
 * Property test helpers
 */

export function isWellFormedFrame(frame: DisplayFrame): boolean {
  return frame.rows.length === 2 && frame.rows.every((row) => row.length === ROW_WIDTH);
}

/**
 * Test configuration for property-based tests
 */
export const propertyTestConfig = {
  numRuns: 200,
};
