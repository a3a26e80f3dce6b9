/**
 * Host Metrics Provider
 *
 * Samples the local machine for the frame builders. Linux readings come from
 * /proc and /sys; `node:os` covers the rest and acts as the fallback when
 * procfs is missing.
 */

import { existsSync, readFileSync } from 'node:fs';
import { cpus, freemem, loadavg, totalmem, uptime } from 'node:os';
import type {
  LoadAverage,
  MemoryUsage,
  MetricsProvider,
  SensorReading,
  SensorRef,
} from '../types/index.js';
import { HWMON_ROOT, readTemperatureSensor } from './hwmon.js';

export interface HostMetricsProviderOptions {
  /** Root of the hwmon sysfs tree */
  hwmonRoot?: string;
}

interface CpuTimes {
  busy: number;
  total: number;
}

export class HostMetricsProvider implements MetricsProvider {
  private readonly hwmonRoot: string;
  private previousCpuTimes?: CpuTimes;

  constructor(options: HostMetricsProviderOptions = {}) {
    this.hwmonRoot = options.hwmonRoot ?? HWMON_ROOT;
  }

  getLoadAverage(): LoadAverage {
    const [one, five, fifteen] = loadavg();
    return [one ?? 0, five ?? 0, fifteen ?? 0];
  }

  /**
   * Mean current clock speed across all cores, in MHz
   */
  getCpuFrequency(): number {
    const speeds = cpus()
      .map((cpu) => cpu.speed)
      .filter((speed) => speed > 0);
    if (speeds.length === 0) {
      throw new Error('CPU frequency not reported by this host');
    }
    return speeds.reduce((sum, speed) => sum + speed, 0) / speeds.length;
  }

  /**
   * Busy share of CPU time since the previous call. The first call measures
   * since boot.
   */
  getCpuPercent(): number {
    const current = this.readCpuTimes();
    const previous = this.previousCpuTimes ?? { busy: 0, total: 0 };
    this.previousCpuTimes = current;

    const totalDiff = current.total - previous.total;
    if (totalDiff <= 0) {
      return 0;
    }
    const busyDiff = current.busy - previous.busy;
    return Math.max(0, Math.min(100, (busyDiff / totalDiff) * 100));
  }

  /**
   * Used bytes exclude buffers and page cache; percent is based on
   * MemAvailable.
   */
  getMemoryUsage(): MemoryUsage {
    if (!existsSync('/proc/meminfo')) {
      const total = totalmem();
      const used = total - freemem();
      return { usedBytes: used, percent: total > 0 ? (used / total) * 100 : 0 };
    }

    const memInfo = readFileSync('/proc/meminfo', 'utf8');
    const lines = memInfo.split('\n');

    const getMemValue = (key: string): number | undefined => {
      const line = lines.find((l) => l.startsWith(key));
      if (!line) return undefined;
      const match = line.match(/(\d+)/);
      return match ? Number.parseInt(match[1], 10) * 1024 : undefined; // kB to bytes
    };

    const total = getMemValue('MemTotal:');
    if (total === undefined || total === 0) {
      throw new Error('MemTotal missing from /proc/meminfo');
    }
    const free = getMemValue('MemFree:') ?? 0;
    const buffers = getMemValue('Buffers:') ?? 0;
    const cached = (getMemValue('Cached:') ?? 0) + (getMemValue('SReclaimable:') ?? 0);
    const available = getMemValue('MemAvailable:') ?? free + buffers + cached;

    let usedBytes = total - free - buffers - cached;
    if (usedBytes < 0) {
      usedBytes = total - free;
    }

    return {
      usedBytes,
      percent: ((total - available) / total) * 100,
    };
  }

  getBootTime(): Date {
    if (existsSync('/proc/stat')) {
      const btimeLine = readFileSync('/proc/stat', 'utf8')
        .split('\n')
        .find((line) => line.startsWith('btime '));
      const seconds = btimeLine ? Number.parseInt(btimeLine.split(/\s+/)[1] ?? '', 10) : Number.NaN;
      if (!Number.isNaN(seconds)) {
        return new Date(seconds * 1000);
      }
    }
    return new Date(Date.now() - uptime() * 1000);
  }

  readSensor(sensor: SensorRef): SensorReading {
    return readTemperatureSensor(sensor, this.hwmonRoot);
  }

  /**
   * Aggregate CPU times from the first line of /proc/stat, or from
   * `os.cpus()` where procfs is unavailable.
   */
  private readCpuTimes(): CpuTimes {
    if (existsSync('/proc/stat')) {
      const cpuLine = readFileSync('/proc/stat', 'utf8').split('\n')[0] ?? '';
      const values = cpuLine.split(/\s+/).slice(1).map(Number);
      const [user = 0, nice = 0, system = 0, idle = 0, iowait = 0, irq = 0, softirq = 0, steal = 0] = values;
      const idleAll = idle + iowait;
      const total = user + nice + system + idle + iowait + irq + softirq + steal;
      return { busy: total - idleAll, total };
    }

    return cpus().reduce<CpuTimes>(
      (acc, cpu) => {
        const { user, nice, sys, idle, irq } = cpu.times;
        const total = user + nice + sys + idle + irq;
        return { busy: acc.busy + total - idle, total: acc.total + total };
      },
      { busy: 0, total: 0 },
    );
  }
}
