/**
 * Metrics Provider Interface
 *
 * Defines the host readings consumed by the frame builders. Implementations
 * sample the operating system; the builders only format what they get.
 */

/** 1, 5 and 15 minute load averages */
export type LoadAverage = [number, number, number];

export interface MemoryUsage {
  /** Used memory in bytes (total minus free, buffers and page cache) */
  usedBytes: number;
  /** Memory in use as a percentage of total (0-100) */
  percent: number;
}

/** Locates one temperature input on a named hardware-monitor chip */
export interface SensorRef {
  /** hwmon chip name, e.g. 'k10temp', 'coretemp', 'thinkpad' */
  chip: string;
  /** Position of the temperature input on that chip, in sysfs order */
  index: number;
}

export type SensorReading =
  | { present: true; value: number }
  | { present: false; reason: string };

export interface MetricsProvider {
  getLoadAverage(): LoadAverage;
  /** Current CPU frequency in MHz */
  getCpuFrequency(): number;
  /** CPU utilisation since the previous call, as a percentage (0-100) */
  getCpuPercent(): number;
  getMemoryUsage(): MemoryUsage;
  getBootTime(): Date;
  /** Temperature in Celsius; absence is reported, never thrown */
  readSensor(sensor: SensorRef): SensorReading;
}

export interface TemperatureSensorInfo {
  chip: string;
  index: number;
  /** Value of tempN_label, or the input name when the chip has no labels */
  label: string;
  /** Celsius, or null when the input could not be read */
  current: number | null;
  /** sysfs path of the tempN_input file */
  path: string;
}
