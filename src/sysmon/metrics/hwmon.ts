/**
 * hwmon Temperature Sensors
 *
 * Discovers temperature inputs under /sys/class/hwmon. Inputs are grouped by
 * chip name; chips sharing a name (two NVMe drives, say) continue the same
 * index sequence, in hwmon directory order.
 */

import { existsSync, readFileSync, readdirSync } from 'node:fs';
import type { SensorReading, SensorRef, TemperatureSensorInfo } from '../types/index.js';

export const HWMON_ROOT = '/sys/class/hwmon';

const TEMPERATURE_INPUT = /^temp(\d+)_input$/;

function readTrimmed(path: string): string | undefined {
  try {
    if (!existsSync(path)) {
      return undefined;
    }
    return readFileSync(path, 'utf8').trim();
  } catch {
    // sysfs attributes can fail with EIO while a chip is suspended
    return undefined;
  }
}

function numericSuffix(name: string): number {
  const match = /(\d+)$/.exec(name);
  return match ? Number.parseInt(match[1], 10) : Number.MAX_SAFE_INTEGER;
}

function listTemperatureInputs(chipDir: string): number[] {
  return readdirSync(chipDir)
    .map((entry) => TEMPERATURE_INPUT.exec(entry))
    .filter((match): match is RegExpExecArray => match !== null)
    .map((match) => Number.parseInt(match[1], 10))
    .sort((a, b) => a - b);
}

/**
 * Lists every temperature input the kernel exposes, with its current value.
 */
export function listTemperatureSensors(root: string = HWMON_ROOT): TemperatureSensorInfo[] {
  if (!existsSync(root)) {
    return [];
  }

  const sensors: TemperatureSensorInfo[] = [];
  const nextIndex = new Map<string, number>();
  const chipDirs = readdirSync(root)
    .filter((entry) => entry.startsWith('hwmon'))
    .sort((a, b) => numericSuffix(a) - numericSuffix(b));

  for (const dir of chipDirs) {
    const chipDir = `${root}/${dir}`;
    const chip = readTrimmed(`${chipDir}/name`) ?? dir;

    for (const input of listTemperatureInputs(chipDir)) {
      const index = nextIndex.get(chip) ?? 0;
      nextIndex.set(chip, index + 1);

      const path = `${chipDir}/temp${input}_input`;
      const raw = readTrimmed(path);
      const milliCelsius = raw === undefined ? Number.NaN : Number.parseInt(raw, 10);

      sensors.push({
        chip,
        index,
        label: readTrimmed(`${chipDir}/temp${input}_label`) ?? `temp${input}`,
        current: Number.isNaN(milliCelsius) ? null : milliCelsius / 1000,
        path,
      });
    }
  }

  return sensors;
}

/**
 * Reads one configured sensor. Missing chips, missing inputs and unreadable
 * values are reported as absent readings.
 */
export function readTemperatureSensor(sensor: SensorRef, root: string = HWMON_ROOT): SensorReading {
  const sensors = listTemperatureSensors(root);
  const onChip = sensors.filter((info) => info.chip === sensor.chip);

  if (onChip.length === 0) {
    return { present: false, reason: `no hwmon chip named '${sensor.chip}'` };
  }

  const match = onChip.find((info) => info.index === sensor.index);
  if (!match) {
    return {
      present: false,
      reason: `chip '${sensor.chip}' has ${onChip.length} temperature input(s), no index ${sensor.index}`,
    };
  }

  if (match.current === null) {
    return { present: false, reason: `unreadable value at ${match.path}` };
  }

  return { present: true, value: match.current };
}
