/**
 * Sysmon Configuration
 *
 * Defaults and validation for the display configuration. Everything is
 * checked before the port is opened; a bad value never reaches the scheduler.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { MAX_SLEEP_MS } from '../scheduler/clock.js';
import { FRAME_KINDS, type SysmonConfiguration } from '../types/index.js';

export const DEFAULT_CONFIGURATION: SysmonConfiguration = {
  serial: {
    path: '/dev/ttyACM0',
    baudRate: 9600,
    encoding: 'latin1',
  },
  warmUpMs: 6000,
  dwellMs: 3000,
  frames: [...FRAME_KINDS],
  sensors: {
    cpu: { chip: 'k10temp', index: 0 },
    mainboard: { chip: 'thinkpad', index: 0 },
  },
};

const sensorRefSchema = z
  .object({
    chip: z.string().trim().min(1, 'sensor chip name must not be empty'),
    index: z.number().int().min(0).default(0),
  })
  .strict();

export const sysmonConfigurationSchema = z
  .object({
    serial: z
      .object({
        path: z.string().trim().min(1, 'serial device path must not be empty').default(DEFAULT_CONFIGURATION.serial.path),
        baudRate: z.number().int().positive().default(DEFAULT_CONFIGURATION.serial.baudRate),
        encoding: z.enum(['ascii', 'latin1']).default(DEFAULT_CONFIGURATION.serial.encoding),
      })
      .strict()
      .default({}),
    warmUpMs: z
      .number()
      .finite()
      .min(0)
      .max(MAX_SLEEP_MS, `warm-up must not exceed ${MAX_SLEEP_MS} ms`)
      .default(DEFAULT_CONFIGURATION.warmUpMs),
    dwellMs: z
      .number()
      .finite()
      .positive('dwell must be greater than zero')
      .max(MAX_SLEEP_MS, `dwell must not exceed ${MAX_SLEEP_MS} ms`)
      .default(DEFAULT_CONFIGURATION.dwellMs),
    frames: z
      .array(z.enum(FRAME_KINDS))
      .min(1, 'at least one frame must be enabled')
      .default([...DEFAULT_CONFIGURATION.frames]),
    sensors: z
      .object({
        cpu: sensorRefSchema.default(DEFAULT_CONFIGURATION.sensors.cpu),
        mainboard: sensorRefSchema.default(DEFAULT_CONFIGURATION.sensors.mainboard),
      })
      .strict()
      .default({}),
  })
  .strict();

function describeIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

/**
 * Validates raw configuration, filling defaults for omitted keys.
 *
 * @throws ConfigurationError listing every problem found
 */
export function parseSysmonConfiguration(raw: unknown): SysmonConfiguration {
  const result = sysmonConfigurationSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(describeIssue);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}
