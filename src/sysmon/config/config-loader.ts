/**
 * Configuration file loading.
 */

import { existsSync, readFileSync } from 'node:fs';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { ConfigurationError } from '../errors.js';
import type { SysmonConfiguration } from '../types/index.js';
import { parseSysmonConfiguration } from './configuration.js';

const log = createSubsystemLogger('sysmon/config');

/** Values given on the command line; they win over the file */
export interface ConfigurationOverrides {
  path?: string;
  baudRate?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merges serial overrides into raw configuration. Non-object input is left
 * alone so validation reports it.
 */
export function applyOverrides(raw: unknown, overrides: ConfigurationOverrides): unknown {
  const serialOverrides: Record<string, unknown> = {};
  if (overrides.path !== undefined) serialOverrides.path = overrides.path;
  if (overrides.baudRate !== undefined) serialOverrides.baudRate = overrides.baudRate;

  if (Object.keys(serialOverrides).length === 0) {
    return raw;
  }
  if (raw !== undefined && !isRecord(raw)) {
    return raw;
  }

  const base = raw ?? {};
  const serial = isRecord(base.serial) ? base.serial : {};
  return { ...base, serial: { ...serial, ...serialOverrides } };
}

/**
 * Reads a JSON configuration file. Without a file the defaults are used.
 *
 * @throws ConfigurationError when the file is missing, not JSON, or invalid
 */
export function loadSysmonConfiguration(
  filePath?: string,
  overrides: ConfigurationOverrides = {},
): SysmonConfiguration {
  let raw: unknown;

  if (filePath !== undefined) {
    if (!existsSync(filePath)) {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    const text = readFileSync(filePath, 'utf8');
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new ConfigurationError(
        `Configuration file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        [],
        error,
      );
    }
  }

  const config = parseSysmonConfiguration(applyOverrides(raw, overrides));
  log.debug('Configuration loaded', { source: filePath ?? 'defaults', config });
  return config;
}
