#!/usr/bin/env node

/**
 * serial-sysmon CLI
 *
 * Entry point for streaming host telemetry to a serial character display.
 */

import { Command, InvalidArgumentError } from 'commander';
import { createSubsystemLogger } from './logging/subsystem.js';
import { loadSysmonConfiguration } from './sysmon/config/config-loader.js';
import { ConfigurationError } from './sysmon/errors.js';
import { listTemperatureSensors } from './sysmon/metrics/hwmon.js';
import { createShutdownSignal, renderFrames, runSysmon } from './sysmon/sysmon-runner.js';

const log = createSubsystemLogger('sysmon/cli');

function parsePositiveInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

function reportFailure(error: unknown): void {
  if (error instanceof ConfigurationError) {
    console.error(`Error: ${error.message}`);
  } else if (error instanceof Error) {
    log.fatal(error.message, { name: error.name });
  } else {
    log.fatal(String(error));
  }
  process.exitCode = 1;
}

const program = new Command();

program
  .name('serial-sysmon')
  .description('Stream CPU, memory, uptime and temperature readings to a 16x2 serial LCD')
  .version('0.1.0');

program
  .command('run')
  .description('Open the serial port and cycle through the configured frames until stopped')
  .option('-c, --config <file>', 'JSON configuration file')
  .option('-d, --device <path>', 'Serial device path (overrides the configuration file)')
  .option('-b, --baud <rate>', 'Baud rate (overrides the configuration file)', parsePositiveInteger)
  .action(async (options: { config?: string; device?: string; baud?: number }) => {
    const shutdown = createShutdownSignal();
    try {
      const config = loadSysmonConfiguration(options.config, {
        path: options.device,
        baudRate: options.baud,
      });
      await runSysmon(config, shutdown.signal);
    } catch (error) {
      reportFailure(error);
    } finally {
      shutdown.dispose();
    }
  });

program
  .command('preview')
  .description('Print every configured frame once, as the display would show it')
  .option('-c, --config <file>', 'JSON configuration file')
  .action((options: { config?: string }) => {
    try {
      const config = loadSysmonConfiguration(options.config);
      for (const frame of renderFrames(config)) {
        console.log(`[${frame.kind}]`);
        console.log(`|${frame.rows[0]}|`);
        console.log(`|${frame.rows[1]}|`);
      }
    } catch (error) {
      reportFailure(error);
    }
  });

program
  .command('sensors')
  .description('List hwmon temperature sensors, for choosing the chip and index to configure')
  .option('--json', 'Print as JSON')
  .action((options: { json?: boolean }) => {
    const sensors = listTemperatureSensors();
    if (options.json) {
      console.log(JSON.stringify(sensors, null, 2));
      return;
    }
    if (sensors.length === 0) {
      console.log('No temperature sensors found under /sys/class/hwmon');
      return;
    }
    for (const sensor of sensors) {
      const value = sensor.current === null ? 'unreadable' : `${sensor.current.toFixed(1)} C`;
      console.log(`${sensor.chip}[${sensor.index}] ${sensor.label}: ${value}`);
    }
    console.log();
    console.log('Set sensors.cpu and sensors.mainboard to { "chip": <name>, "index": <n> } in the configuration file.');
  });

program.parseAsync(process.argv).catch(reportFailure);
