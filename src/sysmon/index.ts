/**
 * Serial Sysmon Entry Point
 *
 * Public surface of the display pipeline: formatter, frame builders,
 * metrics, serial link, scheduler and configuration.
 */

export * from './types/index.js';
export * from './errors.js';
export * from './formatter/index.js';
export * from './frames/index.js';
export * from './metrics/index.js';
export * from './serial-link/index.js';
export * from './scheduler/index.js';
export * from './config/index.js';
export * from './sysmon-runner.js';
