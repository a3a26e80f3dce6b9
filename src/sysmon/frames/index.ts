/**
 * Frame Builders
 *
 * One builder per telemetry category, each producing a two-row, 16-column frame.
 */

export * from './cpu-usage.js';
export * from './load-average.js';
export * from './memory-usage.js';
export * from './uptime.js';
export * from './temperature.js';
export * from './frame-registry.js';
export { fieldOrPlaceholder, makeFrame } from './frame-support.js';
