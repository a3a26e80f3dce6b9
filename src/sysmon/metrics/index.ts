/**
 * Metrics Component
 *
 * Host readings for the frame builders and hwmon sensor discovery.
 */

export * from './host-metrics-provider.js';
export * from './hwmon.js';
