/**
 * Serial Sysmon - Type Definitions
 *
 * This module exports all TypeScript interfaces and types for the display pipeline.
 */

export * from './display-frame.js';
export * from './system-metrics.js';
export * from './sysmon-configuration.js';
