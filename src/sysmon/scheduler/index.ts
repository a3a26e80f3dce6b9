/**
 * Transmission Scheduler Component
 *
 * Round-robin delivery of display frames over the serial link.
 */

export * from './clock.js';
export * from './frame-encoder.js';
export * from './transmission-scheduler.js';
