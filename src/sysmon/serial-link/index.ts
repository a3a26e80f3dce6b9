export * from './serial-link.js';
