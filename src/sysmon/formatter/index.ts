export * from './fixed-width.js';
export * from './layout.js';
