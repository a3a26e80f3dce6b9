export * from './configuration.js';
export * from './config-loader.js';
