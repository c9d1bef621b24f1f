export * from './descriptor.js';
export * from './configuration.js';
