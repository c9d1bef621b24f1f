export * from './freeze.js';
export * from './version.js';
