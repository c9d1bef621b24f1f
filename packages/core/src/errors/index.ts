export * from './descriptor-error.js';
