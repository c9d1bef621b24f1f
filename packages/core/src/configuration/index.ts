export * from './activation.js';
export * from './masking.js';
