export * from './schemas.js';
export * from './descriptor-loader.js';
