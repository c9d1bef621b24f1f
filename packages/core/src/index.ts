/**
 * @siemlink/core
 *
 * Descriptor types, loader and activation rules for log-forwarding connectors
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas and loader
export * from './validation/index.js';

// Activation rules and masking
export * from './configuration/index.js';

// Utilities
export * from './utils/index.js';
