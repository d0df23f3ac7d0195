/**
 * Fan Curve Configuration
 */

export * from './schema.js';
export * from './configuration.js';
export * from './config-dir.js';
