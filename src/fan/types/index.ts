/**
 * Fan Controller - Type Definitions
 */

export * from './hardware.js';
export * from './controller-status.js';
export * from './fan-config.js';
