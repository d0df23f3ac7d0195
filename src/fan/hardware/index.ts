/**
 * Fan Controller Hardware Layer
 *
 * Sensor and fan implementations plus startup discovery.
 */

export * from './vendor-tool.js';
export * from './sensors.js';
export * from './fans.js';
export * from './discovery.js';
