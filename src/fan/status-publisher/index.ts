/**
 * Status Publication
 */

export * from './status-publisher.js';
export * from './status-reader.js';
