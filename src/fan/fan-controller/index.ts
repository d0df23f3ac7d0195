/**
 * Fan Controller Module
 */

export * from './fan-controller.js';
