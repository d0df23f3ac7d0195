export * from './curve-evaluator.js';
