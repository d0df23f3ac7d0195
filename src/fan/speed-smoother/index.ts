export * from './speed-smoother.js';
