export * from './threats.js';
