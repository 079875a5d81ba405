export * from './registry.js';
export * from './exemplars.js';
