export * from './types.js';
export * from './errors.js';
export * from './timeout.js';
export * from './backoff.js';
export * from './mutex.js';
export * from './queue.js';
