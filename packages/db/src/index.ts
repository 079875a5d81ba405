export * from './stores.js';
export * from './memory.js';
export * from './codec.js';
export * from './keys.js';
export * from './redis.js';
export * from './client.js';
