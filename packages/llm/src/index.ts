export * from './types.js';
export * from './client.js';
export * from './agent.js';
export * from './schemas.js';
export * from './prompts.js';
export * from './fallback.js';
export * from './env.js';
