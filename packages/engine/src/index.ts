export * from './consensus.js';
export * from './ledger.js';
export * from './route.js';
export * from './cycle.js';
export * from './commit.js';
export * from './repair.js';
export * from './discovery.js';
export * from './router.js';
export * from './review.js';
export * from './orchestrator.js';
