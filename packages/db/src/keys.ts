const PREFIX = 'autosel';

export const redisKeys = {
  rule: (sourceId: string) => `${PREFIX}:rule:${sourceId}`,
  ruleIndex: `${PREFIX}:rules`,
  ruleLock: (sourceId: string) => `${PREFIX}:lock:rule:${sourceId}`,
  decision: (id: string) => `${PREFIX}:decision:${id}`,
  decisionLog: `${PREFIX}:decisions`,
  sourceDecisions: (sourceId: string) => `${PREFIX}:decisions:source:${sourceId}`,
  pendingReviews: `${PREFIX}:reviews:pending`,
  resolvedReviews: `${PREFIX}:reviews:resolved`,
} as const;
