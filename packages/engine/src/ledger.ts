import { randomUUID } from 'crypto';
import { createLogger } from '@autosel/config';
import type { DecisionRecord, NewDecisionRecord } from '@autosel/core';
import type { DecisionStore } from '@autosel/db';

const logger = createLogger('engine');

/**
 * Stamps and appends decision records. Records are never rewritten.
 */
export class DecisionLedger {
  constructor(
    private readonly store: DecisionStore,
    private readonly clock: () => Date = () => new Date(),
    private readonly idFactory: () => string = randomUUID
  ) {}

  async append(entry: NewDecisionRecord): Promise<DecisionRecord> {
    const record: DecisionRecord = { ...entry, id: this.idFactory(), createdAt: this.clock().toISOString() };
    await this.store.append(record);
    logger.info(
      {
        event: 'ledger.record.appended',
        decisionId: record.id,
        sourceId: record.sourceId,
        method: record.method,
        outcome: record.outcome,
        retryCount: record.retryCount,
      },
      'Decision recorded'
    );
    return record;
  }
}
