/**
 * Rule Registry
 *
 * `upsert` is the only path that writes locators. Counters move on their own
 * through `incrementSuccess` / `incrementFailure`.
 */

import { createLogger } from '@autosel/config';
import { ErrorCode, OrchestratorError, type ExtractionRule, type RuleInput } from '@autosel/core';
import type { RuleStore } from '@autosel/db';

const logger = createLogger('knowledge');

export type Clock = () => Date;

function compareExemplars(a: ExtractionRule, b: ExtractionRule): number {
  if (a.successCount !== b.successCount) {
    return b.successCount - a.successCount;
  }
  if (a.updatedAt !== b.updatedAt) {
    return b.updatedAt.localeCompare(a.updatedAt);
  }
  return a.sourceId.localeCompare(b.sourceId);
}

export class RuleRegistry {
  constructor(
    private readonly store: RuleStore,
    private readonly clock: Clock = () => new Date()
  ) {}

  get(sourceId: string): Promise<ExtractionRule | null> {
    return this.store.get(sourceId);
  }

  /**
   * Replace the rule's locators. Counters restart at zero: they describe the
   * locators they were earned by.
   */
  async upsert(input: RuleInput): Promise<ExtractionRule> {
    if (!input.sourceId.trim()) {
      throw new OrchestratorError(ErrorCode.INVALID_INPUT, 'Rule sourceId must not be empty');
    }
    const rule: ExtractionRule = {
      sourceId: input.sourceId,
      locators: { ...input.locators },
      sourceType: input.sourceType,
      successCount: 0,
      failureCount: 0,
      updatedAt: this.clock().toISOString(),
    };
    await this.store.put(rule);
    logger.info(
      { event: 'registry.rule.upserted', sourceId: rule.sourceId, sourceType: rule.sourceType },
      'Extraction rule saved'
    );
    return rule;
  }

  incrementSuccess(sourceId: string): Promise<ExtractionRule | null> {
    return this.store.increment(sourceId, 'successCount');
  }

  incrementFailure(sourceId: string): Promise<ExtractionRule | null> {
    return this.store.increment(sourceId, 'failureCount');
  }

  list(): Promise<ExtractionRule[]> {
    return this.store.list();
  }

  /**
   * Rules that have succeeded at least once, by success count desc, then
   * most recently updated, then source id
   */
  async topExemplars(limit: number): Promise<ExtractionRule[]> {
    if (limit <= 0) {
      return [];
    }
    const rules = await this.store.list();
    return rules
      .filter((rule) => rule.successCount > 0)
      .sort(compareExemplars)
      .slice(0, limit);
  }

  /**
   * Serialise work on one source id across every process sharing the store.
   * Different ids run in parallel.
   */
  withSourceLock<T>(sourceId: string, task: () => Promise<T>): Promise<T> {
    return this.store.withLock(sourceId, task);
  }
}
