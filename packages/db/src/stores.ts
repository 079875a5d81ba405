/**
 * Logical persistence contracts
 *
 *   rules(source_id PK, locators, source_type, success_count, failure_count, updated_at)
 *   decision_records(id PK, source_id, proposals, consensus_result, retry_count, outcome, created_at)
 */

import type { DecisionRecord, ExtractionRule } from '@autosel/core';

export type RuleCounter = 'successCount' | 'failureCount';

export interface RuleStore {
  get(sourceId: string): Promise<ExtractionRule | null>;
  /** Insert or replace the whole rule */
  put(rule: ExtractionRule): Promise<void>;
  /** Add one to a counter; null when the rule does not exist */
  increment(sourceId: string, counter: RuleCounter): Promise<ExtractionRule | null>;
  list(): Promise<ExtractionRule[]>;
  /**
   * Run `task` holding the source's lock. The lock is shared by every
   * process that uses the same backing store.
   */
  withLock<T>(sourceId: string, task: () => Promise<T>): Promise<T>;
}

/**
 * Append-only decision log. Listings are newest first.
 */
export interface DecisionStore {
  append(record: DecisionRecord): Promise<void>;
  get(id: string): Promise<DecisionRecord | null>;
  listBySource(sourceId: string, limit: number): Promise<DecisionRecord[]>;
  listRecent(limit: number): Promise<DecisionRecord[]>;
  /** `needs_review` records not yet resolved by an operator */
  listPendingReviews(limit: number): Promise<DecisionRecord[]>;
  isPendingReview(id: string): Promise<boolean>;
  markResolved(id: string): Promise<void>;
}
