import { KeyedMutex, type DecisionRecord, type ExtractionRule } from '@autosel/core';
import type { DecisionStore, RuleCounter, RuleStore } from './stores.js';

function copyRule(rule: ExtractionRule): ExtractionRule {
  return { ...rule, locators: { ...rule.locators } };
}

/**
 * In-process rule store for tests and single-process runs
 */
export class MemoryRuleStore implements RuleStore {
  private readonly rules = new Map<string, ExtractionRule>();
  private readonly locks = new KeyedMutex();

  constructor(seed: ExtractionRule[] = []) {
    for (const rule of seed) {
      this.rules.set(rule.sourceId, copyRule(rule));
    }
  }

  async get(sourceId: string): Promise<ExtractionRule | null> {
    const rule = this.rules.get(sourceId);
    return rule ? copyRule(rule) : null;
  }

  async put(rule: ExtractionRule): Promise<void> {
    this.rules.set(rule.sourceId, copyRule(rule));
  }

  async increment(sourceId: string, counter: RuleCounter): Promise<ExtractionRule | null> {
    const rule = this.rules.get(sourceId);
    if (!rule) {
      return null;
    }
    rule[counter] += 1;
    return copyRule(rule);
  }

  async list(): Promise<ExtractionRule[]> {
    return [...this.rules.values()].map(copyRule);
  }

  withLock<T>(sourceId: string, task: () => Promise<T>): Promise<T> {
    return this.locks.runExclusive(sourceId, task);
  }

  isLocked(sourceId: string): boolean {
    return this.locks.isLocked(sourceId);
  }
}

export class MemoryDecisionStore implements DecisionStore {
  private readonly records: DecisionRecord[] = [];
  private readonly resolved = new Set<string>();

  async append(record: DecisionRecord): Promise<void> {
    this.records.push(structuredClone(record));
  }

  async get(id: string): Promise<DecisionRecord | null> {
    const record = this.records.find((r) => r.id === id);
    return record ? structuredClone(record) : null;
  }

  async listBySource(sourceId: string, limit: number): Promise<DecisionRecord[]> {
    return this.newestFirst((r) => r.sourceId === sourceId, limit);
  }

  async listRecent(limit: number): Promise<DecisionRecord[]> {
    return this.newestFirst(() => true, limit);
  }

  async listPendingReviews(limit: number): Promise<DecisionRecord[]> {
    return this.newestFirst((r) => r.outcome === 'needs_review' && !this.resolved.has(r.id), limit);
  }

  async isPendingReview(id: string): Promise<boolean> {
    return this.records.some((r) => r.id === id && r.outcome === 'needs_review') && !this.resolved.has(id);
  }

  async markResolved(id: string): Promise<void> {
    this.resolved.add(id);
  }

  private newestFirst(predicate: (record: DecisionRecord) => boolean, limit: number): DecisionRecord[] {
    return this.records
      .filter(predicate)
      .reverse()
      .slice(0, limit)
      .map((record) => structuredClone(record));
  }
}
