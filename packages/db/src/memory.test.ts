import { describe, it, expect } from 'vitest';
import type { DecisionRecord } from '@autosel/core';
import { MemoryDecisionStore, MemoryRuleStore } from './memory.js';

function record(id: string, sourceId: string, outcome: DecisionRecord['outcome']): DecisionRecord {
  return {
    id,
    sourceId,
    documentRef: 'ref',
    method: 'discovery',
    proposals: [],
    consensus: null,
    retryCount: 3,
    outcome,
    failureReasons: [],
    createdAt: `2024-05-01T00:00:0${id.slice(-1)}.000Z`,
  };
}

describe('MemoryRuleStore', () => {
  it('increments counters and returns null for unknown sources', async () => {
    const store = new MemoryRuleStore([
      {
        sourceId: 'a',
        locators: { title: 'h1', body: 'p', date: 'time' },
        sourceType: 'ssr',
        successCount: 0,
        failureCount: 0,
        updatedAt: '2024-05-01T00:00:00.000Z',
      },
    ]);

    expect((await store.increment('a', 'successCount'))?.successCount).toBe(1);
    expect((await store.increment('a', 'failureCount'))?.failureCount).toBe(1);
    expect(await store.increment('b', 'successCount')).toBeNull();
  });

  it('hands out copies', async () => {
    const store = new MemoryRuleStore();
    await store.put({
      sourceId: 'a',
      locators: { title: 'h1', body: 'p', date: 'time' },
      sourceType: 'spa',
      successCount: 0,
      failureCount: 0,
      updatedAt: '2024-05-01T00:00:00.000Z',
    });
    const first = await store.get('a');
    if (first) first.locators.title = 'h2';
    expect((await store.get('a'))?.locators.title).toBe('h1');
  });

  it('runs locked tasks for one source in arrival order', async () => {
    const store = new MemoryRuleStore();
    const order: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = store.withLock('a', async () => {
      order.push('first');
      await gate;
      return 1;
    });
    const second = store.withLock('a', async () => {
      order.push('second');
      return 2;
    });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(order).toEqual(['first']);
    expect(store.isLocked('a')).toBe(true);

    releaseFirst();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(order).toEqual(['first', 'second']);
    expect(store.isLocked('a')).toBe(false);
  });
});

describe('MemoryDecisionStore', () => {
  it('lists newest first and filters by source', async () => {
    const store = new MemoryDecisionStore();
    await store.append(record('r1', 'a', 'saved'));
    await store.append(record('r2', 'b', 'saved'));
    await store.append(record('r3', 'a', 'needs_review'));

    expect((await store.listRecent(2)).map((r) => r.id)).toEqual(['r3', 'r2']);
    expect((await store.listBySource('a', 10)).map((r) => r.id)).toEqual(['r3', 'r1']);
  });

  it('drops resolved records from the review queue', async () => {
    const store = new MemoryDecisionStore();
    await store.append(record('r1', 'a', 'needs_review'));
    await store.append(record('r2', 'a', 'needs_review'));
    await store.markResolved('r1');

    expect((await store.listPendingReviews(10)).map((r) => r.id)).toEqual(['r2']);
    expect(await store.isPendingReview('r1')).toBe(false);
    expect(await store.isPendingReview('r2')).toBe(true);
  });
});
