import { randomUUID } from 'crypto';
import type { Redis } from 'ioredis';
import { createLogger } from '@autosel/config';
import {
  ErrorCode,
  OrchestratorError,
  safeErrorMessage,
  sleep,
  type DecisionRecord,
  type ExtractionRule,
} from '@autosel/core';
import { decodeDecision, decodeRule, encodeDecision, encodeRule } from './codec.js';
import { redisKeys } from './keys.js';
import type { DecisionStore, RuleCounter, RuleStore } from './stores.js';

const logger = createLogger('db');

// Deletes the lock only while it still holds this holder's token
const RELEASE_LOCK_SCRIPT = `if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0`;

export interface RedisLockOptions {
  /** Expiry of a held lock; must outlast the slowest engine run */
  ttlMs: number;
  /** How long to wait for a busy lock before giving up */
  waitMs: number;
  retryMs: number;
}

export const DEFAULT_LOCK_OPTIONS: RedisLockOptions = { ttlMs: 600000, waitMs: 600000, retryMs: 100 };

type ExecResult = [error: Error | null, result: unknown][] | null;

function checkExec(result: ExecResult, operation: string): unknown[] {
  if (!result) {
    throw new OrchestratorError(ErrorCode.STORE_FAILURE, `Redis transaction aborted: ${operation}`, true);
  }
  return result.map(([error, value]) => {
    if (error) {
      throw new OrchestratorError(ErrorCode.STORE_FAILURE, `Redis ${operation} failed: ${error.message}`, true);
    }
    return value;
  });
}

export class RedisRuleStore implements RuleStore {
  private readonly lock: RedisLockOptions;

  constructor(
    private readonly redis: Redis,
    lock: Partial<RedisLockOptions> = {}
  ) {
    this.lock = { ...DEFAULT_LOCK_OPTIONS, ...lock };
  }

  async get(sourceId: string): Promise<ExtractionRule | null> {
    const key = redisKeys.rule(sourceId);
    return decodeRule(await this.redis.hgetall(key), key);
  }

  async put(rule: ExtractionRule): Promise<void> {
    const key = redisKeys.rule(rule.sourceId);
    const result = await this.redis
      .multi()
      .del(key)
      .hset(key, encodeRule(rule))
      .sadd(redisKeys.ruleIndex, rule.sourceId)
      .exec();
    checkExec(result, 'rule.put');
  }

  async increment(sourceId: string, counter: RuleCounter): Promise<ExtractionRule | null> {
    const key = redisKeys.rule(sourceId);
    if ((await this.redis.exists(key)) === 0) {
      return null;
    }
    await this.redis.hincrby(key, counter, 1);
    return this.get(sourceId);
  }

  async list(): Promise<ExtractionRule[]> {
    const sourceIds = await this.redis.smembers(redisKeys.ruleIndex);
    const rules = await Promise.all(sourceIds.sort().map((sourceId) => this.get(sourceId)));
    return rules.filter((rule): rule is ExtractionRule => rule !== null);
  }

  /**
   * `SET NX PX` lock with a per-holder token. A holder that dies leaves the
   * lock to expire after `ttlMs`.
   */
  async withLock<T>(sourceId: string, task: () => Promise<T>): Promise<T> {
    const key = redisKeys.ruleLock(sourceId);
    const token = randomUUID();
    const deadline = Date.now() + this.lock.waitMs;

    while ((await this.redis.set(key, token, 'PX', this.lock.ttlMs, 'NX')) !== 'OK') {
      if (Date.now() >= deadline) {
        throw new OrchestratorError(
          ErrorCode.STORE_FAILURE,
          `Timed out after ${this.lock.waitMs}ms waiting for the lock on ${sourceId}`,
          true,
          { sourceId }
        );
      }
      await sleep(this.lock.retryMs);
    }

    try {
      return await task();
    } finally {
      await this.redis.eval(RELEASE_LOCK_SCRIPT, 1, key, token).catch((error: unknown) => {
        logger.warn(
          { event: 'redis.lock.release_failed', sourceId, error: safeErrorMessage(error) },
          'Lock release failed; it will expire on its own'
        );
      });
    }
  }
}

/**
 * Decision records keyed by id, with LPUSHed id lists so reads come back
 * newest first
 */
export class RedisDecisionStore implements DecisionStore {
  constructor(private readonly redis: Redis) {}

  async append(record: DecisionRecord): Promise<void> {
    const tx = this.redis
      .multi()
      .set(redisKeys.decision(record.id), encodeDecision(record))
      .lpush(redisKeys.decisionLog, record.id)
      .lpush(redisKeys.sourceDecisions(record.sourceId), record.id);
    if (record.outcome === 'needs_review') {
      tx.sadd(redisKeys.pendingReviews, record.id);
    }
    checkExec(await tx.exec(), 'decision.append');
  }

  async get(id: string): Promise<DecisionRecord | null> {
    const key = redisKeys.decision(id);
    const raw = await this.redis.get(key);
    return raw === null ? null : decodeDecision(raw, key);
  }

  async listBySource(sourceId: string, limit: number): Promise<DecisionRecord[]> {
    return this.load(await this.redis.lrange(redisKeys.sourceDecisions(sourceId), 0, limit - 1));
  }

  async listRecent(limit: number): Promise<DecisionRecord[]> {
    return this.load(await this.redis.lrange(redisKeys.decisionLog, 0, limit - 1));
  }

  async listPendingReviews(limit: number): Promise<DecisionRecord[]> {
    const pending = await this.load(await this.redis.smembers(redisKeys.pendingReviews));
    return pending.sort((a, b) => b.createdAt.localeCompare(a.createdAt)).slice(0, limit);
  }

  async isPendingReview(id: string): Promise<boolean> {
    return (await this.redis.sismember(redisKeys.pendingReviews, id)) === 1;
  }

  async markResolved(id: string): Promise<void> {
    const result = await this.redis
      .multi()
      .srem(redisKeys.pendingReviews, id)
      .sadd(redisKeys.resolvedReviews, id)
      .exec();
    checkExec(result, 'review.resolve');
  }

  private async load(ids: string[]): Promise<DecisionRecord[]> {
    if (ids.length === 0) {
      return [];
    }
    const raws = await this.redis.mget(...ids.map((id) => redisKeys.decision(id)));
    const records: DecisionRecord[] = [];
    raws.forEach((raw, index) => {
      if (raw !== null) {
        records.push(decodeDecision(raw, redisKeys.decision(ids[index])));
      }
    });
    return records;
  }
}
