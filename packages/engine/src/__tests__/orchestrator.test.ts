import { describe, it, expect } from 'vitest';
import { resolveSettings, type SettingsOverrides } from '@autosel/config';
import { ErrorCode, OrchestratorError, isOrchestratorError, type DecisionRecord, type ExtractionRule } from '@autosel/core';
import { MemoryDecisionStore, MemoryRuleStore, type DecisionStore } from '@autosel/db';
import { Orchestrator } from '../orchestrator.js';
import {
  ARTICLE_PAGE,
  JSONLD_PAGE,
  STORY_LOCATORS,
  TEASER_LOCATORS,
  THIN_METADATA_PAGE,
  proposalReply,
  scriptedAgent,
  seededRule,
  sequentialIds,
  validationReply,
  type ScriptStep,
} from './fixtures.js';

interface SetupOptions {
  rules?: ExtractionRule[];
  proposer?: ScriptStep[];
  fallback?: ScriptStep[];
  validator?: ScriptStep[];
  settings?: SettingsOverrides;
  decisions?: DecisionStore;
}

interface SharedStores {
  rules: MemoryRuleStore;
  decisions: DecisionStore;
}

function setup(options: SetupOptions = {}, shared?: SharedStores) {
  const proposer = scriptedAgent('proposer', options.proposer ?? [new Error('proposer not expected')]);
  const fallback = options.fallback ? scriptedAgent('fallback-proposer', options.fallback) : undefined;
  const validator = scriptedAgent('validator', options.validator ?? [new Error('validator not expected')]);
  const rules = shared?.rules ?? new MemoryRuleStore(options.rules);
  const decisions = shared?.decisions ?? options.decisions ?? new MemoryDecisionStore();
  const sleeps: number[] = [];

  const orchestrator = new Orchestrator({
    rules,
    decisions,
    proposer: { primary: proposer, fallback },
    validator: { primary: validator },
    settings: resolveSettings(options.settings),
    clock: () => new Date('2024-06-01T00:00:00.000Z'),
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    idFactory: sequentialIds(),
  });

  return { orchestrator, proposer, fallback, validator, rules, decisions, sleeps };
}

describe('reuse', () => {
  it('returns identical fields on repeated calls and only moves counters', async () => {
    const { orchestrator, rules, decisions } = setup({ rules: [seededRule('news', STORY_LOCATORS)] });

    const first = await orchestrator.process('news', ARTICLE_PAGE);
    const second = await orchestrator.process('news', ARTICLE_PAGE);

    expect(first.status).toBe('saved');
    expect(first.route).toBe('reuse');
    expect(first.states).toEqual(['START', 'QUALITY_GATE', 'DONE']);
    expect(first.decisionId).toBeNull();
    expect(second.fields).toEqual(first.fields);

    const stored = await rules.get('news');
    expect(stored?.locators).toEqual(STORY_LOCATORS);
    expect(stored?.successCount).toBe(5);
    expect(await decisions.listRecent(10)).toEqual([]);
  });
});

describe('scenario A: discovery from structured metadata', () => {
  it('creates a rule without calling any agent', async () => {
    const { orchestrator, proposer, validator, rules, decisions } = setup();

    const result = await orchestrator.process('harbour-times', JSONLD_PAGE);

    expect(proposer.calls).toHaveLength(0);
    expect(validator.calls).toHaveLength(0);
    expect(result).toMatchObject({
      status: 'saved',
      route: 'discovery',
      score: 100,
      retryCount: 0,
      decisionId: 'rec-1',
      states: ['START', 'QUALITY_GATE', 'DISCOVERY', 'QUALITY_GATE_RECHECK', 'DONE'],
    });

    expect((await rules.get('harbour-times'))?.locators).toEqual({
      title: 'jsonld:headline',
      body: 'jsonld:articleBody',
      date: 'jsonld:datePublished',
      url: 'jsonld:url',
    });

    const record = await decisions.get('rec-1');
    expect(record?.method).toBe('metadata');
    expect(record?.outcome).toBe('saved');
    expect(record?.consensus?.score).toBe(1);
    expect(record?.proposals.map((p) => p.agent)).toEqual(['structured-metadata']);
  });
});

describe('scenario B: repair succeeds on the second attempt', () => {
  it('retries with the rejection in context and saves the better rule', async () => {
    const { orchestrator, proposer, rules, decisions, sleeps } = setup({
      rules: [seededRule('news', TEASER_LOCATORS)],
      settings: { qualityWeights: { date: 17 } },
      proposer: [proposalReply(TEASER_LOCATORS, 0.4), proposalReply(STORY_LOCATORS, 0.8)],
      validator: [validationReply(0.24, 'teaser only'), validationReply(0.8)],
    });

    const result = await orchestrator.process('news', ARTICLE_PAGE);

    expect(result).toMatchObject({
      status: 'saved',
      route: 'repair',
      score: 100,
      retryCount: 2,
      states: ['START', 'QUALITY_GATE', 'REPAIR', 'QUALITY_GATE_RECHECK', 'DONE'],
    });
    expect(sleeps).toEqual([1000]);
    expect(proposer.calls[1]?.prompt.user).toContain(
      '1. attempt 1: consensus 0.36 below 0.5 (quality 42/100, missing: body, url); validator: teaser only'
    );

    const record = await decisions.get(result.decisionId ?? '');
    expect(record?.proposals.map((p) => p.kind)).toEqual(['proposal', 'validation', 'proposal', 'validation']);
    expect(record?.consensus?.score).toBe(0.88);
    expect(record?.outcome).toBe('saved');

    const rule = await rules.get('news');
    expect(rule?.locators).toEqual(STORY_LOCATORS);
    expect(rule?.successCount).toBe(1);
    expect(rule?.failureCount).toBe(0);
  });

  it('scores the degraded rule at 42', async () => {
    const { orchestrator } = setup({
      rules: [seededRule('news', TEASER_LOCATORS)],
      settings: { qualityWeights: { date: 17 }, maxRetries: 1 },
      proposer: [proposalReply(TEASER_LOCATORS, 0.1)],
      validator: [validationReply(0.1)],
    });

    const result = await orchestrator.process('news', ARTICLE_PAGE);

    expect(result.status).toBe('needs_review');
    expect(result.score).toBe(42);
    expect(result.missingFields).toEqual(['body', 'url']);
  });
});

describe('scenario C: repair escalates after three rejected attempts', () => {
  it('leaves the rule as it was and records one review item', async () => {
    const { orchestrator, proposer, rules, decisions, sleeps } = setup({
      rules: [seededRule('news', TEASER_LOCATORS)],
      proposer: [proposalReply(TEASER_LOCATORS, 0.2)],
      validator: [validationReply(0.2)],
    });

    const result = await orchestrator.process('news', ARTICLE_PAGE);

    expect(result).toMatchObject({
      status: 'needs_review',
      route: 'repair',
      retryCount: 3,
      states: ['START', 'QUALITY_GATE', 'REPAIR', 'FAILED'],
    });
    expect(proposer.calls).toHaveLength(3);
    expect(sleeps).toEqual([1000, 2000]);

    const rule = await rules.get('news');
    expect(rule?.locators).toEqual(TEASER_LOCATORS);
    expect(rule?.failureCount).toBe(1);

    const records: DecisionRecord[] = await decisions.listRecent(10);
    expect(records).toHaveLength(1);
    expect(records[0]?.outcome).toBe('needs_review');
    expect(records[0]?.failureReasons).toHaveLength(3);
    expect((await decisions.listPendingReviews(10)).map((r) => r.id)).toEqual([records[0]?.id]);
  });
});

describe('scenario D: primary proposer times out twice', () => {
  it('uses the fallback and counts a single attempt', async () => {
    const { orchestrator, proposer, fallback, decisions } = setup({
      rules: [seededRule('news', TEASER_LOCATORS)],
      settings: { agentTimeoutMs: 20 },
      proposer: ['hang'],
      fallback: [proposalReply(STORY_LOCATORS, 0.9)],
      validator: [validationReply(0.9)],
    });

    const result = await orchestrator.process('news', ARTICLE_PAGE);

    expect(result.status).toBe('saved');
    expect(result.retryCount).toBe(1);
    expect(proposer.calls).toHaveLength(2);
    expect(fallback?.calls).toHaveLength(1);

    const record = await decisions.get(result.decisionId ?? '');
    expect(record?.retryCount).toBe(1);
    expect(record?.proposals.map((p) => [p.kind, p.agent])).toEqual([
      ['failure', 'proposer'],
      ['failure', 'proposer'],
      ['proposal', 'fallback-proposer'],
      ['validation', 'validator'],
    ]);
  });
});

describe('recheck of an accepted proposal', () => {
  it('escalates instead of saving when the winner extracts too little', async () => {
    const { orchestrator, rules, decisions } = setup({
      rules: [seededRule('news', TEASER_LOCATORS)],
      proposer: [proposalReply(TEASER_LOCATORS, 1)],
      validator: [validationReply(1)],
    });

    const result = await orchestrator.process('news', ARTICLE_PAGE);

    expect(result).toMatchObject({
      status: 'needs_review',
      route: 'repair',
      score: 40,
      missingFields: ['body', 'url'],
      retryCount: 1,
      decisionId: 'rec-1',
      states: ['START', 'QUALITY_GATE', 'REPAIR', 'QUALITY_GATE_RECHECK', 'FAILED'],
    });

    const record = await decisions.get('rec-1');
    expect(record?.outcome).toBe('needs_review');
    expect(record?.consensus).toMatchObject({ score: 0.76, accepted: true });
    expect(record?.failureReasons).toEqual(['recheck: score 40 below 60 (missing: body, url)']);
    expect((await decisions.listPendingReviews(10)).map((r) => r.id)).toEqual(['rec-1']);

    const rule = await rules.get('news');
    expect(rule?.locators).toEqual(TEASER_LOCATORS);
    expect(rule?.successCount).toBe(3);
    expect(rule?.failureCount).toBe(1);

    const approved = await orchestrator.approve('rec-1', { locators: STORY_LOCATORS });
    expect(approved.rule.locators).toEqual(STORY_LOCATORS);
    expect(approved.record.resolves).toBe('rec-1');
  });
});

describe('discovery through agents', () => {
  it('discovers a rule for a page without structured metadata', async () => {
    const { orchestrator, proposer, rules, decisions } = setup({
      proposer: [proposalReply(STORY_LOCATORS, 0.7)],
      validator: [validationReply(0.6)],
    });

    const result = await orchestrator.process('harbour-times', ARTICLE_PAGE);

    expect(result).toMatchObject({ status: 'saved', route: 'discovery', retryCount: 1 });
    expect(proposer.calls[0]?.prompt.user).toContain('This source has no rule yet. Discover one.');
    expect((await rules.get('harbour-times'))?.sourceType).toBe('ssr');

    const record = await decisions.get(result.decisionId ?? '');
    expect(record?.method).toBe('discovery');
    expect(record?.consensus?.score).toBe(0.79);
  });

  it('escalates with no rule and exactly one review record', async () => {
    const { orchestrator, proposer, rules, decisions, sleeps } = setup({
      settings: { maxRetries: 2 },
      proposer: [proposalReply(TEASER_LOCATORS, 0.2)],
      validator: [validationReply(0.2)],
    });

    const result = await orchestrator.process('harbour-times', ARTICLE_PAGE);

    expect(result).toMatchObject({
      status: 'needs_review',
      route: 'discovery',
      fields: {},
      score: 0,
      retryCount: 2,
      rule: null,
      decisionId: 'rec-1',
      states: ['START', 'QUALITY_GATE', 'DISCOVERY', 'FAILED'],
    });
    expect(proposer.calls).toHaveLength(2);
    expect(sleeps).toEqual([1000]);
    expect(await rules.get('harbour-times')).toBeNull();

    const records = await decisions.listRecent(10);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ id: 'rec-1', method: 'discovery', outcome: 'needs_review', retryCount: 2 });
    expect(records[0]?.failureReasons).toHaveLength(2);
    expect((await decisions.listPendingReviews(10)).map((r) => r.id)).toEqual(['rec-1']);
  });

  it('holds discovery to a stricter threshold than repair', async () => {
    const replies = { proposer: [proposalReply(STORY_LOCATORS, 0.2)], validator: [validationReply(0.2)] };

    const discovery = setup({ ...replies, settings: { maxRetries: 1 } });
    const discovered = await discovery.orchestrator.process('harbour-times', ARTICLE_PAGE);
    expect(discovered.status).toBe('needs_review');
    expect((await discovery.decisions.get('rec-1'))?.consensus).toMatchObject({
      score: 0.52,
      threshold: 0.55,
      accepted: false,
    });

    const repair = setup({ ...replies, settings: { maxRetries: 1 }, rules: [seededRule('news', TEASER_LOCATORS)] });
    const repaired = await repair.orchestrator.process('news', ARTICLE_PAGE);
    expect(repaired.status).toBe('saved');
    expect((await repair.decisions.get('rec-1'))?.consensus).toMatchObject({
      score: 0.52,
      threshold: 0.5,
      accepted: true,
    });
  });

  it('falls through to the agents when metadata locators extract too little', async () => {
    const { orchestrator, proposer, rules, decisions } = setup({
      proposer: [proposalReply(STORY_LOCATORS, 0.9)],
      validator: [validationReply(0.9)],
    });

    const result = await orchestrator.process('harbour-times', THIN_METADATA_PAGE);

    expect(result).toMatchObject({ status: 'saved', route: 'discovery', score: 100, retryCount: 1 });
    expect(proposer.calls).toHaveLength(1);
    expect((await rules.get('harbour-times'))?.locators).toEqual(STORY_LOCATORS);

    const record = await decisions.get(result.decisionId ?? '');
    expect(record?.method).toBe('discovery');
    expect(record?.consensus?.score).toBe(0.94);
  });
});

describe('extraction errors', () => {
  it('forces a zero score and skips the validator', async () => {
    const { orchestrator, validator, decisions } = setup({
      rules: [seededRule('news', TEASER_LOCATORS)],
      settings: { maxRetries: 1 },
      proposer: [proposalReply({ title: '.none', body: '.none', date: '.none' }, 1)],
    });

    const result = await orchestrator.process('news', ARTICLE_PAGE);

    expect(result.status).toBe('needs_review');
    expect(validator.calls).toHaveLength(0);
    const record = await decisions.get(result.decisionId ?? '');
    expect(record?.consensus).toMatchObject({ score: 0, rejection: 'extraction_error' });
  });
});

describe('malformed replies', () => {
  it('degrade to a rejected cycle instead of failing the request', async () => {
    const { orchestrator, decisions } = setup({
      rules: [seededRule('news', TEASER_LOCATORS)],
      settings: { maxRetries: 2 },
      proposer: ['I think the title is in the h1'],
    });

    const result = await orchestrator.process('news', ARTICLE_PAGE);

    expect(result.status).toBe('needs_review');
    expect(result.retryCount).toBe(2);
    const record = await decisions.get(result.decisionId ?? '');
    expect(record?.proposals.map((p) => (p.kind === 'failure' ? p.reason : p.kind))).toEqual(['malformed', 'malformed']);
    expect(record?.consensus?.rejection).toBe('no_proposal');
  });
});

describe('input and infrastructure errors', () => {
  it('rejects empty input', async () => {
    const { orchestrator } = setup();
    const error = await orchestrator.process(' ', ARTICLE_PAGE).catch((e: unknown) => e);
    expect(isOrchestratorError(error, ErrorCode.INVALID_INPUT)).toBe(true);
    await expect(orchestrator.process('news', '')).rejects.toThrow('document must not be empty');
  });

  it('reports a store failure in the result', async () => {
    class BrokenDecisionStore extends MemoryDecisionStore {
      override async append(): Promise<void> {
        throw new OrchestratorError(ErrorCode.STORE_FAILURE, 'decision log unavailable', true);
      }
    }
    const { orchestrator, rules } = setup({ decisions: new BrokenDecisionStore() });

    const result = await orchestrator.process('harbour-times', JSONLD_PAGE);

    expect(result.status).toBe('error');
    expect(result.error).toEqual({ code: 'STORE_FAILURE', message: 'decision log unavailable' });
    expect(result.states).toEqual(['START', 'QUALITY_GATE', 'DISCOVERY', 'FAILED']);
    // The rule is written only after its decision is recorded
    expect(await rules.get('harbour-times')).toBeNull();
  });
});

describe('concurrent requests for one source', () => {
  it('runs one engine and lets the other request reuse its rule', async () => {
    const { orchestrator, proposer, decisions } = setup({
      rules: [seededRule('news', TEASER_LOCATORS)],
      proposer: [proposalReply(STORY_LOCATORS, 0.9)],
      validator: [validationReply(0.9)],
    });

    const results = await Promise.all([
      orchestrator.process('news', ARTICLE_PAGE),
      orchestrator.process('news', ARTICLE_PAGE),
    ]);

    expect(results.map((r) => r.route).sort()).toEqual(['repair', 'reuse']);
    expect(results.every((r) => r.status === 'saved')).toBe(true);
    expect(proposer.calls).toHaveLength(1);
    expect(await decisions.listRecent(10)).toHaveLength(1);
  });

  it('shares the source lock between orchestrators over the same stores', async () => {
    const shared: SharedStores = {
      rules: new MemoryRuleStore([seededRule('news', TEASER_LOCATORS)]),
      decisions: new MemoryDecisionStore(),
    };
    const replies = { proposer: [proposalReply(STORY_LOCATORS, 0.9)], validator: [validationReply(0.9)] };
    const api = setup(replies, shared);
    const worker = setup(replies, shared);

    const results = await Promise.all([
      api.orchestrator.process('news', ARTICLE_PAGE),
      worker.orchestrator.process('news', ARTICLE_PAGE),
    ]);

    expect(results.map((r) => r.route)).toEqual(['repair', 'reuse']);
    expect(api.proposer.calls).toHaveLength(1);
    expect(worker.proposer.calls).toHaveLength(0);
    expect(await shared.decisions.listRecent(10)).toHaveLength(1);
  });

  it('does not count the rule again when re-reading it after the wait', async () => {
    const { title, body, date } = STORY_LOCATORS;
    const storyWithoutUrl = { title, body, date };
    const { orchestrator, rules, decisions } = setup({
      rules: [seededRule('news', TEASER_LOCATORS)],
      settings: { reuseThreshold: 95, maxRetries: 1 },
      proposer: [proposalReply(storyWithoutUrl, 0.9), proposalReply(TEASER_LOCATORS, 0.1)],
      validator: [validationReply(0.9), validationReply(0)],
    });

    const results = await Promise.all([
      orchestrator.process('news', ARTICLE_PAGE),
      orchestrator.process('news', ARTICLE_PAGE),
    ]);

    expect(results.map((r) => r.status)).toEqual(['saved', 'needs_review']);
    expect(results.map((r) => r.route)).toEqual(['repair', 'repair']);

    const rule = await rules.get('news');
    expect(rule?.locators).toEqual(storyWithoutUrl);
    expect(rule?.successCount).toBe(1);
    expect(rule?.failureCount).toBe(0);
    expect((await decisions.listRecent(10)).map((r) => r.outcome)).toEqual(['needs_review', 'saved']);
  });
});
