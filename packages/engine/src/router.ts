/**
 * Extraction Router
 *
 *   START → QUALITY_GATE → { DONE | REPAIR | DISCOVERY }
 *   REPAIR | DISCOVERY → QUALITY_GATE_RECHECK → DONE
 *   escalation or a failed recheck → FAILED
 *
 * At most one engine invocation per request. The engine runs under the
 * source's lock; a request that waited on the lock re-reads the rule first
 * and reuses it when another request already fixed it. The engine rechecks
 * its winner before saving, so a failed recheck leaves the rule untouched
 * and a pending review behind.
 */

import { createLogger, type OrchestratorSettings } from '@autosel/config';
import {
  ErrorCode,
  OrchestratorError,
  isOrchestratorError,
  safeErrorMessage,
  type ExtractionResult,
  type ExtractionRule,
  type Route,
  type RouterState,
} from '@autosel/core';
import type { RuleRegistry } from '@autosel/knowledge';
import { passesQualityGate } from '@autosel/quality';
import type { DiscoveryEngine } from './discovery.js';
import type { EngineResult, RepairEngine } from './repair.js';
import { decideRoute, documentRef, evaluateRule, type RuleEvaluation } from './route.js';

const logger = createLogger('router');

export interface ProcessOptions {
  /** Page URL, used for the url field when the rule has no url locator */
  url?: string;
}

export interface RouterDeps {
  registry: RuleRegistry;
  repair: RepairEngine;
  discovery: DiscoveryEngine;
}

interface Trace {
  sourceId: string;
  states: RouterState[];
  route: Route;
}

export class ExtractionRouter {
  constructor(
    private readonly deps: RouterDeps,
    private readonly settings: OrchestratorSettings
  ) {}

  /**
   * @throws OrchestratorError INVALID_INPUT for an empty source id or document.
   *   Every other failure is reported in the result with status `error`.
   */
  async process(sourceId: string, document: string, options: ProcessOptions = {}): Promise<ExtractionResult> {
    if (!sourceId.trim()) {
      throw new OrchestratorError(ErrorCode.INVALID_INPUT, 'sourceId must not be empty');
    }
    if (!document.trim()) {
      throw new OrchestratorError(ErrorCode.INVALID_INPUT, 'document must not be empty');
    }

    const trace: Trace = { sourceId, states: ['START'], route: 'discovery' };
    try {
      return await this.route(trace, document, options);
    } catch (error: unknown) {
      trace.states.push('FAILED');
      const code: string = isOrchestratorError(error) ? error.code : 'INTERNAL';
      const message = safeErrorMessage(error);
      logger.error({ event: 'router.process.error', sourceId, route: trace.route, code, error: message }, 'Processing failed');
      return {
        sourceId,
        status: 'error',
        route: trace.route,
        fields: {},
        score: 0,
        missingFields: [],
        retryCount: 0,
        rule: null,
        decisionId: null,
        states: trace.states,
        error: { code, message },
      };
    }
  }

  private async route(trace: Trace, document: string, options: ProcessOptions): Promise<ExtractionResult> {
    const { registry } = this.deps;
    const { sourceId } = trace;

    trace.states.push('QUALITY_GATE');
    const rule = await registry.get(sourceId);
    const evaluation = rule ? await this.evaluateAndCount(rule, document, options.url) : null;
    trace.route = decideRoute({ rule, score: evaluation?.score ?? 0, reuseThreshold: this.settings.reuseThreshold });

    logger.info(
      { event: 'router.route.decided', sourceId, route: trace.route, score: evaluation?.score ?? null },
      `Route: ${trace.route}`
    );

    if (rule && evaluation && trace.route === 'reuse') {
      trace.states.push('DONE');
      return this.reuseResult(trace, rule, evaluation);
    }

    return registry.withSourceLock(sourceId, async () => {
      const current = await registry.get(sourceId);
      let degraded = evaluation;

      // Another request changed the rule while this one waited for the lock.
      // This request already counted once, so the re-read only counts a reuse.
      if (current && current.updatedAt !== rule?.updatedAt) {
        const reread = evaluateRule(document, current, this.settings.qualityWeights, options.url);
        if (passesQualityGate(reread, this.settings.reuseThreshold)) {
          await registry.incrementSuccess(sourceId);
          trace.route = 'reuse';
          trace.states.push('DONE');
          logger.info({ event: 'router.route.reused_after_wait', sourceId }, 'Rule fixed by a concurrent request');
          return this.reuseResult(trace, current, reread);
        }
        degraded = reread;
      }

      const ref = documentRef(document);
      let result: EngineResult;
      if (current) {
        trace.route = 'repair';
        trace.states.push('REPAIR');
        const { missingFields } = degraded ?? evaluateRule(document, current, this.settings.qualityWeights, options.url);
        result = await this.deps.repair.run({ rule: current, document, documentRef: ref, url: options.url, missingFields });
      } else {
        trace.route = 'discovery';
        trace.states.push('DISCOVERY');
        result = await this.deps.discovery.run({ sourceId, document, documentRef: ref, url: options.url });
      }

      return this.finish(trace, result, current, degraded);
    });
  }

  private async finish(
    trace: Trace,
    result: EngineResult,
    previous: ExtractionRule | null,
    before: RuleEvaluation | null
  ): Promise<ExtractionResult> {
    const { record, evaluation } = result;
    const base = {
      sourceId: trace.sourceId,
      route: trace.route,
      retryCount: record.retryCount,
      decisionId: record.id,
    };

    if (evaluation) {
      trace.states.push('QUALITY_GATE_RECHECK');
      logger.info(
        { event: 'router.recheck.completed', sourceId: trace.sourceId, score: evaluation.score, passed: result.rule !== null },
        `Recheck ${result.rule ? 'passed' : 'failed'}`
      );
    }

    if (result.outcome === 'saved' && result.rule && evaluation) {
      trace.states.push('DONE');
      const counted = await this.deps.registry.incrementSuccess(trace.sourceId);
      return {
        ...base,
        status: 'saved',
        fields: evaluation.fields,
        score: evaluation.score,
        missingFields: evaluation.missingFields,
        rule: counted ?? result.rule,
        states: trace.states,
      };
    }

    trace.states.push('FAILED');
    const shown = evaluation ?? before;
    return {
      ...base,
      status: 'needs_review',
      fields: shown?.fields ?? {},
      score: shown?.score ?? 0,
      missingFields: shown?.missingFields ?? [],
      rule: previous,
      states: trace.states,
    };
  }

  /**
   * Score the rule and move its success or failure counter
   */
  private async evaluateAndCount(rule: ExtractionRule, document: string, url: string | undefined): Promise<RuleEvaluation> {
    const evaluation = evaluateRule(document, rule, this.settings.qualityWeights, url);
    if (passesQualityGate(evaluation, this.settings.reuseThreshold)) {
      await this.deps.registry.incrementSuccess(rule.sourceId);
    } else {
      await this.deps.registry.incrementFailure(rule.sourceId);
    }
    return evaluation;
  }

  private async reuseResult(trace: Trace, rule: ExtractionRule, evaluation: RuleEvaluation): Promise<ExtractionResult> {
    return {
      sourceId: trace.sourceId,
      status: 'saved',
      route: 'reuse',
      fields: evaluation.fields,
      score: evaluation.score,
      missingFields: evaluation.missingFields,
      retryCount: 0,
      rule: (await this.deps.registry.get(trace.sourceId)) ?? rule,
      decisionId: null,
      states: trace.states,
    };
  }
}
