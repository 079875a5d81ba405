/**
 * Repair Engine: recover a rule that no longer extracts well
 *
 * A saved winner replaces the locators through the registry (counters
 * restart). Escalation leaves the degraded rule untouched so later runs can
 * try again.
 */

import { createLogger, type OrchestratorSettings } from '@autosel/config';
import type { DecisionOutcome, DecisionRecord, ExtractionRule } from '@autosel/core';
import { formatExemplarsForPrompt, retrieveExemplars, type RuleRegistry } from '@autosel/knowledge';
import { commitDecision } from './commit.js';
import { runConsensusCycles, type AgentDeps } from './cycle.js';
import type { DecisionLedger } from './ledger.js';
import type { RuleEvaluation } from './route.js';

const logger = createLogger('engine');

export interface EngineDeps extends AgentDeps {
  registry: RuleRegistry;
  ledger: DecisionLedger;
}

export interface EngineResult {
  outcome: DecisionOutcome;
  /** The saved rule on accept; null on escalation */
  rule: ExtractionRule | null;
  record: DecisionRecord;
  /** Recheck of the winning locators; null when no proposal was accepted */
  evaluation: RuleEvaluation | null;
}

export interface RepairRequest {
  rule: ExtractionRule;
  document: string;
  documentRef: string;
  url?: string;
  missingFields: readonly string[];
}

export class RepairEngine {
  constructor(
    private readonly deps: EngineDeps,
    private readonly settings: OrchestratorSettings
  ) {}

  async run(request: RepairRequest): Promise<EngineResult> {
    const { rule } = request;
    const exemplars = await retrieveExemplars(this.deps.registry, {
      limit: this.settings.exemplarLimit,
      excludeSourceId: rule.sourceId,
    });

    logger.info(
      { event: 'engine.repair.start', sourceId: rule.sourceId, missingFields: request.missingFields, exemplars: exemplars.length },
      'Repairing extraction rule'
    );

    const outcome = await runConsensusCycles(
      {
        mode: 'repair',
        sourceId: rule.sourceId,
        document: request.document,
        url: request.url,
        missingFields: request.missingFields,
        exemplars: formatExemplarsForPrompt(exemplars),
        currentLocators: rule.locators,
      },
      this.deps,
      this.settings,
      this.settings.repair
    );

    const result = await commitDecision(this.deps, this.settings, {
      draft: {
        sourceId: rule.sourceId,
        documentRef: request.documentRef,
        method: 'repair',
        proposals: outcome.exchanges,
        consensus: outcome.consensus,
        retryCount: outcome.cycles,
        failureReasons: outcome.failureReasons,
      },
      winner: outcome.winner,
      document: request.document,
      url: request.url,
    });
    const { record } = result;

    if (result.rule) {
      logger.info(
        { event: 'engine.repair.saved', sourceId: rule.sourceId, cycles: outcome.cycles, score: outcome.consensus?.score },
        'Repaired rule saved'
      );
    } else {
      logger.warn(
        { event: 'engine.repair.escalated', sourceId: rule.sourceId, cycles: outcome.cycles, decisionId: record.id },
        'Repair found no rule that passes; escalating for review'
      );
    }

    return result;
  }
}
