/**
 * Last step of both engines. The winning locators are rechecked on the
 * document, the decision is recorded, and only then is the rule written.
 * A winner below the recheck bar is escalated instead of saved.
 */

import { createLogger, type OrchestratorSettings } from '@autosel/config';
import type { NewDecisionRecord, ProposerProposal } from '@autosel/core';
import { passesQualityGate } from '@autosel/quality';
import type { EngineDeps, EngineResult } from './repair.js';
import { evaluateRule, type RuleEvaluation } from './route.js';

const logger = createLogger('engine');

export type DecisionDraft = Omit<NewDecisionRecord, 'outcome' | 'resolves'>;

export interface CommitRequest {
  draft: DecisionDraft;
  winner: ProposerProposal | null;
  document: string;
  url?: string;
}

export async function commitDecision(
  deps: Pick<EngineDeps, 'registry' | 'ledger'>,
  settings: Pick<OrchestratorSettings, 'recheckThreshold' | 'qualityWeights'>,
  { draft, winner, document, url }: CommitRequest
): Promise<EngineResult> {
  let evaluation: RuleEvaluation | null = null;
  let passed = false;
  const failureReasons = [...draft.failureReasons];

  if (winner) {
    evaluation = evaluateRule(document, winner, settings.qualityWeights, url);
    passed = evaluation.extractionError === undefined && passesQualityGate(evaluation, settings.recheckThreshold);
    if (!passed) {
      const missing = evaluation.missingFields.length > 0 ? ` (missing: ${evaluation.missingFields.join(', ')})` : '';
      failureReasons.push(`recheck: score ${evaluation.score} below ${settings.recheckThreshold}${missing}`);
      logger.warn(
        { event: 'engine.recheck.failed', sourceId: draft.sourceId, score: evaluation.score, threshold: settings.recheckThreshold },
        'Accepted locators failed the recheck'
      );
    }
  }

  const record = await deps.ledger.append({ ...draft, failureReasons, outcome: passed ? 'saved' : 'needs_review' });
  const rule =
    passed && winner
      ? await deps.registry.upsert({ sourceId: draft.sourceId, locators: winner.locators, sourceType: winner.sourceType })
      : null;

  return { outcome: record.outcome, rule, record, evaluation };
}
