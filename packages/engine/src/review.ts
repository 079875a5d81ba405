/**
 * Operator approval of an escalated decision, the only write path into the
 * registry outside automated consensus
 */

import { createLogger } from '@autosel/config';
import {
  ErrorCode,
  OrchestratorError,
  isOrchestratorError,
  type DecisionRecord,
  type ExtractionRule,
  type LocatorMap,
  type ProposerProposal,
  type SourceType,
} from '@autosel/core';
import type { DecisionStore } from '@autosel/db';
import { parseLocator } from '@autosel/extract';
import type { RuleRegistry } from '@autosel/knowledge';
import type { DecisionLedger } from './ledger.js';

const logger = createLogger('engine');

export interface ReviewDeps {
  registry: RuleRegistry;
  ledger: DecisionLedger;
  decisions: DecisionStore;
}

export interface ApproveInput {
  /** Operator-supplied locators; the record's best proposal when omitted */
  locators?: LocatorMap;
  sourceType?: SourceType;
}

export interface ApproveResult {
  rule: ExtractionRule;
  record: DecisionRecord;
}

/**
 * Highest-confidence proposal; the later one wins a tie
 */
export function bestProposal(record: DecisionRecord): ProposerProposal | null {
  let best: ProposerProposal | null = null;
  for (const exchange of record.proposals) {
    if (exchange.kind === 'proposal' && (!best || exchange.confidence >= best.confidence)) {
      best = exchange;
    }
  }
  return best;
}

function checkLocators(locators: LocatorMap): void {
  for (const [field, locator] of Object.entries(locators)) {
    if (locator === undefined) continue;
    try {
      parseLocator(locator);
    } catch (error) {
      if (isOrchestratorError(error)) {
        throw new OrchestratorError(ErrorCode.INVALID_INPUT, `${field}: ${error.message}`, false, { field });
      }
      throw error;
    }
  }
}

export async function approveReview(deps: ReviewDeps, decisionId: string, input: ApproveInput = {}): Promise<ApproveResult> {
  const reviewed = await deps.decisions.get(decisionId);
  if (!reviewed) {
    throw new OrchestratorError(ErrorCode.NOT_FOUND, `Decision not found: ${decisionId}`);
  }
  const proposal = input.locators ? null : bestProposal(reviewed);
  const locators = input.locators ?? proposal?.locators;
  if (!locators) {
    throw new OrchestratorError(
      ErrorCode.INVALID_INPUT,
      `No locators supplied and decision ${decisionId} has no proposal to approve`
    );
  }
  checkLocators(locators);

  const { sourceId } = reviewed;
  return deps.registry.withSourceLock(sourceId, async () => {
    // Checked under the lock so two approvals of one decision cannot both pass
    if (!(await deps.decisions.isPendingReview(decisionId))) {
      throw new OrchestratorError(ErrorCode.INVALID_INPUT, `Decision ${decisionId} is not awaiting review`);
    }

    const existing = await deps.registry.get(sourceId);
    const sourceType = input.sourceType ?? proposal?.sourceType ?? existing?.sourceType ?? 'ssr';

    const record = await deps.ledger.append({
      sourceId,
      documentRef: reviewed.documentRef,
      method: 'operator',
      proposals: [],
      consensus: null,
      retryCount: 0,
      outcome: 'saved',
      failureReasons: [],
      resolves: reviewed.id,
    });
    const rule = await deps.registry.upsert({ sourceId, locators, sourceType });
    await deps.decisions.markResolved(reviewed.id);

    logger.info(
      { event: 'review.approved', sourceId, decisionId: reviewed.id, resolution: record.id, fromProposal: proposal !== null },
      'Review approved'
    );
    return { rule, record };
  });
}
