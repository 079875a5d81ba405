/**
 * Discovery Engine: invent a rule for a source with none
 *
 * Pages that carry good structured metadata are accepted from it directly,
 * with no inference call. Everything else goes through the consensus loop
 * under the discovery threshold.
 */

import { createLogger, type OrchestratorSettings } from '@autosel/config';
import type { ConsensusResult, LocatorMap, ProposerProposal } from '@autosel/core';
import { deriveMetadataLocators, extractStructuredMetadata, metadataQualityScore } from '@autosel/extract';
import { formatExemplarsForPrompt, retrieveExemplars } from '@autosel/knowledge';
import { passesQualityGate } from '@autosel/quality';
import { commitDecision, type DecisionDraft } from './commit.js';
import { evaluateConsensus } from './consensus.js';
import { runConsensusCycles } from './cycle.js';
import type { EngineDeps, EngineResult } from './repair.js';
import { evaluateRule } from './route.js';

const logger = createLogger('engine');

export const METADATA_AGENT = 'structured-metadata';

const UNSEEN_SOURCE_MISSING = ['title', 'body', 'date', 'url'];

export interface DiscoveryRequest {
  sourceId: string;
  document: string;
  documentRef: string;
  url?: string;
}

interface MetadataCandidate {
  proposal: ProposerProposal;
  consensus: ConsensusResult;
}

export class DiscoveryEngine {
  constructor(
    private readonly deps: EngineDeps,
    private readonly settings: OrchestratorSettings
  ) {}

  async run(request: DiscoveryRequest): Promise<EngineResult> {
    const metadata = this.checkMetadata(request);
    if (metadata) {
      return this.commit(request, metadata.proposal, {
        method: 'metadata',
        proposals: [metadata.proposal],
        consensus: metadata.consensus,
        retryCount: 0,
        failureReasons: [],
      });
    }

    const exemplars = await retrieveExemplars(this.deps.registry, { limit: this.settings.exemplarLimit });
    logger.info(
      { event: 'engine.discovery.start', sourceId: request.sourceId, exemplars: exemplars.length },
      'Discovering extraction rule'
    );

    const outcome = await runConsensusCycles(
      {
        mode: 'discovery',
        sourceId: request.sourceId,
        document: request.document,
        url: request.url,
        missingFields: UNSEEN_SOURCE_MISSING,
        exemplars: formatExemplarsForPrompt(exemplars),
      },
      this.deps,
      this.settings,
      this.settings.discovery
    );

    const base = {
      method: 'discovery' as const,
      proposals: outcome.exchanges,
      consensus: outcome.consensus,
      retryCount: outcome.cycles,
      failureReasons: outcome.failureReasons,
    };
    return this.commit(request, outcome.winner, base);
  }

  /**
   * Metadata pre-check. Null when the page's metadata is too thin, its
   * locators miss a required field, or they extract below the recheck bar.
   */
  private checkMetadata(request: DiscoveryRequest): MetadataCandidate | null {
    const metadata = extractStructuredMetadata(request.document);
    const quality = metadataQualityScore(metadata);
    if (!metadata.values.title || quality < this.settings.metadataQualityThreshold) {
      logger.debug(
        { event: 'engine.discovery.metadata_skipped', sourceId: request.sourceId, quality, source: metadata.source },
        'Structured metadata below quality bar'
      );
      return null;
    }

    const locators: LocatorMap | null = deriveMetadataLocators(request.document, metadata);
    if (!locators) {
      return null;
    }

    const evaluation = evaluateRule(request.document, { locators }, this.settings.qualityWeights, request.url);
    if (evaluation.extractionError !== undefined || !passesQualityGate(evaluation, this.settings.recheckThreshold)) {
      logger.debug(
        { event: 'engine.discovery.metadata_rejected', sourceId: request.sourceId, score: evaluation.score },
        'Metadata-derived locators extract too little'
      );
      return null;
    }

    const proposal: ProposerProposal = {
      kind: 'proposal',
      agent: METADATA_AGENT,
      attempt: 0,
      locators,
      sourceType: 'ssr',
      confidence: quality,
      rationale: `Structured metadata (${metadata.source}) with quality ${quality}; extraction scored ${evaluation.score}/100`,
    };
    const consensus = evaluateConsensus({
      proposal,
      validatorConfidence: quality,
      extractionQuality: evaluation.score / 100,
      extractionFailed: false,
      weights: this.settings.discovery.weights,
      threshold: this.settings.discovery.acceptanceThreshold,
    });
    return consensus.accepted ? { proposal, consensus } : null;
  }

  private async commit(
    request: DiscoveryRequest,
    winner: ProposerProposal | null,
    decision: Omit<DecisionDraft, 'sourceId' | 'documentRef'>
  ): Promise<EngineResult> {
    const result = await commitDecision(this.deps, this.settings, {
      draft: { ...decision, sourceId: request.sourceId, documentRef: request.documentRef },
      winner,
      document: request.document,
      url: request.url,
    });
    const { record } = result;

    if (result.rule) {
      logger.info(
        { event: 'engine.discovery.saved', sourceId: request.sourceId, method: decision.method, decisionId: record.id },
        'Discovered rule saved'
      );
    } else {
      logger.warn(
        { event: 'engine.discovery.escalated', sourceId: request.sourceId, cycles: decision.retryCount, decisionId: record.id },
        'Discovery found no rule that passes; escalating for review'
      );
    }
    return result;
  }
}
