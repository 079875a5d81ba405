/**
 * Bounded PROPOSE → VALIDATE → CONSENSUS loop shared by repair and discovery
 *
 * Each rejected cycle adds its reason to the next proposal's context. The
 * loop stops at the first accepted proposal or after `maxRetries` cycles.
 */

import { createLogger, type EngineSettings, type OrchestratorSettings } from '@autosel/config';
import {
  computeBackoffDelay,
  type AgentExchange,
  type ConsensusResult,
  type LocatorMap,
  type ProposerProposal,
  type ValidatorVerdict,
} from '@autosel/core';
import { prepareDocumentForPrompt } from '@autosel/extract';
import {
  ProposalResponseSchema,
  ValidationResponseSchema,
  buildProposerPrompt,
  buildValidatorPrompt,
  invokeWithFallback,
  parseAgentJson,
  type AgentChain,
  type ProposalMode,
} from '@autosel/llm';
import { evaluateConsensus } from './consensus.js';
import { evaluateRule } from './route.js';

const logger = createLogger('engine');

export interface AgentDeps {
  proposer: AgentChain;
  validator: AgentChain;
  sleep: (ms: number) => Promise<void>;
}

export type CycleSettings = Pick<
  OrchestratorSettings,
  'maxRetries' | 'agentTimeoutMs' | 'primaryAttempts' | 'backoff' | 'promptDocumentChars' | 'qualityWeights'
>;

export interface CycleRequest {
  mode: ProposalMode;
  sourceId: string;
  document: string;
  url?: string;
  missingFields: readonly string[];
  exemplars: string;
  currentLocators?: LocatorMap;
}

export interface CycleOutcome {
  winner: ProposerProposal | null;
  /** Consensus of the last cycle run */
  consensus: ConsensusResult | null;
  exchanges: AgentExchange[];
  cycles: number;
  failureReasons: string[];
}

function describeRejection(attempt: number, consensus: ConsensusResult, verdict: ValidatorVerdict | null): string {
  switch (consensus.rejection) {
    case 'no_proposal':
      return `attempt ${attempt}: no usable proposal from any proposer agent`;
    case 'extraction_error':
      return `attempt ${attempt}: proposed locators could not be executed (${verdict?.extractionError ?? 'unknown error'})`;
    default: {
      const missing = verdict && verdict.missingFields.length > 0 ? `, missing: ${verdict.missingFields.join(', ')}` : '';
      const rationale = verdict ? `; validator: ${verdict.rationale}` : '';
      return `attempt ${attempt}: consensus ${consensus.score} below ${consensus.threshold} (quality ${
        verdict?.qualityScore ?? 0
      }/100${missing})${rationale}`;
    }
  }
}

export async function runConsensusCycles(
  request: CycleRequest,
  deps: AgentDeps,
  settings: CycleSettings,
  engine: EngineSettings
): Promise<CycleOutcome> {
  const { sourceId, document, url } = request;
  const prepared = prepareDocumentForPrompt(document, settings.promptDocumentChars);
  const exchanges: AgentExchange[] = [];
  const failureReasons: string[] = [];
  let consensus: ConsensusResult | null = null;

  for (let attempt = 1; attempt <= settings.maxRetries; attempt++) {
    if (attempt > 1) {
      const delayMs = computeBackoffDelay(attempt - 1, settings.backoff);
      logger.info({ event: 'engine.cycle.backoff', sourceId, attempt, delayMs }, `Retrying in ${delayMs}ms`);
      await deps.sleep(delayMs);
    }

    // PROPOSE
    const proposed = await invokeWithFallback({
      chain: deps.proposer,
      prompt: buildProposerPrompt({
        mode: request.mode,
        sourceId,
        url,
        document: prepared.text,
        missingFields: request.missingFields,
        exemplars: request.exemplars,
        currentLocators: request.currentLocators,
        previousFailures: failureReasons,
      }),
      role: 'proposer',
      sourceId,
      attempt,
      timeoutMs: settings.agentTimeoutMs,
      primaryAttempts: settings.primaryAttempts,
      parse: (text) => parseAgentJson(ProposalResponseSchema, text),
    });
    exchanges.push(...proposed.failures);

    if (!proposed.ok) {
      consensus = evaluateConsensus({
        proposal: null,
        validatorConfidence: 0,
        extractionQuality: 0,
        extractionFailed: false,
        weights: engine.weights,
        threshold: engine.acceptanceThreshold,
      });
      failureReasons.push(describeRejection(attempt, consensus, null));
      logger.warn({ event: 'engine.cycle.no_proposal', sourceId, attempt }, 'No proposer agent produced a proposal');
      continue;
    }

    const proposal: ProposerProposal = {
      kind: 'proposal',
      agent: proposed.agent,
      attempt,
      locators: proposed.value.locators,
      sourceType: proposed.value.sourceType ?? 'ssr',
      confidence: proposed.value.confidence,
      rationale: proposed.value.rationale,
      tokens: proposed.tokens,
    };
    exchanges.push(proposal);

    // VALIDATE
    const evaluation = evaluateRule(document, proposal, settings.qualityWeights, url);
    const verdict: ValidatorVerdict = {
      kind: 'validation',
      agent: deps.validator.primary.name,
      attempt,
      confidence: 0,
      rationale: '',
      extractionQuality: evaluation.score / 100,
      qualityScore: evaluation.score,
      missingFields: evaluation.missingFields,
    };

    if (evaluation.extractionError !== undefined) {
      verdict.extractionError = evaluation.extractionError;
      verdict.rationale = 'Proposed locators could not be executed; validator not consulted';
    } else {
      const validated = await invokeWithFallback({
        chain: deps.validator,
        prompt: buildValidatorPrompt({
          sourceId,
          document: prepared.text,
          locators: proposal.locators,
          extracted: evaluation.fields,
          qualityScore: evaluation.score,
          missingFields: evaluation.missingFields,
        }),
        role: 'validator',
        sourceId,
        attempt,
        timeoutMs: settings.agentTimeoutMs,
        primaryAttempts: settings.primaryAttempts,
        parse: (text) => parseAgentJson(ValidationResponseSchema, text),
      });
      exchanges.push(...validated.failures);
      if (validated.ok) {
        verdict.agent = validated.agent;
        verdict.confidence = validated.value.confidence;
        verdict.rationale = validated.value.rationale;
        verdict.tokens = validated.tokens;
      } else {
        verdict.rationale = 'Validator unavailable; confidence counted as 0';
      }
    }
    exchanges.push(verdict);

    // CONSENSUS
    consensus = evaluateConsensus({
      proposal,
      validatorConfidence: verdict.confidence,
      extractionQuality: verdict.extractionQuality,
      extractionFailed: verdict.extractionError !== undefined,
      weights: engine.weights,
      threshold: engine.acceptanceThreshold,
    });

    logger.info(
      {
        event: 'engine.cycle.consensus',
        sourceId,
        mode: request.mode,
        attempt,
        score: consensus.score,
        accepted: consensus.accepted,
        qualityScore: evaluation.score,
      },
      `Consensus ${consensus.score} (threshold ${engine.acceptanceThreshold})`
    );

    if (consensus.accepted) {
      return { winner: proposal, consensus, exchanges, cycles: attempt, failureReasons };
    }
    failureReasons.push(describeRejection(attempt, consensus, verdict));
  }

  return { winner: null, consensus, exchanges, cycles: settings.maxRetries, failureReasons };
}
