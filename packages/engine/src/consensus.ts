/**
 * Consensus arithmetic
 *
 *   score = w.proposer·proposerConfidence + w.validator·validatorConfidence + w.extraction·extractionQuality
 *
 * Inputs are clamped to [0, 1]. A hard extraction error or a missing
 * proposal scores 0 outright.
 */

import type { ConsensusResult, ConsensusWeights, ProposerProposal } from '@autosel/core';

export interface ConsensusInput {
  proposerConfidence: number;
  validatorConfidence: number;
  extractionQuality: number;
}

function clampUnit(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(Math.max(value, 0), 1);
}

function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}

export function consensusScore(input: ConsensusInput, weights: ConsensusWeights): number {
  return round4(
    weights.proposer * clampUnit(input.proposerConfidence) +
      weights.validator * clampUnit(input.validatorConfidence) +
      weights.extraction * clampUnit(input.extractionQuality)
  );
}

export interface ConsensusEvaluation {
  proposal: ProposerProposal | null;
  validatorConfidence: number;
  extractionQuality: number;
  extractionFailed: boolean;
  weights: ConsensusWeights;
  threshold: number;
}

export function evaluateConsensus(evaluation: ConsensusEvaluation): ConsensusResult {
  const { proposal, weights, threshold } = evaluation;
  const inputs: ConsensusInput = {
    proposerConfidence: clampUnit(proposal?.confidence ?? 0),
    validatorConfidence: clampUnit(evaluation.validatorConfidence),
    extractionQuality: clampUnit(evaluation.extractionQuality),
  };

  if (!proposal) {
    return { ...inputs, weights, threshold, score: 0, accepted: false, winner: null, rejection: 'no_proposal' };
  }
  if (evaluation.extractionFailed) {
    return { ...inputs, weights, threshold, score: 0, accepted: false, winner: null, rejection: 'extraction_error' };
  }

  const score = consensusScore(inputs, weights);
  if (score >= threshold) {
    return { ...inputs, weights, threshold, score, accepted: true, winner: proposal };
  }
  return { ...inputs, weights, threshold, score, accepted: false, winner: null, rejection: 'below_threshold' };
}
