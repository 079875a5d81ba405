/**
 * Route decision and rule evaluation. No inference calls.
 */

import { createHash } from 'crypto';
import { isOrchestratorError, safeErrorMessage, type ExtractedFields, type ExtractionRule, type Route } from '@autosel/core';
import { executeLocators } from '@autosel/extract';
import { scoreExtraction, type QualityWeights } from '@autosel/quality';

export interface RouteInput {
  rule: ExtractionRule | null;
  /** Quality Gate score of the rule on the current document; ignored without a rule */
  score: number;
  reuseThreshold: number;
}

export function decideRoute({ rule, score, reuseThreshold }: RouteInput): Route {
  if (!rule) return 'discovery';
  return score >= reuseThreshold ? 'reuse' : 'repair';
}

export interface RuleEvaluation {
  fields: ExtractedFields;
  score: number;
  missingFields: string[];
  /** Set when the locators could not run at all */
  extractionError?: string;
}

const ALL_MISSING = ['title', 'body', 'date', 'url'];

/**
 * Run a rule on a document and score the result. An extraction failure
 * scores 0 with every field missing.
 */
export function evaluateRule(
  document: string,
  rule: Pick<ExtractionRule, 'locators'>,
  weights: QualityWeights,
  url?: string
): RuleEvaluation {
  try {
    const fields = executeLocators(document, rule.locators, { url });
    return { fields, ...scoreExtraction(fields, weights) };
  } catch (error) {
    if (!isOrchestratorError(error)) {
      throw error;
    }
    return { fields: {}, score: 0, missingFields: [...ALL_MISSING], extractionError: safeErrorMessage(error) };
  }
}

export function documentRef(document: string): string {
  return createHash('sha256').update(document).digest('hex');
}
