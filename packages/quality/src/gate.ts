/**
 * Rule-based Quality Gate
 *
 * Scores an extraction attempt 0-100 from the extracted field values alone.
 * No I/O; malformed or absent fields score zero for their component.
 */

import type { LocatorField } from '@autosel/core';

export interface QualityWeights {
  title: number;
  /** body ≥ BODY_FULL_LENGTH characters */
  bodyFull: number;
  /** body ≥ BODY_PARTIAL_LENGTH characters */
  bodyPartial: number;
  /** body ≥ BODY_MINIMAL_LENGTH characters */
  bodyMinimal: number;
  date: number;
  url: number;
}

export const DEFAULT_QUALITY_WEIGHTS: QualityWeights = {
  title: 25,
  bodyFull: 50,
  bodyPartial: 30,
  bodyMinimal: 15,
  date: 15,
  url: 10,
};

export const TITLE_MIN_LENGTH = 10;
export const BODY_FULL_LENGTH = 500;
export const BODY_PARTIAL_LENGTH = 200;
export const BODY_MINIMAL_LENGTH = 100;
export const MAX_QUALITY_SCORE = 100;

const LOOSE_DATE_PATTERNS: readonly RegExp[] = [
  // 2025-11-05, 2025.11.05, 2025/11/05, 2025년 11월 5일, ISO timestamps
  /\d{4}\s*[-./년]\s*\d{1,2}\s*[-./월]\s*\d{1,2}/,
  // 05/11/2025, 5.11.2025
  /\b\d{1,2}[-./]\d{1,2}[-./]\d{4}\b/,
];

const URL_PATTERN = /^https?:\/\/[^\s/$.?#][^\s]*$/i;

export type FieldInput = { readonly [K in LocatorField]?: unknown };

export interface QualityScore {
  score: number;
  missingFields: string[];
}

function text(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

export function looksLikeDate(value: string): boolean {
  return LOOSE_DATE_PATTERNS.some((pattern) => pattern.test(value));
}

/**
 * Score extracted fields. Missing-field names are reported in rubric order:
 * `title`, `body` or `body_short`, `date`, `url`.
 */
export function scoreExtraction(
  fields: FieldInput | null | undefined,
  weights: QualityWeights = DEFAULT_QUALITY_WEIGHTS
): QualityScore {
  const missingFields: string[] = [];
  let total = 0;

  const title = text(fields?.title);
  if (title.length >= TITLE_MIN_LENGTH) {
    total += weights.title;
  } else {
    missingFields.push('title');
  }

  const bodyLength = text(fields?.body).length;
  if (bodyLength >= BODY_FULL_LENGTH) {
    total += weights.bodyFull;
  } else if (bodyLength >= BODY_PARTIAL_LENGTH) {
    total += weights.bodyPartial;
    missingFields.push('body_short');
  } else if (bodyLength >= BODY_MINIMAL_LENGTH) {
    total += weights.bodyMinimal;
    missingFields.push('body_short');
  } else {
    missingFields.push('body');
  }

  const date = text(fields?.date);
  if (date.length > 0 && looksLikeDate(date)) {
    total += weights.date;
  } else {
    missingFields.push('date');
  }

  if (URL_PATTERN.test(text(fields?.url))) {
    total += weights.url;
  } else {
    missingFields.push('url');
  }

  return {
    score: Math.round(Math.min(Math.max(total, 0), MAX_QUALITY_SCORE)),
    missingFields,
  };
}

export function passesQualityGate(result: QualityScore, threshold: number): boolean {
  return result.score >= threshold;
}
