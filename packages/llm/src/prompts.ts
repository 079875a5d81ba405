/**
 * Proposer and validator prompts
 */

import type { ExtractedFields, LocatorMap } from '@autosel/core';
import type { AgentPrompt } from './types.js';

export type ProposalMode = 'repair' | 'discovery';

export interface ProposerPromptInput {
  mode: ProposalMode;
  sourceId: string;
  url?: string;
  /** Preprocessed document */
  document: string;
  missingFields: readonly string[];
  /** Formatted exemplar block */
  exemplars: string;
  /** Locators of the degraded rule, repair only */
  currentLocators?: LocatorMap;
  /** Why earlier attempts in this run were rejected, oldest first */
  previousFailures: readonly string[];
}

export interface ValidatorPromptInput {
  sourceId: string;
  document: string;
  locators: LocatorMap;
  extracted: ExtractedFields;
  qualityScore: number;
  missingFields: readonly string[];
}

const LOCATOR_GRAMMAR = `Locator syntax:
- a CSS selector: text of the first match (for "body", all matches joined)
- "selector@attr": attribute value of the first match
- a bare meta[...] selector reads its content attribute
- "jsonld:path.to.field": value from the NewsArticle JSON-LD block`;

const PROPOSER_SYSTEM = `You write extraction rules for news article pages.
Given page HTML, return locators for the article title, body and publication date (and optionally the canonical url).
Prefer stable selectors: semantic tags, itemprop and data attributes, JSON-LD. Avoid generated class names and positional selectors.
${LOCATOR_GRAMMAR}

Respond with JSON only:
{"locators":{"title":"...","body":"...","date":"...","url":"..."},"sourceType":"ssr"|"spa","confidence":0.0-1.0,"rationale":"..."}`;

const VALIDATOR_SYSTEM = `You review extraction rules for news article pages.
You are shown the page, the proposed locators and what they actually extracted.
Judge whether the extracted values are the real article title, body and publication date, not navigation, teasers or boilerplate.

Respond with JSON only:
{"confidence":0.0-1.0,"rationale":"...","issues":["..."]}`;

const FIELD_PREVIEW_CHARS = 600;

function preview(value: string | undefined): string {
  if (!value) return '(nothing)';
  return value.length > FIELD_PREVIEW_CHARS ? `${value.slice(0, FIELD_PREVIEW_CHARS)}...` : value;
}

export function buildProposerPrompt(input: ProposerPromptInput): AgentPrompt {
  const parts: string[] = [];

  parts.push(`## Source
Source id: ${input.sourceId}${input.url ? `\nURL: ${input.url}` : ''}`);

  if (input.mode === 'repair' && input.currentLocators) {
    parts.push(`\n## Current rule (no longer extracts well)
${JSON.stringify(input.currentLocators, null, 2)}`);
  } else {
    parts.push(`\n## Task
This source has no rule yet. Discover one.`);
  }

  if (input.missingFields.length > 0) {
    parts.push(`\n## Quality problems
Missing or weak fields: ${input.missingFields.join(', ')}`);
  }

  parts.push(`\n## Examples\n${input.exemplars}`);

  if (input.previousFailures.length > 0) {
    parts.push(`\n## Earlier attempts in this run were rejected
${input.previousFailures.map((reason, i) => `${i + 1}. ${reason}`).join('\n')}
Propose something different that addresses these problems.`);
  }

  parts.push(`\n## Page\n${input.document}`);

  return { system: PROPOSER_SYSTEM, user: parts.join('\n') };
}

export function buildValidatorPrompt(input: ValidatorPromptInput): AgentPrompt {
  const user = `## Source
Source id: ${input.sourceId}

## Proposed locators
${JSON.stringify(input.locators, null, 2)}

## Extracted with those locators (quality score ${input.qualityScore}/100${
    input.missingFields.length > 0 ? `, missing: ${input.missingFields.join(', ')}` : ''
  })
title: ${preview(input.extracted.title)}
date: ${preview(input.extracted.date)}
url: ${preview(input.extracted.url)}
body: ${preview(input.extracted.body)}

## Page
${input.document}`;

  return { system: VALIDATOR_SYSTEM, user };
}
