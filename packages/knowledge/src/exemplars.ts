/**
 * Exemplar retrieval for few-shot prompts
 *
 * Stateless: every call reads the registry afresh, so a rule saved by one
 * request is visible to the next.
 */

import type { ExtractionRule, LocatorField, LocatorMap } from '@autosel/core';
import type { RuleRegistry } from './registry.js';

export const MAX_EXEMPLARS = 5;

export type LocatorPattern =
  | 'jsonld'
  | 'meta'
  | 'attribute'
  | 'id'
  | 'data-attribute'
  | 'class'
  | 'nested'
  | 'nth-child'
  | 'semantic'
  | 'tag';

const SEMANTIC_TAGS = new Set(['article', 'main', 'header', 'time', 'section', 'h1', 'h2']);

export interface Exemplar {
  rule: ExtractionRule;
  patterns: Partial<Record<LocatorField, LocatorPattern[]>>;
}

/**
 * Classify a locator by the features it relies on, most specific first
 */
export function analyzeLocatorPattern(locator: string): LocatorPattern[] {
  const trimmed = locator.trim();
  if (trimmed.startsWith('jsonld:')) {
    return ['jsonld'];
  }

  const patterns: LocatorPattern[] = [];
  const selector = trimmed.replace(/@[\w-]+$/, '');
  if (selector !== trimmed) patterns.push('attribute');
  if (/^meta\b/.test(selector)) patterns.push('meta');
  if (selector.includes('#')) patterns.push('id');
  if (/\[data-[\w-]+/.test(selector)) patterns.push('data-attribute');
  if (/\.[\w-]/.test(selector)) patterns.push('class');
  if (/\s|>/.test(selector)) patterns.push('nested');
  if (selector.includes(':nth-')) patterns.push('nth-child');

  const tags = selector.match(/(?:^|[\s>+~])([a-z][a-z0-9]*)/gi) ?? [];
  if (tags.some((tag) => SEMANTIC_TAGS.has(tag.replace(/^[\s>+~]/, '').toLowerCase()))) {
    patterns.push('semantic');
  }
  if (patterns.length === 0) {
    patterns.push('tag');
  }
  return patterns;
}

export interface RetrieveOptions {
  limit: number;
  /** Leave out the rule being repaired */
  excludeSourceId?: string;
}

export async function retrieveExemplars(registry: RuleRegistry, options: RetrieveOptions): Promise<Exemplar[]> {
  const limit = Math.min(Math.max(options.limit, 0), MAX_EXEMPLARS);
  if (limit === 0) {
    return [];
  }
  // One spare so exclusion still leaves `limit` rules
  const candidates = await registry.topExemplars(limit + 1);
  return candidates
    .filter((rule) => rule.sourceId !== options.excludeSourceId)
    .slice(0, limit)
    .map((rule) => ({ rule, patterns: describeLocators(rule.locators) }));
}

function describeLocators(locators: LocatorMap): Exemplar['patterns'] {
  const patterns: Exemplar['patterns'] = {
    title: analyzeLocatorPattern(locators.title),
    body: analyzeLocatorPattern(locators.body),
    date: analyzeLocatorPattern(locators.date),
  };
  if (locators.url) {
    patterns.url = analyzeLocatorPattern(locators.url);
  }
  return patterns;
}

export function formatExemplarsForPrompt(exemplars: readonly Exemplar[]): string {
  if (exemplars.length === 0) {
    return 'No previously successful rules are available.';
  }

  const lines: string[] = ['Rules that already work on other sources:'];
  exemplars.forEach(({ rule, patterns }, index) => {
    lines.push('');
    lines.push(`${index + 1}. ${rule.sourceId} (${rule.sourceType}, ${rule.successCount} successful extractions)`);
    for (const field of ['title', 'body', 'date', 'url'] as const) {
      const locator = rule.locators[field];
      if (locator) {
        lines.push(`   ${field}: ${locator}  [${(patterns[field] ?? []).join(', ')}]`);
      }
    }
  });
  return lines.join('\n');
}
