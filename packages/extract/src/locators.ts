/**
 * Locator execution
 *
 * Grammar:
 *   `css selector`        text of the first match (`body`: all matches joined by blank lines)
 *   `css selector@attr`   attribute of the first match
 *   `meta[...]`           a bare meta selector reads its `content` attribute
 *   `jsonld:path.to.key`  value from the page's article JSON-LD node
 */

import * as cheerio from 'cheerio';
import {
  ErrorCode,
  OrchestratorError,
  type ExtractedFields,
  type LocatorField,
  type LocatorMap,
} from '@autosel/core';
import { findArticleNode, readJsonLdText } from './jsonld.js';
import type { MetadataField } from './metadata.js';

export type ParsedLocator =
  | { kind: 'css'; selector: string; attribute?: string }
  | { kind: 'jsonld'; path: string[] };

const JSONLD_PREFIX = 'jsonld:';
const ATTRIBUTE_SUFFIX = /^(.*[^\s@])\s*@([A-Za-z_:][\w:.-]*)$/;

function invalid(locator: string, reason: string): OrchestratorError {
  return new OrchestratorError(ErrorCode.EXTRACTION_FAILED, `Invalid locator "${locator}": ${reason}`, false, {
    locator,
  });
}

export function parseLocator(locator: string): ParsedLocator {
  const trimmed = locator.trim();
  if (!trimmed) {
    throw invalid(locator, 'empty');
  }

  if (trimmed.startsWith(JSONLD_PREFIX)) {
    const path = trimmed.slice(JSONLD_PREFIX.length).split('.').map((key) => key.trim());
    if (path.some((key) => key.length === 0)) {
      throw invalid(locator, 'empty JSON-LD path segment');
    }
    return { kind: 'jsonld', path };
  }

  // `@` inside an attribute selector value (a[href*="@"]) is not a suffix
  const match = ATTRIBUTE_SUFFIX.exec(trimmed);
  if (match && !match[2].includes(']') && match[1].split('[').length === match[1].split(']').length) {
    return { kind: 'css', selector: match[1], attribute: match[2] };
  }
  return { kind: 'css', selector: trimmed };
}

function normalizeText(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function guardSelector<T>(locator: string, run: () => T): T {
  try {
    return run();
  } catch (error) {
    throw invalid(locator, error instanceof Error ? error.message : String(error));
  }
}

/**
 * Evaluate one locator against a loaded document
 * @throws OrchestratorError EXTRACTION_FAILED when the selector cannot be parsed
 */
export function evaluateLocator(
  $: cheerio.CheerioAPI,
  locator: string,
  field: LocatorField | MetadataField
): string | undefined {
  const parsed = parseLocator(locator);

  if (parsed.kind === 'jsonld') {
    const article = findArticleNode($);
    return article ? readJsonLdText(article, parsed.path) : undefined;
  }

  const matches = guardSelector(locator, () => $(parsed.selector));
  if (matches.length === 0) {
    return undefined;
  }

  if (parsed.attribute) {
    const value = matches.first().attr(parsed.attribute);
    return value && value.trim() ? value.trim() : undefined;
  }

  if (matches.first().is('meta')) {
    const content = matches.first().attr('content');
    return content && content.trim() ? content.trim() : undefined;
  }

  if (field === 'body') {
    const paragraphs = matches
      .toArray()
      .map((el) => normalizeText($(el).text()))
      .filter((text) => text.length > 0);
    return paragraphs.length > 0 ? paragraphs.join('\n\n') : undefined;
  }

  const text = normalizeText(matches.first().text());
  return text || undefined;
}

export interface ExecuteOptions {
  /** Request URL, used for the `url` field when the rule has no url locator */
  url?: string;
}

/**
 * Run a rule's locators over a raw document
 * @throws OrchestratorError EXTRACTION_FAILED on an unparsable selector, or
 *   when no locator yields any value
 */
export function executeLocators(
  document: string,
  locators: LocatorMap,
  options: ExecuteOptions = {}
): ExtractedFields {
  const $ = cheerio.load(document);
  const fields: ExtractedFields = {};

  const entries: Array<[LocatorField, string | undefined]> = [
    ['title', locators.title],
    ['body', locators.body],
    ['date', locators.date],
    ['url', locators.url],
  ];

  for (const [field, locator] of entries) {
    if (locator === undefined) continue;
    const value = evaluateLocator($, locator, field);
    if (value !== undefined) {
      fields[field] = value;
    }
  }

  if (Object.keys(fields).length === 0) {
    throw new OrchestratorError(ErrorCode.EXTRACTION_FAILED, 'Locators matched no content', false, {
      locators,
    });
  }

  if (fields.url === undefined && options.url) {
    fields.url = options.url;
  }

  return fields;
}
