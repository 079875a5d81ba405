/**
 * schema.org JSON-LD lookup for article pages
 */

import type * as cheerio from 'cheerio';

const ARTICLE_TYPES = new Set(['NewsArticle', 'ReportageNewsArticle', 'AnalysisNewsArticle', 'Article']);

export type JsonLdNode = Record<string, unknown>;

function isNode(value: unknown): value is JsonLdNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isArticle(node: JsonLdNode): boolean {
  const type = node['@type'];
  if (typeof type === 'string') {
    return ARTICLE_TYPES.has(type);
  }
  return Array.isArray(type) && type.some((t) => typeof t === 'string' && ARTICLE_TYPES.has(t));
}

function flatten(data: unknown): JsonLdNode[] {
  if (Array.isArray(data)) {
    return data.flatMap(flatten);
  }
  if (!isNode(data)) {
    return [];
  }
  const graph = data['@graph'];
  if (Array.isArray(graph)) {
    return graph.filter(isNode);
  }
  return [data];
}

/**
 * First article node across all ld+json blocks; `@graph` wrappers and
 * top-level arrays are unpacked. Unparsable blocks are skipped.
 */
export function findArticleNode($: cheerio.CheerioAPI): JsonLdNode | null {
  for (const script of $('script[type="application/ld+json"]').toArray()) {
    const raw = $(script).text().trim();
    if (!raw) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      continue; // malformed block, try the next one
    }

    const article = flatten(parsed).find(isArticle);
    if (article) {
      return article;
    }
  }
  return null;
}

/**
 * Resolve a dotted path to display text. Arrays yield their first usable
 * entry; objects yield `name`, then `url`, then `@value`.
 */
export function readJsonLdText(node: JsonLdNode, path: readonly string[]): string | undefined {
  let current: unknown = node;
  for (const key of path) {
    if (Array.isArray(current)) {
      current = current[0];
    }
    if (!isNode(current)) {
      return undefined;
    }
    current = current[key];
  }
  return toText(current);
}

function toText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  if (Array.isArray(value)) {
    for (const entry of value) {
      const text = toText(entry);
      if (text) return text;
    }
    return undefined;
  }
  if (isNode(value)) {
    return toText(value.name) ?? toText(value.url) ?? toText(value['@value']);
  }
  return undefined;
}
