/**
 * Structured article metadata: JSON-LD first, meta tags second, merged when
 * neither carries a title on its own.
 *
 * Every value keeps the locator that reproduces it, so a page with good
 * metadata yields a usable rule without any inference call.
 */

import * as cheerio from 'cheerio';
import type { LocatorMap } from '@autosel/core';
import { evaluateLocator } from './locators.js';
import { findArticleNode, readJsonLdText } from './jsonld.js';

export type MetadataField = 'title' | 'description' | 'author' | 'date' | 'image' | 'url' | 'body';

export type MetadataSource = 'json-ld' | 'meta-tags' | 'merged' | 'none';

export interface ArticleMetadata {
  values: Partial<Record<MetadataField, string>>;
  /** Locator for each value in `values` */
  provenance: Partial<Record<MetadataField, string>>;
  source: MetadataSource;
}

const JSONLD_PATHS: Record<MetadataField, readonly string[][]> = {
  title: [['headline'], ['name']],
  description: [['description']],
  author: [['author', 'name'], ['author']],
  date: [['datePublished'], ['dateCreated']],
  image: [['image', 'url'], ['image']],
  url: [['url'], ['mainEntityOfPage', '@id']],
  body: [['articleBody']],
};

const META_LOCATORS: Record<MetadataField, readonly string[]> = {
  title: ['meta[property="og:title"]', 'meta[name="twitter:title"]'],
  description: ['meta[property="og:description"]', 'meta[name="twitter:description"]', 'meta[name="description"]'],
  author: ['meta[name="author"]', 'meta[property="article:author"]'],
  date: ['meta[property="article:published_time"]', 'meta[itemprop="datePublished"]', 'meta[name="date"]'],
  image: ['meta[property="og:image"]', 'meta[name="twitter:image"]'],
  url: ['meta[property="og:url"]', 'link[rel="canonical"]@href'],
  body: [],
};

// Visible containers probed for the body when metadata has no articleBody
const BODY_CONTAINERS = ['[itemprop="articleBody"]', 'article'];

const FIELDS: readonly MetadataField[] = ['title', 'description', 'author', 'date', 'image', 'url', 'body'];

type Extracted = Pick<ArticleMetadata, 'values' | 'provenance'>;

function fromJsonLd($: cheerio.CheerioAPI): Extracted | null {
  const article = findArticleNode($);
  if (!article) return null;

  const extracted: Extracted = { values: {}, provenance: {} };
  for (const field of FIELDS) {
    for (const path of JSONLD_PATHS[field]) {
      const value = readJsonLdText(article, path);
      if (value) {
        extracted.values[field] = value;
        extracted.provenance[field] = `jsonld:${path.join('.')}`;
        break;
      }
    }
  }
  return extracted;
}

function fromMetaTags($: cheerio.CheerioAPI): Extracted {
  const extracted: Extracted = { values: {}, provenance: {} };
  for (const field of FIELDS) {
    for (const locator of META_LOCATORS[field]) {
      const value = evaluateLocator($, locator, field);
      if (value) {
        extracted.values[field] = value;
        extracted.provenance[field] = locator;
        break;
      }
    }
  }
  return extracted;
}

export function extractStructuredMetadata(document: string): ArticleMetadata {
  const $ = cheerio.load(document);
  const jsonLd = fromJsonLd($);

  if (jsonLd?.values.title) {
    return { ...jsonLd, source: 'json-ld' };
  }

  const meta = fromMetaTags($);
  if (meta.values.title) {
    return { ...meta, source: 'meta-tags' };
  }

  const merged: Extracted = { values: {}, provenance: {} };
  for (const field of FIELDS) {
    const origin = jsonLd?.values[field] ? jsonLd : meta.values[field] ? meta : null;
    const value = origin?.values[field];
    const locator = origin?.provenance[field];
    if (value && locator) {
      merged.values[field] = value;
      merged.provenance[field] = locator;
    }
  }

  if (Object.keys(merged.values).length === 0) {
    return { values: {}, provenance: {}, source: 'none' };
  }
  return { ...merged, source: 'merged' };
}

/**
 * 0..1: title 0.3, description 0.2, author 0.1, date 0.2, image 0.1,
 * plus 0.1 when the values came from JSON-LD
 */
export function metadataQualityScore(metadata: ArticleMetadata): number {
  const { values } = metadata;
  let score = 0;
  if (values.title) score += 0.3;
  if (values.description) score += 0.2;
  if (values.author) score += 0.1;
  if (values.date) score += 0.2;
  if (values.image) score += 0.1;
  if (metadata.source === 'json-ld') score += 0.1;
  return Math.min(Math.round(score * 100) / 100, 1);
}

/**
 * Locators that reproduce the metadata's title, body and date, or null when
 * one of them has no source in the document
 */
export function deriveMetadataLocators(document: string, metadata: ArticleMetadata): LocatorMap | null {
  const { provenance } = metadata;
  let body = provenance.body;

  if (!body) {
    const $ = cheerio.load(document);
    body = BODY_CONTAINERS.find((selector) => {
      const text = evaluateLocator($, selector, 'body');
      return text !== undefined && text.length > 0;
    });
  }

  if (!provenance.title || !provenance.date || !body) {
    return null;
  }

  const locators: LocatorMap = { title: provenance.title, body, date: provenance.date };
  if (provenance.url) {
    locators.url = provenance.url;
  }
  return locators;
}
