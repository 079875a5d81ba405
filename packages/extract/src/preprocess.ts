import * as cheerio from 'cheerio';

const NOISE_SELECTORS = 'script:not([type="application/ld+json"]), style, noscript, svg, iframe, template';

export interface PreparedDocument {
  text: string;
  originalLength: number;
  truncated: boolean;
}

/**
 * Shrink a raw document for prompting: drop non-content markup and
 * comments, collapse whitespace, and cut at `maxChars`.
 */
export function prepareDocumentForPrompt(document: string, maxChars: number): PreparedDocument {
  const $ = cheerio.load(document);
  $(NOISE_SELECTORS).remove();

  const compact = $.html()
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/\s+/g, ' ')
    .replace(/>\s+</g, '><')
    .trim();
  if (compact.length <= maxChars) {
    return { text: compact, originalLength: compact.length, truncated: false };
  }

  return {
    text: `${compact.substring(0, maxChars)}\n<!-- truncated ${compact.length - maxChars} chars -->`,
    originalLength: compact.length,
    truncated: true,
  };
}
