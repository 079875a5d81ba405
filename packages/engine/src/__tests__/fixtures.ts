import type { ExtractionRule, LocatorMap } from '@autosel/core';
import type { AgentCallContext, AgentPrompt, AgentReply, InferenceAgent } from '@autosel/llm';

export type ScriptStep = string | Error | 'hang';

export interface ScriptedAgent extends InferenceAgent {
  calls: Array<{ prompt: AgentPrompt; context: AgentCallContext }>;
}

/**
 * Agent that replays a script; the last step repeats once the script runs out
 */
export function scriptedAgent(name: string, script: ScriptStep[]): ScriptedAgent {
  const calls: ScriptedAgent['calls'] = [];
  return {
    name,
    calls,
    async invoke(prompt: AgentPrompt, context: AgentCallContext): Promise<AgentReply> {
      const step = script[Math.min(calls.length, script.length - 1)];
      calls.push({ prompt, context });
      if (step === 'hang') {
        return new Promise<AgentReply>(() => undefined);
      }
      if (step instanceof Error) {
        throw step;
      }
      return { text: step, tokens: 100 };
    },
  };
}

export function proposalReply(locators: LocatorMap, confidence: number, rationale = 'looks stable'): string {
  return JSON.stringify({ locators, confidence, rationale });
}

export function validationReply(confidence: number, rationale = 'checked extraction'): string {
  return JSON.stringify({ confidence, rationale });
}

const PARAGRAPH =
  'The council met on Tuesday to debate the harbour budget and voted to expand the ferry terminal by next spring. ';

export const STORY_BODY = PARAGRAPH.repeat(3).trim();

/** Article whose teaser is short and whose story paragraphs are long */
export const ARTICLE_PAGE = `<html><head>
<link rel="canonical" href="https://news.example.com/harbour-budget">
</head><body>
<h1 class="headline">Council approves new harbour budget</h1>
<span class="teaser">Short teaser text.</span>
<time datetime="2024-05-01">May 1, 2024</time>
<div class="story"><p>${STORY_BODY}</p><p>${STORY_BODY}</p></div>
</body></html>`;

export const TEASER_LOCATORS: LocatorMap = {
  title: 'h1.headline',
  body: 'span.teaser',
  date: 'time@datetime',
};

export const STORY_LOCATORS: LocatorMap = {
  title: 'h1.headline',
  body: 'div.story p',
  date: 'time@datetime',
  url: 'link[rel="canonical"]@href',
};

export const JSONLD_PAGE = `<html><head>
<script type="application/ld+json">${JSON.stringify({
  '@context': 'https://schema.org',
  '@type': 'NewsArticle',
  headline: 'Harbour budget passes after long debate',
  description: 'The council approved the harbour budget.',
  author: { '@type': 'Person', name: 'Test Reporter' },
  datePublished: '2024-05-01T09:00:00Z',
  image: 'https://news.example.com/harbour.jpg',
  url: 'https://news.example.com/harbour-budget',
  articleBody: `${STORY_BODY} ${STORY_BODY}`,
})}</script>
</head><body><div id="app"></div></body></html>`;

/**
 * Good JSON-LD with no articleBody or url. The only visible body container
 * holds the teaser, so the metadata-derived locators extract too little.
 */
export const THIN_METADATA_PAGE = ARTICLE_PAGE.replace(
  '<head>',
  `<head>
<script type="application/ld+json">${JSON.stringify({
    '@context': 'https://schema.org',
    '@type': 'NewsArticle',
    headline: 'Council approves new harbour budget',
    description: 'The council approved the harbour budget.',
    author: { '@type': 'Person', name: 'Test Reporter' },
    datePublished: '2024-05-01',
    image: 'https://news.example.com/harbour.jpg',
  })}</script>`
).replace('<span class="teaser">Short teaser text.</span>', '<article>Short teaser text.</article>');

export function seededRule(sourceId: string, locators: LocatorMap): ExtractionRule {
  return {
    sourceId,
    locators,
    sourceType: 'ssr',
    successCount: 3,
    failureCount: 0,
    updatedAt: '2024-01-01T00:00:00.000Z',
  };
}

export function sequentialIds(prefix = 'rec'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}
