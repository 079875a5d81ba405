/**
 * Shapes the engines accept from inference agents. Anything else is a
 * malformed response.
 */

import { z } from 'zod';
import { ErrorCode, OrchestratorError } from '@autosel/core';

const Locator = z.string().trim().min(1);
const Confidence = z.number().min(0).max(1);

export const ProposalResponseSchema = z.object({
  locators: z.object({
    title: Locator,
    body: Locator,
    date: Locator,
    url: Locator.optional(),
  }),
  sourceType: z.enum(['ssr', 'spa']).optional(),
  confidence: Confidence,
  rationale: z.string().min(1),
});

export const ValidationResponseSchema = z.object({
  confidence: Confidence,
  rationale: z.string().min(1),
  issues: z.array(z.string()).optional(),
});

export type ProposalResponse = z.infer<typeof ProposalResponseSchema>;
export type ValidationResponse = z.infer<typeof ValidationResponseSchema>;

const FENCED = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

function unwrap(text: string): string {
  const trimmed = text.trim();
  const fenced = FENCED.exec(trimmed);
  if (fenced) {
    return fenced[1];
  }
  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  return start >= 0 && end > start ? trimmed.slice(start, end + 1) : trimmed;
}

/**
 * Parse an agent's JSON reply, tolerating code fences and surrounding prose
 * @throws OrchestratorError AGENT_MALFORMED
 */
export function parseAgentJson<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, text: string): T {
  let candidate: unknown;
  try {
    candidate = JSON.parse(unwrap(text));
  } catch {
    throw new OrchestratorError(ErrorCode.AGENT_MALFORMED, 'Agent reply is not valid JSON', false, {
      preview: text.slice(0, 120),
    });
  }

  const result = schema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new OrchestratorError(ErrorCode.AGENT_MALFORMED, `Agent reply failed validation: ${issues.join('; ')}`, false, {
      issues,
    });
  }
  return result.data;
}
