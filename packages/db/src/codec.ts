/**
 * Redis representations of rules and decision records
 *
 * Rules live in a hash of strings so counters can be bumped with HINCRBY.
 * Decision records are stored as JSON and re-validated on read.
 */

import { z } from 'zod';
import { ErrorCode, OrchestratorError, type DecisionRecord, type ExtractionRule } from '@autosel/core';

const LocatorMapSchema = z.object({
  title: z.string(),
  body: z.string(),
  date: z.string(),
  url: z.string().optional(),
});

const SourceTypeSchema = z.enum(['ssr', 'spa']);

const ProposalSchema = z.object({
  kind: z.literal('proposal'),
  agent: z.string(),
  attempt: z.number().int(),
  locators: LocatorMapSchema,
  sourceType: SourceTypeSchema,
  confidence: z.number(),
  rationale: z.string(),
  tokens: z.number().optional(),
});

const VerdictSchema = z.object({
  kind: z.literal('validation'),
  agent: z.string(),
  attempt: z.number().int(),
  confidence: z.number(),
  rationale: z.string(),
  extractionQuality: z.number(),
  qualityScore: z.number(),
  missingFields: z.array(z.string()),
  extractionError: z.string().optional(),
  tokens: z.number().optional(),
});

const FailureSchema = z.object({
  kind: z.literal('failure'),
  agent: z.string(),
  role: z.enum(['proposer', 'validator']),
  attempt: z.number().int(),
  reason: z.enum(['timeout', 'transport', 'malformed']),
  message: z.string(),
});

const ConsensusSchema = z.object({
  proposerConfidence: z.number(),
  validatorConfidence: z.number(),
  extractionQuality: z.number(),
  weights: z.object({ proposer: z.number(), validator: z.number(), extraction: z.number() }),
  threshold: z.number(),
  score: z.number(),
  accepted: z.boolean(),
  winner: ProposalSchema.nullable(),
  rejection: z.enum(['below_threshold', 'extraction_error', 'no_proposal']).optional(),
});

const DecisionRecordSchema: z.ZodType<DecisionRecord, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  sourceId: z.string(),
  documentRef: z.string(),
  method: z.enum(['repair', 'discovery', 'metadata', 'operator']),
  proposals: z.array(z.discriminatedUnion('kind', [ProposalSchema, VerdictSchema, FailureSchema])),
  consensus: ConsensusSchema.nullable(),
  retryCount: z.number().int().min(0),
  outcome: z.enum(['saved', 'needs_review']),
  failureReasons: z.array(z.string()),
  resolves: z.string().optional(),
  createdAt: z.string(),
});

const RuleHashSchema = z.object({
  sourceId: z.string().min(1),
  locators: z.string(),
  sourceType: SourceTypeSchema,
  successCount: z.coerce.number().int().min(0),
  failureCount: z.coerce.number().int().min(0),
  updatedAt: z.string(),
});

function corrupt(kind: string, key: string, detail: string): OrchestratorError {
  return new OrchestratorError(ErrorCode.STORE_FAILURE, `Corrupt ${kind} in store: ${key} (${detail})`, false, { key });
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function parseJson(raw: string, kind: string, key: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw corrupt(kind, key, error instanceof Error ? error.message : String(error));
  }
}

export function encodeRule(rule: ExtractionRule): Record<string, string> {
  return {
    sourceId: rule.sourceId,
    locators: JSON.stringify(rule.locators),
    sourceType: rule.sourceType,
    successCount: String(rule.successCount),
    failureCount: String(rule.failureCount),
    updatedAt: rule.updatedAt,
  };
}

/**
 * @returns null for an empty hash (HGETALL on a missing key)
 * @throws OrchestratorError STORE_FAILURE when the hash does not decode
 */
export function decodeRule(hash: Record<string, string>, key: string): ExtractionRule | null {
  if (Object.keys(hash).length === 0) {
    return null;
  }
  const fields = RuleHashSchema.safeParse(hash);
  if (!fields.success) {
    throw corrupt('rule', key, describeIssues(fields.error));
  }
  const locators = LocatorMapSchema.safeParse(parseJson(fields.data.locators, 'rule', key));
  if (!locators.success) {
    throw corrupt('rule', key, describeIssues(locators.error));
  }
  return { ...fields.data, locators: locators.data };
}

export function encodeDecision(record: DecisionRecord): string {
  return JSON.stringify(record);
}

export function decodeDecision(raw: string, key: string): DecisionRecord {
  const result = DecisionRecordSchema.safeParse(parseJson(raw, 'decision record', key));
  if (!result.success) {
    throw corrupt('decision record', key, describeIssues(result.error));
  }
  return result.data;
}
