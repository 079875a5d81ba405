/**
 * Orchestrator tuning
 *
 * Repair and discovery carry their own acceptance threshold and weight split;
 * neither is derived from the other.
 */

import { z } from 'zod';
import { ErrorCode, OrchestratorError, type ConsensusWeights } from '@autosel/core';
import { DEFAULT_QUALITY_WEIGHTS, type QualityWeights } from '@autosel/quality';

const WEIGHT_SUM_TOLERANCE = 1e-6;

const Unit = z.number().min(0).max(1);

const ConsensusWeightsSchema = z
  .object({
    proposer: Unit,
    validator: Unit,
    extraction: Unit,
  })
  .refine((w) => Math.abs(w.proposer + w.validator + w.extraction - 1) <= WEIGHT_SUM_TOLERANCE, {
    message: 'consensus weights must sum to 1.0',
  });

const EngineSettingsSchema = z.object({
  acceptanceThreshold: Unit,
  weights: ConsensusWeightsSchema,
});

const QualityWeightsSchema = z
  .object({
    title: z.number().min(0),
    bodyFull: z.number().min(0),
    bodyPartial: z.number().min(0),
    bodyMinimal: z.number().min(0),
    date: z.number().min(0),
    url: z.number().min(0),
  })
  .refine((w) => w.bodyFull >= w.bodyPartial && w.bodyPartial >= w.bodyMinimal, {
    message: 'body tiers must not decrease with length',
  });

const Score = z.number().int().min(0).max(100);

export const OrchestratorSettingsSchema = z.object({
  reuseThreshold: Score,
  recheckThreshold: Score,
  repair: EngineSettingsSchema,
  discovery: EngineSettingsSchema,
  maxRetries: z.number().int().min(1).max(10),
  agentTimeoutMs: z.number().int().positive(),
  primaryAttempts: z.number().int().min(1).max(5),
  backoff: z.object({
    baseMs: z.number().int().min(0),
    maxMs: z.number().int().min(0),
  }),
  exemplarLimit: z.number().int().min(0).max(5),
  promptDocumentChars: z.number().int().min(500),
  metadataQualityThreshold: Unit,
  qualityWeights: QualityWeightsSchema,
});

export interface EngineSettings {
  acceptanceThreshold: number;
  weights: ConsensusWeights;
}

export interface OrchestratorSettings {
  reuseThreshold: number;
  recheckThreshold: number;
  repair: EngineSettings;
  discovery: EngineSettings;
  maxRetries: number;
  agentTimeoutMs: number;
  primaryAttempts: number;
  backoff: { baseMs: number; maxMs: number };
  exemplarLimit: number;
  promptDocumentChars: number;
  metadataQualityThreshold: number;
  qualityWeights: QualityWeights;
}

export interface SettingsOverrides
  extends Partial<Omit<OrchestratorSettings, 'repair' | 'discovery' | 'backoff' | 'qualityWeights'>> {
  repair?: Partial<EngineSettings>;
  discovery?: Partial<EngineSettings>;
  backoff?: Partial<OrchestratorSettings['backoff']>;
  qualityWeights?: Partial<QualityWeights>;
}

const DEFAULT_WEIGHTS: ConsensusWeights = { proposer: 0.3, validator: 0.3, extraction: 0.4 };

export const DEFAULT_SETTINGS: OrchestratorSettings = {
  reuseThreshold: 80,
  recheckThreshold: 60,
  repair: { acceptanceThreshold: 0.5, weights: DEFAULT_WEIGHTS },
  discovery: { acceptanceThreshold: 0.55, weights: DEFAULT_WEIGHTS },
  maxRetries: 3,
  agentTimeoutMs: 30000,
  primaryAttempts: 2,
  backoff: { baseMs: 1000, maxMs: 8000 },
  exemplarLimit: 5,
  promptDocumentChars: 8000,
  metadataQualityThreshold: 0.7,
  qualityWeights: DEFAULT_QUALITY_WEIGHTS,
};

function parseSettings(candidate: unknown): OrchestratorSettings {
  const result = OrchestratorSettingsSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new OrchestratorError(ErrorCode.CONFIG_INVALID, `Invalid orchestrator settings: ${issues.join('; ')}`, false, {
      issues,
    });
  }
  return result.data;
}

// Unset overrides keep the default instead of clearing it
function compact(value: object | undefined): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value ?? {}).filter(([, v]) => v !== undefined));
}

/**
 * Merge overrides over the defaults and validate the result
 */
export function resolveSettings(overrides: SettingsOverrides = {}): OrchestratorSettings {
  const { repair, discovery, backoff, qualityWeights, ...scalars } = overrides;
  return parseSettings({
    ...DEFAULT_SETTINGS,
    ...compact(scalars),
    repair: { ...DEFAULT_SETTINGS.repair, ...compact(repair) },
    discovery: { ...DEFAULT_SETTINGS.discovery, ...compact(discovery) },
    backoff: { ...DEFAULT_SETTINGS.backoff, ...compact(backoff) },
    qualityWeights: { ...DEFAULT_SETTINGS.qualityWeights, ...compact(qualityWeights) },
  });
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) {
    return undefined;
  }
  // NaN is left for the schema to reject with the variable's path
  return Number(raw);
}

function readWeights(env: NodeJS.ProcessEnv, name: string): ConsensusWeights | undefined {
  const raw = env[name]?.trim();
  if (!raw) {
    return undefined;
  }
  const parts = raw.split(',').map((part) => Number(part.trim()));
  if (parts.length !== 3) {
    throw new OrchestratorError(
      ErrorCode.CONFIG_INVALID,
      `${name} must be three comma-separated numbers (proposer,validator,extraction)`,
      false,
      { value: raw }
    );
  }
  const [proposer, validator, extraction] = parts;
  return { proposer, validator, extraction };
}

/**
 * Build settings from environment variables, defaulting anything unset
 * @throws OrchestratorError CONFIG_INVALID
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): OrchestratorSettings {
  return resolveSettings({
    reuseThreshold: readNumber(env, 'REUSE_THRESHOLD'),
    recheckThreshold: readNumber(env, 'RECHECK_THRESHOLD'),
    maxRetries: readNumber(env, 'MAX_RETRIES'),
    agentTimeoutMs: readNumber(env, 'AGENT_TIMEOUT_MS'),
    primaryAttempts: readNumber(env, 'PRIMARY_AGENT_ATTEMPTS'),
    exemplarLimit: readNumber(env, 'EXEMPLAR_LIMIT'),
    promptDocumentChars: readNumber(env, 'PROMPT_DOCUMENT_CHARS'),
    metadataQualityThreshold: readNumber(env, 'METADATA_QUALITY_THRESHOLD'),
    repair: {
      acceptanceThreshold: readNumber(env, 'REPAIR_ACCEPTANCE_THRESHOLD'),
      weights: readWeights(env, 'REPAIR_WEIGHTS'),
    },
    discovery: {
      acceptanceThreshold: readNumber(env, 'DISCOVERY_ACCEPTANCE_THRESHOLD'),
      weights: readWeights(env, 'DISCOVERY_WEIGHTS'),
    },
    backoff: {
      baseMs: readNumber(env, 'BACKOFF_BASE_MS'),
      maxMs: readNumber(env, 'BACKOFF_MAX_MS'),
    },
  });
}
