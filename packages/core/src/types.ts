/**
 * Domain types shared by the orchestrator packages
 */

/** Logical fields an extraction rule can locate. */
export type LocatorField = 'title' | 'body' | 'date' | 'url';

/**
 * Field to locator mapping. Locators are opaque to the orchestrator and are
 * interpreted by the extract package (CSS, `selector@attr`, `jsonld:<path>`).
 */
export interface LocatorMap {
  title: string;
  body: string;
  date: string;
  url?: string;
}

export type SourceType = 'ssr' | 'spa';

export interface ExtractionRule {
  sourceId: string;
  locators: LocatorMap;
  sourceType: SourceType;
  successCount: number;
  failureCount: number;
  updatedAt: string;
}

export interface RuleInput {
  sourceId: string;
  locators: LocatorMap;
  sourceType: SourceType;
}

export type ExtractedFields = Partial<Record<LocatorField, string>>;

export type AgentRole = 'proposer' | 'validator';

export type AgentFailureReason = 'timeout' | 'transport' | 'malformed';

export interface ProposerProposal {
  kind: 'proposal';
  agent: string;
  attempt: number;
  locators: LocatorMap;
  sourceType: SourceType;
  confidence: number;
  rationale: string;
  tokens?: number;
}

export interface ValidatorVerdict {
  kind: 'validation';
  agent: string;
  attempt: number;
  confidence: number;
  rationale: string;
  /** Quality Gate score of the validator's own extraction, 0..1 */
  extractionQuality: number;
  qualityScore: number;
  missingFields: string[];
  extractionError?: string;
  tokens?: number;
}

export interface AgentFailure {
  kind: 'failure';
  agent: string;
  role: AgentRole;
  attempt: number;
  reason: AgentFailureReason;
  message: string;
}

/** One entry per inference-agent exchange, in call order. */
export type AgentExchange = ProposerProposal | ValidatorVerdict | AgentFailure;

export interface ConsensusWeights {
  proposer: number;
  validator: number;
  extraction: number;
}

export type ConsensusRejection = 'below_threshold' | 'extraction_error' | 'no_proposal';

export interface ConsensusResult {
  proposerConfidence: number;
  validatorConfidence: number;
  extractionQuality: number;
  weights: ConsensusWeights;
  threshold: number;
  score: number;
  accepted: boolean;
  winner: ProposerProposal | null;
  rejection?: ConsensusRejection;
}

export type EngineMethod = 'repair' | 'discovery' | 'metadata' | 'operator';

export type DecisionOutcome = 'saved' | 'needs_review';

export interface DecisionRecord {
  id: string;
  sourceId: string;
  /** sha256 of the raw document the decision was made against */
  documentRef: string;
  method: EngineMethod;
  proposals: AgentExchange[];
  consensus: ConsensusResult | null;
  retryCount: number;
  outcome: DecisionOutcome;
  failureReasons: string[];
  resolves?: string;
  createdAt: string;
}

export type NewDecisionRecord = Omit<DecisionRecord, 'id' | 'createdAt'>;

export type RouterState =
  | 'START'
  | 'QUALITY_GATE'
  | 'REPAIR'
  | 'DISCOVERY'
  | 'QUALITY_GATE_RECHECK'
  | 'DONE'
  | 'FAILED';

export type Route = 'reuse' | 'repair' | 'discovery';

export type ExtractionOutcome = 'saved' | 'needs_review' | 'error';

export interface ExtractionResult {
  sourceId: string;
  status: ExtractionOutcome;
  route: Route;
  fields: ExtractedFields;
  score: number;
  missingFields: string[];
  retryCount: number;
  rule: ExtractionRule | null;
  decisionId: string | null;
  states: RouterState[];
  error?: { code: string; message: string };
}

/** Document fetch collaborator. Rendering strategy is the implementation's concern. */
export interface DocumentFetcher {
  fetch(sourceId: string, url: string): Promise<string>;
}
