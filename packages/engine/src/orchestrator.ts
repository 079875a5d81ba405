/**
 * Wiring for the router, engines and review action
 */

import { sleep as defaultSleep, type ExtractionResult } from '@autosel/core';
import type { OrchestratorSettings } from '@autosel/config';
import type { DecisionStore, RuleStore } from '@autosel/db';
import { RuleRegistry } from '@autosel/knowledge';
import type { AgentChain } from '@autosel/llm';
import { DiscoveryEngine } from './discovery.js';
import { DecisionLedger } from './ledger.js';
import { RepairEngine } from './repair.js';
import { approveReview, type ApproveInput, type ApproveResult } from './review.js';
import { ExtractionRouter, type ProcessOptions } from './router.js';

export interface OrchestratorDeps {
  rules: RuleStore;
  decisions: DecisionStore;
  proposer: AgentChain;
  validator: AgentChain;
  settings: OrchestratorSettings;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  idFactory?: () => string;
}

export class Orchestrator {
  readonly registry: RuleRegistry;
  readonly ledger: DecisionLedger;
  readonly decisions: DecisionStore;
  readonly router: ExtractionRouter;

  constructor(deps: OrchestratorDeps) {
    this.registry = new RuleRegistry(deps.rules, deps.clock);
    this.ledger = new DecisionLedger(deps.decisions, deps.clock, deps.idFactory);
    this.decisions = deps.decisions;

    const engineDeps = {
      registry: this.registry,
      ledger: this.ledger,
      proposer: deps.proposer,
      validator: deps.validator,
      sleep: deps.sleep ?? defaultSleep,
    };
    this.router = new ExtractionRouter(
      {
        registry: this.registry,
        repair: new RepairEngine(engineDeps, deps.settings),
        discovery: new DiscoveryEngine(engineDeps, deps.settings),
      },
      deps.settings
    );
  }

  process(sourceId: string, document: string, options?: ProcessOptions): Promise<ExtractionResult> {
    return this.router.process(sourceId, document, options);
  }

  approve(decisionId: string, input?: ApproveInput): Promise<ApproveResult> {
    return approveReview({ registry: this.registry, ledger: this.ledger, decisions: this.decisions }, decisionId, input);
  }
}
