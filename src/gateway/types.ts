import type { ContractId, ModuleId, StateId, TenantId } from '../contracts/types.js';
import type { PredicateContext } from '../predicates/registry.js';
import type { Violation } from '../violations/types.js';

export interface TransitionRequest {
  kind: 'transition';
  contract: string;
  entity: string;
  from: StateId;
  to: StateId;
  guardContext?: PredicateContext;
}

export interface DependencyRequest {
  kind: 'dependency';
  contract: string;
  source: ModuleId;
  target: ModuleId;
}

export interface GenericRequest {
  kind: 'generic';
  contract: string;
  predicateInput: PredicateContext;
}

export type EvaluationRequest = TransitionRequest | DependencyRequest | GenericRequest;

export type DecisionOutcome = 'allow' | 'deny' | 'unconfigured';

/**
 * Logical evaluation point: which published contract version produced the
 * decision. Carries no wall-clock time.
 */
export interface EvaluationStamp {
  contractId: ContractId;
  version: number;
  publishedSeq: number;
}

export interface Decision {
  outcome: DecisionOutcome;
  tenantId: TenantId;
  contract: string;
  violations: Violation[];
  evaluatedAt: EvaluationStamp | null;
  reason?: string;
}
