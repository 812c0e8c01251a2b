export type TenantId = string;
export type StateId = string;
export type ModuleId = string;
export type LayerId = string;
export type ContractId = string;

export const GLOBAL_SCOPE = 'global';

export type Severity = 'block' | 'warn';

export interface Transition {
  readonly from: StateId;
  readonly to: StateId;
  readonly guard?: string;
}

export interface StateMachine {
  readonly states: ReadonlySet<StateId>;
  readonly transitions: readonly Transition[];
  readonly initial: StateId;
  readonly terminal: ReadonlySet<StateId>;
}

export type LayerEdge = readonly [LayerId, LayerId];

export interface ArchitectureGraph {
  readonly modules: ReadonlySet<ModuleId>;
  readonly layers: ReadonlyMap<ModuleId, LayerId>;
  readonly allowedEdges: readonly LayerEdge[];
}

interface RuleBase {
  readonly id: string;
  readonly severity: Severity;
  readonly description: string;
}

export interface StateTransitionRule extends RuleBase {
  readonly type: 'state_transition';
  readonly entity: string;
  readonly machine: StateMachine;
}

export interface LayerDependencyRule extends RuleBase {
  readonly type: 'layer_dependency';
  readonly graph: ArchitectureGraph;
}

export interface GenericPredicateRule extends RuleBase {
  readonly type: 'generic_predicate';
  readonly predicate: string;
}

export type Rule = StateTransitionRule | LayerDependencyRule | GenericPredicateRule;

export type RuleType = Rule['type'];

/**
 * What an administrator hands to `publish`. Identity, version and hash are
 * assigned by the registry.
 */
export interface ContractInput {
  readonly name: string;
  readonly rules: readonly Rule[];
}

/**
 * A published contract. Instances are deep-frozen and never change after
 * publication; a newer version supersedes them by pointer swap.
 */
export interface Contract extends ContractInput {
  readonly id: ContractId;
  readonly tenantScope: TenantId;
  readonly version: number;
  readonly hash: string;
  readonly publishedSeq: number;
}

export type ContractIssueCode =
  | 'EMPTY_TENANT_SCOPE'
  | 'EMPTY_CONTRACT_NAME'
  | 'DUPLICATE_RULE_ID'
  | 'EMPTY_STATE_MACHINE'
  | 'UNKNOWN_INITIAL_STATE'
  | 'DANGLING_TRANSITION_STATE'
  | 'DUPLICATE_TRANSITION'
  | 'UNKNOWN_TERMINAL_STATE'
  | 'TERMINAL_HAS_OUTGOING'
  | 'UNREACHABLE_STATE'
  | 'UNKNOWN_GUARD'
  | 'MODULE_WITHOUT_LAYER'
  | 'UNDECLARED_LAYER_MODULE'
  | 'DANGLING_LAYER_EDGE'
  | 'UNKNOWN_PREDICATE';

export interface ContractIssue {
  code: ContractIssueCode;
  ruleId?: string;
  message: string;
  detail?: Record<string, unknown>;
}
