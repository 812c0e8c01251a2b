import type { PredicateRegistry } from '../predicates/registry.js';
import { unreachableStates } from '../state-machine/analysis.js';
import type {
  ArchitectureGraph,
  ContractInput,
  ContractIssue,
  GenericPredicateRule,
  LayerDependencyRule,
  StateTransitionRule,
} from './types.js';

function checkStateMachine(rule: StateTransitionRule, predicates: PredicateRegistry): ContractIssue[] {
  const issues: ContractIssue[] = [];
  const { machine } = rule;
  const ruleId = rule.id;

  if (machine.states.size === 0) {
    issues.push({
      code: 'EMPTY_STATE_MACHINE',
      ruleId,
      message: `State machine for ${rule.entity} declares no states`,
    });
    return issues;
  }

  const initialKnown = machine.states.has(machine.initial);
  if (!initialKnown) {
    issues.push({
      code: 'UNKNOWN_INITIAL_STATE',
      ruleId,
      message: `Initial state ${machine.initial} is not a declared state`,
      detail: { initial: machine.initial },
    });
  }

  const seen = new Set<string>();
  for (const transition of machine.transitions) {
    const dangling = [transition.from, transition.to].filter(s => !machine.states.has(s));
    if (dangling.length > 0) {
      issues.push({
        code: 'DANGLING_TRANSITION_STATE',
        ruleId,
        message: `Transition ${transition.from} → ${transition.to} references undeclared state(s): ${[...new Set(dangling)].join(', ')}`,
        detail: { from: transition.from, to: transition.to, undeclared: [...new Set(dangling)] },
      });
    }

    const key = `${transition.from}\u0000${transition.to}`;
    if (seen.has(key)) {
      issues.push({
        code: 'DUPLICATE_TRANSITION',
        ruleId,
        message: `Transition ${transition.from} → ${transition.to} is declared more than once`,
        detail: { from: transition.from, to: transition.to },
      });
    }
    seen.add(key);

    if (machine.terminal.has(transition.from)) {
      issues.push({
        code: 'TERMINAL_HAS_OUTGOING',
        ruleId,
        message: `Terminal state ${transition.from} has an outgoing transition to ${transition.to}`,
        detail: { from: transition.from, to: transition.to },
      });
    }

    if (transition.guard !== undefined && !predicates.has(transition.guard)) {
      issues.push({
        code: 'UNKNOWN_GUARD',
        ruleId,
        message: `Guard "${transition.guard}" on ${transition.from} → ${transition.to} is not a registered predicate`,
        detail: { guard: transition.guard, from: transition.from, to: transition.to },
      });
    }
  }

  for (const state of machine.terminal) {
    if (!machine.states.has(state)) {
      issues.push({
        code: 'UNKNOWN_TERMINAL_STATE',
        ruleId,
        message: `Terminal state ${state} is not a declared state`,
        detail: { state },
      });
    }
  }

  // Reachability is meaningless without a valid starting point.
  if (initialKnown) {
    const unreachable = unreachableStates(machine);
    if (unreachable.length > 0) {
      issues.push({
        code: 'UNREACHABLE_STATE',
        ruleId,
        message: `States unreachable from ${machine.initial}: ${unreachable.join(', ')}`,
        detail: { unreachable },
      });
    }
  }

  return issues;
}

function checkArchitectureGraph(rule: LayerDependencyRule): ContractIssue[] {
  const issues: ContractIssue[] = [];
  const graph: ArchitectureGraph = rule.graph;
  const ruleId = rule.id;

  const withoutLayer = [...graph.modules].filter(m => !graph.layers.has(m));
  if (withoutLayer.length > 0) {
    issues.push({
      code: 'MODULE_WITHOUT_LAYER',
      ruleId,
      message: `Modules without a layer: ${withoutLayer.join(', ')}`,
      detail: { modules: withoutLayer },
    });
  }

  const undeclared = [...graph.layers.keys()].filter(m => !graph.modules.has(m));
  if (undeclared.length > 0) {
    issues.push({
      code: 'UNDECLARED_LAYER_MODULE',
      ruleId,
      message: `Layer mapping references undeclared modules: ${undeclared.join(', ')}`,
      detail: { modules: undeclared },
    });
  }

  const knownLayers = new Set(graph.layers.values());
  for (const [from, to] of graph.allowedEdges) {
    const dangling = [from, to].filter(l => !knownLayers.has(l));
    if (dangling.length > 0) {
      issues.push({
        code: 'DANGLING_LAYER_EDGE',
        ruleId,
        message: `Allowed edge ${from} → ${to} names layer(s) no module belongs to: ${[...new Set(dangling)].join(', ')}`,
        detail: { from, to, layers: [...new Set(dangling)] },
      });
    }
  }

  return issues;
}

function checkGenericPredicate(rule: GenericPredicateRule, predicates: PredicateRegistry): ContractIssue[] {
  if (predicates.has(rule.predicate)) {
    return [];
  }
  return [
    {
      code: 'UNKNOWN_PREDICATE',
      ruleId: rule.id,
      message: `Predicate "${rule.predicate}" is not registered`,
      detail: { predicate: rule.predicate },
    },
  ];
}

/**
 * Collects every structural problem in a contract. An empty result means
 * the contract may be published.
 */
export function validateContractInput(input: ContractInput, predicates: PredicateRegistry): ContractIssue[] {
  const issues: ContractIssue[] = [];

  if (input.name.trim() === '') {
    issues.push({ code: 'EMPTY_CONTRACT_NAME', message: 'Contract name must not be empty' });
  }

  const ruleIds = new Set<string>();
  for (const rule of input.rules) {
    if (ruleIds.has(rule.id)) {
      issues.push({
        code: 'DUPLICATE_RULE_ID',
        ruleId: rule.id,
        message: `Rule id ${rule.id} is used more than once`,
      });
    }
    ruleIds.add(rule.id);

    switch (rule.type) {
      case 'state_transition':
        issues.push(...checkStateMachine(rule, predicates));
        break;
      case 'layer_dependency':
        issues.push(...checkArchitectureGraph(rule));
        break;
      case 'generic_predicate':
        issues.push(...checkGenericPredicate(rule, predicates));
        break;
    }
  }

  return issues;
}
