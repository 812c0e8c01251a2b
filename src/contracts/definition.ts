import { hashContractBody } from './hash.js';
import type {
  ArchitectureGraph,
  Contract,
  ContractId,
  ContractInput,
  Rule,
  StateMachine,
  TenantId,
} from './types.js';

export function contractKey(tenantScope: TenantId, name: string): string {
  return `${tenantScope}/${name}`;
}

export function contractId(tenantScope: TenantId, name: string, version: number): ContractId {
  return `${contractKey(tenantScope, name)}@${version}`;
}

function rejectMutation(kind: string, method: string): () => never {
  return () => {
    throw new TypeError(`Cannot ${method} on a published contract ${kind}`);
  };
}

/**
 * Object.freeze does not reach Set and Map contents, so the mutators are
 * shadowed on the instance. The result is still a real Set.
 */
export function frozenSet<T>(values: Iterable<T>): ReadonlySet<T> {
  const set = new Set(values);
  for (const method of ['add', 'delete', 'clear']) {
    Object.defineProperty(set, method, { value: rejectMutation('set', method) });
  }
  return Object.freeze(set);
}

export function frozenMap<K, V>(entries: Iterable<readonly [K, V]>): ReadonlyMap<K, V> {
  const map = new Map(entries);
  for (const method of ['set', 'delete', 'clear']) {
    Object.defineProperty(map, method, { value: rejectMutation('map', method) });
  }
  return Object.freeze(map);
}

function copyMachine(machine: StateMachine): StateMachine {
  return Object.freeze({
    states: frozenSet(machine.states),
    transitions: Object.freeze(
      machine.transitions.map(t => Object.freeze(t.guard === undefined ? { from: t.from, to: t.to } : { ...t }))
    ),
    initial: machine.initial,
    terminal: frozenSet(machine.terminal),
  });
}

function copyGraph(graph: ArchitectureGraph): ArchitectureGraph {
  return Object.freeze({
    modules: frozenSet(graph.modules),
    layers: frozenMap(graph.layers),
    allowedEdges: Object.freeze(graph.allowedEdges.map(([from, to]) => Object.freeze([from, to] as const))),
  });
}

function copyRule(rule: Rule): Rule {
  switch (rule.type) {
    case 'state_transition':
      return Object.freeze({ ...rule, machine: copyMachine(rule.machine) });
    case 'layer_dependency':
      return Object.freeze({ ...rule, graph: copyGraph(rule.graph) });
    case 'generic_predicate':
      return Object.freeze({ ...rule });
  }
}

/**
 * Builds the immutable snapshot stored by the registry. Sets, maps and
 * arrays are copied so later changes to the caller's input cannot leak in.
 */
export function buildContract(
  tenantScope: TenantId,
  input: ContractInput,
  version: number,
  publishedSeq: number
): Contract {
  const rules = Object.freeze(input.rules.map(copyRule));

  return Object.freeze({
    id: contractId(tenantScope, input.name, version),
    name: input.name,
    tenantScope,
    version,
    rules,
    hash: hashContractBody(tenantScope, { name: input.name, rules }),
    publishedSeq,
  });
}
