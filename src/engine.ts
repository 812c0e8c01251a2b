import { ContractRegistry } from './contracts/registry.js';
import { EnforcementGateway } from './gateway/gateway.js';
import { PredicateRegistry, type PredicateDefinition } from './predicates/registry.js';

export interface Engine {
  predicates: PredicateRegistry;
  registry: ContractRegistry;
  gateway: EnforcementGateway;
}

/**
 * Wires the three shared pieces. Predicates must be registered before any
 * contract that names them is published.
 */
export function createEngine(predicates: PredicateDefinition[] | PredicateRegistry = []): Engine {
  const predicateRegistry = predicates instanceof PredicateRegistry ? predicates : new PredicateRegistry(predicates);
  const registry = new ContractRegistry(predicateRegistry);
  return {
    predicates: predicateRegistry,
    registry,
    gateway: new EnforcementGateway(registry),
  };
}
