import { createArchitectureGraph } from '../src/architecture/graph.js';
import type {
  ContractInput,
  LayerDependencyRule,
  Severity,
  StateMachine,
  StateTransitionRule,
} from '../src/contracts/types.js';
import { PredicateRegistry } from '../src/predicates/registry.js';

export function paymentMachine(): StateMachine {
  return {
    states: new Set(['pending', 'paid', 'refunded']),
    transitions: [
      { from: 'pending', to: 'paid' },
      { from: 'paid', to: 'refunded' },
    ],
    initial: 'pending',
    terminal: new Set(['refunded']),
  };
}

export function paymentRule(overrides: Partial<StateTransitionRule> = {}): StateTransitionRule {
  return {
    id: 'payment-lifecycle',
    type: 'state_transition',
    severity: 'block',
    description: 'Payment lifecycle',
    entity: 'payment',
    machine: paymentMachine(),
    ...overrides,
  };
}

export function webDataGraph() {
  return createArchitectureGraph({
    layers: { api: 'web', db: 'data' },
    allowedEdges: [['web', 'data']],
  });
}

export function layerRule(id = 'layers', severity: Severity = 'block'): LayerDependencyRule {
  return {
    id,
    type: 'layer_dependency',
    severity,
    description: 'Layering',
    graph: webDataGraph(),
  };
}

export function paymentsContract(overrides: Partial<ContractInput> = {}): ContractInput {
  return {
    name: 'payments',
    rules: [paymentRule(), layerRule()],
    ...overrides,
  };
}

export function testPredicates(): PredicateRegistry {
  return new PredicateRegistry([
    {
      name: 'hasAmount',
      description: 'amount is present',
      evaluate: ctx => typeof ctx.amount === 'number',
    },
    {
      name: 'isAdmin',
      description: 'actor is an admin',
      evaluate: ctx => ctx.role === 'admin',
    },
    {
      name: 'explodes',
      description: 'always throws',
      evaluate: () => {
        throw new Error('boom');
      },
    },
  ]);
}
