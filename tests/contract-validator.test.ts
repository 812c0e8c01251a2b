import { describe, expect, test } from 'vitest';

import { createArchitectureGraph } from '../src/architecture/graph.js';
import type { ContractIssueCode, ContractInput, StateMachine } from '../src/contracts/types.js';
import { validateContractInput } from '../src/contracts/validator.js';
import { layerRule, paymentMachine, paymentRule, paymentsContract, testPredicates } from './fixtures.js';

const predicates = testPredicates();

function codesFor(input: ContractInput): ContractIssueCode[] {
  return validateContractInput(input, predicates).map(i => i.code);
}

function withMachine(machine: StateMachine): ContractInput {
  return { name: 'payments', rules: [paymentRule({ machine })] };
}

describe('validateContractInput', () => {
  test('well-formed contract has no issues', () => {
    expect(validateContractInput(paymentsContract(), predicates)).toEqual([]);
  });

  test('empty name is rejected', () => {
    expect(codesFor(paymentsContract({ name: '  ' }))).toEqual(['EMPTY_CONTRACT_NAME']);
  });

  test('duplicate rule ids are rejected', () => {
    expect(codesFor({ name: 'payments', rules: [layerRule('same'), layerRule('same')] })).toEqual([
      'DUPLICATE_RULE_ID',
    ]);
  });

  test('state machine without states', () => {
    const machine: StateMachine = { states: new Set(), transitions: [], initial: 'x', terminal: new Set() };
    expect(codesFor(withMachine(machine))).toEqual(['EMPTY_STATE_MACHINE']);
  });

  test('unknown initial state skips the reachability check', () => {
    expect(codesFor(withMachine({ ...paymentMachine(), initial: 'draft' }))).toEqual(['UNKNOWN_INITIAL_STATE']);
  });

  test('transition to an undeclared state', () => {
    const machine: StateMachine = {
      ...paymentMachine(),
      transitions: [...paymentMachine().transitions, { from: 'paid', to: 'disputed' }],
    };
    const issues = validateContractInput(withMachine(machine), predicates);

    expect(issues).toEqual([
      {
        code: 'DANGLING_TRANSITION_STATE',
        ruleId: 'payment-lifecycle',
        message: 'Transition paid → disputed references undeclared state(s): disputed',
        detail: { from: 'paid', to: 'disputed', undeclared: ['disputed'] },
      },
    ]);
  });

  test('duplicate transition', () => {
    const machine: StateMachine = {
      ...paymentMachine(),
      transitions: [...paymentMachine().transitions, { from: 'pending', to: 'paid' }],
    };
    expect(codesFor(withMachine(machine))).toEqual(['DUPLICATE_TRANSITION']);
  });

  test('terminal state with outgoing edge', () => {
    const machine: StateMachine = {
      ...paymentMachine(),
      transitions: [...paymentMachine().transitions, { from: 'refunded', to: 'pending' }],
    };
    expect(codesFor(withMachine(machine))).toEqual(['TERMINAL_HAS_OUTGOING']);
  });

  test('undeclared terminal state', () => {
    const machine: StateMachine = { ...paymentMachine(), terminal: new Set(['refunded', 'void']) };
    expect(codesFor(withMachine(machine))).toEqual(['UNKNOWN_TERMINAL_STATE']);
  });

  test('unreachable states are a publish-time error', () => {
    const machine: StateMachine = {
      ...paymentMachine(),
      states: new Set(['pending', 'paid', 'refunded', 'failed', 'disputed']),
    };
    const issues = validateContractInput(withMachine(machine), predicates);

    expect(issues).toHaveLength(1);
    expect(issues[0].code).toBe('UNREACHABLE_STATE');
    expect(issues[0].message).toBe('States unreachable from pending: failed, disputed');
  });

  test('unknown guard name fails fast', () => {
    const machine: StateMachine = {
      ...paymentMachine(),
      transitions: [{ from: 'pending', to: 'paid', guard: 'noSuchGuard' }, { from: 'paid', to: 'refunded' }],
    };
    expect(codesFor(withMachine(machine))).toEqual(['UNKNOWN_GUARD']);
  });

  test('registered guard is accepted', () => {
    const machine: StateMachine = {
      ...paymentMachine(),
      transitions: [{ from: 'pending', to: 'paid', guard: 'hasAmount' }, { from: 'paid', to: 'refunded' }],
    };
    expect(codesFor(withMachine(machine))).toEqual([]);
  });

  test('architecture graph invariants', () => {
    const graph = {
      modules: new Set(['api', 'db', 'jobs']),
      layers: new Map([
        ['api', 'web'],
        ['db', 'data'],
        ['cache', 'data'],
      ]),
      allowedEdges: [['web', 'data'] as const, ['web', 'queue'] as const],
    };
    const issues = validateContractInput(
      { name: 'layers', rules: [{ ...layerRule(), graph }] },
      predicates
    );

    expect(issues.map(i => [i.code, i.message])).toEqual([
      ['MODULE_WITHOUT_LAYER', 'Modules without a layer: jobs'],
      ['UNDECLARED_LAYER_MODULE', 'Layer mapping references undeclared modules: cache'],
      ['DANGLING_LAYER_EDGE', 'Allowed edge web → queue names layer(s) no module belongs to: queue'],
    ]);
  });

  test('graph built from a layer table is valid', () => {
    const graph = createArchitectureGraph({ layers: { a: 'x', b: 'y' }, allowedEdges: [['x', 'y']] });
    expect(codesFor({ name: 'layers', rules: [{ ...layerRule(), graph }] })).toEqual([]);
  });

  test('unknown generic predicate', () => {
    const input: ContractInput = {
      name: 'generic',
      rules: [
        { id: 'g', type: 'generic_predicate', severity: 'block', description: 'g', predicate: 'isAdmin' },
        { id: 'h', type: 'generic_predicate', severity: 'warn', description: 'h', predicate: 'missing' },
      ],
    };
    expect(validateContractInput(input, predicates)).toEqual([
      {
        code: 'UNKNOWN_PREDICATE',
        ruleId: 'h',
        message: 'Predicate "missing" is not registered',
        detail: { predicate: 'missing' },
      },
    ]);
  });

  test('issues from several rules are all collected', () => {
    const input: ContractInput = {
      name: 'payments',
      rules: [
        paymentRule({ machine: { ...paymentMachine(), initial: 'draft' } }),
        { id: 'g', type: 'generic_predicate', severity: 'block', description: 'g', predicate: 'missing' },
      ],
    };
    expect(codesFor(input)).toEqual(['UNKNOWN_INITIAL_STATE', 'UNKNOWN_PREDICATE']);
  });
});
