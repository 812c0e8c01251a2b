import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { DocumentError } from '../src/contracts/errors.js';
import { loadContractDocuments, parseContractDocument, parseContractJson } from '../src/contracts/loader.js';
import { ContractRegistry } from '../src/contracts/registry.js';
import { BUILTIN_PREDICATES } from '../src/predicates/builtin.js';
import { PredicateRegistry } from '../src/predicates/registry.js';
import { paymentsDocument } from './documents.js';
import { testPredicates } from './fixtures.js';

function documentError(fn: () => unknown): DocumentError {
  try {
    fn();
  } catch (error) {
    if (error instanceof DocumentError) return error;
    throw error;
  }
  throw new Error('expected a DocumentError');
}

describe('parseContractDocument', () => {
  test('maps a document onto the contract model', () => {
    const input = parseContractDocument(paymentsDocument(), 'payments.json');

    expect(input.name).toBe('payments');
    expect(input.rules).toEqual([
      {
        id: 'payment-lifecycle',
        type: 'state_transition',
        severity: 'block',
        description: 'Payment lifecycle',
        entity: 'payment',
        machine: {
          states: new Set(['pending', 'paid', 'refunded']),
          initial: 'pending',
          terminal: new Set(['refunded']),
          transitions: [
            { from: 'pending', to: 'paid' },
            { from: 'paid', to: 'refunded' },
          ],
        },
      },
      {
        id: 'layers',
        type: 'layer_dependency',
        severity: 'warn',
        description: 'layers',
        graph: {
          modules: new Set(['api', 'db']),
          layers: new Map([
            ['api', 'web'],
            ['db', 'data'],
          ]),
          allowedEdges: [['web', 'data']],
        },
      },
    ]);
  });

  test('transition lists keep their guards', () => {
    const doc = {
      schemaVersion: '1.2.0',
      name: 'orders',
      rules: [
        {
          id: 'order',
          type: 'state_transition',
          entity: 'order',
          machine: {
            states: ['new', 'paid'],
            initial: 'new',
            transitions: [{ from: 'new', to: 'paid', guard: 'hasAmount' }],
          },
        },
      ],
    };
    const rule = parseContractDocument(doc, 'orders.json').rules[0];

    expect(rule.type).toBe('state_transition');
    if (rule.type === 'state_transition') {
      expect(rule.machine.transitions).toEqual([{ from: 'new', to: 'paid', guard: 'hasAmount' }]);
      expect(rule.machine.terminal).toEqual(new Set());
    }
  });

  test('schema problems carry their path', () => {
    const error = documentError(() =>
      parseContractDocument({ schemaVersion: '1.0', name: 'x', rules: [] }, 'bad.json')
    );

    expect(error.source).toBe('bad.json');
    expect(error.problems).toEqual(['schemaVersion: must be MAJOR.MINOR.PATCH']);
  });

  test('unknown rule type is rejected', () => {
    const error = documentError(() =>
      parseContractDocument({ schemaVersion: '1.0.0', name: 'x', rules: [{ id: 'r', type: 'sla' }] }, 'bad.json')
    );

    expect(error.problems).toHaveLength(1);
    expect(error.problems[0]).toMatch(/^rules\.0\.type: /);
  });

  test('another major document version is rejected', () => {
    const error = documentError(() =>
      parseContractDocument({ ...paymentsDocument(), schemaVersion: '2.0.0' }, 'future.json')
    );

    expect(error.problems).toEqual(['schemaVersion 2.0.0 is not compatible with 1.0.0']);
  });

  test('malformed JSON is a document error', () => {
    const error = documentError(() => parseContractJson('{', 'broken.json'));
    expect(error.source).toBe('broken.json');
    expect(error.problems).toHaveLength(1);
  });
});

describe('loadContractDocuments', () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'contracts-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeDocument(tenant: string, file: string, content: string): Promise<void> {
    await fs.mkdir(path.join(dir, tenant), { recursive: true });
    await fs.writeFile(path.join(dir, tenant, file), content);
  }

  test('publishes every tenant directory and reports failures', async () => {
    await writeDocument('global', 'payments.json', JSON.stringify(paymentsDocument()));
    await writeDocument('t1', 'payments.json', JSON.stringify(paymentsDocument()));
    await writeDocument('t1', 'broken.json', '{');
    await writeDocument('t1', 'README.txt', 'not a contract');

    const registry = new ContractRegistry(testPredicates());
    const { published, failures } = await loadContractDocuments(dir, registry);

    expect(published.map(c => c.id)).toEqual(['global/payments@1', 't1/payments@1']);
    expect(failures.map(f => [f.source, f.error.code])).toEqual([[path.join('t1', 'broken.json'), 'DOCUMENT_INVALID']]);
    expect(registry.resolve('t2', 'payments').tenantScope).toBe('global');
  });

  test('structurally invalid documents are failures too', async () => {
    const doc = paymentsDocument('payments', 'draft');
    await writeDocument('t1', 'payments.json', JSON.stringify(doc));

    const registry = new ContractRegistry(testPredicates());
    const { published, failures } = await loadContractDocuments(dir, registry);

    expect(published).toEqual([]);
    expect(failures[0].error.code).toBe('VALIDATION_FAILED');
    expect(registry.tryResolve('t1', 'payments')).toBeNull();
  });

  test('bundled contracts load with the builtin predicates', async () => {
    const bundled = fileURLToPath(new URL('../contracts', import.meta.url));
    const registry = new ContractRegistry(new PredicateRegistry(BUILTIN_PREDICATES));
    const { published, failures } = await loadContractDocuments(bundled, registry);

    expect(failures).toEqual([]);
    expect(published.map(c => c.id)).toEqual(['default/architecture@1', 'global/payments@1']);
  });
});
