import { promises as fs } from 'fs';
import path from 'path';
import type { ZodIssue } from 'zod';
import { createArchitectureGraph } from '../architecture/graph.js';
import { logger } from '../observability/logger.js';
import { DocumentError, EnforcementError } from './errors.js';
import type { ContractRegistry } from './registry.js';
import { contractDocumentSchema, type MachineDocument, type RuleDocument } from './schema.js';
import type { Contract, ContractInput, Rule, StateMachine, Transition } from './types.js';
import { DOCUMENT_SCHEMA_VERSION, isCompatibleSchemaVersion } from './version.js';

function formatIssue(issue: ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${location}: ${issue.message}`;
}

function toMachine(doc: MachineDocument): StateMachine {
  const transitions: Transition[] = Array.isArray(doc.transitions)
    ? doc.transitions.map(t => (t.guard === undefined ? { from: t.from, to: t.to } : { from: t.from, to: t.to, guard: t.guard }))
    : Object.entries(doc.transitions).flatMap(([from, targets]) => targets.map(to => ({ from, to })));

  return {
    states: new Set(doc.states),
    transitions,
    initial: doc.initial,
    terminal: new Set(doc.terminal),
  };
}

function toRule(doc: RuleDocument): Rule {
  const base = {
    id: doc.id,
    severity: doc.severity,
    description: doc.description ?? doc.id,
  };

  switch (doc.type) {
    case 'state_transition':
      return { ...base, type: doc.type, entity: doc.entity, machine: toMachine(doc.machine) };
    case 'layer_dependency':
      return { ...base, type: doc.type, graph: createArchitectureGraph(doc.graph) };
    case 'generic_predicate':
      return { ...base, type: doc.type, predicate: doc.predicate };
  }
}

/**
 * Maps a raw (already JSON-parsed) contract document onto the in-memory
 * model. Structural checks such as reachability are left to publish.
 */
export function parseContractDocument(raw: unknown, source: string): ContractInput {
  const parsed = contractDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DocumentError(source, parsed.error.issues.map(formatIssue));
  }

  const doc = parsed.data;
  if (!isCompatibleSchemaVersion(doc.schemaVersion)) {
    throw new DocumentError(source, [
      `schemaVersion ${doc.schemaVersion} is not compatible with ${DOCUMENT_SCHEMA_VERSION}`,
    ]);
  }

  return {
    name: doc.name,
    rules: doc.rules.map(toRule),
  };
}

export function parseContractJson(text: string, source: string): ContractInput {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new DocumentError(source, [error instanceof Error ? error.message : 'Malformed JSON']);
  }
  return parseContractDocument(raw, source);
}

export interface LoadFailure {
  source: string;
  error: EnforcementError;
}

export interface LoadResult {
  published: Contract[];
  failures: LoadFailure[];
}

async function listDirectories(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries.filter(e => e.isDirectory()).map(e => e.name).sort();
}

async function listJsonFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries.filter(e => e.isFile() && e.name.endsWith('.json')).map(e => e.name).sort();
}

/**
 * Publishes every `<dir>/<tenant>/<contract>.json` into the registry. The
 * `global` directory holds contracts shared by all tenants.
 *
 * A bad document is reported in `failures` and does not stop the others.
 */
export async function loadContractDocuments(dir: string, registry: ContractRegistry): Promise<LoadResult> {
  const result: LoadResult = { published: [], failures: [] };

  for (const tenant of await listDirectories(dir)) {
    const tenantDir = path.join(dir, tenant);

    for (const file of await listJsonFiles(tenantDir)) {
      const source = path.join(tenant, file);
      const text = await fs.readFile(path.join(tenantDir, file), 'utf8');

      try {
        const contract = registry.publish(tenant, parseContractJson(text, source));
        result.published.push(contract);
        logger.info('contract_loaded', 'Contract document published', {
          source,
          contractId: contract.id,
          hash: contract.hash,
          rules: contract.rules.length,
        });
      } catch (error) {
        if (!(error instanceof EnforcementError)) {
          throw error;
        }
        result.failures.push({ source, error });
        logger.error('contract_load_failed', 'Contract document rejected', {
          source,
          code: error.code,
          error: error.message,
        });
      }
    }
  }

  return result;
}
