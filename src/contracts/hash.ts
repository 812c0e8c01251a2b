import crypto from 'crypto';
import type { ContractInput, Rule } from './types.js';

/**
 * Canonical JSON with recursively sorted keys. Sets serialize as sorted
 * arrays and maps as objects, so structurally equal contracts hash equally.
 */
export function canonicalStringify(value: unknown): string {
  if (value === null || value === undefined) return 'null';

  if (typeof value === 'string') {
    return JSON.stringify(value);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }

  if (value instanceof Set) {
    return canonicalStringify([...value].map(String).sort());
  }

  if (value instanceof Map) {
    return canonicalStringify(Object.fromEntries(value));
  }

  if (Array.isArray(value)) {
    return `[${value.map(item => canonicalStringify(item)).join(',')}]`;
  }

  if (typeof value === 'object') {
    const entries: Array<[string, unknown]> = Object.entries(value);
    const pairs = entries
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, item]) => `${JSON.stringify(key)}:${canonicalStringify(item)}`);
    return `{${pairs.join(',')}}`;
  }

  return 'null';
}

export function hashContractBody(tenantScope: string, input: ContractInput): string {
  const body: { tenantScope: string; name: string; rules: readonly Rule[] } = {
    tenantScope,
    name: input.name,
    rules: input.rules,
  };
  return crypto.createHash('sha256').update(canonicalStringify(body)).digest('hex').substring(0, 16);
}
