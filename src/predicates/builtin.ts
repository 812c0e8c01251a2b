import type { PredicateDefinition } from './registry.js';

export function requireFields(name: string, fields: string[]): PredicateDefinition {
  return {
    name,
    description: `Context carries non-empty ${fields.join(', ')}`,
    evaluate: ctx => fields.every(f => ctx[f] !== undefined && ctx[f] !== null && ctx[f] !== ''),
  };
}

export function positiveNumber(name: string, field: string): PredicateDefinition {
  return {
    name,
    description: `Context field ${field} is a positive number`,
    evaluate: ctx => {
      const value = ctx[field];
      return typeof value === 'number' && Number.isFinite(value) && value > 0;
    },
  };
}

export function oneOf(name: string, field: string, allowed: readonly unknown[]): PredicateDefinition {
  return {
    name,
    description: `Context field ${field} is one of ${allowed.map(String).join(', ')}`,
    evaluate: ctx => allowed.includes(ctx[field]),
  };
}

/** Registered by the reference server so JSON contracts can use them as guards. */
export const BUILTIN_PREDICATES: PredicateDefinition[] = [
  requireFields('hasActor', ['actor']),
  positiveNumber('positiveAmount', 'amount'),
];
