import type { ArchitectureGraph, LayerId, ModuleId, Severity } from '../contracts/types.js';
import { VALID, type ValidationResult, type Violation } from '../violations/types.js';
import { toViolation } from '../violations/summary.js';

export type DependencyEdge = readonly [source: ModuleId, target: ModuleId];

export interface BatchOptions {
  ruleId?: string;
  severity?: Severity;
}

export function layerOf(graph: ArchitectureGraph, module: ModuleId): LayerId | undefined {
  return graph.modules.has(module) ? graph.layers.get(module) : undefined;
}

export function isAllowedLayerEdge(graph: ArchitectureGraph, from: LayerId, to: LayerId): boolean {
  return graph.allowedEdges.some(([a, b]) => a === from && b === to);
}

export function validateDependency(
  graph: ArchitectureGraph,
  source: ModuleId,
  target: ModuleId
): ValidationResult {
  if (source === target) {
    return VALID;
  }

  const sourceLayer = layerOf(graph, source);
  const targetLayer = layerOf(graph, target);

  if (sourceLayer === undefined || targetLayer === undefined) {
    const unknown = [
      ...(sourceLayer === undefined ? [source] : []),
      ...(targetLayer === undefined ? [target] : []),
    ];
    return {
      ok: false,
      code: 'UNKNOWN_MODULE',
      message: `Undeclared module${unknown.length > 1 ? 's' : ''} ${unknown.map(m => `"${m}"`).join(', ')} in dependency ${source} → ${target}`,
      context: { source, target, sourceLayer, targetLayer },
    };
  }

  if (!isAllowedLayerEdge(graph, sourceLayer, targetLayer)) {
    return {
      ok: false,
      code: 'FORBIDDEN_LAYER_EDGE',
      message: `Module ${source} (layer ${sourceLayer}) may not depend on module ${target} (layer ${targetLayer}): edge ${sourceLayer} → ${targetLayer} is not allowed`,
      context: { source, target, sourceLayer, targetLayer },
    };
  }

  return VALID;
}

/**
 * Lazy view over the violations in an edge snapshot. Each iteration starts
 * a fresh pass over `edges`, so an array snapshot can be consumed repeatedly.
 * An edge listed twice is reported at its first position only.
 */
export function iterateViolations(
  graph: ArchitectureGraph,
  edges: Iterable<DependencyEdge>,
  options: BatchOptions = {}
): Iterable<Violation> {
  const ruleId = options.ruleId ?? 'architecture';
  const severity = options.severity ?? 'block';

  return {
    *[Symbol.iterator]() {
      const seen = new Set<string>();
      for (const [source, target] of edges) {
        const key = `${source}\u0000${target}`;
        if (seen.has(key)) continue;
        seen.add(key);

        const result = validateDependency(graph, source, target);
        if (!result.ok) {
          yield toViolation(result, ruleId, severity);
        }
      }
    },
  };
}

export function validateAll(
  graph: ArchitectureGraph,
  edges: Iterable<DependencyEdge>,
  options: BatchOptions = {}
): Violation[] {
  return [...iterateViolations(graph, edges, options)];
}
