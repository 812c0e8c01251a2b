import type { ArchitectureGraph, ModuleId } from '../contracts/types.js';
import type { Violation } from '../violations/types.js';
import { findDependencyCycles } from './cycles.js';
import { allowedTargetLayers } from './graph.js';
import { iterateViolations, type BatchOptions, type DependencyEdge } from './validator.js';

export interface ArchitectureReport {
  valid: boolean;
  checkedEdges: number;
  violations: Violation[];
  /** Modules that depend on each other in a loop, whatever their layers. */
  cycles: ModuleId[][];
  suggestions: string[];
}

function suggestFix(graph: ArchitectureGraph, violation: Violation): string {
  const { source, target, sourceLayer } = violation.context;

  if (violation.code === 'UNKNOWN_MODULE') {
    return `Declare ${source} and ${target} with a layer before depending between them`;
  }

  if (sourceLayer === undefined) {
    return `Review dependency ${source} → ${target}`;
  }

  const allowed = allowedTargetLayers(graph, sourceLayer);
  if (allowed.length === 0) {
    return `Remove dependency ${source} → ${target}: layer ${sourceLayer} may not depend on any other layer`;
  }
  return `Route ${source} → ${target} through a module in layer ${allowed.join(' or ')}`;
}

export function buildArchitectureReport(
  graph: ArchitectureGraph,
  edges: readonly DependencyEdge[],
  options: BatchOptions = {}
): ArchitectureReport {
  const violations = [...iterateViolations(graph, edges, options)];
  const cycles = findDependencyCycles(edges);

  return {
    valid: violations.length === 0 && cycles.length === 0,
    checkedEdges: edges.length,
    violations,
    cycles,
    suggestions: [...new Set(violations.map(v => suggestFix(graph, v)))],
  };
}
