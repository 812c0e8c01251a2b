import type { ArchitectureGraph, LayerEdge, LayerId, ModuleId } from '../contracts/types.js';

export interface ArchitectureGraphSpec {
  layers: Record<ModuleId, LayerId>;
  allowedEdges: Array<[LayerId, LayerId]>;
  /** Defaults to the keys of `layers`. */
  modules?: ModuleId[];
}

export function createArchitectureGraph(spec: ArchitectureGraphSpec): ArchitectureGraph {
  return {
    modules: new Set(spec.modules ?? Object.keys(spec.layers)),
    layers: new Map(Object.entries(spec.layers)),
    allowedEdges: spec.allowedEdges.map(([from, to]): LayerEdge => [from, to]),
  };
}

export type FeatureLayer = 'routes' | 'service' | 'models' | 'commons';

/**
 * Conventional layering for feature folders: routes go through services,
 * services own models, everything may use commons and commons uses nothing.
 */
export const FEATURE_LAYER_EDGES: ReadonlyArray<[FeatureLayer, FeatureLayer]> = [
  ['routes', 'service'],
  ['routes', 'commons'],
  ['service', 'models'],
  ['service', 'commons'],
  ['models', 'commons'],
];

export function layeredFeatureGraph(modules: Record<ModuleId, FeatureLayer>): ArchitectureGraph {
  return createArchitectureGraph({
    layers: modules,
    allowedEdges: FEATURE_LAYER_EDGES.map(([from, to]) => [from, to]),
  });
}

export function allowedTargetLayers(graph: ArchitectureGraph, from: LayerId): LayerId[] {
  return graph.allowedEdges.filter(([a]) => a === from).map(([, b]) => b);
}
