export * from './contracts/types.js';
export * from './contracts/errors.js';
export { ContractRegistry, RegistrySnapshot } from './contracts/registry.js';
export { validateContractInput } from './contracts/validator.js';
export { buildContract, contractId } from './contracts/definition.js';
export { parseContractDocument, parseContractJson, loadContractDocuments } from './contracts/loader.js';
export type { LoadFailure, LoadResult } from './contracts/loader.js';
export { contractDocumentSchema } from './contracts/schema.js';
export type { ContractDocument } from './contracts/schema.js';
export { RedisContractSource, DOCUMENTS_KEY, PUBLISHED_CHANNEL } from './contracts/redis-source.js';
export { DOCUMENT_SCHEMA_VERSION } from './contracts/version.js';

export { PredicateRegistry } from './predicates/registry.js';
export type { Predicate, PredicateContext, PredicateDefinition } from './predicates/registry.js';
export { requireFields, positiveNumber, oneOf, BUILTIN_PREDICATES } from './predicates/builtin.js';

export { validateTransition } from './state-machine/validator.js';
export { allowedTargets, reachableStates, unreachableStates } from './state-machine/analysis.js';

export { validateDependency, validateAll, iterateViolations } from './architecture/validator.js';
export type { DependencyEdge, BatchOptions } from './architecture/validator.js';
export { createArchitectureGraph, layeredFeatureGraph, FEATURE_LAYER_EDGES } from './architecture/graph.js';
export type { ArchitectureGraphSpec, FeatureLayer } from './architecture/graph.js';
export { buildArchitectureReport } from './architecture/report.js';
export { findDependencyCycles } from './architecture/cycles.js';
export type { ArchitectureReport } from './architecture/report.js';

export type { Violation, ViolationCode, ViolationContext, ValidationResult } from './violations/types.js';
export { summarizeViolations, formatViolation } from './violations/summary.js';

export { EnforcementGateway } from './gateway/gateway.js';
export type {
  Decision,
  DecisionOutcome,
  DependencyRequest,
  EvaluationRequest,
  EvaluationStamp,
  GenericRequest,
  TransitionRequest,
} from './gateway/types.js';
export { evaluationRequestSchema } from './gateway/schema.js';

export { createEngine } from './engine.js';
export type { Engine } from './engine.js';

export { tenantContext, enforce, enforcementErrorHandler } from './middleware/enforcement.js';
export { DecisionHistory, sanitizeDecision } from './decisions/history.js';
