import type { LayerId, ModuleId, Severity, StateId } from '../contracts/types.js';

export type ViolationCode =
  | 'UNKNOWN_STATE'
  | 'ILLEGAL_TRANSITION'
  | 'GUARD_REJECTED'
  | 'UNKNOWN_ENTITY'
  | 'UNKNOWN_MODULE'
  | 'FORBIDDEN_LAYER_EDGE'
  | 'PREDICATE_FAILED';

export interface ViolationContext {
  entity?: string;
  from?: StateId;
  to?: StateId;
  guard?: string;
  source?: ModuleId;
  target?: ModuleId;
  sourceLayer?: LayerId;
  targetLayer?: LayerId;
  predicate?: string;
}

export interface Violation {
  ruleId: string;
  code: ViolationCode;
  severity: Severity;
  message: string;
  context: ViolationContext;
}

/**
 * Outcome of a single validator call, before it is attributed to a rule.
 */
export type ValidationResult =
  | { ok: true }
  | { ok: false; code: ViolationCode; message: string; context: ViolationContext };

export const VALID: ValidationResult = Object.freeze({ ok: true });
