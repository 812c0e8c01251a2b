import type { Decision, EvaluationRequest } from '../gateway/types.js';

export interface DecisionRecord {
  recordedAt: string;
  requestId: string;
  tenantId: string;
  request: EvaluationRequest;
  decision: Decision;
}

export interface DecisionHistoryStats {
  count: number;
  maxSize: number;
  type: 'memory' | 'redis';
}

/**
 * Audit view that drops guard and predicate inputs, which may carry
 * request payloads.
 */
export interface SanitizedDecisionRecord extends Omit<DecisionRecord, 'request'> {
  request: {
    kind: EvaluationRequest['kind'];
    contract: string;
  };
}
