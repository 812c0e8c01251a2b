import type { Severity } from '../contracts/types.js';
import type { ValidationResult, Violation } from './types.js';

export function toViolation(
  result: Exclude<ValidationResult, { ok: true }>,
  ruleId: string,
  severity: Severity,
  description?: string
): Violation {
  return {
    ruleId,
    code: result.code,
    severity,
    message: description ? `${description}: ${result.message}` : result.message,
    context: result.context,
  };
}

export function summarizeViolations(violations: readonly Violation[]): {
  total: number;
  block: number;
  warn: number;
} {
  return {
    total: violations.length,
    block: violations.filter(v => v.severity === 'block').length,
    warn: violations.filter(v => v.severity === 'warn').length,
  };
}

export function formatViolation(violation: Violation): string {
  return `[${violation.severity.toUpperCase()}] ${violation.ruleId} ${violation.code}: ${violation.message}`;
}
