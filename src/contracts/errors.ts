import type { ContractIssue, TenantId } from './types.js';

export type EnforcementErrorCode =
  | 'VALIDATION_FAILED'
  | 'CONTRACT_NOT_FOUND'
  | 'DOCUMENT_INVALID'
  | 'CONTRACT_INTEGRITY';

export abstract class EnforcementError extends Error {
  abstract readonly code: EnforcementErrorCode;
}

export class ValidationError extends EnforcementError {
  readonly code = 'VALIDATION_FAILED';

  constructor(
    public readonly contractName: string,
    public readonly issues: ContractIssue[]
  ) {
    super(`Contract "${contractName}" rejected: ${issues.map(i => i.code).join(', ')}`);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends EnforcementError {
  readonly code = 'CONTRACT_NOT_FOUND';

  constructor(
    public readonly tenantId: TenantId,
    public readonly contractName: string
  ) {
    super(`No contract "${contractName}" published for tenant ${tenantId} or globally`);
    this.name = 'NotFoundError';
  }
}

export class DocumentError extends EnforcementError {
  readonly code = 'DOCUMENT_INVALID';

  constructor(
    public readonly source: string,
    public readonly problems: string[]
  ) {
    super(`Invalid contract document ${source}: ${problems.join('; ')}`);
    this.name = 'DocumentError';
  }
}

/**
 * Raised only when a published contract is in a state publish-time
 * validation rules out. Callers should treat it as a fault, not a decision.
 */
export class ContractIntegrityError extends EnforcementError {
  readonly code = 'CONTRACT_INTEGRITY';

  /** `contractId` is null when raised below the gateway, which rethrows with the id. */
  constructor(
    public readonly contractId: string | null,
    public readonly reason: string
  ) {
    super(contractId === null ? `Contract is corrupted: ${reason}` : `Contract ${contractId} is corrupted: ${reason}`);
    this.name = 'ContractIntegrityError';
  }
}
