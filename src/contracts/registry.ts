import type { PredicateRegistry } from '../predicates/registry.js';
import { buildContract, contractKey } from './definition.js';
import { NotFoundError, ValidationError } from './errors.js';
import { GLOBAL_SCOPE, type Contract, type ContractInput, type ContractIssue, type TenantId } from './types.js';
import { validateContractInput } from './validator.js';

interface KeyRecord {
  readonly active: Contract;
  readonly history: readonly Contract[];
}

type ContractIndex = ReadonlyMap<string, KeyRecord>;

/**
 * Frozen view of the registry at one point in time. Later publishes do not
 * affect a snapshot that has already been taken.
 */
export class RegistrySnapshot {
  constructor(private readonly index: ContractIndex) {}

  tryResolve(tenantId: TenantId, name: string): Contract | null {
    const own = this.index.get(contractKey(tenantId, name));
    if (own) return own.active;

    const global = this.index.get(contractKey(GLOBAL_SCOPE, name));
    return global ? global.active : null;
  }

  resolve(tenantId: TenantId, name: string): Contract {
    const contract = this.tryResolve(tenantId, name);
    if (contract === null) {
      throw new NotFoundError(tenantId, name);
    }
    return contract;
  }

  history(tenantScope: TenantId, name: string): readonly Contract[] {
    return this.index.get(contractKey(tenantScope, name))?.history ?? [];
  }

  getVersion(tenantScope: TenantId, name: string, version: number): Contract | null {
    return this.history(tenantScope, name).find(c => c.version === version) ?? null;
  }

  list(): Contract[] {
    return [...this.index.values()].map(record => record.active);
  }

  latestVersion(tenantScope: TenantId, name: string): number {
    return this.index.get(contractKey(tenantScope, name))?.active.version ?? 0;
  }

  /** Returns a new snapshot where `contract` is the active version of its key. */
  with(contract: Contract): RegistrySnapshot {
    const key = contractKey(contract.tenantScope, contract.name);
    const previous = this.index.get(key);

    const next = new Map(this.index);
    next.set(key, Object.freeze({
      active: contract,
      history: Object.freeze([...(previous?.history ?? []), contract]),
    }));
    return new RegistrySnapshot(next);
  }
}

/**
 * Versioned per-tenant contract store.
 *
 * Every publish builds a new snapshot and replaces the old one in a single
 * assignment; published contracts themselves are frozen. Readers therefore
 * see either the previous or the next snapshot, never a mix.
 */
export class ContractRegistry {
  private current: RegistrySnapshot = new RegistrySnapshot(new Map());
  private sequence = 0;

  constructor(public readonly predicates: PredicateRegistry) {}

  /**
   * Validates and publishes a new version for (tenantScope, name).
   * @throws ValidationError when the contract is structurally invalid; the store is left unchanged.
   */
  publish(tenantScope: TenantId, input: ContractInput): Contract {
    const issues: ContractIssue[] = [];
    if (tenantScope.trim() === '') {
      issues.push({ code: 'EMPTY_TENANT_SCOPE', message: 'Tenant scope must not be empty' });
    }
    issues.push(...validateContractInput(input, this.predicates));

    if (issues.length > 0) {
      throw new ValidationError(input.name, issues);
    }

    const version = this.current.latestVersion(tenantScope, input.name) + 1;
    const contract = buildContract(tenantScope, input, version, ++this.sequence);

    this.current = this.current.with(contract);
    return contract;
  }

  /**
   * Tenant-specific contract first, then the global one.
   * @throws NotFoundError when neither exists.
   */
  resolve(tenantId: TenantId, name: string): Contract {
    return this.current.resolve(tenantId, name);
  }

  tryResolve(tenantId: TenantId, name: string): Contract | null {
    return this.current.tryResolve(tenantId, name);
  }

  history(tenantScope: TenantId, name: string): readonly Contract[] {
    return this.current.history(tenantScope, name);
  }

  getVersion(tenantScope: TenantId, name: string, version: number): Contract | null {
    return this.current.getVersion(tenantScope, name, version);
  }

  list(): Contract[] {
    return this.current.list();
  }

  snapshot(): RegistrySnapshot {
    return this.current;
  }
}
