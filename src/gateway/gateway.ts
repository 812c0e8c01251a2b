import { validateDependency } from '../architecture/validator.js';
import { ContractIntegrityError, NotFoundError } from '../contracts/errors.js';
import type { ContractRegistry } from '../contracts/registry.js';
import type { Contract, StateTransitionRule, TenantId } from '../contracts/types.js';
import { runPredicate } from '../predicates/registry.js';
import { validateTransition } from '../state-machine/validator.js';
import { toViolation } from '../violations/summary.js';
import type { ValidationResult, Violation } from '../violations/types.js';
import type {
  Decision,
  DependencyRequest,
  EvaluationRequest,
  GenericRequest,
  TransitionRequest,
} from './types.js';

/**
 * The single decision API the host calls.
 *
 * Resolves the contract once per call and evaluates every matching rule in
 * declaration order. Nothing is cached between calls.
 */
export class EnforcementGateway {
  constructor(private readonly registry: ContractRegistry) {}

  evaluate(tenantId: TenantId, request: EvaluationRequest): Decision {
    let contract: Contract;
    try {
      contract = this.registry.resolve(tenantId, request.contract);
    } catch (error) {
      if (error instanceof NotFoundError) {
        return {
          outcome: 'unconfigured',
          tenantId,
          contract: request.contract,
          violations: [],
          evaluatedAt: null,
          reason: error.message,
        };
      }
      throw error;
    }

    return this.evaluateAgainst(tenantId, contract, request);
  }

  /**
   * Evaluates against an already captured contract version, e.g. one taken
   * from a registry snapshot before a hot reload.
   */
  evaluateAgainst(tenantId: TenantId, contract: Contract, request: EvaluationRequest): Decision {
    const violations = this.collectViolations(contract, request);
    const blocked = violations.some(v => v.severity === 'block');

    return {
      outcome: blocked ? 'deny' : 'allow',
      tenantId,
      contract: request.contract,
      violations,
      evaluatedAt: {
        contractId: contract.id,
        version: contract.version,
        publishedSeq: contract.publishedSeq,
      },
    };
  }

  private collectViolations(contract: Contract, request: EvaluationRequest): Violation[] {
    switch (request.kind) {
      case 'transition':
        return this.checkTransition(contract, request);
      case 'dependency':
        return this.checkDependency(contract, request);
      case 'generic':
        return this.checkGeneric(contract, request);
    }
  }

  private checkTransition(contract: Contract, request: TransitionRequest): Violation[] {
    const rules = contract.rules.filter(
      (rule): rule is StateTransitionRule =>
        rule.type === 'state_transition' && rule.entity === request.entity
    );

    if (rules.length === 0) {
      return [
        {
          ruleId: '*',
          code: 'UNKNOWN_ENTITY',
          severity: 'block',
          message: `Contract ${contract.id} declares no state machine for entity "${request.entity}"`,
          context: { entity: request.entity, from: request.from, to: request.to },
        },
      ];
    }

    const violations: Violation[] = [];
    for (const rule of rules) {
      const result = this.runTransitionRule(contract, rule, request);
      if (!result.ok) {
        violations.push(
          toViolation({ ...result, context: { entity: request.entity, ...result.context } }, rule.id, rule.severity, rule.description)
        );
      }
    }
    return violations;
  }

  private runTransitionRule(contract: Contract, rule: StateTransitionRule, request: TransitionRequest): ValidationResult {
    try {
      return validateTransition(rule.machine, request.from, request.to, request.guardContext ?? {}, this.registry.predicates);
    } catch (error) {
      if (error instanceof ContractIntegrityError && error.contractId === null) {
        throw new ContractIntegrityError(contract.id, `${error.reason} (rule ${rule.id})`);
      }
      throw error;
    }
  }

  private checkDependency(contract: Contract, request: DependencyRequest): Violation[] {
    const violations: Violation[] = [];
    for (const rule of contract.rules) {
      if (rule.type !== 'layer_dependency') continue;

      const result = validateDependency(rule.graph, request.source, request.target);
      if (!result.ok) {
        violations.push(toViolation(result, rule.id, rule.severity, rule.description));
      }
    }
    return violations;
  }

  private checkGeneric(contract: Contract, request: GenericRequest): Violation[] {
    const violations: Violation[] = [];
    for (const rule of contract.rules) {
      if (rule.type !== 'generic_predicate') continue;

      const definition = this.registry.predicates.get(rule.predicate);
      if (!definition) {
        throw new ContractIntegrityError(contract.id, `predicate "${rule.predicate}" of rule ${rule.id} is not registered`);
      }

      const outcome = runPredicate(definition, request.predicateInput);
      if (!outcome.passed) {
        violations.push({
          ruleId: rule.id,
          code: 'PREDICATE_FAILED',
          severity: rule.severity,
          message: outcome.error
            ? `${rule.description}: predicate "${rule.predicate}" failed: ${outcome.error}`
            : `${rule.description}: predicate "${rule.predicate}" returned false`,
          context: { predicate: rule.predicate },
        });
      }
    }
    return violations;
  }
}
