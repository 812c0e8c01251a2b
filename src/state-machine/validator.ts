import type { StateId, StateMachine } from '../contracts/types.js';
import { ContractIntegrityError } from '../contracts/errors.js';
import type { PredicateContext, PredicateRegistry } from '../predicates/registry.js';
import { runPredicate } from '../predicates/registry.js';
import { VALID, type ValidationResult } from '../violations/types.js';
import { allowedTargets, findTransition, isTerminalState } from './analysis.js';

/**
 * Checks one proposed transition. Pure: committing the new state is the
 * caller's job once it has an allow.
 */
export function validateTransition(
  machine: StateMachine,
  from: StateId,
  to: StateId,
  guardContext: PredicateContext,
  predicates: PredicateRegistry
): ValidationResult {
  const unknown = [from, to].filter(s => !machine.states.has(s));
  if (unknown.length > 0) {
    const names = [...new Set(unknown)];
    return {
      ok: false,
      code: 'UNKNOWN_STATE',
      message: `Unknown state${names.length > 1 ? 's' : ''} ${names.map(n => `"${n}"`).join(', ')} in transition ${from} → ${to}`,
      context: { from, to },
    };
  }

  const transition = findTransition(machine, from, to);
  if (!transition) {
    const message = isTerminalState(machine, from)
      ? `Illegal transition ${from} → ${to}: ${from} is a terminal state`
      : `Illegal transition ${from} → ${to}: allowed targets from ${from} are [${allowedTargets(machine, from).join(', ')}]`;
    return {
      ok: false,
      code: 'ILLEGAL_TRANSITION',
      message,
      context: { from, to },
    };
  }

  if (transition.guard === undefined) {
    return VALID;
  }

  const guard = predicates.get(transition.guard);
  if (!guard) {
    throw new ContractIntegrityError(null, `guard "${transition.guard}" is not registered`);
  }

  const outcome = runPredicate(guard, guardContext);
  if (outcome.passed) {
    return VALID;
  }

  return {
    ok: false,
    code: 'GUARD_REJECTED',
    message: outcome.error
      ? `Guard "${transition.guard}" failed for ${from} → ${to}: ${outcome.error}`
      : `Guard "${transition.guard}" rejected ${from} → ${to}`,
    context: { from, to, guard: transition.guard },
  };
}
