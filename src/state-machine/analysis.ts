import type { StateId, StateMachine, Transition } from '../contracts/types.js';

export function findTransition(machine: StateMachine, from: StateId, to: StateId): Transition | undefined {
  return machine.transitions.find(t => t.from === from && t.to === to);
}

export function allowedTargets(machine: StateMachine, from: StateId): StateId[] {
  return machine.transitions.filter(t => t.from === from).map(t => t.to);
}

export function isTerminalState(machine: StateMachine, state: StateId): boolean {
  return machine.terminal.has(state);
}

/**
 * Breadth-first walk from the initial state. Transitions naming unknown
 * states are followed as-is; callers that care check membership separately.
 */
export function reachableStates(machine: StateMachine): Set<StateId> {
  const reached = new Set<StateId>([machine.initial]);
  const queue: StateId[] = [machine.initial];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const next of allowedTargets(machine, current)) {
      if (!reached.has(next)) {
        reached.add(next);
        queue.push(next);
      }
    }
  }

  return reached;
}

export function unreachableStates(machine: StateMachine): StateId[] {
  const reached = reachableStates(machine);
  return [...machine.states].filter(s => !reached.has(s));
}
