import type { RunState } from '@conclave/agent-contracts';
import { InvalidRunStateError } from '@conclave/agent-contracts';

type StateTransition = {
  from: RunState;
  to: RunState;
  timestamp: string;
  reason?: string;
};

const ALLOWED_TRANSITIONS: Record<RunState, readonly RunState[]> = {
  created: ['running', 'deleted'],
  running: ['completed', 'terminated', 'failed'],
  completed: ['running', 'deleted'],
  terminated: ['running', 'deleted'],
  failed: ['deleted'],
  deleted: [],
};

const ACTION_FOR_TARGET: Record<RunState, string> = {
  created: 'create',
  running: 'run',
  completed: 'complete',
  terminated: 'terminate',
  failed: 'fail',
  deleted: 'delete',
};

export function canTransition(from: RunState, to: RunState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Lifecycle of one named subagent. Only the subagent manager mutates it.
 */
export class RunStateMachine {
  private current: RunState = 'created';
  private transitions: StateTransition[] = [];

  constructor(
    private readonly agentName: string,
    private readonly onTransition?: (from: RunState, to: RunState) => void,
  ) {}

  getCurrent(): RunState {
    return this.current;
  }

  getTransitions(): StateTransition[] {
    return [...this.transitions];
  }

  /**
   * Throws InvalidRunStateError when the move is not allowed; state is unchanged then.
   */
  assertCanTransition(to: RunState): void {
    if (!canTransition(this.current, to)) {
      throw new InvalidRunStateError(this.agentName, this.current, ACTION_FOR_TARGET[to]);
    }
  }

  transition(to: RunState, reason?: string): void {
    this.assertCanTransition(to);

    const from = this.current;
    this.transitions.push({
      from,
      to,
      timestamp: new Date().toISOString(),
      reason,
    });
    this.current = to;
    this.onTransition?.(from, to);
  }
}
