import { InternalError } from "../errors.js";
import type { ActionState } from "../graph/types.js";

const TRANSITIONS: Record<ActionState, readonly ActionState[]> = {
  PENDING: ["READY", "SKIPPED", "CANCELLED"],
  // FAILURE (or WARNING) straight from READY: render or runner construction errors.
  READY: ["RUNNING", "SKIPPED", "CANCELLED", "FAILURE", "WARNING"],
  RUNNING: ["SUCCESS", "WARNING", "FAILURE", "CANCELLED"],
  SUCCESS: [],
  WARNING: [],
  FAILURE: [],
  SKIPPED: [],
  CANCELLED: [],
};

export function canTransition(from: ActionState, to: ActionState): boolean {
  return TRANSITIONS[from].includes(to);
}

export type TransitionRecord = {
  from: ActionState;
  to: ActionState;
  at: number;
  cause?: string;
};

/**
 * Per-action state owned by one run. The only mutation path is
 * `transition`, which rejects moves outside the table above.
 */
export class ActionStateMachine {
  private states = new Map<string, ActionState>();

  constructor(ids: readonly string[]) {
    for (const id of ids) this.states.set(id, "PENDING");
  }

  get(id: string): ActionState {
    const state = this.states.get(id);
    if (state === undefined) throw new InternalError(`No state tracked for action "${id}"`);
    return state;
  }

  transition(id: string, to: ActionState, cause?: string): TransitionRecord {
    const from = this.get(id);
    if (!canTransition(from, to)) {
      throw new InternalError(`Illegal transition for action "${id}": ${from} -> ${to}`);
    }
    this.states.set(id, to);
    return { from, to, at: Date.now(), cause };
  }

  /** Ids currently in `state`, in the order the machine was built with. */
  idsIn(state: ActionState): string[] {
    return [...this.states].filter(([, s]) => s === state).map(([id]) => id);
  }

  allTerminal(): boolean {
    for (const state of this.states.values()) {
      if (TRANSITIONS[state].length > 0) return false;
    }
    return true;
  }
}
