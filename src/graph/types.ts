export type ParamValue = string | number | boolean | null | ParamValue[] | { [key: string]: ParamValue };

export type ActionParams = { [key: string]: ParamValue };

export type ActionDescriptor = {
  id: string;
  /** Runner kind, resolved through the RunnerRegistry. */
  kind: string;
  params: ActionParams;
  dependsOn: string[];
  /** Outcome names the action may produce. */
  outcomes?: string[];
  description?: string;
  /** `low`: a failure ends in WARNING and does not fail the run. */
  severity?: ActionSeverity;
};

export type ActionSeverity = "normal" | "low";

/** Reference namespaces; `@{env.HOME}` never names an action. */
export const RESERVED_ACTION_IDS: ReadonlySet<string> = new Set(["context", "env"]);

export type ActionState =
  | "PENDING"
  | "READY"
  | "RUNNING"
  | "SUCCESS"
  | "WARNING"
  | "FAILURE"
  | "SKIPPED"
  | "CANCELLED";

export type TerminalState = Extract<ActionState, "SUCCESS" | "WARNING" | "FAILURE" | "SKIPPED" | "CANCELLED">;

export const TERMINAL_STATES: ReadonlySet<ActionState> = new Set<ActionState>([
  "SUCCESS",
  "WARNING",
  "FAILURE",
  "SKIPPED",
  "CANCELLED",
]);

export function isTerminal(state: ActionState): state is TerminalState {
  return TERMINAL_STATES.has(state);
}
