import { EXIT_CODES } from "../errors.js";
import type { ActionParams, ActionState } from "../graph/types.js";
import type { OutcomeSnapshot } from "../outcomes/ledger.js";
import type { OutputStream } from "../runners/contract.js";

export type RunVerdict = "SUCCESS" | "FAILURE" | "CANCELLED";

export type ActionReport = {
  id: string;
  kind: string;
  state: ActionState;
  cause?: string;
  exitCode?: number;
  startedAt?: number;
  finishedAt?: number;
  /** Parameters after interpolation, when the action got that far. */
  params?: ActionParams;
};

export type RunResult = {
  runId: string;
  verdict: RunVerdict;
  strategy: string;
  /** In topological order. */
  actions: readonly ActionReport[];
  outcomes: OutcomeSnapshot;
  startedAt: number;
  finishedAt: number;
  durationMs: number;
};

export type RunEvent =
  | { type: "run:started"; runId: string; strategy: string; actionIds: string[]; at: number }
  | {
      type: "action:transition";
      runId: string;
      actionId: string;
      from: ActionState;
      to: ActionState;
      at: number;
      cause?: string;
    }
  | { type: "action:message"; runId: string; actionId: string; message: string; stream: OutputStream; at: number }
  | { type: "run:finished"; runId: string; result: RunResult; at: number };

export type RunEventListener = (event: RunEvent) => void;

export type RunOptions = {
  /** External cancellation. Aborting it cancels the run cooperatively. */
  signal?: AbortSignal;
  onEvent?: RunEventListener;
  runId?: string;
  /** Values for `@{context.key}` references. */
  context?: Readonly<Record<string, string>>;
  /** Values for `@{env.NAME}` references. Defaults to `process.env`. */
  env?: Readonly<Record<string, string | undefined>>;
};

export function exitCodeFor(verdict: RunVerdict): number {
  switch (verdict) {
    case "SUCCESS":
      return EXIT_CODES.success;
    case "FAILURE":
      return EXIT_CODES.failure;
    case "CANCELLED":
      return EXIT_CODES.cancelled;
  }
}
