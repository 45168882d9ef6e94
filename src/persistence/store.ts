import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { InternalError } from "../errors.js";
import type { RunResult, RunVerdict } from "../executor/types.js";
import type { ActionState } from "../graph/types.js";
import { formatIssues } from "../schemas.js";

const ACTION_STATES = [
  "PENDING",
  "READY",
  "RUNNING",
  "SUCCESS",
  "WARNING",
  "FAILURE",
  "SKIPPED",
  "CANCELLED",
] as const;

const ActionSummarySchema = z.object({
  id: z.string(),
  kind: z.string(),
  state: z.enum(ACTION_STATES),
  cause: z.string().optional(),
  exitCode: z.number().int().optional(),
  startedAt: z.number().optional(),
  finishedAt: z.number().optional(),
});

const RunRowSchema = z.object({
  run_id: z.string(),
  workflow: z.string().nullable(),
  verdict: z.enum(["SUCCESS", "FAILURE", "CANCELLED"]),
  strategy: z.string(),
  actions: z.string(),
  started_at: z.number(),
  finished_at: z.number(),
});

export type ActionSummary = {
  id: string;
  kind: string;
  state: ActionState;
  cause?: string;
  exitCode?: number;
  startedAt?: number;
  finishedAt?: number;
};

/** What the history keeps of a finished run. Outcomes and parameters are not stored. */
export type RunRecord = {
  runId: string;
  workflow?: string;
  verdict: RunVerdict;
  strategy: string;
  actions: ActionSummary[];
  startedAt: number;
  finishedAt: number;
};

/** Archive of finished runs. Never used to resume execution. */
export class RunStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id      TEXT PRIMARY KEY,
        workflow    TEXT,
        verdict     TEXT NOT NULL,
        strategy    TEXT NOT NULL,
        actions     TEXT NOT NULL DEFAULT '[]',
        started_at  INTEGER NOT NULL,
        finished_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC);
    `);
  }

  insert(result: RunResult, workflow?: string): void {
    const actions: ActionSummary[] = result.actions.map(({ id, kind, state, cause, exitCode, startedAt, finishedAt }) => ({
      id,
      kind,
      state,
      cause,
      exitCode,
      startedAt,
      finishedAt,
    }));
    this.db
      .prepare(
        `INSERT OR REPLACE INTO runs (run_id, workflow, verdict, strategy, actions, started_at, finished_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        result.runId,
        workflow ?? null,
        result.verdict,
        result.strategy,
        JSON.stringify(actions),
        result.startedAt,
        result.finishedAt,
      );
  }

  get(runId: string): RunRecord | undefined {
    const row: unknown = this.db.prepare("SELECT * FROM runs WHERE run_id = ?").get(runId);
    return row === undefined ? undefined : rowToRecord(row);
  }

  /** Most recent first. */
  list(limit = 20): RunRecord[] {
    const rows: unknown[] = this.db.prepare("SELECT * FROM runs ORDER BY started_at DESC LIMIT ?").all(limit);
    return rows.map(rowToRecord);
  }

  /** Delete runs started before a given timestamp. Returns how many were deleted. */
  deleteOlderThan(timestamp: number): number {
    const result = this.db.prepare("DELETE FROM runs WHERE started_at < ?").run(timestamp);
    return result.changes;
  }

  close(): void {
    this.db.close();
  }
}

function rowToRecord(raw: unknown): RunRecord {
  const row = RunRowSchema.safeParse(raw);
  if (!row.success) {
    throw new InternalError(`Corrupt run history row: ${formatIssues(row.error)}`);
  }
  const actions = z.array(ActionSummarySchema).safeParse(JSON.parse(row.data.actions));
  if (!actions.success) {
    throw new InternalError(`Corrupt run history actions for ${row.data.run_id}: ${formatIssues(actions.error)}`);
  }
  const record: RunRecord = {
    runId: row.data.run_id,
    verdict: row.data.verdict,
    strategy: row.data.strategy,
    actions: actions.data,
    startedAt: row.data.started_at,
    finishedAt: row.data.finished_at,
  };
  if (row.data.workflow !== null) record.workflow = row.data.workflow;
  return record;
}
