import { z } from "zod";
import type { ParamValue } from "./graph/types.js";

// ─── Parameters ─────────────────────────────────────────────────────

export const ParamValueSchema: z.ZodType<ParamValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(ParamValueSchema),
    z.record(ParamValueSchema),
  ]),
);

export const ActionParamsSchema = z.record(ParamValueSchema);

// ─── Runner results ─────────────────────────────────────────────────

export const RunnerResultSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("success"), outcomes: z.record(z.string()) }),
  z.object({ status: z.literal("failure"), cause: z.string(), exitCode: z.number().int().optional() }),
  z.object({ status: z.literal("cancelled"), cause: z.string().optional() }),
]);

// ─── Configuration ──────────────────────────────────────────────────

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);
export const RenderModeSchema = z.enum(["strict", "lenient"]);
export const OutcomeContractSchema = z.enum(["open", "closed"]);

export const EngineSettingsSchema = z
  .object({
    strategy: z.string().min(1),
    concurrency: z.number().int().positive(),
    rendering: RenderModeSchema,
    outcomeContract: OutcomeContractSchema,
    cancelGraceMs: z.number().int().nonnegative(),
  })
  .partial()
  .strict();

export const RunnerSettingsSchema = z
  .object({
    actionsDirectories: z.array(z.string().min(1)),
    shellInjectYieldFunction: z.boolean(),
    dockerBinary: z.string().min(1),
  })
  .partial()
  .strict();

/** Partial config layer, as accepted from a workflow file or from code. */
export const ConfigLayerSchema = z
  .object({
    engine: EngineSettingsSchema,
    runners: RunnerSettingsSchema,
    logging: z.object({ level: LogLevelSchema, file: z.string().min(1) }).partial().strict(),
    workflow: z.object({ file: z.string().min(1), envFile: z.string().min(1) }).partial().strict(),
    history: z.object({ dbPath: z.string().min(1) }).partial().strict(),
  })
  .partial()
  .strict();

/** `configuration` section of a workflow file: engine and runner settings only. */
export const WorkflowConfigurationSchema = ConfigLayerSchema.pick({ engine: true, runners: true });

export type ConfigLayer = z.infer<typeof ConfigLayerSchema>;

const booleanFromEnv = z
  .string()
  .trim()
  .toLowerCase()
  .transform((v, ctx) => {
    if (["1", "true", "yes", "on"].includes(v)) return true;
    if (["0", "false", "no", "off", ""].includes(v)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got "${v}"` });
    return z.NEVER;
  });

const listFromEnv = z
  .string()
  .transform((v) => v.split(",").map((s) => s.trim()).filter(Boolean));

/** Environment variables recognized by configFromEnv. */
export const EnvSchema = z.object({
  TASKWEAVE_STRATEGY: z.string().min(1).optional(),
  TASKWEAVE_CONCURRENCY: z.coerce.number().int().positive().optional(),
  TASKWEAVE_STRICT_OUTCOMES: booleanFromEnv.optional(),
  TASKWEAVE_OUTCOME_CONTRACT: OutcomeContractSchema.optional(),
  TASKWEAVE_CANCEL_GRACE_MS: z.coerce.number().int().nonnegative().optional(),
  TASKWEAVE_ACTIONS_DIRS: listFromEnv.optional(),
  TASKWEAVE_SHELL_INJECT_YIELD: booleanFromEnv.optional(),
  TASKWEAVE_DOCKER_BIN: z.string().min(1).optional(),
  TASKWEAVE_LOG_LEVEL: LogLevelSchema.optional(),
  TASKWEAVE_LOG_FILE: z.string().min(1).optional(),
  TASKWEAVE_WORKFLOW_FILE: z.string().min(1).optional(),
  TASKWEAVE_ENV_FILE: z.string().min(1).optional(),
  TASKWEAVE_HISTORY_DB: z.string().min(1).optional(),
});

// ─── Bundled runner params ──────────────────────────────────────────

const environmentSchema = z.record(z.union([z.string(), z.number(), z.boolean()]).transform(String));

export const ShellParamsSchema = z
  .object({
    command: z.string().optional(),
    file: z.string().min(1).optional(),
    environment: environmentSchema.optional(),
    cwd: z.string().min(1).optional(),
  })
  .strict()
  .refine((p) => (p.command === undefined) !== (p.file === undefined), {
    message: 'Exactly one of "command" or "file" must be set',
  });

export const DockerShellParamsSchema = z
  .object({
    image: z.string().min(1),
    command: z.string().optional(),
    file: z.string().min(1).optional(),
    environment: environmentSchema.optional(),
    cwd: z.string().min(1).optional(),
    pull: z.boolean().optional(),
  })
  .strict()
  .refine((p) => (p.command === undefined) !== (p.file === undefined), {
    message: 'Exactly one of "command" or "file" must be set',
  });

export const EchoParamsSchema = z.object({ message: z.string() }).strict();

export type ShellParams = z.infer<typeof ShellParamsSchema>;
export type DockerShellParams = z.infer<typeof DockerShellParamsSchema>;

/** Join zod issues into one line: `path: message; path: message`. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

/**
 * Parse `data` against `schema`, converting a failure into the error the
 * caller builds from the formatted issues.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  toError: (message: string) => Error,
): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw toError(formatIssues(result.error));
  }
  return result.data;
}
