export type ErrorCode =
  | "CONFIG_INVALID"
  | "UNKNOWN_STRATEGY"
  | "DUPLICATE_REGISTRATION"
  | "LOAD_FAILED"
  | "SOURCE_NOT_FOUND"
  | "VALIDATION_FAILED"
  | "RENDER_FAILED"
  | "OUTCOME_CONFLICT"
  | "INVARIANT_VIOLATED";

/** Process exit codes. Run verdicts map through `exitCodeFor` in executor/types.ts. */
export const EXIT_CODES = {
  success: 0,
  failure: 1,
  unexpected: 2,
  config: 101,
  load: 102,
  validation: 103,
  source: 104,
  cancelled: 130,
} as const;

export class TaskweaveError extends Error {
  readonly code: ErrorCode;
  readonly exitCode: number;

  constructor(code: ErrorCode, message: string, exitCode: number = EXIT_CODES.unexpected) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
  }
}

export class ConfigError extends TaskweaveError {
  constructor(code: "CONFIG_INVALID" | "UNKNOWN_STRATEGY" | "DUPLICATE_REGISTRATION", message: string) {
    super(code, message, EXIT_CODES.config);
  }
}

/** Workflow source or plugin module could not be loaded. */
export class LoadError extends TaskweaveError {
  readonly sources: readonly string[];

  constructor(message: string, sources: readonly string[] = []) {
    const text = sources.length > 0 ? `${message}\n  Sources stack: ${sources.join(" -> ")}` : message;
    super("LOAD_FAILED", text, EXIT_CODES.load);
    this.sources = [...sources];
  }
}

export class SourceError extends TaskweaveError {
  constructor(message: string) {
    super("SOURCE_NOT_FOUND", message, EXIT_CODES.source);
  }
}

export type ValidationErrorKind =
  | "UnknownDependency"
  | "CycleDetected"
  | "DuplicateId"
  | "InvalidId"
  | "ReservedId"
  | "UnknownAction"
  | "UnknownRunnerKind";

export type ValidationDetails = {
  actionId?: string;
  dependency?: string;
  /** Closed path, first id repeated at the end. */
  cycle?: string[];
  kind?: string;
};

export class ValidationError extends TaskweaveError {
  readonly kind: ValidationErrorKind;
  readonly details: ValidationDetails;

  constructor(kind: ValidationErrorKind, message: string, details: ValidationDetails = {}) {
    super("VALIDATION_FAILED", message, EXIT_CODES.validation);
    this.kind = kind;
    this.details = details;
  }
}

export type RenderErrorKind =
  | "MissingOutcome"
  | "MalformedReference"
  | "UnknownAction"
  | "UnrelatedAction"
  | "UnknownContextKey"
  | "RecursionLimit";

export class RenderError extends TaskweaveError {
  readonly kind: RenderErrorKind;
  readonly reference?: string;

  constructor(kind: RenderErrorKind, message: string, reference?: string) {
    super("RENDER_FAILED", message);
    this.kind = kind;
    this.reference = reference;
  }
}

export class ConflictError extends TaskweaveError {
  readonly actionId: string;
  readonly key: string;

  constructor(actionId: string, key: string) {
    super("OUTCOME_CONFLICT", `Outcome "${actionId}.${key}" has already been recorded`);
    this.actionId = actionId;
    this.key = key;
  }
}

export class InternalError extends TaskweaveError {
  constructor(message: string) {
    super("INVARIANT_VIOLATED", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
