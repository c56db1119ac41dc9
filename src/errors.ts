/**
 * Error taxonomy surfaced to callers of the engine and the CLI.
 *
 * NotFound errors propagate unchanged. Source errors are either transient
 * (handled inside the evidence chain) or terminal (sources exhausted, timeout).
 */
export type ErrorCode =
  | "PUSH_NOT_FOUND"
  | "PARENT_PUSH_NOT_FOUND"
  | "CHILD_PUSH_NOT_FOUND"
  | "SNAPSHOT_INVALID"
  | "SOURCES_NOT_FOUND"
  | "SOURCE_UNAVAILABLE"
  | "PREDICTION_TIMEOUT";

export class PushTriageError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class PushNotFoundError extends PushTriageError {
  constructor(readonly rev: string, detail?: string) {
    super("PUSH_NOT_FOUND", `Push not found: ${rev}${detail ? ` (${detail})` : ""}`);
  }
}

export class ParentPushNotFoundError extends PushTriageError {
  constructor(readonly rev: string, reason: string) {
    super("PARENT_PUSH_NOT_FOUND", `Parent push of ${rev} not found: ${reason}`);
  }
}

export class ChildPushNotFoundError extends PushTriageError {
  constructor(readonly rev: string, reason: string) {
    super("CHILD_PUSH_NOT_FOUND", `Child push of ${rev} not found: ${reason}`);
  }
}

export class SnapshotInvalidError extends PushTriageError {
  constructor(readonly filePath: string, errors: string) {
    super("SNAPSHOT_INVALID", `Invalid push snapshot ${filePath}: ${errors}`);
  }
}

/** Every registered source failed to provide a capability. */
export class SourcesNotFoundError extends PushTriageError {
  constructor(readonly capability: string) {
    super("SOURCES_NOT_FOUND", `No registered sources were able to fulfill '${capability}'!`);
  }
}

/** A single source gave up after exhausting its retries. */
export class SourceUnavailableError extends PushTriageError {
  constructor(
    readonly source: string,
    readonly attempts: number,
    readonly lastError?: unknown,
  ) {
    super("SOURCE_UNAVAILABLE", `Source '${source}' unavailable after ${attempts} attempt(s)`);
  }
}

export class PredictionServiceTimeoutError extends PushTriageError {
  constructor(readonly waitedMs: number) {
    super("PREDICTION_TIMEOUT", "Timed out waiting for result from the prediction service");
  }
}

export function isPushTriageError(err: unknown): err is PushTriageError {
  return err instanceof PushTriageError;
}
