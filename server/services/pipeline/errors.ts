import type { TaskErrorDescriptor } from "./types";

export type PipelineTaskErrorCode =
  | "provider_timeout"
  | "provider_unavailable"
  | "provider_rate_limited"
  | "provider_auth"
  | "invalid_input"
  | "invalid_ai_output"
  | "chapter_missing"
  | "missing_dependency_result"
  | "claim_expired"
  | "unknown_provider"
  | "unexpected";

/**
 * Failure raised while executing a task. Never crosses the scheduler: the
 * worker pool converts it into a {@link TaskErrorDescriptor} on the task.
 */
export class PipelineTaskError extends Error {
  readonly code: PipelineTaskErrorCode;
  readonly retryable: boolean;

  constructor(
    code: PipelineTaskErrorCode,
    message: string,
    options: { retryable: boolean; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = "PipelineTaskError";
    this.code = code;
    this.retryable = options.retryable;
  }
}

export type PipelineCommandErrorCode =
  | "project_not_found"
  | "task_not_found"
  | "invalid_project_state"
  | "no_chapters"
  | "no_provider"
  | "invalid_config"
  | "invalid_request";

export class PipelineCommandError extends Error {
  readonly code: PipelineCommandErrorCode;

  constructor(code: PipelineCommandErrorCode, message: string) {
    super(message);
    this.name = "PipelineCommandError";
    this.code = code;
  }
}

export function toTaskErrorDescriptor(
  error: unknown,
  occurredAt: Date,
): TaskErrorDescriptor {
  if (error instanceof PipelineTaskError) {
    return {
      code: error.code,
      message: error.message,
      retryable: error.retryable,
      occurredAt: occurredAt.toISOString(),
    };
  }
  const message =
    error instanceof Error ? error.message : String(error ?? "unknown error");
  // Unclassified failures are assumed transient so they get the retry budget.
  return {
    code: "unexpected",
    message,
    retryable: true,
    occurredAt: occurredAt.toISOString(),
  };
}
