import type {
  BackoffStrategy,
  TaskErrorDescriptor,
  TranslationTask,
} from "./types";

export const DEFAULT_MAX_RETRY_DELAY_SECONDS = 3600;

export type RetryDecision =
  | {
      action: "retry";
      retryCount: number;
      delayMs: number;
      retryAt: Date;
    }
  | {
      action: "fail_terminal";
      retryCount: number;
      reason: "retries_exhausted" | "non_retryable";
    };

export function computeRetryDelayMs(
  attempt: number,
  baseDelaySeconds: number,
  backoff: BackoffStrategy,
  maxDelaySeconds = DEFAULT_MAX_RETRY_DELAY_SECONDS,
): number {
  const safeAttempt = Math.max(1, Math.floor(attempt));
  const base = Math.max(0, baseDelaySeconds);
  const seconds =
    backoff === "exponential"
      ? base * 2 ** (safeAttempt - 1)
      : base * safeAttempt;
  return Math.min(seconds, maxDelaySeconds) * 1000;
}

/**
 * Decides what happens to a task whose attempt just failed. The failed
 * attempt counts toward retry_count; the count is clamped to max_retries.
 */
export function decideRetry(
  task: Pick<TranslationTask, "retryCount" | "maxRetries" | "retryDelaySeconds">,
  error: Pick<TaskErrorDescriptor, "retryable">,
  options: {
    backoff: BackoffStrategy;
    now: Date;
    maxDelaySeconds?: number;
  },
): RetryDecision {
  if (!error.retryable) {
    return {
      action: "fail_terminal",
      retryCount: task.retryCount,
      reason: "non_retryable",
    };
  }

  const attempt = task.retryCount + 1;
  if (attempt >= task.maxRetries) {
    return {
      action: "fail_terminal",
      retryCount: Math.min(attempt, task.maxRetries),
      reason: "retries_exhausted",
    };
  }

  const delayMs = computeRetryDelayMs(
    attempt,
    task.retryDelaySeconds,
    options.backoff,
    options.maxDelaySeconds,
  );
  return {
    action: "retry",
    retryCount: attempt,
    delayMs,
    retryAt: new Date(options.now.getTime() + delayMs),
  };
}
