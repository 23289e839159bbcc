import type {
  ProjectPhase,
  ProjectStatus,
  TaskStatus,
  TaskType,
  TaskUsage,
  TranslationTask,
} from "./types";

const TASK_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["ready", "cancelled"],
  ready: ["running", "cancelled"],
  running: ["completed", "failed", "failed_terminal", "cancelled"],
  completed: [],
  failed: ["ready", "failed_terminal", "cancelled"],
  // terminal; only a manual restart leaves these
  failed_terminal: ["pending", "ready"],
  cancelled: ["pending", "ready"],
};

const PROJECT_TRANSITIONS: Record<ProjectStatus, readonly ProjectStatus[]> = {
  created: ["analyzing", "cancelled"],
  analyzing: ["translating", "paused", "failed", "cancelled"],
  translating: ["reviewing", "paused", "failed", "cancelled"],
  reviewing: ["completed", "paused", "failed", "cancelled"],
  paused: [
    "paused",
    "analyzing",
    "translating",
    "reviewing",
    "completed",
    "failed",
    "cancelled",
  ],
  completed: [],
  failed: ["created", "analyzing"],
  cancelled: ["created", "analyzing"],
};

export const TERMINAL_TASK_STATUSES: ReadonlySet<TaskStatus> = new Set([
  "completed",
  "failed_terminal",
  "cancelled",
]);

export const ACTIVE_PROJECT_PHASES: readonly ProjectPhase[] = [
  "analyzing",
  "translating",
  "reviewing",
];

export const TERMINAL_PROJECT_STATUSES: ReadonlySet<ProjectStatus> = new Set([
  "completed",
  "failed",
  "cancelled",
]);

export const STAGE_ORDER: readonly TaskType[] = [
  "outline",
  "character_map",
  "translate",
  "quality_check",
  "review",
];

export const PHASE_OF_TASK: Record<TaskType, ProjectPhase> = {
  outline: "analyzing",
  character_map: "analyzing",
  translate: "translating",
  quality_check: "translating",
  review: "reviewing",
};

export const isTerminalTaskStatus = (status: TaskStatus) =>
  TERMINAL_TASK_STATUSES.has(status);

export const isActivePhase = (status: ProjectStatus): status is ProjectPhase =>
  status === "analyzing" || status === "translating" || status === "reviewing";

export function canTransitionTask(from: TaskStatus, to: TaskStatus): boolean {
  return TASK_TRANSITIONS[from].includes(to);
}

export function canTransitionProject(
  from: ProjectStatus,
  to: ProjectStatus,
): boolean {
  return PROJECT_TRANSITIONS[from].includes(to);
}

export type TaskPatch = Partial<
  Pick<
    TranslationTask,
    | "result"
    | "error"
    | "retryCount"
    | "retryAt"
    | "workerId"
    | "claimedAt"
    | "startedAt"
    | "completedAt"
    | "actualCost"
    | "tokensUsed"
  >
>;

export type FanOut = "release_dependents" | "cancel_dependents";

export interface TaskTransitionRequest {
  taskId: string;
  from: readonly TaskStatus[];
  /** When set, the stored worker id must match (claim ownership CAS). */
  expectedWorkerId?: string | null;
  to: TaskStatus;
  patch?: TaskPatch;
  usage?: TaskUsage | null;
  fanOut?: FanOut;
  at: Date;
}

export interface TaskChange {
  before: TranslationTask;
  after: TranslationTask;
  usage: TaskUsage | null;
}

/**
 * Checks the CAS preconditions of a request against the stored task.
 * Returns false for stale or duplicate requests, which callers treat as no-ops.
 */
export function matchesTransition(
  task: TranslationTask,
  request: TaskTransitionRequest,
): boolean {
  if (!request.from.includes(task.status)) {
    return false;
  }
  if (
    request.expectedWorkerId !== undefined &&
    task.workerId !== request.expectedWorkerId
  ) {
    return false;
  }
  return canTransitionTask(task.status, request.to);
}

export function applyTaskTransition(
  task: TranslationTask,
  request: TaskTransitionRequest,
): TranslationTask {
  return {
    ...task,
    ...(request.patch ?? {}),
    status: request.to,
    updatedAt: request.at.toISOString(),
  };
}

/**
 * Computes the dependent changes triggered by a committed transition.
 * `projectTasks` must contain the chain the task belongs to.
 */
export function planFanOut(
  committed: TranslationTask,
  fanOut: FanOut | undefined,
  projectTasks: readonly TranslationTask[],
  at: Date,
): TaskChange[] {
  if (!fanOut) {
    return [];
  }
  const byPredecessor = new Map<string, TranslationTask>();
  for (const task of projectTasks) {
    if (task.dependsOn) {
      byPredecessor.set(task.dependsOn, task);
    }
  }

  const changes: TaskChange[] = [];
  if (fanOut === "release_dependents") {
    const dependent = byPredecessor.get(committed.id);
    if (dependent && dependent.status === "pending") {
      changes.push({
        before: dependent,
        after: {
          ...dependent,
          status: "ready",
          updatedAt: at.toISOString(),
        },
        usage: null,
      });
    }
    return changes;
  }

  let cursor = byPredecessor.get(committed.id);
  while (cursor) {
    if (!isTerminalTaskStatus(cursor.status) && cursor.status !== "running") {
      changes.push({
        before: cursor,
        after: {
          ...cursor,
          status: "cancelled",
          workerId: null,
          retryAt: null,
          completedAt: at.toISOString(),
          error: {
            code: "dependency_failed",
            message: `Upstream task ${committed.id} ended as ${committed.status}`,
            retryable: false,
            occurredAt: at.toISOString(),
          },
          updatedAt: at.toISOString(),
        },
        usage: null,
      });
    }
    cursor = byPredecessor.get(cursor.id);
  }
  return changes;
}

/** Orders tasks by priority, then creation time, then insertion order. */
export function compareTaskPriority(
  left: TranslationTask,
  right: TranslationTask,
): number {
  if (left.priority !== right.priority) {
    return left.priority - right.priority;
  }
  if (left.createdAt !== right.createdAt) {
    return left.createdAt < right.createdAt ? -1 : 1;
  }
  return left.sequence - right.sequence;
}
