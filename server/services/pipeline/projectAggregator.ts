import {
  isActivePhase,
  isTerminalTaskStatus,
  PHASE_OF_TASK,
  type TaskChange,
} from "./taskStateMachine";
import {
  emptyTaskCounts,
  type PipelineStatistic,
  type ProjectPhase,
  type ProjectStatus,
  type TaskStatusCounts,
  type TranslationProject,
  type TranslationTask,
} from "./types";

const round2 = (value: number) => Math.round(value * 100) / 100;
const round6 = (value: number) => Number(value.toFixed(6));

export function countTasks(tasks: readonly Pick<TranslationTask, "status">[]) {
  const counts = emptyTaskCounts();
  for (const task of tasks) {
    counts[task.status] += 1;
  }
  return counts;
}

export function computeProgress(counts: TaskStatusCounts, totalTasks: number) {
  if (totalTasks <= 0) return 0;
  const terminal = counts.completed + counts.failed_terminal + counts.cancelled;
  return round2((100 * terminal) / totalTasks);
}

/**
 * Folds one committed task change into the project counters. Replaying a
 * change whose status did not move leaves the project untouched.
 */
export function reduceTaskTransition(
  project: TranslationProject,
  change: TaskChange,
  at: Date,
): TranslationProject {
  const { before, after, usage } = change;
  if (before.status === after.status) {
    return project;
  }

  const taskCounts = { ...project.taskCounts };
  taskCounts[before.status] = Math.max(0, taskCounts[before.status] - 1);
  taskCounts[after.status] += 1;

  const next: TranslationProject = {
    ...project,
    taskCounts,
    progress: computeProgress(taskCounts, project.totalTasks),
    updatedAt: at.toISOString(),
  };

  if (usage) {
    next.actualCost = round6(project.actualCost + usage.cost);
    next.tokensUsed = project.tokensUsed + usage.tokensUsed;
  }

  if (after.status === "completed") {
    if (after.isFinalStage) {
      next.completedChapters = project.completedChapters + 1;
    }
    if (after.result?.type === "quality_check") {
      next.qualityScoreSum = round6(project.qualityScoreSum + after.result.score);
      next.qualityScoredChapters = project.qualityScoredChapters + 1;
      next.qualityIssuesCount =
        project.qualityIssuesCount + after.result.issues.length;
      next.averageQualityScore = round2(
        next.qualityScoreSum / next.qualityScoredChapters,
      );
    }
  }

  if (after.status === "failed_terminal") {
    next.failedChapters = project.failedChapters + 1;
    if (after.error) {
      next.lastError = { code: after.error.code, message: after.error.message };
    }
  } else if (before.status === "failed_terminal") {
    next.failedChapters = Math.max(0, project.failedChapters - 1);
  }

  return next;
}

export type ProjectAdvance =
  | { kind: "fail"; code: "failure_threshold_exceeded"; message: string }
  | { kind: "advance"; to: ProjectStatus };

export const NEXT_PHASE: Record<ProjectPhase, ProjectStatus> = {
  analyzing: "translating",
  translating: "reviewing",
  reviewing: "completed",
};

export function exceedsFailureThreshold(project: TranslationProject) {
  const threshold = project.config.failureThreshold;
  if (threshold === null || project.totalChapters === 0) {
    return false;
  }
  return project.failedChapters / project.totalChapters > threshold;
}

/** The phase the project is in, or would resume into when paused. */
export function effectivePhase(project: TranslationProject): ProjectPhase | null {
  if (isActivePhase(project.status)) {
    return project.status;
  }
  if (
    project.status === "paused" &&
    project.resumeStatus &&
    isActivePhase(project.resumeStatus)
  ) {
    return project.resumeStatus;
  }
  return null;
}

/**
 * Decides the next project status after task changes. The threshold check
 * runs first; phase completion cascades through empty stages.
 */
export function planProjectAdvance(
  project: TranslationProject,
  tasks: readonly TranslationTask[],
): ProjectAdvance | null {
  const phase = effectivePhase(project);
  if (!phase) {
    return null;
  }

  if (exceedsFailureThreshold(project)) {
    return {
      kind: "fail",
      code: "failure_threshold_exceeded",
      message: `${project.failedChapters} of ${project.totalChapters} chapters failed (threshold ${project.config.failureThreshold})`,
    };
  }

  let current: ProjectStatus = phase;
  while (isActivePhase(current)) {
    const stagePhase: ProjectPhase = current;
    const open = tasks.some(
      (task) =>
        PHASE_OF_TASK[task.taskType] === stagePhase &&
        !isTerminalTaskStatus(task.status),
    );
    if (open) break;
    current = NEXT_PHASE[stagePhase];
  }

  return current === phase ? null : { kind: "advance", to: current };
}

export interface ProjectProgressReport {
  projectId: string;
  name: string;
  status: ProjectStatus;
  resumeStatus: ProjectStatus | null;
  progress: number;
  phases: Record<ProjectPhase, { total: number; terminal: number }>;
  chapters: { total: number; completed: number; failed: number };
  tasks: TaskStatusCounts & { total: number };
  cost: { estimated: number; actual: number; tokensUsed: number };
  quality: {
    averageScore: number | null;
    scoredChapters: number;
    issuesCount: number;
  };
  lastError: TranslationProject["lastError"];
  estimatedRemainingSeconds: number | null;
  recentActivities: PipelineStatistic[];
  statusTimestamps: TranslationProject["statusTimestamps"];
  updatedAt: string;
}

export function estimateRemainingSeconds(
  tasks: readonly TranslationTask[],
  statistics: readonly PipelineStatistic[],
): number | null {
  const remaining = tasks.filter((task) => !isTerminalTaskStatus(task.status));
  if (remaining.length === 0) return 0;
  const durations = statistics
    .filter((stat) => stat.toStatus === "completed" && stat.durationMs !== null)
    .map((stat) => stat.durationMs ?? 0);
  if (durations.length === 0) return null;
  const average =
    durations.reduce((total, value) => total + value, 0) / durations.length;
  return Math.round((average * remaining.length) / 1000);
}

export function buildProgressReport(
  project: TranslationProject,
  tasks: readonly TranslationTask[],
  statistics: readonly PipelineStatistic[],
  options: { recentLimit?: number } = {},
): ProjectProgressReport {
  const phaseSummary = (phase: ProjectPhase) => {
    const stage = tasks.filter((task) => PHASE_OF_TASK[task.taskType] === phase);
    return {
      total: stage.length,
      terminal: stage.filter((task) => isTerminalTaskStatus(task.status)).length,
    };
  };

  return {
    projectId: project.id,
    name: project.name,
    status: project.status,
    resumeStatus: project.resumeStatus,
    progress: project.progress,
    phases: {
      analyzing: phaseSummary("analyzing"),
      translating: phaseSummary("translating"),
      reviewing: phaseSummary("reviewing"),
    },
    chapters: {
      total: project.totalChapters,
      completed: project.completedChapters,
      failed: project.failedChapters,
    },
    tasks: { ...project.taskCounts, total: project.totalTasks },
    cost: {
      estimated: project.estimatedCost,
      actual: project.actualCost,
      tokensUsed: project.tokensUsed,
    },
    quality: {
      averageScore: project.averageQualityScore,
      scoredChapters: project.qualityScoredChapters,
      issuesCount: project.qualityIssuesCount,
    },
    lastError: project.lastError,
    estimatedRemainingSeconds: estimateRemainingSeconds(tasks, statistics),
    recentActivities: statistics.slice(0, options.recentLimit ?? 10),
    statusTimestamps: project.statusTimestamps,
    updatedAt: project.updatedAt,
  };
}
