import type { FastifyBaseLogger } from "fastify";

import type { CharacterMappingRegistry } from "./characterMappings";
import { PIPELINE_EVENTS, type PipelineEventBus } from "./pipelineEvents";
import { reduceTaskTransition } from "./projectAggregator";
import { decideRetry } from "./retryPolicy";
import type { TaskTransitionRequest } from "./taskStateMachine";
import { translatedChapterPatch } from "./translatedChapters";
import type { PipelineStore, TransitionOutcome } from "./taskStore";
import type {
  BackoffStrategy,
  TaskErrorDescriptor,
  TaskResult,
  TaskStatus,
  TaskUsage,
  TranslationTask,
} from "./types";

const CANCELLABLE: readonly TaskStatus[] = ["pending", "ready", "running", "failed"];

/** Task-level totals across attempts; every billed call counts. */
const accumulateUsage = (
  task: Pick<TranslationTask, "actualCost" | "tokensUsed">,
  usage: TaskUsage,
) => ({
  actualCost: Number((task.actualCost + usage.cost).toFixed(6)),
  tokensUsed: task.tokensUsed + usage.tokensUsed,
});

/**
 * The only writer of task status. Each method is one compare-and-set commit;
 * a null return means the task moved on and the request was stale.
 */
export class TaskLifecycle {
  private readonly now: () => Date;

  constructor(
    private readonly store: PipelineStore,
    private readonly registry: CharacterMappingRegistry,
    private readonly bus: PipelineEventBus,
    private readonly logger: FastifyBaseLogger,
    options: { now?: () => Date } = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  claim(task: TranslationTask, workerId: string) {
    const at = this.now();
    return this.commit({
      taskId: task.id,
      from: ["ready"],
      to: "running",
      patch: {
        workerId,
        claimedAt: at.toISOString(),
        startedAt: at.toISOString(),
        error: null,
      },
      at,
    });
  }

  /**
   * Commits the completion and releases the dependent. The chapter record and
   * character proposals are written only once that commit succeeds, so a
   * result discarded because the task moved on leaves nothing behind.
   */
  async complete(
    task: TranslationTask,
    workerId: string,
    result: TaskResult,
    usage: TaskUsage,
  ): Promise<TransitionOutcome | null> {
    const current = await this.store.getTask(task.id);
    if (!current || current.status !== "running" || current.workerId !== workerId) {
      this.logger.info(
        { taskId: task.id, status: current?.status ?? null },
        "[PIPELINE] Discarding result of task no longer held by this worker",
      );
      return null;
    }

    const at = this.now();
    const commit = async () => {
      const committed = await this.commit({
        taskId: task.id,
        from: ["running"],
        expectedWorkerId: workerId,
        to: "completed",
        patch: {
          result,
          error: null,
          completedAt: at.toISOString(),
          ...accumulateUsage(current, usage),
        },
        usage,
        fanOut: "release_dependents",
        at,
      });
      if (committed) {
        await this.recordChapterOutput(task, result, usage, at);
      }
      return committed;
    };
    const candidates =
      result.type === "character_map" || result.type === "translate"
        ? result.characters
        : [];

    try {
      return await this.registry.mergeAfterCommit(
        task.projectId,
        candidates,
        {
          taskId: task.id,
          chapterNumber: task.chapterNumber,
          detectionMethod: task.taskType,
        },
        commit,
      );
    } catch (err) {
      const committed = await this.store.getTask(task.id);
      if (committed?.status !== "completed" || committed.workerId !== workerId) {
        throw err;
      }
      // the completion stands; only the proposals were lost
      this.logger.error(
        { err, taskId: task.id, projectId: task.projectId },
        "[MAPPINGS] Failed to merge character proposals of a completed task",
      );
      return null;
    }
  }

  /**
   * Records a failed attempt. Retryable errors below the retry bound go to
   * `failed` with a due time; everything else is terminal and cancels the
   * rest of the chain.
   */
  fail(
    task: TranslationTask,
    workerId: string | null,
    error: TaskErrorDescriptor,
    backoff: BackoffStrategy,
    usage: TaskUsage | null = null,
  ) {
    const at = this.now();
    const decision = decideRetry(task, error, { backoff, now: at });
    const billed = usage ? accumulateUsage(task, usage) : {};
    if (decision.action === "retry") {
      return this.commit({
        taskId: task.id,
        from: ["running"],
        expectedWorkerId: workerId,
        to: "failed",
        patch: {
          error,
          retryCount: decision.retryCount,
          retryAt: decision.retryAt.toISOString(),
          workerId: null,
          claimedAt: null,
          ...billed,
        },
        usage,
        at,
      });
    }
    return this.commit({
      taskId: task.id,
      from: ["running"],
      expectedWorkerId: workerId,
      to: "failed_terminal",
      patch: {
        error,
        retryCount: decision.retryCount,
        retryAt: null,
        workerId: null,
        completedAt: at.toISOString(),
        ...billed,
      },
      usage,
      fanOut: "cancel_dependents",
      at,
    });
  }

  promoteRetry(task: TranslationTask) {
    return this.commit({
      taskId: task.id,
      from: ["failed"],
      to: "ready",
      patch: { retryAt: null },
      at: this.now(),
    });
  }

  cancel(task: TranslationTask, reason: { code: string; message: string }) {
    const at = this.now();
    return this.commit({
      taskId: task.id,
      from: CANCELLABLE,
      to: "cancelled",
      patch: {
        workerId: null,
        retryAt: null,
        completedAt: at.toISOString(),
        error: { ...reason, retryable: false, occurredAt: at.toISOString() },
      },
      at,
    });
  }

  /** Puts a terminal task back into its chain with a fresh retry budget. */
  restart(task: TranslationTask, runnable: boolean) {
    return this.commit({
      taskId: task.id,
      from: ["failed_terminal", "cancelled"],
      to: runnable ? "ready" : "pending",
      patch: {
        retryCount: 0,
        retryAt: null,
        error: null,
        result: null,
        workerId: null,
        claimedAt: null,
        startedAt: null,
        completedAt: null,
      },
      at: this.now(),
    });
  }

  private async recordChapterOutput(
    task: TranslationTask,
    result: TaskResult,
    usage: TaskUsage,
    at: Date,
  ) {
    const outline =
      result.type === "translate" ? await this.completedOutline(task) : null;
    const patch = translatedChapterPatch(task, result, usage, outline);
    if (!patch) return;
    try {
      await this.store.upsertTranslatedChapter(
        task.projectId,
        task.chapterNumber,
        patch,
        at,
      );
    } catch (err) {
      this.logger.error(
        { err, taskId: task.id, chapterNumber: task.chapterNumber },
        "[PIPELINE] Failed to record translated chapter",
      );
    }
  }

  private async completedOutline(task: TranslationTask) {
    const tasks = await this.store.listTasks(task.projectId);
    const outline = tasks.find(
      (entry) =>
        entry.chapterNumber === task.chapterNumber &&
        entry.status === "completed" &&
        entry.result?.type === "outline",
    );
    return outline?.result?.type === "outline" ? outline.result.outline : null;
  }

  private async commit(request: TaskTransitionRequest) {
    const outcome = await this.store.transitionTask(request, reduceTaskTransition);
    if (!outcome) {
      this.logger.debug(
        { taskId: request.taskId, to: request.to },
        "[PIPELINE] Stale task transition ignored",
      );
      return null;
    }
    this.bus.emit(PIPELINE_EVENTS.TASK_COMMITTED, outcome);
    return outcome;
  }
}
