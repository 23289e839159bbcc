import type { FastifyBaseLogger } from "fastify";
import { nanoid } from "nanoid";
import pLimit, { type LimitFunction } from "p-limit";

import { buildTaskUsage } from "../usage";
import type { AiCapabilityService } from "./aiCapabilityService";
import type { CharacterMappingRegistry } from "./characterMappings";
import type { ChapterContent, ContentStore } from "./contentStore";
import { PipelineTaskError, toTaskErrorDescriptor } from "./errors";
import type { ProviderRateLimiter } from "./rateLimiter";
import {
  isResultOf,
  runTaskHandler,
  type HandlerUsage,
  type TaskHandlerContext,
} from "./taskHandlers";
import type { TaskLifecycle } from "./taskLifecycle";
import type { PipelineStore } from "./taskStore";
import type {
  ProviderDescriptor,
  TaskType,
  TranslationProject,
  TranslationTask,
} from "./types";

export interface WorkerPoolDependencies {
  store: PipelineStore;
  lifecycle: TaskLifecycle;
  limiter: ProviderRateLimiter;
  registry: CharacterMappingRegistry;
  content: ContentStore;
  ai: AiCapabilityService;
  providers: ReadonlyMap<string, ProviderDescriptor>;
  logger: FastifyBaseLogger;
  /** Called after every execution, successful or not. */
  onSettled: () => void;
  now?: () => Date;
}

export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  controller: AbortController,
  providerId: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(
        new PipelineTaskError(
          "provider_timeout",
          `Provider ${providerId} did not answer within ${timeoutMs}ms`,
          { retryable: true },
        ),
      );
    }, timeoutMs);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/** Sums what every AI call of one attempt reported, so failed attempts are billed too. */
class AttemptMeter {
  private usage: HandlerUsage | null = null;

  record(response: HandlerUsage) {
    const previous = this.usage;
    this.usage = previous
      ? {
          inputTokens: previous.inputTokens + response.inputTokens,
          outputTokens: previous.outputTokens + response.outputTokens,
          tokensUsed: previous.tokensUsed + response.tokensUsed,
          latencyMs: previous.latencyMs + response.latencyMs,
        }
      : {
          inputTokens: response.inputTokens,
          outputTokens: response.outputTokens,
          tokensUsed: response.tokensUsed,
          latencyMs: response.latencyMs,
        };
  }

  get total() {
    return this.usage;
  }
}

/**
 * Bounded set of execution slots. The scheduler reserves a slot (via
 * `freeSlots`) and a provider grant before dispatching; the pool always
 * returns the grant when the execution settles.
 */
export class WorkerPool {
  private readonly limit: LimitFunction;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly now: () => Date;

  constructor(
    readonly size: number,
    private readonly deps: WorkerPoolDependencies,
  ) {
    this.limit = pLimit(size);
    this.now = deps.now ?? (() => new Date());
  }

  get freeSlots() {
    return Math.max(
      0,
      this.size - this.limit.activeCount - this.limit.pendingCount,
    );
  }

  nextWorkerId() {
    return `worker-${nanoid(10)}`;
  }

  dispatch(task: TranslationTask, workerId: string) {
    const run = this.limit(() => this.execute(task, workerId));
    this.inFlight.add(run);
    void run
      .catch((err: unknown) => {
        this.deps.logger.error(
          { err, taskId: task.id, workerId },
          "[WORKER] Task execution could not be recorded",
        );
      })
      .finally(() => {
        this.inFlight.delete(run);
      });
  }

  /** Resolves once every dispatched execution has settled. */
  async drain() {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private async execute(task: TranslationTask, workerId: string) {
    const { logger, lifecycle, limiter, store } = this.deps;
    let project: TranslationProject | null = null;
    const meter = new AttemptMeter();
    try {
      project = await store.getProject(task.projectId);
      if (!project || project.status === "cancelled" || project.status === "failed") {
        logger.info(
          { taskId: task.id, projectId: task.projectId },
          "[WORKER] Skipping task of a stopped project",
        );
        return;
      }
      const provider = this.deps.providers.get(task.providerId);
      if (!provider) {
        throw new PipelineTaskError(
          "unknown_provider",
          `Provider ${task.providerId} is not configured`,
          { retryable: false },
        );
      }

      const controller = new AbortController();
      const context = this.buildContext(
        task,
        workerId,
        project,
        provider,
        controller.signal,
        meter,
      );
      const output = await withTimeout(
        runTaskHandler(context),
        provider.timeoutSeconds * 1000,
        controller,
        provider.id,
      );
      await lifecycle.complete(
        task,
        workerId,
        output.result,
        buildTaskUsage(provider, output.usage),
      );
    } catch (err) {
      const descriptor = toTaskErrorDescriptor(err, this.now());
      logger.warn(
        {
          err,
          taskId: task.id,
          taskType: task.taskType,
          chapterNumber: task.chapterNumber,
          code: descriptor.code,
          retryable: descriptor.retryable,
        },
        "[WORKER] Task attempt failed",
      );
      const provider = this.deps.providers.get(task.providerId);
      const billed = meter.total;
      await lifecycle.fail(
        task,
        workerId,
        descriptor,
        project?.config.backoff ?? "linear",
        provider && billed ? buildTaskUsage(provider, billed) : null,
      );
    } finally {
      limiter.release(task.providerId);
      this.deps.onSettled();
    }
  }

  private buildContext(
    task: TranslationTask,
    workerId: string,
    project: TranslationProject,
    provider: ProviderDescriptor,
    signal: AbortSignal,
    meter: AttemptMeter,
  ): TaskHandlerContext {
    const { store, content, ai, registry } = this.deps;
    let chapter: Promise<ChapterContent> | null = null;
    let chain: Promise<TranslationTask[]> | null = null;

    const loadChain = () => {
      chain ??= store
        .listTasks(task.projectId)
        .then((tasks) =>
          tasks.filter((entry) => entry.chapterNumber === task.chapterNumber),
        );
      return chain;
    };

    return {
      task,
      project,
      provider,
      loadChapter: () => {
        chapter ??= content
          .fetchChapter(project.sourceNovelId, task.targetId)
          .then((loaded) => {
            if (!loaded) {
              throw new PipelineTaskError(
                "chapter_missing",
                `Chapter ${task.chapterNumber} (${task.targetId}) is not available`,
                { retryable: false },
              );
            }
            return loaded;
          });
        return chapter;
      },
      stageResult: async <K extends TaskType>(type: K) => {
        const tasks = await loadChain();
        const stage = tasks.find(
          (entry) => entry.taskType === type && entry.status === "completed",
        );
        const result = stage ? stage.result : null;
        return isResultOf(result, type) ? result : null;
      },
      glossary: () => registry.glossary(task.projectId),
      invoke: async (payload) => {
        const current = await store.getTask(task.id);
        if (!current || current.status !== "running" || current.workerId !== workerId) {
          throw new PipelineTaskError(
            "claim_expired",
            `Task ${task.id} is no longer held by ${workerId}`,
            { retryable: true },
          );
        }
        const response = await ai.invoke({
          providerId: provider.id,
          taskType: task.taskType,
          payload,
          context: {
            projectId: task.projectId,
            taskId: task.id,
            chapterNumber: task.chapterNumber,
          },
          signal,
        });
        meter.record(response);
        return response;
      },
    };
  }
}
