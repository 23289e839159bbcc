import type { FastifyBaseLogger } from "fastify";
import { v4 as uuidv4 } from "uuid";

import {
  mergeProjectConfig,
  type PipelineConfiguration,
  type ProjectConfigOverrides,
} from "../../config/pipelineConfiguration";
import type { AiCapabilityService } from "./aiCapabilityService";
import {
  CharacterMappingRegistry,
  type VerifyMappingInput,
} from "./characterMappings";
import type { ContentStore } from "./contentStore";
import { PipelineCommandError } from "./errors";
import { KeyedMutex } from "./keyedMutex";
import {
  connectEventSinks,
  PIPELINE_EVENTS,
  PipelineEventBus,
  type PipelineEventSink,
} from "./pipelineEvents";
import {
  buildProgressReport,
  countTasks,
  NEXT_PHASE,
  planProjectAdvance,
  type ProjectProgressReport,
} from "./projectAggregator";
import { ProviderRateLimiter } from "./rateLimiter";
import { PipelineScheduler } from "./scheduler";
import { buildTaskGraph } from "./taskGraph";
import { TaskLifecycle } from "./taskLifecycle";
import {
  isActivePhase,
  isTerminalTaskStatus,
  TERMINAL_PROJECT_STATUSES,
} from "./taskStateMachine";
import type { PipelineStore, ProjectPatch, TransitionOutcome } from "./taskStore";
import {
  emptyTaskCounts,
  type CharacterMapping,
  type Page,
  type PageRequest,
  type PipelineStatistic,
  type ProjectStatus,
  type TaskStatus,
  type TaskType,
  type TranslatedChapter,
  type TranslationProject,
  type TranslationTask,
} from "./types";
import { WorkerPool } from "./workerPool";

export interface CreateProjectInput {
  name: string;
  description?: string | null;
  sourceNovelId: string;
  sourceLanguage: string;
  targetLanguage: string;
  startChapter?: number;
  endChapter?: number | null;
  config?: ProjectConfigOverrides;
}

export interface TaskListFilter {
  status?: TaskStatus;
  taskType?: TaskType;
  chapterNumber?: number;
}

export interface TaskDetail {
  task: TranslationTask;
  history: PipelineStatistic[];
}

export interface OrchestratorDependencies {
  store: PipelineStore;
  content: ContentStore;
  ai: AiCapabilityService;
  configuration: PipelineConfiguration;
  logger: FastifyBaseLogger;
  sinks?: readonly PipelineEventSink[];
  now?: () => Date;
  idFactory?: () => string;
}

const OPEN_PROJECT_STATUSES: readonly ProjectStatus[] = [
  "created",
  "analyzing",
  "translating",
  "reviewing",
  "paused",
];

const HISTORY_LIMIT = 500;

/**
 * Entry point of the translation pipeline. Commands return as soon as the
 * state change is committed; execution happens on scheduler ticks.
 */
export class TranslationPipelineOrchestrator {
  readonly bus = new PipelineEventBus();
  readonly limiter: ProviderRateLimiter;
  readonly registry: CharacterMappingRegistry;
  readonly lifecycle: TaskLifecycle;
  readonly pool: WorkerPool;
  readonly scheduler: PipelineScheduler;

  private readonly store: PipelineStore;
  private readonly content: ContentStore;
  private readonly configuration: PipelineConfiguration;
  private readonly logger: FastifyBaseLogger;
  private readonly sinks: readonly PipelineEventSink[];
  private readonly now: () => Date;
  private readonly idFactory: () => string;
  private readonly projectLocks = new KeyedMutex();
  /** Projects whose dispatch is frozen ahead of the pause/cancel commit. */
  private readonly halted = new Set<string>();
  private disconnectSinks: (() => void) | null = null;
  private readonly onTaskCommitted = (outcome: TransitionOutcome) => {
    const projectId = outcome.project.id;
    void this.projectLocks
      .run(projectId, () => this.advance(projectId))
      .catch((err: unknown) => {
        this.logger.error({ err, projectId }, "[PIPELINE] Project advance failed");
      })
      .finally(() => this.scheduler.requestTick());
  };

  constructor(deps: OrchestratorDependencies) {
    this.store = deps.store;
    this.content = deps.content;
    this.configuration = deps.configuration;
    this.logger = deps.logger;
    this.sinks = deps.sinks ?? [];
    this.now = deps.now ?? (() => new Date());
    this.idFactory = deps.idFactory ?? uuidv4;

    const providers = new Map(
      deps.configuration.providers.map((provider) => [provider.id, provider]),
    );
    this.limiter = new ProviderRateLimiter(deps.configuration.providers);
    this.registry = new CharacterMappingRegistry(deps.store, {
      mergePolicy: deps.configuration.mappingMergePolicy,
      logger: deps.logger,
      now: this.now,
    });
    this.lifecycle = new TaskLifecycle(
      deps.store,
      this.registry,
      this.bus,
      deps.logger,
      { now: this.now },
    );
    this.pool = new WorkerPool(deps.configuration.workerPoolSize, {
      store: deps.store,
      lifecycle: this.lifecycle,
      limiter: this.limiter,
      registry: this.registry,
      content: deps.content,
      ai: deps.ai,
      providers,
      logger: deps.logger,
      onSettled: () => this.scheduler.requestTick(),
      now: this.now,
    });
    this.scheduler = new PipelineScheduler({
      store: deps.store,
      lifecycle: this.lifecycle,
      limiter: this.limiter,
      pool: this.pool,
      logger: deps.logger,
      livenessTimeoutMs: deps.configuration.livenessTimeoutSeconds * 1000,
      isDispatchable: (projectId) => !this.halted.has(projectId),
      now: this.now,
    });
  }

  /** Connects sinks and starts scheduling; re-evaluates projects left mid-phase. */
  async start() {
    this.disconnectSinks = connectEventSinks(this.bus, this.sinks, this.logger);
    this.bus.on(PIPELINE_EVENTS.TASK_COMMITTED, this.onTaskCommitted);
    this.scheduler.start();
    const open = await this.store.listProjects(["analyzing", "translating", "reviewing"]);
    for (const project of open) {
      await this.projectLocks.run(project.id, () => this.advance(project.id));
    }
    this.scheduler.requestTick();
  }

  async stop() {
    this.scheduler.stop();
    this.bus.off(PIPELINE_EVENTS.TASK_COMMITTED, this.onTaskCommitted);
    this.disconnectSinks?.();
    this.disconnectSinks = null;
    await this.pool.drain();
  }

  async createProject(
    input: CreateProjectInput,
    createdBy: string | null,
  ): Promise<TranslationProject> {
    const config = mergeProjectConfig(
      this.configuration.projectDefaults,
      input.config,
    );
    for (const [stage, providerId] of Object.entries(config.stageProviders)) {
      if (!this.configuration.providers.some((provider) => provider.id === providerId)) {
        throw new PipelineCommandError(
          "invalid_config",
          `Unknown provider ${providerId} for ${stage}`,
        );
      }
    }
    const startChapter = input.startChapter ?? 1;
    const endChapter = input.endChapter ?? null;
    if (endChapter !== null && endChapter < startChapter) {
      throw new PipelineCommandError(
        "invalid_request",
        "endChapter must not be before startChapter",
      );
    }

    const at = this.now().toISOString();
    const project: TranslationProject = {
      id: this.idFactory(),
      name: input.name,
      description: input.description ?? null,
      createdBy,
      sourceNovelId: input.sourceNovelId,
      sourceLanguage: input.sourceLanguage,
      targetLanguage: input.targetLanguage,
      startChapter,
      endChapter,
      config,
      status: "created",
      resumeStatus: null,
      progress: 0,
      totalChapters: 0,
      completedChapters: 0,
      failedChapters: 0,
      totalTasks: 0,
      taskCounts: emptyTaskCounts(),
      estimatedCost: 0,
      actualCost: 0,
      tokensUsed: 0,
      averageQualityScore: null,
      qualityScoreSum: 0,
      qualityScoredChapters: 0,
      qualityIssuesCount: 0,
      lastError: null,
      statusTimestamps: { created: at },
      createdAt: at,
      updatedAt: at,
    };
    const created = await this.store.createProject(project);
    this.logger.info(
      { projectId: created.id, sourceNovelId: created.sourceNovelId },
      "[PIPELINE] Project created",
    );
    return created;
  }

  /** Expands the project into its task graph and enters the analysis phase. */
  async startProject(projectId: string): Promise<TranslationProject> {
    const started = await this.projectLocks.run(projectId, async () => {
      const project = await this.requireProject(projectId);
      if (project.status !== "created") {
        throw this.invalidState(project, "start");
      }
      const chapters = await this.content.listChapters(project.sourceNovelId);
      const graph = buildTaskGraph(project, chapters, this.configuration.providers, {
        idFactory: this.idFactory,
        now: this.now(),
      });
      const seeded = await this.store.seedProjectTasks(
        {
          projectId,
          from: ["created"],
          to: "analyzing",
          patch: {
            totalChapters: graph.totalChapters,
            totalTasks: graph.tasks.length,
            taskCounts: countTasks(graph.tasks),
            estimatedCost: graph.estimatedCost,
            progress: 0,
          },
          at: this.now(),
        },
        graph.tasks,
      );
      if (!seeded) {
        throw this.invalidState(project, "start");
      }
      this.announce(seeded, project.status);
      this.logger.info(
        {
          projectId,
          totalChapters: graph.totalChapters,
          totalTasks: graph.tasks.length,
          estimatedCost: graph.estimatedCost,
        },
        "[PIPELINE] Project started",
      );
      return (await this.advance(projectId)) ?? seeded;
    });
    this.scheduler.requestTick();
    return started;
  }

  /** Freezes dispatch; running tasks finish and their results still count. */
  async pauseProject(projectId: string): Promise<TranslationProject> {
    const wasHalted = this.halted.has(projectId);
    this.halted.add(projectId);
    try {
      return await this.projectLocks.run(projectId, async () => {
        const project = await this.requireProject(projectId);
        if (!isActivePhase(project.status)) {
          throw this.invalidState(project, "pause");
        }
        const paused = await this.transition(project, "paused", {
          resumeStatus: project.status,
        });
        if (!paused) {
          throw this.invalidState(project, "pause");
        }
        return paused;
      });
    } catch (err) {
      if (!wasHalted) {
        this.halted.delete(projectId);
      }
      throw err;
    }
  }

  async resumeProject(projectId: string): Promise<TranslationProject> {
    const resumed = await this.projectLocks.run(projectId, async () => {
      const project = await this.requireProject(projectId);
      const target = project.resumeStatus;
      if (project.status !== "paused" || !target) {
        throw this.invalidState(project, "resume");
      }
      const next = await this.transition(project, target, { resumeStatus: null });
      if (!next) {
        throw this.invalidState(project, "resume");
      }
      this.halted.delete(projectId);
      return (await this.advance(projectId)) ?? next;
    });
    this.scheduler.requestTick();
    return resumed;
  }

  /** Stops the project for good; results of in-flight calls are discarded. */
  async cancelProject(projectId: string): Promise<TranslationProject> {
    this.halted.add(projectId);
    return this.projectLocks.run(projectId, async () => {
      const project = await this.requireProject(projectId);
      if (!OPEN_PROJECT_STATUSES.includes(project.status)) {
        throw this.invalidState(project, "cancel");
      }
      const cancelled = await this.transition(project, "cancelled", {
        resumeStatus: null,
      });
      if (!cancelled) {
        throw this.invalidState(project, "cancel");
      }
      await this.cancelOpenTasks(projectId, {
        code: "project_cancelled",
        message: "Project was cancelled by an operator",
      });
      return (await this.store.getProject(projectId)) ?? cancelled;
    });
  }

  /**
   * Gives failed and cancelled tasks a fresh retry budget and re-enters the
   * pipeline. Completed chapters are kept.
   */
  async restartProject(projectId: string): Promise<TranslationProject> {
    const restarted = await this.projectLocks.run(projectId, async () => {
      const project = await this.requireProject(projectId);
      if (project.status !== "failed" && project.status !== "cancelled") {
        throw this.invalidState(project, "restart");
      }
      const tasks = await this.store.listTasks(projectId);
      const target: ProjectStatus = tasks.length === 0 ? "created" : "analyzing";
      const next = await this.transition(project, target, {
        resumeStatus: null,
        lastError: null,
      });
      if (!next) {
        throw this.invalidState(project, "restart");
      }
      this.halted.delete(projectId);

      const statusById = new Map(tasks.map((task) => [task.id, task.status]));
      const ordered = [...tasks].sort((left, right) => left.sequence - right.sequence);
      for (const task of ordered) {
        if (task.status !== "failed_terminal" && task.status !== "cancelled") {
          continue;
        }
        const predecessor = task.dependsOn ? statusById.get(task.dependsOn) : null;
        const runnable = !task.dependsOn || predecessor === "completed";
        const outcome = await this.lifecycle.restart(task, runnable);
        const [change] = outcome?.changes ?? [];
        if (change) {
          statusById.set(task.id, change.after.status);
        }
      }
      this.logger.info({ projectId, status: target }, "[PIPELINE] Project restarted");
      return (await this.advance(projectId)) ?? (await this.requireProject(projectId));
    });
    this.scheduler.requestTick();
    return restarted;
  }

  async getProject(projectId: string) {
    return this.requireProject(projectId);
  }

  async listProjects(statuses?: readonly ProjectStatus[]) {
    return this.store.listProjects(statuses);
  }

  async getProjectProgress(projectId: string): Promise<ProjectProgressReport> {
    const project = await this.requireProject(projectId);
    const [tasks, statistics] = await Promise.all([
      this.store.listTasks(projectId),
      this.store.listStatistics(projectId, HISTORY_LIMIT),
    ]);
    return buildProgressReport(project, tasks, statistics);
  }

  async getTaskDetail(taskId: string): Promise<TaskDetail> {
    const task = await this.store.getTask(taskId);
    if (!task) {
      throw new PipelineCommandError("task_not_found", `Task ${taskId} not found`);
    }
    const statistics = await this.store.listStatistics(task.projectId, HISTORY_LIMIT);
    return {
      task,
      history: statistics.filter((entry) => entry.taskId === taskId),
    };
  }

  async listTasks(
    projectId: string,
    filter: TaskListFilter = {},
  ): Promise<TranslationTask[]> {
    await this.requireProject(projectId);
    const tasks = await this.store.listTasks(projectId);
    return tasks
      .filter(
        (task) =>
          (filter.status === undefined || task.status === filter.status) &&
          (filter.taskType === undefined || task.taskType === filter.taskType) &&
          (filter.chapterNumber === undefined ||
            task.chapterNumber === filter.chapterNumber),
      )
      .sort((left, right) => left.sequence - right.sequence);
  }

  async listTranslatedChapters(
    projectId: string,
    page: PageRequest = { page: 1, pageSize: 20 },
  ): Promise<Page<TranslatedChapter>> {
    await this.requireProject(projectId);
    if (page.page < 1 || page.pageSize < 1) {
      throw new PipelineCommandError(
        "invalid_request",
        "page and pageSize must be positive",
      );
    }
    return this.store.listTranslatedChapters(projectId, page);
  }

  async listCharacterMappings(projectId: string): Promise<CharacterMapping[]> {
    await this.requireProject(projectId);
    return this.registry.list(projectId);
  }

  async verifyCharacterMapping(
    projectId: string,
    originalName: string,
    input: VerifyMappingInput,
  ): Promise<CharacterMapping> {
    await this.requireProject(projectId);
    return this.registry.verify(projectId, originalName, input);
  }

  /**
   * Applies the failure policy and phase completion. Runs under the project
   * lock; returns the project when its status changed.
   */
  private async advance(projectId: string): Promise<TranslationProject | null> {
    let project = await this.store.getProject(projectId);
    if (!project) return null;
    const tasks = await this.store.listTasks(projectId);
    const plan = planProjectAdvance(project, tasks);
    if (!plan) return null;

    if (plan.kind === "fail") {
      const failed = await this.transition(project, "failed", {
        resumeStatus: null,
        lastError: { code: plan.code, message: plan.message },
      });
      if (!failed) return null;
      this.halted.delete(projectId);
      this.logger.warn({ projectId, reason: plan.message }, "[PIPELINE] Project failed");
      await this.cancelOpenTasks(projectId, {
        code: "project_failed",
        message: plan.message,
      });
      return (await this.store.getProject(projectId)) ?? failed;
    }

    if (project.status === "paused" && plan.to !== "completed") {
      return this.transition(project, "paused", { resumeStatus: plan.to });
    }

    let changed: TranslationProject | null = null;
    while (project && project.status !== plan.to) {
      const step: ProjectStatus =
        project.status === "paused"
          ? plan.to
          : isActivePhase(project.status)
            ? NEXT_PHASE[project.status]
            : plan.to;
      const next = await this.transition(project, step, { resumeStatus: null });
      if (!next) break;
      changed = next;
      project = next;
    }
    if (changed?.status === "completed") {
      this.halted.delete(projectId);
      this.logger.info(
        {
          projectId,
          completedChapters: changed.completedChapters,
          failedChapters: changed.failedChapters,
          actualCost: changed.actualCost,
        },
        "[PIPELINE] Project completed",
      );
    }
    return changed;
  }

  private async cancelOpenTasks(
    projectId: string,
    reason: { code: string; message: string },
  ) {
    const tasks = await this.store.listTasks(projectId);
    for (const task of tasks) {
      if (!isTerminalTaskStatus(task.status)) {
        await this.lifecycle.cancel(task, reason);
      }
    }
  }

  private async transition(
    project: TranslationProject,
    to: ProjectStatus,
    patch: ProjectPatch,
  ): Promise<TranslationProject | null> {
    const next = await this.store.transitionProject({
      projectId: project.id,
      from: [project.status],
      to,
      patch,
      at: this.now(),
    });
    if (next) {
      this.announce(next, project.status);
    }
    return next;
  }

  private announce(project: TranslationProject, oldStatus: ProjectStatus) {
    if (project.status === oldStatus) return;
    if (TERMINAL_PROJECT_STATUSES.has(project.status)) {
      this.registry.evict(project.id);
    }
    this.bus.emit(PIPELINE_EVENTS.PROJECT_STATUS_CHANGED, { project, oldStatus });
  }

  private async requireProject(projectId: string) {
    const project = await this.store.getProject(projectId);
    if (!project) {
      throw new PipelineCommandError(
        "project_not_found",
        `Project ${projectId} not found`,
      );
    }
    return project;
  }

  private invalidState(project: TranslationProject, action: string) {
    const terminal = TERMINAL_PROJECT_STATUSES.has(project.status);
    return new PipelineCommandError(
      "invalid_project_state",
      `Cannot ${action} project ${project.id} while it is ${project.status}${terminal ? " (terminal)" : ""}`,
    );
  }
}
