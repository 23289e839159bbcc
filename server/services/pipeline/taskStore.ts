import { v4 as uuidv4 } from "uuid";

import {
  applyTaskTransition,
  canTransitionProject,
  matchesTransition,
  planFanOut,
  type TaskChange,
  type TaskTransitionRequest,
} from "./taskStateMachine";
import { applyTranslatedChapterPatch, emptyTranslatedChapter } from "./translatedChapters";
import type {
  CharacterMapping,
  Page,
  PageRequest,
  PipelineStatistic,
  ProjectStatus,
  TaskStatus,
  TranslatedChapter,
  TranslatedChapterPatch,
  TranslationProject,
  TranslationTask,
} from "./types";

/** Folds one task change into its project. Must be pure. */
export type ProjectReducer = (
  project: TranslationProject,
  change: TaskChange,
  at: Date,
) => TranslationProject;

export type ProjectPatch = Partial<
  Omit<
    TranslationProject,
    "id" | "status" | "createdAt" | "updatedAt" | "statusTimestamps"
  >
>;

export interface ProjectTransitionRequest {
  projectId: string;
  from: readonly ProjectStatus[];
  to: ProjectStatus;
  patch?: ProjectPatch;
  at: Date;
}

export interface TransitionOutcome {
  project: TranslationProject;
  /** The requested change first, then fan-out changes in chain order. */
  changes: TaskChange[];
  statistics: PipelineStatistic[];
}

export interface CharacterMappingStore {
  listCharacterMappings(projectId: string): Promise<CharacterMapping[]>;
  /** Upsert; an unverified write never replaces a verified entry. */
  saveCharacterMapping(mapping: CharacterMapping): Promise<void>;
}

export interface TranslatedChapterStore {
  /** Creates the chapter record on first write; later writes only set the patched fields. */
  upsertTranslatedChapter(
    projectId: string,
    chapterNumber: number,
    patch: TranslatedChapterPatch,
    at: Date,
  ): Promise<TranslatedChapter>;
  /** Ordered by chapter number. */
  listTranslatedChapters(
    projectId: string,
    page: PageRequest,
  ): Promise<Page<TranslatedChapter>>;
}

/**
 * Durable state of the pipeline. Every method is atomic on its own; the
 * transition methods are compare-and-set operations that return null when
 * their preconditions no longer hold.
 */
export interface PipelineStore extends CharacterMappingStore, TranslatedChapterStore {
  createProject(project: TranslationProject): Promise<TranslationProject>;
  getProject(projectId: string): Promise<TranslationProject | null>;
  listProjects(
    statuses?: readonly ProjectStatus[],
  ): Promise<TranslationProject[]>;
  transitionProject(
    request: ProjectTransitionRequest,
  ): Promise<TranslationProject | null>;
  /** Moves the project out of `created` and inserts its task graph in one unit. */
  seedProjectTasks(
    request: ProjectTransitionRequest,
    tasks: readonly TranslationTask[],
  ): Promise<TranslationProject | null>;
  getTask(taskId: string): Promise<TranslationTask | null>;
  listTasks(projectId: string): Promise<TranslationTask[]>;
  listTasksByStatus(
    statuses: readonly TaskStatus[],
    projectId?: string,
  ): Promise<TranslationTask[]>;
  /**
   * Commits a task transition, its fan-out, the project fold and the
   * statistics records as one unit.
   */
  transitionTask(
    request: TaskTransitionRequest,
    reducer: ProjectReducer,
  ): Promise<TransitionOutcome | null>;
  /** Newest first. */
  listStatistics(projectId: string, limit: number): Promise<PipelineStatistic[]>;
}

export function buildStatistic(
  change: TaskChange,
  at: Date,
  id: string,
): PipelineStatistic {
  const { before, after, usage } = change;
  const startedAt = after.startedAt ? Date.parse(after.startedAt) : null;
  const settled = after.status !== "running" && after.status !== "ready";
  return {
    id,
    projectId: after.projectId,
    taskId: after.id,
    taskType: after.taskType,
    chapterNumber: after.chapterNumber,
    fromStatus: before.status,
    toStatus: after.status,
    tokensUsed: usage?.tokensUsed ?? 0,
    cost: usage?.cost ?? 0,
    durationMs:
      settled && startedAt !== null && before.status === "running"
        ? Math.max(0, at.getTime() - startedAt)
        : null,
    occurredAt: at.toISOString(),
  };
}

export function applyProjectTransition(
  project: TranslationProject,
  request: ProjectTransitionRequest,
): TranslationProject {
  const at = request.at.toISOString();
  const statusTimestamps =
    project.status === request.to
      ? project.statusTimestamps
      : { ...project.statusTimestamps, [request.to]: at };
  return {
    ...project,
    ...(request.patch ?? {}),
    status: request.to,
    statusTimestamps,
    updatedAt: at,
  };
}

export function projectTransitionAllowed(
  project: TranslationProject,
  request: ProjectTransitionRequest,
): boolean {
  return (
    request.from.includes(project.status) &&
    canTransitionProject(project.status, request.to)
  );
}

const clone = <T>(value: T): T => structuredClone(value);

/**
 * In-process store. Each mutation runs to completion without yielding, which
 * makes every method atomic with respect to other callers.
 */
export class MemoryPipelineStore implements PipelineStore {
  private readonly projects = new Map<string, TranslationProject>();
  private readonly tasks = new Map<string, TranslationTask>();
  private readonly tasksByProject = new Map<string, string[]>();
  private readonly mappings = new Map<string, Map<string, CharacterMapping>>();
  private readonly statistics = new Map<string, PipelineStatistic[]>();
  private readonly chapters = new Map<string, Map<number, TranslatedChapter>>();
  private readonly idFactory: () => string;

  constructor(options: { idFactory?: () => string } = {}) {
    this.idFactory = options.idFactory ?? uuidv4;
  }

  async createProject(project: TranslationProject) {
    if (this.projects.has(project.id)) {
      throw new Error(`Project ${project.id} already exists`);
    }
    this.projects.set(project.id, clone(project));
    this.tasksByProject.set(project.id, []);
    return clone(project);
  }

  async getProject(projectId: string) {
    const project = this.projects.get(projectId);
    return project ? clone(project) : null;
  }

  async listProjects(statuses?: readonly ProjectStatus[]) {
    return [...this.projects.values()]
      .filter((project) => !statuses || statuses.includes(project.status))
      .map(clone);
  }

  async transitionProject(request: ProjectTransitionRequest) {
    const project = this.projects.get(request.projectId);
    if (!project || !projectTransitionAllowed(project, request)) {
      return null;
    }
    const next = applyProjectTransition(project, request);
    this.projects.set(next.id, next);
    return clone(next);
  }

  async seedProjectTasks(
    request: ProjectTransitionRequest,
    tasks: readonly TranslationTask[],
  ) {
    const project = this.projects.get(request.projectId);
    if (!project || !projectTransitionAllowed(project, request)) {
      return null;
    }
    const next = applyProjectTransition(project, request);
    this.projects.set(next.id, next);
    const ids = this.tasksByProject.get(next.id) ?? [];
    for (const task of tasks) {
      this.tasks.set(task.id, clone(task));
      ids.push(task.id);
    }
    this.tasksByProject.set(next.id, ids);
    return clone(next);
  }

  async getTask(taskId: string) {
    const task = this.tasks.get(taskId);
    return task ? clone(task) : null;
  }

  async listTasks(projectId: string) {
    return this.projectTasks(projectId).map(clone);
  }

  async listTasksByStatus(statuses: readonly TaskStatus[], projectId?: string) {
    const source = projectId
      ? this.projectTasks(projectId)
      : [...this.tasks.values()];
    return source.filter((task) => statuses.includes(task.status)).map(clone);
  }

  async transitionTask(
    request: TaskTransitionRequest,
    reducer: ProjectReducer,
  ): Promise<TransitionOutcome | null> {
    const task = this.tasks.get(request.taskId);
    if (!task || !matchesTransition(task, request)) {
      return null;
    }
    const project = this.projects.get(task.projectId);
    if (!project) {
      return null;
    }

    const primary: TaskChange = {
      before: task,
      after: applyTaskTransition(task, request),
      usage: request.usage ?? null,
    };
    const changes = [
      primary,
      ...planFanOut(
        primary.after,
        request.fanOut,
        this.projectTasks(task.projectId),
        request.at,
      ),
    ];

    let folded = project;
    const statistics: PipelineStatistic[] = [];
    for (const change of changes) {
      this.tasks.set(change.after.id, change.after);
      folded = reducer(folded, change, request.at);
      statistics.push(buildStatistic(change, request.at, this.idFactory()));
    }
    this.projects.set(folded.id, folded);
    const log = this.statistics.get(folded.id) ?? [];
    log.push(...statistics);
    this.statistics.set(folded.id, log);

    return clone({ project: folded, changes, statistics });
  }

  async listStatistics(projectId: string, limit: number) {
    const log = this.statistics.get(projectId) ?? [];
    return log.slice(-limit).reverse().map(clone);
  }

  async listCharacterMappings(projectId: string) {
    const scope = this.mappings.get(projectId);
    return scope ? [...scope.values()].map(clone) : [];
  }

  async saveCharacterMapping(mapping: CharacterMapping) {
    const scope =
      this.mappings.get(mapping.projectId) ?? new Map<string, CharacterMapping>();
    const existing = scope.get(mapping.originalName);
    if (existing?.isVerified && !mapping.isVerified) {
      return;
    }
    scope.set(mapping.originalName, clone(mapping));
    this.mappings.set(mapping.projectId, scope);
  }

  async upsertTranslatedChapter(
    projectId: string,
    chapterNumber: number,
    patch: TranslatedChapterPatch,
    at: Date,
  ) {
    const timestamp = at.toISOString();
    const scope =
      this.chapters.get(projectId) ?? new Map<number, TranslatedChapter>();
    const existing =
      scope.get(chapterNumber) ??
      emptyTranslatedChapter(projectId, chapterNumber, timestamp);
    const next = applyTranslatedChapterPatch(existing, clone(patch), timestamp);
    scope.set(chapterNumber, next);
    this.chapters.set(projectId, scope);
    return clone(next);
  }

  async listTranslatedChapters(projectId: string, page: PageRequest) {
    const all = [...(this.chapters.get(projectId)?.values() ?? [])].sort(
      (left, right) => left.chapterNumber - right.chapterNumber,
    );
    const offset = (page.page - 1) * page.pageSize;
    return {
      items: all.slice(offset, offset + page.pageSize).map(clone),
      total: all.length,
      page: page.page,
      pageSize: page.pageSize,
    };
  }

  private projectTasks(projectId: string): TranslationTask[] {
    const ids = this.tasksByProject.get(projectId) ?? [];
    const tasks: TranslationTask[] = [];
    for (const id of ids) {
      const task = this.tasks.get(id);
      if (task) {
        tasks.push(task);
      }
    }
    return tasks;
  }
}
