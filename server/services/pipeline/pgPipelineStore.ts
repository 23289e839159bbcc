import type { PoolClient } from "pg";
import { v4 as uuidv4 } from "uuid";

import { withTransaction, type DbPool } from "../../db";
import {
  applyTaskTransition,
  matchesTransition,
  planFanOut,
  type TaskChange,
  type TaskTransitionRequest,
} from "./taskStateMachine";
import {
  applyProjectTransition,
  buildStatistic,
  projectTransitionAllowed,
  type PipelineStore,
  type ProjectReducer,
  type ProjectTransitionRequest,
  type TransitionOutcome,
} from "./taskStore";
import type {
  ChapterReviewStatus,
  CharacterMapping,
  CharacterType,
  Page,
  PageRequest,
  PipelineStatistic,
  ProjectErrorDescriptor,
  ProjectPipelineConfig,
  ProjectStatus,
  TaskErrorDescriptor,
  TaskResult,
  TaskStatus,
  TaskStatusCounts,
  TaskTargetType,
  TaskType,
  TranslatedChapter,
  TranslatedChapterPatch,
  TranslationProject,
  TranslationTask,
  QualityIssue,
} from "./types";

type Queryable = Pick<PoolClient, "query">;

interface ProjectRow {
  id: string;
  name: string;
  description: string | null;
  created_by: string | null;
  source_novel_id: string;
  source_language: string;
  target_language: string;
  start_chapter: number;
  end_chapter: number | null;
  config: ProjectPipelineConfig;
  status: ProjectStatus;
  resume_status: ProjectStatus | null;
  progress: string;
  total_chapters: number;
  completed_chapters: number;
  failed_chapters: number;
  total_tasks: number;
  task_counts: TaskStatusCounts;
  estimated_cost: string;
  actual_cost: string;
  tokens_used: string;
  average_quality_score: string | null;
  quality_score_sum: string;
  quality_scored_chapters: number;
  quality_issues_count: number;
  last_error: ProjectErrorDescriptor | null;
  status_timestamps: Partial<Record<ProjectStatus, string>>;
  created_at: Date;
  updated_at: Date;
}

interface TaskRow {
  id: string;
  project_id: string;
  task_type: TaskType;
  target_type: TaskTargetType;
  target_id: string;
  chapter_number: number;
  provider_id: string;
  status: TaskStatus;
  priority: number;
  sequence: number;
  depends_on: string | null;
  is_final_stage: boolean;
  retry_count: number;
  max_retries: number;
  retry_delay_seconds: string;
  retry_at: Date | null;
  worker_id: string | null;
  claimed_at: Date | null;
  started_at: Date | null;
  completed_at: Date | null;
  result: TaskResult | null;
  error: TaskErrorDescriptor | null;
  estimated_cost: string;
  actual_cost: string;
  tokens_used: string;
  created_at: Date;
  updated_at: Date;
}

interface MappingRow {
  project_id: string;
  original_name: string;
  translated_name: string;
  alternative_names: string[];
  character_type: CharacterType;
  confidence: string;
  is_verified: boolean;
  verified_by: string | null;
  verification_notes: string | null;
  auto_detected: boolean;
  detection_method: string | null;
  first_appearance_chapter: number | null;
  last_appearance_chapter: number | null;
  appearance_frequency: number;
  source_task_id: string | null;
  created_at: Date;
  updated_at: Date;
}

interface ChapterRow {
  project_id: string;
  chapter_number: number;
  chapter_id: string;
  content: string;
  outline: string | null;
  word_count: number;
  translation_method: string;
  provider_id: string | null;
  input_tokens: number;
  output_tokens: number;
  quality_score: string | null;
  quality_issues: QualityIssue[];
  review_status: ChapterReviewStatus;
  review_notes: string | null;
  created_at: Date;
  updated_at: Date;
}

interface StatisticRow {
  id: string;
  project_id: string;
  task_id: string;
  task_type: TaskType;
  chapter_number: number;
  from_status: TaskStatus;
  to_status: TaskStatus;
  tokens_used: string;
  cost: string;
  duration_ms: number | null;
  occurred_at: Date;
}

const iso = (value: Date | null) => (value ? value.toISOString() : null);
const json = (value: unknown) => (value === null ? null : JSON.stringify(value));

function toProject(row: ProjectRow): TranslationProject {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    createdBy: row.created_by,
    sourceNovelId: row.source_novel_id,
    sourceLanguage: row.source_language,
    targetLanguage: row.target_language,
    startChapter: row.start_chapter,
    endChapter: row.end_chapter,
    config: row.config,
    status: row.status,
    resumeStatus: row.resume_status,
    progress: Number(row.progress),
    totalChapters: row.total_chapters,
    completedChapters: row.completed_chapters,
    failedChapters: row.failed_chapters,
    totalTasks: row.total_tasks,
    taskCounts: row.task_counts,
    estimatedCost: Number(row.estimated_cost),
    actualCost: Number(row.actual_cost),
    tokensUsed: Number(row.tokens_used),
    averageQualityScore:
      row.average_quality_score === null ? null : Number(row.average_quality_score),
    qualityScoreSum: Number(row.quality_score_sum),
    qualityScoredChapters: row.quality_scored_chapters,
    qualityIssuesCount: row.quality_issues_count,
    lastError: row.last_error,
    statusTimestamps: row.status_timestamps,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}

function toTask(row: TaskRow): TranslationTask {
  return {
    id: row.id,
    projectId: row.project_id,
    taskType: row.task_type,
    targetType: row.target_type,
    targetId: row.target_id,
    chapterNumber: row.chapter_number,
    providerId: row.provider_id,
    status: row.status,
    priority: row.priority,
    sequence: row.sequence,
    dependsOn: row.depends_on,
    isFinalStage: row.is_final_stage,
    retryCount: row.retry_count,
    maxRetries: row.max_retries,
    retryDelaySeconds: Number(row.retry_delay_seconds),
    retryAt: iso(row.retry_at),
    workerId: row.worker_id,
    claimedAt: iso(row.claimed_at),
    startedAt: iso(row.started_at),
    completedAt: iso(row.completed_at),
    result: row.result,
    error: row.error,
    estimatedCost: Number(row.estimated_cost),
    actualCost: Number(row.actual_cost),
    tokensUsed: Number(row.tokens_used),
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}

function toMapping(row: MappingRow): CharacterMapping {
  return {
    projectId: row.project_id,
    originalName: row.original_name,
    translatedName: row.translated_name,
    alternativeNames: row.alternative_names,
    characterType: row.character_type,
    confidence: Number(row.confidence),
    isVerified: row.is_verified,
    verifiedBy: row.verified_by,
    verificationNotes: row.verification_notes,
    autoDetected: row.auto_detected,
    detectionMethod: row.detection_method,
    firstAppearanceChapter: row.first_appearance_chapter,
    lastAppearanceChapter: row.last_appearance_chapter,
    appearanceFrequency: row.appearance_frequency,
    sourceTaskId: row.source_task_id,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}

function toTranslatedChapter(row: ChapterRow): TranslatedChapter {
  return {
    projectId: row.project_id,
    chapterNumber: row.chapter_number,
    chapterId: row.chapter_id,
    content: row.content,
    outline: row.outline,
    wordCount: row.word_count,
    translationMethod: row.translation_method,
    providerId: row.provider_id,
    inputTokens: row.input_tokens,
    outputTokens: row.output_tokens,
    qualityScore: row.quality_score === null ? null : Number(row.quality_score),
    qualityIssues: row.quality_issues,
    reviewStatus: row.review_status,
    reviewNotes: row.review_notes,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}

/** Patch fields and their columns, in insert order. */
const CHAPTER_PATCH_COLUMNS: ReadonlyArray<[keyof TranslatedChapterPatch, string]> = [
  ["chapterId", "chapter_id"],
  ["content", "content"],
  ["outline", "outline"],
  ["wordCount", "word_count"],
  ["translationMethod", "translation_method"],
  ["providerId", "provider_id"],
  ["inputTokens", "input_tokens"],
  ["outputTokens", "output_tokens"],
  ["qualityScore", "quality_score"],
  ["qualityIssues", "quality_issues"],
  ["reviewStatus", "review_status"],
  ["reviewNotes", "review_notes"],
];

function toStatistic(row: StatisticRow): PipelineStatistic {
  return {
    id: row.id,
    projectId: row.project_id,
    taskId: row.task_id,
    taskType: row.task_type,
    chapterNumber: row.chapter_number,
    fromStatus: row.from_status,
    toStatus: row.to_status,
    tokensUsed: Number(row.tokens_used),
    cost: Number(row.cost),
    durationMs: row.duration_ms,
    occurredAt: row.occurred_at.toISOString(),
  };
}

const PROJECT_COLUMNS = `id, name, description, created_by, source_novel_id, source_language,
  target_language, start_chapter, end_chapter, config, status, resume_status, progress,
  total_chapters, completed_chapters, failed_chapters, total_tasks, task_counts,
  estimated_cost, actual_cost, tokens_used, average_quality_score, quality_score_sum,
  quality_scored_chapters, quality_issues_count, last_error, status_timestamps,
  created_at, updated_at`;

const TASK_COLUMNS = `id, project_id, task_type, target_type, target_id, chapter_number,
  provider_id, status, priority, sequence, depends_on, is_final_stage, retry_count,
  max_retries, retry_delay_seconds, retry_at, worker_id, claimed_at, started_at,
  completed_at, result, error, estimated_cost, actual_cost, tokens_used, created_at,
  updated_at`;

const placeholders = (count: number) =>
  Array.from({ length: count }, (_, index) => `$${index + 1}`).join(", ");

function projectValues(project: TranslationProject): unknown[] {
  return [
    project.id,
    project.name,
    project.description,
    project.createdBy,
    project.sourceNovelId,
    project.sourceLanguage,
    project.targetLanguage,
    project.startChapter,
    project.endChapter,
    json(project.config),
    project.status,
    project.resumeStatus,
    project.progress,
    project.totalChapters,
    project.completedChapters,
    project.failedChapters,
    project.totalTasks,
    json(project.taskCounts),
    project.estimatedCost,
    project.actualCost,
    project.tokensUsed,
    project.averageQualityScore,
    project.qualityScoreSum,
    project.qualityScoredChapters,
    project.qualityIssuesCount,
    json(project.lastError),
    json(project.statusTimestamps),
    project.createdAt,
    project.updatedAt,
  ];
}

function taskValues(task: TranslationTask): unknown[] {
  return [
    task.id,
    task.projectId,
    task.taskType,
    task.targetType,
    task.targetId,
    task.chapterNumber,
    task.providerId,
    task.status,
    task.priority,
    task.sequence,
    task.dependsOn,
    task.isFinalStage,
    task.retryCount,
    task.maxRetries,
    task.retryDelaySeconds,
    task.retryAt,
    task.workerId,
    task.claimedAt,
    task.startedAt,
    task.completedAt,
    json(task.result),
    json(task.error),
    task.estimatedCost,
    task.actualCost,
    task.tokensUsed,
    task.createdAt,
    task.updatedAt,
  ];
}

const PROJECT_COLUMN_COUNT = 29;
const TASK_COLUMN_COUNT = 27;

const UPSERT_PROJECT = `INSERT INTO translation_projects (${PROJECT_COLUMNS})
  VALUES (${placeholders(PROJECT_COLUMN_COUNT)})
  ON CONFLICT (id) DO UPDATE SET
    name = EXCLUDED.name, description = EXCLUDED.description,
    config = EXCLUDED.config, status = EXCLUDED.status,
    resume_status = EXCLUDED.resume_status, progress = EXCLUDED.progress,
    total_chapters = EXCLUDED.total_chapters,
    completed_chapters = EXCLUDED.completed_chapters,
    failed_chapters = EXCLUDED.failed_chapters, total_tasks = EXCLUDED.total_tasks,
    task_counts = EXCLUDED.task_counts, estimated_cost = EXCLUDED.estimated_cost,
    actual_cost = EXCLUDED.actual_cost, tokens_used = EXCLUDED.tokens_used,
    average_quality_score = EXCLUDED.average_quality_score,
    quality_score_sum = EXCLUDED.quality_score_sum,
    quality_scored_chapters = EXCLUDED.quality_scored_chapters,
    quality_issues_count = EXCLUDED.quality_issues_count,
    last_error = EXCLUDED.last_error, status_timestamps = EXCLUDED.status_timestamps,
    updated_at = EXCLUDED.updated_at
  RETURNING *`;

const UPSERT_TASK = `INSERT INTO translation_tasks (${TASK_COLUMNS})
  VALUES (${placeholders(TASK_COLUMN_COUNT)})
  ON CONFLICT (id) DO UPDATE SET
    status = EXCLUDED.status, retry_count = EXCLUDED.retry_count,
    retry_at = EXCLUDED.retry_at, worker_id = EXCLUDED.worker_id,
    claimed_at = EXCLUDED.claimed_at, started_at = EXCLUDED.started_at,
    completed_at = EXCLUDED.completed_at, result = EXCLUDED.result,
    error = EXCLUDED.error, actual_cost = EXCLUDED.actual_cost,
    tokens_used = EXCLUDED.tokens_used, updated_at = EXCLUDED.updated_at`;

/**
 * PostgreSQL store. Every transition locks the project row first, so all
 * commits inside one project are serialized and lock order is fixed.
 */
export class PgPipelineStore implements PipelineStore {
  constructor(
    private readonly pool: DbPool,
    private readonly idFactory: () => string = uuidv4,
  ) {}

  async createProject(project: TranslationProject) {
    const { rows } = await this.pool.query<ProjectRow>(
      `INSERT INTO translation_projects (${PROJECT_COLUMNS})
       VALUES (${placeholders(PROJECT_COLUMN_COUNT)}) RETURNING *`,
      projectValues(project),
    );
    return toProject(rows[0]);
  }

  async getProject(projectId: string) {
    const { rows } = await this.pool.query<ProjectRow>(
      "SELECT * FROM translation_projects WHERE id = $1",
      [projectId],
    );
    return rows.length ? toProject(rows[0]) : null;
  }

  async listProjects(statuses?: readonly ProjectStatus[]) {
    const { rows } = statuses
      ? await this.pool.query<ProjectRow>(
          "SELECT * FROM translation_projects WHERE status = ANY($1) ORDER BY created_at",
          [statuses],
        )
      : await this.pool.query<ProjectRow>(
          "SELECT * FROM translation_projects ORDER BY created_at",
        );
    return rows.map(toProject);
  }

  transitionProject(request: ProjectTransitionRequest) {
    return withTransaction(this.pool, async (client) => {
      const project = await this.lockProject(client, request.projectId);
      if (!project || !projectTransitionAllowed(project, request)) {
        return null;
      }
      return this.saveProject(client, applyProjectTransition(project, request));
    });
  }

  seedProjectTasks(
    request: ProjectTransitionRequest,
    tasks: readonly TranslationTask[],
  ) {
    return withTransaction(this.pool, async (client) => {
      const project = await this.lockProject(client, request.projectId);
      if (!project || !projectTransitionAllowed(project, request)) {
        return null;
      }
      const saved = await this.saveProject(
        client,
        applyProjectTransition(project, request),
      );
      const ordered = [...tasks].sort((left, right) => left.sequence - right.sequence);
      for (const task of ordered) {
        await client.query(UPSERT_TASK, taskValues(task));
      }
      return saved;
    });
  }

  async getTask(taskId: string) {
    const { rows } = await this.pool.query<TaskRow>(
      "SELECT * FROM translation_tasks WHERE id = $1",
      [taskId],
    );
    return rows.length ? toTask(rows[0]) : null;
  }

  async listTasks(projectId: string) {
    const { rows } = await this.pool.query<TaskRow>(
      "SELECT * FROM translation_tasks WHERE project_id = $1 ORDER BY sequence",
      [projectId],
    );
    return rows.map(toTask);
  }

  async listTasksByStatus(statuses: readonly TaskStatus[], projectId?: string) {
    const { rows } = projectId
      ? await this.pool.query<TaskRow>(
          `SELECT * FROM translation_tasks WHERE status = ANY($1) AND project_id = $2
           ORDER BY priority, created_at, sequence`,
          [statuses, projectId],
        )
      : await this.pool.query<TaskRow>(
          `SELECT * FROM translation_tasks WHERE status = ANY($1)
           ORDER BY priority, created_at, sequence`,
          [statuses],
        );
    return rows.map(toTask);
  }

  async transitionTask(
    request: TaskTransitionRequest,
    reducer: ProjectReducer,
  ): Promise<TransitionOutcome | null> {
    const located = await this.getTask(request.taskId);
    if (!located) {
      return null;
    }
    return withTransaction(this.pool, async (client) => {
      const project = await this.lockProject(client, located.projectId);
      if (!project) {
        return null;
      }
      const chain = await this.lockChain(client, located);
      const task = chain.find((entry) => entry.id === request.taskId);
      if (!task || !matchesTransition(task, request)) {
        return null;
      }

      const primary: TaskChange = {
        before: task,
        after: applyTaskTransition(task, request),
        usage: request.usage ?? null,
      };
      const changes = [
        primary,
        ...planFanOut(primary.after, request.fanOut, chain, request.at),
      ];

      let folded = project;
      const statistics: PipelineStatistic[] = [];
      for (const change of changes) {
        await client.query(UPSERT_TASK, taskValues(change.after));
        folded = reducer(folded, change, request.at);
        const statistic = buildStatistic(change, request.at, this.idFactory());
        await this.insertStatistic(client, statistic);
        statistics.push(statistic);
      }
      const saved = await this.saveProject(client, folded);
      return { project: saved, changes, statistics };
    });
  }

  async listStatistics(projectId: string, limit: number) {
    const { rows } = await this.pool.query<StatisticRow>(
      `SELECT * FROM pipeline_statistics WHERE project_id = $1
       ORDER BY occurred_at DESC LIMIT $2`,
      [projectId, limit],
    );
    return rows.map(toStatistic);
  }

  async listCharacterMappings(projectId: string) {
    const { rows } = await this.pool.query<MappingRow>(
      "SELECT * FROM character_mappings WHERE project_id = $1 ORDER BY original_name",
      [projectId],
    );
    return rows.map(toMapping);
  }

  async saveCharacterMapping(mapping: CharacterMapping) {
    await this.pool.query(
      `INSERT INTO character_mappings (
         project_id, original_name, translated_name, alternative_names, character_type,
         confidence, is_verified, verified_by, verification_notes, auto_detected,
         detection_method, first_appearance_chapter, last_appearance_chapter,
         appearance_frequency, source_task_id, created_at, updated_at)
       VALUES (${placeholders(17)})
       ON CONFLICT (project_id, original_name) DO UPDATE SET
         translated_name = EXCLUDED.translated_name,
         alternative_names = EXCLUDED.alternative_names,
         character_type = EXCLUDED.character_type,
         confidence = EXCLUDED.confidence,
         is_verified = EXCLUDED.is_verified,
         verified_by = EXCLUDED.verified_by,
         verification_notes = EXCLUDED.verification_notes,
         first_appearance_chapter = EXCLUDED.first_appearance_chapter,
         last_appearance_chapter = EXCLUDED.last_appearance_chapter,
         appearance_frequency = EXCLUDED.appearance_frequency,
         source_task_id = EXCLUDED.source_task_id,
         updated_at = EXCLUDED.updated_at
       WHERE NOT character_mappings.is_verified OR EXCLUDED.is_verified`,
      [
        mapping.projectId,
        mapping.originalName,
        mapping.translatedName,
        json(mapping.alternativeNames),
        mapping.characterType,
        mapping.confidence,
        mapping.isVerified,
        mapping.verifiedBy,
        mapping.verificationNotes,
        mapping.autoDetected,
        mapping.detectionMethod,
        mapping.firstAppearanceChapter,
        mapping.lastAppearanceChapter,
        mapping.appearanceFrequency,
        mapping.sourceTaskId,
        mapping.createdAt,
        mapping.updatedAt,
      ],
    );
  }

  async upsertTranslatedChapter(
    projectId: string,
    chapterNumber: number,
    patch: TranslatedChapterPatch,
    at: Date,
  ): Promise<TranslatedChapter> {
    const columns: string[] = [];
    const values: unknown[] = [projectId, chapterNumber];
    for (const [key, column] of CHAPTER_PATCH_COLUMNS) {
      const value = patch[key];
      if (value === undefined) continue;
      columns.push(column);
      values.push(key === "qualityIssues" ? json(value) : value);
    }
    values.push(at);
    const assignments = columns.map((column) => `${column} = EXCLUDED.${column}`);
    const { rows } = await this.pool.query<ChapterRow>(
      `INSERT INTO translated_chapters (
         project_id, chapter_number, ${[...columns, "created_at", "updated_at"].join(", ")})
       VALUES (${placeholders(values.length)}, $${values.length})
       ON CONFLICT (project_id, chapter_number) DO UPDATE SET
         ${[...assignments, "updated_at = EXCLUDED.updated_at"].join(", ")}
       RETURNING *`,
      values,
    );
    return toTranslatedChapter(rows[0]);
  }

  async listTranslatedChapters(
    projectId: string,
    page: PageRequest,
  ): Promise<Page<TranslatedChapter>> {
    const [{ rows }, count] = await Promise.all([
      this.pool.query<ChapterRow>(
        `SELECT * FROM translated_chapters WHERE project_id = $1
         ORDER BY chapter_number LIMIT $2 OFFSET $3`,
        [projectId, page.pageSize, (page.page - 1) * page.pageSize],
      ),
      this.pool.query<{ total: string }>(
        "SELECT COUNT(*) AS total FROM translated_chapters WHERE project_id = $1",
        [projectId],
      ),
    ]);
    return {
      items: rows.map(toTranslatedChapter),
      total: Number(count.rows[0]?.total ?? 0),
      page: page.page,
      pageSize: page.pageSize,
    };
  }

  private async lockProject(client: Queryable, projectId: string) {
    const { rows } = await client.query<ProjectRow>(
      "SELECT * FROM translation_projects WHERE id = $1 FOR UPDATE",
      [projectId],
    );
    return rows.length ? toProject(rows[0]) : null;
  }

  /** The chapter chain a task belongs to, locked for the fan-out. */
  private async lockChain(client: Queryable, task: TranslationTask) {
    const { rows } = await client.query<TaskRow>(
      `SELECT * FROM translation_tasks
       WHERE project_id = $1 AND chapter_number = $2
       ORDER BY sequence FOR UPDATE`,
      [task.projectId, task.chapterNumber],
    );
    return rows.map(toTask);
  }

  private async saveProject(client: Queryable, project: TranslationProject) {
    const { rows } = await client.query<ProjectRow>(
      UPSERT_PROJECT,
      projectValues(project),
    );
    return toProject(rows[0]);
  }

  private async insertStatistic(client: Queryable, statistic: PipelineStatistic) {
    await client.query(
      `INSERT INTO pipeline_statistics (
         id, project_id, task_id, task_type, chapter_number, from_status, to_status,
         tokens_used, cost, duration_ms, occurred_at)
       VALUES (${placeholders(11)})`,
      [
        statistic.id,
        statistic.projectId,
        statistic.taskId,
        statistic.taskType,
        statistic.chapterNumber,
        statistic.fromStatus,
        statistic.toStatus,
        statistic.tokensUsed,
        statistic.cost,
        statistic.durationMs,
        statistic.occurredAt,
      ],
    );
  }
}
