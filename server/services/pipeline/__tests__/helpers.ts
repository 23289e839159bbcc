import pino from "pino";

import {
  DEFAULT_PROJECT_CONFIG,
  mergeProjectConfig,
  type PipelineConfiguration,
  type ProjectConfigOverrides,
} from "../../../config/pipelineConfiguration";
import type {
  AiCapabilityService,
  AiInvocation,
  AiInvocationResult,
} from "../aiCapabilityService";
import type { ChapterContent, ContentStore } from "../contentStore";
import { PipelineTaskError } from "../errors";
import type { ChapterSummary } from "../taskGraph";
import {
  emptyTaskCounts,
  type ProviderDescriptor,
  type TaskType,
  type TranslationProject,
  type TranslationTask,
} from "../types";

export const silentLogger = pino({ level: "silent" });

export const FIXED_NOW = new Date("2024-05-01T00:00:00.000Z");

export function buildProvider(
  overrides: Partial<ProviderDescriptor> = {},
): ProviderDescriptor {
  return {
    id: "mock",
    displayName: "Mock provider",
    vendor: "custom",
    model: "mock-model",
    baseUrl: null,
    apiKeyEnv: null,
    capabilities: ["outline", "character_map", "translate", "quality_check", "review"],
    supportedLanguages: [],
    maxConcurrentRequests: 4,
    maxRequestsPerMinute: 1000,
    maxRequestsPerDay: 100_000,
    timeoutSeconds: 5,
    costPer1kInputTokens: 0.001,
    costPer1kOutputTokens: 0.002,
    priority: 5,
    ...overrides,
  };
}

export function buildConfiguration(
  options: {
    providers?: ProviderDescriptor[];
    projectDefaults?: ProjectConfigOverrides;
    workerPoolSize?: number;
  } = {},
): PipelineConfiguration {
  return {
    workerPoolSize: options.workerPoolSize ?? 8,
    livenessTimeoutSeconds: 900,
    mappingMergePolicy: "first_writer_wins",
    projectDefaults: mergeProjectConfig(DEFAULT_PROJECT_CONFIG, {
      retryDelaySeconds: 0,
      ...options.projectDefaults,
    }),
    providers: options.providers ?? [buildProvider()],
  };
}

export function buildProject(
  overrides: Partial<TranslationProject> = {},
): TranslationProject {
  const at = FIXED_NOW.toISOString();
  return {
    id: "project-1",
    name: "Test novel",
    description: null,
    createdBy: "user-1",
    sourceNovelId: "novel-1",
    sourceLanguage: "zh",
    targetLanguage: "en",
    startChapter: 1,
    endChapter: null,
    config: { ...DEFAULT_PROJECT_CONFIG },
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
    ...overrides,
  };
}

export function buildTask(overrides: Partial<TranslationTask> = {}): TranslationTask {
  const at = FIXED_NOW.toISOString();
  return {
    id: "task-1",
    projectId: "project-1",
    taskType: "translate",
    targetType: "chapter",
    targetId: "chapter-1",
    chapterNumber: 1,
    providerId: "mock",
    status: "ready",
    priority: 5,
    sequence: 1,
    dependsOn: null,
    isFinalStage: true,
    retryCount: 0,
    maxRetries: 3,
    retryDelaySeconds: 0,
    retryAt: null,
    workerId: null,
    claimedAt: null,
    startedAt: null,
    completedAt: null,
    result: null,
    error: null,
    estimatedCost: 0,
    actualCost: 0,
    tokensUsed: 0,
    createdAt: at,
    updatedAt: at,
    ...overrides,
  };
}

export const chapterSummaries = (count: number, characterCount = 400): ChapterSummary[] =>
  Array.from({ length: count }, (_, index) => ({
    chapterId: `chapter-${index + 1}`,
    chapterNumber: index + 1,
    title: `Chapter ${index + 1}`,
    characterCount,
  }));

export class FakeContentStore implements ContentStore {
  private readonly chapters: ChapterContent[];

  constructor(novelId: string, chapterCount: number) {
    this.chapters = chapterSummaries(chapterCount).map((chapter) => ({
      ...chapter,
      novelId,
      text: `王磊走进了第${chapter.chapterNumber}章。`,
    }));
  }

  async listChapters(novelId: string): Promise<ChapterSummary[]> {
    return this.chapters
      .filter((chapter) => chapter.novelId === novelId)
      .map(({ chapterId, chapterNumber, title, characterCount }) => ({
        chapterId,
        chapterNumber,
        title,
        characterCount,
      }));
  }

  async fetchChapter(novelId: string, chapterId: string) {
    return (
      this.chapters.find(
        (chapter) => chapter.novelId === novelId && chapter.chapterId === chapterId,
      ) ?? null
    );
  }
}

interface Deferred {
  resolve: () => void;
  promise: Promise<void>;
}

function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { resolve, promise };
}

export function defaultOutput(taskType: TaskType, chapterNumber: number): unknown {
  switch (taskType) {
    case "outline":
      return { outline: `Outline of chapter ${chapterNumber}` };
    case "character_map":
      return {
        characters: [{ originalName: "王磊", translatedName: "Wang Lei", confidence: 0.9 }],
      };
    case "translate":
      return { translatedText: `Translated chapter ${chapterNumber}`, characters: [] };
    case "quality_check":
      return { score: 4.2, issues: [] };
    case "review":
      return { verdict: "approved", notes: null };
  }
}

/**
 * Scripted provider: queued failures and outputs per (stage, chapter),
 * optional holds that keep calls in flight, and per-provider concurrency
 * tracking.
 */
export class ScriptedAiService implements AiCapabilityService {
  readonly calls: AiInvocation[] = [];
  readonly maxInFlight = new Map<string, number>();
  private readonly inFlight = new Map<string, number>();
  private readonly failures = new Map<string, PipelineTaskError[]>();
  private readonly held: Deferred[] = [];
  private readonly holdTypes = new Set<TaskType>();
  private readonly outputs = new Map<string, unknown[]>();

  /** Queues raw outputs returned (and billed) in place of the default one. */
  respondWith(taskType: TaskType, chapterNumber: number, ...outputs: unknown[]) {
    const key = `${taskType}:${chapterNumber}`;
    this.outputs.set(key, [...(this.outputs.get(key) ?? []), ...outputs]);
  }

  failNext(taskType: TaskType, chapterNumber: number, ...errors: PipelineTaskError[]) {
    const key = `${taskType}:${chapterNumber}`;
    this.failures.set(key, [...(this.failures.get(key) ?? []), ...errors]);
  }

  hold(taskType: TaskType) {
    this.holdTypes.add(taskType);
  }

  get heldCount() {
    return this.held.length;
  }

  releaseHeld() {
    this.holdTypes.clear();
    for (const entry of this.held.splice(0)) {
      entry.resolve();
    }
  }

  callsFor(taskType: TaskType, chapterNumber?: number) {
    return this.calls.filter(
      (call) =>
        call.taskType === taskType &&
        (chapterNumber === undefined || call.context.chapterNumber === chapterNumber),
    );
  }

  async invoke(request: AiInvocation): Promise<AiInvocationResult> {
    this.calls.push(request);
    const current = (this.inFlight.get(request.providerId) ?? 0) + 1;
    this.inFlight.set(request.providerId, current);
    this.maxInFlight.set(
      request.providerId,
      Math.max(current, this.maxInFlight.get(request.providerId) ?? 0),
    );
    try {
      if (this.holdTypes.has(request.taskType)) {
        const gate = deferred();
        this.held.push(gate);
        await gate.promise;
      }
      await new Promise((resolve) => setImmediate(resolve));
      const key = `${request.taskType}:${request.context.chapterNumber}`;
      const failure = this.failures.get(key)?.shift();
      if (failure) {
        throw failure;
      }
      const scripted = this.outputs.get(key) ?? [];
      return {
        output:
          scripted.length > 0
            ? scripted.shift()
            : defaultOutput(request.taskType, request.context.chapterNumber),
        inputTokens: 100,
        outputTokens: 50,
        tokensUsed: 150,
        latencyMs: 5,
      };
    } finally {
      this.inFlight.set(request.providerId, (this.inFlight.get(request.providerId) ?? 1) - 1);
    }
  }
}

export const transientFailure = (message = "upstream unavailable") =>
  new PipelineTaskError("provider_unavailable", message, { retryable: true });

export async function waitFor(
  predicate: () => boolean | Promise<boolean>,
  options: { timeoutMs?: number; intervalMs?: number; message?: string } = {},
) {
  const timeoutMs = options.timeoutMs ?? 3000;
  const intervalMs = options.intervalMs ?? 5;
  const deadline = Date.now() + timeoutMs;
  while (!(await predicate())) {
    if (Date.now() > deadline) {
      throw new Error(options.message ?? `Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}
