export const TASK_TYPES = [
  "outline",
  "character_map",
  "translate",
  "quality_check",
  "review",
] as const;

export type TaskType = (typeof TASK_TYPES)[number];

export const TASK_STATUSES = [
  "pending",
  "ready",
  "running",
  "completed",
  "failed",
  "failed_terminal",
  "cancelled",
] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export const PROJECT_STATUSES = [
  "created",
  "analyzing",
  "translating",
  "reviewing",
  "completed",
  "paused",
  "failed",
  "cancelled",
] as const;

export type ProjectStatus = (typeof PROJECT_STATUSES)[number];

/** Project phases in which the scheduler may dispatch tasks. */
export type ProjectPhase = Extract<
  ProjectStatus,
  "analyzing" | "translating" | "reviewing"
>;

export type TaskTargetType = "chapter" | "batch";

export type BackoffStrategy = "linear" | "exponential";

export type UnverifiedMergePolicy =
  | "first_writer_wins"
  | "highest_confidence_wins";

export const CHARACTER_TYPES = [
  "protagonist",
  "antagonist",
  "supporting",
  "background",
  "place",
  "organization",
  "item",
  "character",
] as const;

export type CharacterType = (typeof CHARACTER_TYPES)[number];

export interface TaskErrorDescriptor {
  code: string;
  message: string;
  retryable: boolean;
  occurredAt: string;
}

export interface TaskUsage {
  inputTokens: number;
  outputTokens: number;
  tokensUsed: number;
  cost: number;
  latencyMs: number;
}

export interface CharacterProposal {
  originalName: string;
  translatedName: string;
  confidence: number;
  characterType?: CharacterType;
  /** Operator-confirmed proposals replace whatever is stored. */
  verified?: boolean;
}

export interface QualityIssue {
  type: string;
  severity: "low" | "medium" | "high";
  message: string;
}

export type ReviewVerdict = "approved" | "needs_revision";

export type TaskResult =
  | { type: "outline"; outline: string }
  | { type: "character_map"; characters: CharacterProposal[] }
  | {
      type: "translate";
      translatedText: string;
      wordCount: number;
      characters: CharacterProposal[];
    }
  | { type: "quality_check"; score: number; issues: QualityIssue[] }
  | { type: "review"; verdict: ReviewVerdict; notes: string | null };

export type TaskResultOf<T extends TaskType> = Extract<TaskResult, { type: T }>;

export interface TranslationTask {
  id: string;
  projectId: string;
  taskType: TaskType;
  targetType: TaskTargetType;
  targetId: string;
  chapterNumber: number;
  providerId: string;
  status: TaskStatus;
  priority: number;
  sequence: number;
  dependsOn: string | null;
  isFinalStage: boolean;
  retryCount: number;
  maxRetries: number;
  retryDelaySeconds: number;
  retryAt: string | null;
  workerId: string | null;
  claimedAt: string | null;
  startedAt: string | null;
  completedAt: string | null;
  result: TaskResult | null;
  error: TaskErrorDescriptor | null;
  estimatedCost: number;
  actualCost: number;
  tokensUsed: number;
  createdAt: string;
  updatedAt: string;
}

export interface ProjectPipelineConfig {
  generateOutline: boolean;
  useCharacterMapping: boolean;
  enableQualityCheck: boolean;
  qualityThreshold: number;
  maxRetries: number;
  retryDelaySeconds: number;
  backoff: BackoffStrategy;
  /** Ratio of terminally failed chapters above which the project fails; null disables. */
  failureThreshold: number | null;
  priorities: Record<TaskType, number>;
  stageProviders: Partial<Record<TaskType, string>>;
}

export type TaskStatusCounts = Record<TaskStatus, number>;

export interface ProjectErrorDescriptor {
  code: string;
  message: string;
}

export interface TranslationProject {
  id: string;
  name: string;
  description: string | null;
  createdBy: string | null;
  sourceNovelId: string;
  sourceLanguage: string;
  targetLanguage: string;
  startChapter: number;
  endChapter: number | null;
  config: ProjectPipelineConfig;
  status: ProjectStatus;
  resumeStatus: ProjectStatus | null;
  progress: number;
  totalChapters: number;
  completedChapters: number;
  failedChapters: number;
  totalTasks: number;
  taskCounts: TaskStatusCounts;
  estimatedCost: number;
  actualCost: number;
  tokensUsed: number;
  averageQualityScore: number | null;
  qualityScoreSum: number;
  qualityScoredChapters: number;
  qualityIssuesCount: number;
  lastError: ProjectErrorDescriptor | null;
  statusTimestamps: Partial<Record<ProjectStatus, string>>;
  createdAt: string;
  updatedAt: string;
}

export interface CharacterMapping {
  projectId: string;
  originalName: string;
  translatedName: string;
  alternativeNames: string[];
  characterType: CharacterType;
  confidence: number;
  isVerified: boolean;
  verifiedBy: string | null;
  verificationNotes: string | null;
  autoDetected: boolean;
  detectionMethod: string | null;
  firstAppearanceChapter: number | null;
  lastAppearanceChapter: number | null;
  appearanceFrequency: number;
  sourceTaskId: string | null;
  createdAt: string;
  updatedAt: string;
}

export type ProviderVendor = "openai" | "deepseek" | "zhipu" | "ollama" | "custom";

export interface ProviderDescriptor {
  id: string;
  displayName: string;
  vendor: ProviderVendor;
  model: string;
  baseUrl: string | null;
  apiKeyEnv: string | null;
  capabilities: TaskType[];
  /** Empty means any language pair. */
  supportedLanguages: string[];
  maxConcurrentRequests: number;
  maxRequestsPerMinute: number;
  maxRequestsPerDay: number;
  timeoutSeconds: number;
  costPer1kInputTokens: number;
  costPer1kOutputTokens: number;
  priority: number;
}

export type ChapterReviewStatus = "pending" | ReviewVerdict;

/** Per-chapter output, written as translate, quality_check and review complete. */
export interface TranslatedChapter {
  projectId: string;
  chapterNumber: number;
  chapterId: string;
  content: string;
  outline: string | null;
  wordCount: number;
  translationMethod: string;
  providerId: string | null;
  inputTokens: number;
  outputTokens: number;
  qualityScore: number | null;
  qualityIssues: QualityIssue[];
  reviewStatus: ChapterReviewStatus;
  reviewNotes: string | null;
  createdAt: string;
  updatedAt: string;
}

export type TranslatedChapterPatch = Partial<
  Omit<TranslatedChapter, "projectId" | "chapterNumber" | "createdAt" | "updatedAt">
>;

export interface PageRequest {
  page: number;
  pageSize: number;
}

export interface Page<T> extends PageRequest {
  items: T[];
  total: number;
}

export interface PipelineStatistic {
  id: string;
  projectId: string;
  taskId: string;
  taskType: TaskType;
  chapterNumber: number;
  fromStatus: TaskStatus;
  toStatus: TaskStatus;
  tokensUsed: number;
  cost: number;
  durationMs: number | null;
  occurredAt: string;
}

export const emptyTaskCounts = (): TaskStatusCounts => ({
  pending: 0,
  ready: 0,
  running: 0,
  completed: 0,
  failed: 0,
  failed_terminal: 0,
  cancelled: 0,
});
