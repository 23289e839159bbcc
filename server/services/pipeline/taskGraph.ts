import { estimateTaskCost } from "../usage";
import { PipelineCommandError } from "./errors";
import { STAGE_ORDER } from "./taskStateMachine";
import type {
  ProjectPipelineConfig,
  ProviderDescriptor,
  TaskType,
  TranslationProject,
  TranslationTask,
} from "./types";

export interface ChapterSummary {
  chapterId: string;
  chapterNumber: number;
  title: string | null;
  characterCount: number;
}

export function enabledStages(config: ProjectPipelineConfig): TaskType[] {
  return STAGE_ORDER.filter((stage) => {
    switch (stage) {
      case "outline":
        return config.generateOutline;
      case "character_map":
        return config.useCharacterMapping;
      case "translate":
        return true;
      case "quality_check":
      case "review":
        return config.enableQualityCheck;
    }
  });
}

const supportsPair = (
  provider: ProviderDescriptor,
  sourceLanguage: string,
  targetLanguage: string,
) =>
  provider.supportedLanguages.length === 0 ||
  (provider.supportedLanguages.includes(sourceLanguage) &&
    provider.supportedLanguages.includes(targetLanguage));

/**
 * Picks the provider for one stage: the project's explicit override when it
 * names a known provider, otherwise the capable provider with the lowest
 * priority number.
 */
export function selectProvider(
  providers: readonly ProviderDescriptor[],
  taskType: TaskType,
  project: Pick<TranslationProject, "sourceLanguage" | "targetLanguage" | "config">,
): ProviderDescriptor {
  const overrideId = project.config.stageProviders[taskType];
  if (overrideId) {
    const override = providers.find((provider) => provider.id === overrideId);
    if (!override || !override.capabilities.includes(taskType)) {
      throw new PipelineCommandError(
        "no_provider",
        `Provider ${overrideId} cannot run ${taskType} tasks`,
      );
    }
    return override;
  }

  const candidates = providers
    .filter(
      (provider) =>
        provider.capabilities.includes(taskType) &&
        supportsPair(provider, project.sourceLanguage, project.targetLanguage),
    )
    .sort((left, right) => left.priority - right.priority);

  const [selected] = candidates;
  if (!selected) {
    throw new PipelineCommandError(
      "no_provider",
      `No provider supports ${taskType} for ${project.sourceLanguage} -> ${project.targetLanguage}`,
    );
  }
  return selected;
}

export interface TaskGraph {
  tasks: TranslationTask[];
  estimatedCost: number;
  totalChapters: number;
}

/**
 * Expands a project into one linear chain per chapter. The head of each chain
 * is ready; every later stage waits on its predecessor.
 */
export function buildTaskGraph(
  project: TranslationProject,
  chapters: readonly ChapterSummary[],
  providers: readonly ProviderDescriptor[],
  options: { idFactory: () => string; now: Date },
): TaskGraph {
  const inRange = chapters
    .filter(
      (chapter) =>
        chapter.chapterNumber >= project.startChapter &&
        (project.endChapter === null ||
          chapter.chapterNumber <= project.endChapter),
    )
    .sort((left, right) => left.chapterNumber - right.chapterNumber);

  if (inRange.length === 0) {
    throw new PipelineCommandError(
      "no_chapters",
      `Novel ${project.sourceNovelId} has no chapters in the requested range`,
    );
  }

  const stages = enabledStages(project.config);
  const stageProviders = new Map(
    stages.map((stage) => [stage, selectProvider(providers, stage, project)]),
  );
  const createdAt = options.now.toISOString();
  const tasks: TranslationTask[] = [];
  let sequence = 0;
  let estimatedCost = 0;

  for (const chapter of inRange) {
    let previous: TranslationTask | null = null;
    stages.forEach((stage, index) => {
      const provider = stageProviders.get(stage);
      if (!provider) {
        throw new PipelineCommandError("no_provider", `No provider for ${stage}`);
      }
      sequence += 1;
      const cost = estimateTaskCost(stage, chapter.characterCount, provider);
      estimatedCost += cost;
      const task: TranslationTask = {
        id: options.idFactory(),
        projectId: project.id,
        taskType: stage,
        targetType: "chapter",
        targetId: chapter.chapterId,
        chapterNumber: chapter.chapterNumber,
        providerId: provider.id,
        status: previous ? "pending" : "ready",
        priority: project.config.priorities[stage],
        sequence,
        dependsOn: previous ? previous.id : null,
        isFinalStage: index === stages.length - 1,
        retryCount: 0,
        maxRetries: project.config.maxRetries,
        retryDelaySeconds: project.config.retryDelaySeconds,
        retryAt: null,
        workerId: null,
        claimedAt: null,
        startedAt: null,
        completedAt: null,
        result: null,
        error: null,
        estimatedCost: cost,
        actualCost: 0,
        tokensUsed: 0,
        createdAt,
        updatedAt: createdAt,
      };
      tasks.push(task);
      previous = task;
    });
  }

  return {
    tasks,
    estimatedCost: Number(estimatedCost.toFixed(6)),
    totalChapters: inRange.length,
  };
}
