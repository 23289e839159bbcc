import { z } from "zod";

import type { AiInvocationResult } from "./aiCapabilityService";
import type { ChapterContent } from "./contentStore";
import { PipelineTaskError } from "./errors";
import {
  CHARACTER_TYPES,
  type ProviderDescriptor,
  type TaskResult,
  type TaskResultOf,
  type TaskType,
  type TranslationProject,
  type TranslationTask,
} from "./types";

export interface TaskHandlerContext {
  task: TranslationTask;
  project: TranslationProject;
  provider: ProviderDescriptor;
  invoke(payload: Record<string, unknown>): Promise<AiInvocationResult>;
  loadChapter(): Promise<ChapterContent>;
  /** Result of an earlier stage of the same chapter, or null when that stage is disabled. */
  stageResult<K extends TaskType>(type: K): Promise<TaskResultOf<K> | null>;
  glossary(): Promise<Record<string, string>>;
}

export type HandlerUsage = Pick<
  AiInvocationResult,
  "inputTokens" | "outputTokens" | "tokensUsed" | "latencyMs"
>;

export interface TaskHandlerOutput<K extends TaskType> {
  result: TaskResultOf<K>;
  usage: HandlerUsage;
}

export type TaskHandler<K extends TaskType> = (
  context: TaskHandlerContext,
) => Promise<TaskHandlerOutput<K>>;

export const isResultOf = <K extends TaskType>(
  result: TaskResult | null,
  type: K,
): result is TaskResultOf<K> => result !== null && result.type === type;

const characterProposalSchema = z.object({
  originalName: z.string().trim().min(1),
  translatedName: z.string().trim().min(1),
  confidence: z.number().min(0).max(1).default(0.5),
  characterType: z.enum(CHARACTER_TYPES).optional().catch(undefined),
});

const outlineOutputSchema = z.object({ outline: z.string().trim().min(1) });

const characterMapOutputSchema = z.object({
  characters: z.array(characterProposalSchema).default([]),
});

const translateOutputSchema = z.object({
  translatedText: z.string().trim().min(1),
  characters: z.array(characterProposalSchema).default([]),
});

const qualityCheckOutputSchema = z.object({
  score: z.number().min(0).max(5),
  issues: z
    .array(
      z.object({
        type: z.string().default("general"),
        severity: z.enum(["low", "medium", "high"]).catch("medium"),
        message: z.string(),
      }),
    )
    .default([]),
});

const reviewOutputSchema = z.object({
  verdict: z.enum(["approved", "needs_revision"]),
  notes: z.string().nullable().default(null),
});

function parseOutput<S extends z.ZodTypeAny>(
  schema: S,
  output: unknown,
  taskType: TaskType,
): z.output<S> {
  const parsed = schema.safeParse(output);
  if (!parsed.success) {
    throw new PipelineTaskError(
      "invalid_ai_output",
      `Invalid ${taskType} output: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
        .join("; ")}`,
      { retryable: false, cause: parsed.error },
    );
  }
  return parsed.data;
}

const usageOf = (response: AiInvocationResult): HandlerUsage => ({
  inputTokens: response.inputTokens,
  outputTokens: response.outputTokens,
  tokensUsed: response.tokensUsed,
  latencyMs: response.latencyMs,
});

export const countWords = (text: string) =>
  text.split(/\s+/).filter((word) => word.length > 0).length;

async function requireStageResult<K extends TaskType>(
  context: TaskHandlerContext,
  type: K,
): Promise<TaskResultOf<K>> {
  const result = await context.stageResult(type);
  if (!result) {
    throw new PipelineTaskError(
      "missing_dependency_result",
      `Chapter ${context.task.chapterNumber} has no ${type} result`,
      { retryable: false },
    );
  }
  return result;
}

const outlineHandler: TaskHandler<"outline"> = async (context) => {
  const chapter = await context.loadChapter();
  const response = await context.invoke({
    title: chapter.title,
    sourceLanguage: context.project.sourceLanguage,
    text: chapter.text,
  });
  const { outline } = parseOutput(outlineOutputSchema, response.output, "outline");
  return { result: { type: "outline", outline }, usage: usageOf(response) };
};

const characterMapHandler: TaskHandler<"character_map"> = async (context) => {
  const chapter = await context.loadChapter();
  const outline = await context.stageResult("outline");
  const response = await context.invoke({
    sourceLanguage: context.project.sourceLanguage,
    targetLanguage: context.project.targetLanguage,
    outline: outline?.outline ?? null,
    knownNames: await context.glossary(),
    text: chapter.text,
  });
  const { characters } = parseOutput(
    characterMapOutputSchema,
    response.output,
    "character_map",
  );
  return {
    result: { type: "character_map", characters },
    usage: usageOf(response),
  };
};

const translateHandler: TaskHandler<"translate"> = async (context) => {
  const chapter = await context.loadChapter();
  const outline = await context.stageResult("outline");
  const response = await context.invoke({
    title: chapter.title,
    sourceLanguage: context.project.sourceLanguage,
    targetLanguage: context.project.targetLanguage,
    outline: outline?.outline ?? null,
    glossary: await context.glossary(),
    text: chapter.text,
  });
  const { translatedText, characters } = parseOutput(
    translateOutputSchema,
    response.output,
    "translate",
  );
  return {
    result: {
      type: "translate",
      translatedText,
      wordCount: countWords(translatedText),
      characters,
    },
    usage: usageOf(response),
  };
};

const qualityCheckHandler: TaskHandler<"quality_check"> = async (context) => {
  const chapter = await context.loadChapter();
  const translation = await requireStageResult(context, "translate");
  const response = await context.invoke({
    sourceLanguage: context.project.sourceLanguage,
    targetLanguage: context.project.targetLanguage,
    sourceText: chapter.text,
    translatedText: translation.translatedText,
    glossary: await context.glossary(),
  });
  const { score, issues } = parseOutput(
    qualityCheckOutputSchema,
    response.output,
    "quality_check",
  );
  return {
    result: { type: "quality_check", score, issues },
    usage: usageOf(response),
  };
};

const reviewHandler: TaskHandler<"review"> = async (context) => {
  const translation = await requireStageResult(context, "translate");
  const quality = await requireStageResult(context, "quality_check");
  const threshold = context.project.config.qualityThreshold;
  const response = await context.invoke({
    targetLanguage: context.project.targetLanguage,
    translatedText: translation.translatedText,
    qualityScore: quality.score,
    qualityIssues: quality.issues,
    qualityThreshold: threshold,
  });
  const review = parseOutput(reviewOutputSchema, response.output, "review");
  // A chapter scored under the threshold is never approved.
  const belowThreshold = quality.score < threshold;
  return {
    result: {
      type: "review",
      verdict: belowThreshold ? "needs_revision" : review.verdict,
      notes:
        belowThreshold && review.verdict === "approved"
          ? `Quality score ${quality.score} is below ${threshold}`
          : review.notes,
    },
    usage: usageOf(response),
  };
};

export const TASK_HANDLERS: { [K in TaskType]: TaskHandler<K> } = {
  outline: outlineHandler,
  character_map: characterMapHandler,
  translate: translateHandler,
  quality_check: qualityCheckHandler,
  review: reviewHandler,
};

export async function runTaskHandler(
  context: TaskHandlerContext,
): Promise<{ result: TaskResult; usage: HandlerUsage }> {
  const handler = TASK_HANDLERS[context.task.taskType];
  return handler(context);
}
