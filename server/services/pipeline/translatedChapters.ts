import type {
  TaskResult,
  TaskUsage,
  TranslatedChapter,
  TranslatedChapterPatch,
  TranslationTask,
} from "./types";

export const AI_TRANSLATION_METHOD = "ai_direct";

export function emptyTranslatedChapter(
  projectId: string,
  chapterNumber: number,
  at: string,
): TranslatedChapter {
  return {
    projectId,
    chapterNumber,
    chapterId: "",
    content: "",
    outline: null,
    wordCount: 0,
    translationMethod: AI_TRANSLATION_METHOD,
    providerId: null,
    inputTokens: 0,
    outputTokens: 0,
    qualityScore: null,
    qualityIssues: [],
    reviewStatus: "pending",
    reviewNotes: null,
    createdAt: at,
    updatedAt: at,
  };
}

/**
 * The fields a completed stage contributes to its chapter record. A new
 * translation resets the quality and review fields, which described the
 * text it replaces.
 */
export function translatedChapterPatch(
  task: TranslationTask,
  result: TaskResult,
  usage: TaskUsage,
  outline: string | null,
): TranslatedChapterPatch | null {
  switch (result.type) {
    case "translate":
      return {
        chapterId: task.targetId,
        content: result.translatedText,
        outline,
        wordCount: result.wordCount,
        translationMethod: AI_TRANSLATION_METHOD,
        providerId: task.providerId,
        inputTokens: usage.inputTokens,
        outputTokens: usage.outputTokens,
        qualityScore: null,
        qualityIssues: [],
        reviewStatus: "pending",
        reviewNotes: null,
      };
    case "quality_check":
      return { qualityScore: result.score, qualityIssues: result.issues };
    case "review":
      return { reviewStatus: result.verdict, reviewNotes: result.notes };
    default:
      return null;
  }
}

export function applyTranslatedChapterPatch(
  existing: TranslatedChapter,
  patch: TranslatedChapterPatch,
  at: string,
): TranslatedChapter {
  return { ...existing, ...patch, updatedAt: at };
}
