import type {
  ProviderDescriptor,
  TaskType,
  TaskUsage,
} from "./pipeline/types";

/** Rough source-text density used before any provider has reported usage. */
export const CHARS_PER_TOKEN = 4;

interface StageTokenProfile {
  /** Multiplier on the chapter's token count for the prompt side. */
  input: number;
  /** Multiplier on the chapter's token count for the completion side. */
  output: number;
}

const STAGE_TOKEN_PROFILES: Record<TaskType, StageTokenProfile> = {
  outline: { input: 1, output: 0.2 },
  character_map: { input: 1.2, output: 0.1 },
  translate: { input: 1.3, output: 1.2 },
  // source plus translation
  quality_check: { input: 2.2, output: 0.1 },
  review: { input: 2.2, output: 0.1 },
};

type ProviderPricing = Pick<
  ProviderDescriptor,
  "costPer1kInputTokens" | "costPer1kOutputTokens"
>;

export function estimateCost(
  pricing: ProviderPricing,
  inputTokens: number,
  outputTokens: number,
) {
  const inputCost = (inputTokens / 1000) * pricing.costPer1kInputTokens;
  const outputCost = (outputTokens / 1000) * pricing.costPer1kOutputTokens;
  return Number((inputCost + outputCost).toFixed(6));
}

export const estimateTokens = (characters: number) =>
  Math.ceil(Math.max(0, characters) / CHARS_PER_TOKEN);

export function estimateTaskCost(
  taskType: TaskType,
  chapterCharacters: number,
  pricing: ProviderPricing,
) {
  const tokens = estimateTokens(chapterCharacters);
  const profile = STAGE_TOKEN_PROFILES[taskType];
  return estimateCost(
    pricing,
    Math.ceil(tokens * profile.input),
    Math.ceil(tokens * profile.output),
  );
}

export function buildTaskUsage(
  pricing: ProviderPricing,
  reported: {
    inputTokens: number;
    outputTokens: number;
    tokensUsed?: number;
    latencyMs: number;
  },
): TaskUsage {
  const inputTokens = Math.max(0, reported.inputTokens);
  const outputTokens = Math.max(0, reported.outputTokens);
  return {
    inputTokens,
    outputTokens,
    tokensUsed: reported.tokensUsed ?? inputTokens + outputTokens,
    cost: estimateCost(pricing, inputTokens, outputTokens),
    latencyMs: reported.latencyMs,
  };
}
