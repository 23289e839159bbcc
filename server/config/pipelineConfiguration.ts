import { readFileSync } from "node:fs";
import path from "node:path";

import { z } from "zod";

import { PipelineCommandError } from "../services/pipeline/errors";
import {
  TASK_TYPES,
  type ProjectPipelineConfig,
  type ProviderDescriptor,
  type TaskType,
  type UnverifiedMergePolicy,
} from "../services/pipeline/types";

const taskTypeSchema = z.enum(TASK_TYPES);

export const DEFAULT_TASK_PRIORITIES: Record<TaskType, number> = {
  outline: 2,
  character_map: 3,
  translate: 5,
  quality_check: 5,
  review: 6,
};

export const DEFAULT_PROJECT_CONFIG: ProjectPipelineConfig = {
  generateOutline: true,
  useCharacterMapping: true,
  enableQualityCheck: true,
  qualityThreshold: 3.5,
  maxRetries: 3,
  retryDelaySeconds: 60,
  backoff: "linear",
  failureThreshold: null,
  priorities: DEFAULT_TASK_PRIORITIES,
  stageProviders: {},
};

const prioritySchema = z.number().int().min(1).max(10);

/** Partial project policy as accepted from clients and the configuration file. */
export const projectConfigOverridesSchema = z
  .object({
    generateOutline: z.boolean(),
    useCharacterMapping: z.boolean(),
    enableQualityCheck: z.boolean(),
    qualityThreshold: z.number().min(0).max(5),
    maxRetries: z.number().int().min(1).max(20),
    retryDelaySeconds: z.number().min(0).max(86_400),
    backoff: z.enum(["linear", "exponential"]),
    failureThreshold: z.number().min(0).max(1).nullable(),
    priorities: z.record(taskTypeSchema, prioritySchema),
    stageProviders: z.record(taskTypeSchema, z.string().min(1)),
  })
  .partial()
  .strict();

export type ProjectConfigOverrides = z.infer<typeof projectConfigOverridesSchema>;

const providerSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().min(1),
  vendor: z.enum(["openai", "deepseek", "zhipu", "ollama", "custom"]),
  model: z.string().min(1),
  baseUrl: z.string().url().nullable().default(null),
  apiKeyEnv: z.string().min(1).nullable().default(null),
  capabilities: z.array(taskTypeSchema).min(1),
  supportedLanguages: z.array(z.string()).default([]),
  maxConcurrentRequests: z.number().int().positive(),
  maxRequestsPerMinute: z.number().int().positive(),
  maxRequestsPerDay: z.number().int().positive(),
  timeoutSeconds: z.number().positive().default(120),
  costPer1kInputTokens: z.number().min(0).default(0),
  costPer1kOutputTokens: z.number().min(0).default(0),
  priority: z.number().int().default(5),
});

const pipelineConfigurationSchema = z.object({
  workerPoolSize: z.number().int().positive().default(4),
  livenessTimeoutSeconds: z.number().positive().default(900),
  mappingMergePolicy: z
    .enum(["first_writer_wins", "highest_confidence_wins"])
    .default("first_writer_wins"),
  projectDefaults: projectConfigOverridesSchema.default({}),
  providers: z.array(providerSchema).default([]),
});

export interface PipelineConfiguration {
  workerPoolSize: number;
  livenessTimeoutSeconds: number;
  mappingMergePolicy: UnverifiedMergePolicy;
  projectDefaults: ProjectPipelineConfig;
  providers: ProviderDescriptor[];
}

export function mergeProjectConfig(
  base: ProjectPipelineConfig,
  overrides: ProjectConfigOverrides = {},
): ProjectPipelineConfig {
  return {
    ...base,
    ...overrides,
    priorities: { ...base.priorities, ...(overrides.priorities ?? {}) },
    stageProviders: { ...base.stageProviders, ...(overrides.stageProviders ?? {}) },
  };
}

function formatIssues(error: z.ZodError) {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parsePipelineConfiguration(raw: unknown): PipelineConfiguration {
  const parsed = pipelineConfigurationSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PipelineCommandError(
      "invalid_config",
      `Invalid pipeline configuration: ${formatIssues(parsed.error)}`,
    );
  }
  const ids = new Set<string>();
  for (const provider of parsed.data.providers) {
    if (ids.has(provider.id)) {
      throw new PipelineCommandError(
        "invalid_config",
        `Duplicate provider id ${provider.id}`,
      );
    }
    ids.add(provider.id);
  }
  return {
    ...parsed.data,
    projectDefaults: mergeProjectConfig(
      DEFAULT_PROJECT_CONFIG,
      parsed.data.projectDefaults,
    ),
  };
}

const CONFIG_PATH =
  process.env.PIPELINE_CONFIG_PATH ??
  path.resolve(process.cwd(), "server", "pipelineConfiguration.json");

let cachedConfig: PipelineConfiguration | null = null;

const isMissingFile = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export function loadPipelineConfiguration(
  configPath: string = CONFIG_PATH,
): PipelineConfiguration {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return parsePipelineConfiguration({});
    }
    throw error;
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new PipelineCommandError(
      "invalid_config",
      `${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parsePipelineConfiguration(json);
}

export function getPipelineConfiguration(): PipelineConfiguration {
  cachedConfig ??= loadPipelineConfiguration();
  return cachedConfig;
}

export function reloadPipelineConfiguration(): void {
  cachedConfig = null;
}
