import type { FastifyBaseLogger } from "fastify";
import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";

import { PipelineTaskError } from "./errors";
import type { ProviderDescriptor, TaskType } from "./types";

export interface AiInvocation {
  providerId: string;
  taskType: TaskType;
  payload: Record<string, unknown>;
  context: { projectId: string; taskId: string; chapterNumber: number };
  signal?: AbortSignal;
}

export interface AiInvocationResult {
  output: unknown;
  tokensUsed: number;
  inputTokens: number;
  outputTokens: number;
  latencyMs: number;
}

/** Opaque, billed text generation. Failures surface as {@link PipelineTaskError}. */
export interface AiCapabilityService {
  invoke(request: AiInvocation): Promise<AiInvocationResult>;
}

export interface ChatCompletionClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal; timeout?: number; maxRetries?: number },
      ): PromiseLike<ChatCompletion>;
    };
  };
}

export type ChatClientFactory = (
  provider: ProviderDescriptor,
  apiKey: string,
) => ChatCompletionClient;

const STAGE_INSTRUCTIONS: Record<TaskType, string> = {
  outline:
    'Summarize the chapter for a translator. Reply with JSON: {"outline": string}.',
  character_map:
    'List recurring named entities with a proposed translation. Reply with JSON: {"characters": [{"originalName": string, "translatedName": string, "confidence": number, "characterType"?: string}]}.',
  translate:
    'Translate the chapter. Use the glossary for names. Reply with JSON: {"translatedText": string, "characters": [{"originalName": string, "translatedName": string, "confidence": number}]}.',
  quality_check:
    'Rate the translation from 0 to 5. Reply with JSON: {"score": number, "issues": [{"type": string, "severity": "low"|"medium"|"high", "message": string}]}.',
  review:
    'Decide whether the translation can be published. Reply with JSON: {"verdict": "approved"|"needs_revision", "notes": string|null}.',
};

const defaultClientFactory: ChatClientFactory = (provider, apiKey) =>
  new OpenAI({
    apiKey,
    baseURL: provider.baseUrl ?? undefined,
    maxRetries: 0,
    timeout: provider.timeoutSeconds * 1000,
  });

/** Maps SDK and transport failures onto the task error taxonomy. */
export function classifyProviderError(
  error: unknown,
  providerId: string,
): PipelineTaskError {
  if (error instanceof PipelineTaskError) {
    return error;
  }
  if (
    error instanceof OpenAI.APIUserAbortError ||
    error instanceof OpenAI.APIConnectionTimeoutError
  ) {
    return new PipelineTaskError(
      "provider_timeout",
      `Provider ${providerId} timed out`,
      { retryable: true, cause: error },
    );
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new PipelineTaskError(
      "provider_rate_limited",
      `Provider ${providerId} rejected the request: rate limited`,
      { retryable: true, cause: error },
    );
  }
  if (
    error instanceof OpenAI.AuthenticationError ||
    error instanceof OpenAI.PermissionDeniedError
  ) {
    return new PipelineTaskError(
      "provider_auth",
      `Provider ${providerId} refused the credentials`,
      { retryable: false, cause: error },
    );
  }
  if (
    error instanceof OpenAI.BadRequestError ||
    error instanceof OpenAI.UnprocessableEntityError ||
    error instanceof OpenAI.NotFoundError
  ) {
    return new PipelineTaskError("invalid_input", error.message, {
      retryable: false,
      cause: error,
    });
  }
  if (error instanceof OpenAI.APIError) {
    return new PipelineTaskError(
      "provider_unavailable",
      `Provider ${providerId} failed: ${error.message}`,
      { retryable: true, cause: error },
    );
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PipelineTaskError("unexpected", message, {
    retryable: true,
    cause: error,
  });
}

export function parseJsonOutput(content: string | null | undefined): unknown {
  const text = (content ?? "").trim();
  const body = text.startsWith("```")
    ? text.replace(/^```(?:json)?\s*/i, "").replace(/```\s*$/, "")
    : text;
  try {
    return JSON.parse(body);
  } catch (err) {
    throw new PipelineTaskError(
      "invalid_ai_output",
      "Provider returned output that is not JSON",
      { retryable: false, cause: err },
    );
  }
}

/**
 * OpenAI-compatible chat completion adapter. Every configured vendor
 * (DeepSeek, Zhipu, Ollama) is reached through its OpenAI-style endpoint.
 */
export class OpenAiCapabilityService implements AiCapabilityService {
  private readonly clients = new Map<string, ChatCompletionClient>();
  private readonly providers: Map<string, ProviderDescriptor>;
  private readonly env: NodeJS.ProcessEnv;
  private readonly clientFactory: ChatClientFactory;
  private readonly now: () => number;

  constructor(
    providers: readonly ProviderDescriptor[],
    private readonly logger: FastifyBaseLogger,
    options: {
      env?: NodeJS.ProcessEnv;
      clientFactory?: ChatClientFactory;
      now?: () => number;
    } = {},
  ) {
    this.providers = new Map(providers.map((provider) => [provider.id, provider]));
    this.env = options.env ?? process.env;
    this.clientFactory = options.clientFactory ?? defaultClientFactory;
    this.now = options.now ?? Date.now;
  }

  async invoke(request: AiInvocation): Promise<AiInvocationResult> {
    const provider = this.providers.get(request.providerId);
    if (!provider) {
      throw new PipelineTaskError(
        "unknown_provider",
        `Provider ${request.providerId} is not configured`,
        { retryable: false },
      );
    }

    const client = this.clientFor(provider);
    const startedAt = this.now();
    let completion: ChatCompletion;
    try {
      completion = await client.chat.completions.create(
        {
          model: provider.model,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: STAGE_INSTRUCTIONS[request.taskType] },
            { role: "user", content: JSON.stringify(request.payload) },
          ],
        },
        { signal: request.signal },
      );
    } catch (err) {
      const classified = classifyProviderError(err, provider.id);
      this.logger.warn(
        {
          err,
          providerId: provider.id,
          taskId: request.context.taskId,
          code: classified.code,
        },
        "[AI] Provider call failed",
      );
      throw classified;
    }

    const latencyMs = this.now() - startedAt;
    const choice = completion.choices[0];
    const output = parseJsonOutput(choice?.message.content);
    const inputTokens = completion.usage?.prompt_tokens ?? 0;
    const outputTokens = completion.usage?.completion_tokens ?? 0;

    this.logger.debug(
      {
        providerId: provider.id,
        taskId: request.context.taskId,
        taskType: request.taskType,
        inputTokens,
        outputTokens,
        latencyMs,
      },
      "[AI] Provider call completed",
    );

    return {
      output,
      inputTokens,
      outputTokens,
      tokensUsed: completion.usage?.total_tokens ?? inputTokens + outputTokens,
      latencyMs,
    };
  }

  private clientFor(provider: ProviderDescriptor): ChatCompletionClient {
    const cached = this.clients.get(provider.id);
    if (cached) {
      return cached;
    }
    let apiKey = "unused";
    if (provider.apiKeyEnv) {
      const configured = this.env[provider.apiKeyEnv];
      if (!configured) {
        throw new PipelineTaskError(
          "provider_auth",
          `${provider.apiKeyEnv} is not configured for provider ${provider.id}`,
          { retryable: false },
        );
      }
      apiKey = configured;
    }
    const client = this.clientFactory(provider, apiKey);
    this.clients.set(provider.id, client);
    return client;
  }
}
