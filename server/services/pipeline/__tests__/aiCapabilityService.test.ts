import { describe, test } from "node:test";
import assert from "node:assert";

import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";

import {
  classifyProviderError,
  OpenAiCapabilityService,
  parseJsonOutput,
  type ChatCompletionClient,
} from "../aiCapabilityService";
import { PipelineTaskError } from "../errors";
import { buildProvider, silentLogger } from "./helpers";

function completion(content: string | null): ChatCompletion {
  return {
    id: "cmpl-1",
    object: "chat.completion",
    created: 0,
    model: "mock-model",
    choices: [
      {
        index: 0,
        finish_reason: "stop",
        logprobs: null,
        message: { role: "assistant", content, refusal: null },
      },
    ],
    usage: { prompt_tokens: 30, completion_tokens: 12, total_tokens: 42 },
  };
}

function fakeClient(respond: () => Promise<ChatCompletion>) {
  const requests: ChatCompletionCreateParamsNonStreaming[] = [];
  const client: ChatCompletionClient = {
    chat: {
      completions: {
        create: async (body) => {
          requests.push(body);
          return respond();
        },
      },
    },
  };
  return { client, requests };
}

const invocation = {
  providerId: "mock",
  taskType: "outline" as const,
  payload: { text: "王磊推开了门。" },
  context: { projectId: "project-1", taskId: "task-1", chapterNumber: 1 },
};

describe("OpenAiCapabilityService", () => {
  test("sends the stage instructions and parses fenced JSON output", async () => {
    const { client, requests } = fakeClient(async () =>
      completion('```json\n{"outline": "Wang Lei enters"}\n```'),
    );
    let clock = 1_000;
    const service = new OpenAiCapabilityService(
      [buildProvider({ apiKeyEnv: "MOCK_API_KEY" })],
      silentLogger,
      {
        env: { MOCK_API_KEY: "test-secret" },
        clientFactory: () => client,
        now: () => {
          clock += 250;
          return clock;
        },
      },
    );

    const result = await service.invoke(invocation);

    assert.deepStrictEqual(result, {
      output: { outline: "Wang Lei enters" },
      inputTokens: 30,
      outputTokens: 12,
      tokensUsed: 42,
      latencyMs: 250,
    });
    assert.strictEqual(requests[0].model, "mock-model");
    assert.strictEqual(requests[0].messages[0].role, "system");
    assert.strictEqual(
      requests[0].messages[1].content,
      JSON.stringify({ text: "王磊推开了门。" }),
    );
  });

  test("reports a missing API key as a non-retryable auth failure", async () => {
    const service = new OpenAiCapabilityService(
      [buildProvider({ apiKeyEnv: "MOCK_API_KEY" })],
      silentLogger,
      { env: {}, clientFactory: () => fakeClient(async () => completion("{}")).client },
    );
    await assert.rejects(
      service.invoke(invocation),
      (err: unknown) =>
        err instanceof PipelineTaskError &&
        err.code === "provider_auth" &&
        err.retryable === false,
    );
  });

  test("rejects providers that are not configured", async () => {
    const service = new OpenAiCapabilityService([], silentLogger);
    await assert.rejects(
      service.invoke(invocation),
      (err: unknown) => err instanceof PipelineTaskError && err.code === "unknown_provider",
    );
  });

  test("classifies SDK failures raised by the client", async () => {
    const { client } = fakeClient(async () => {
      throw new OpenAI.RateLimitError(429, undefined, "Too many requests", undefined);
    });
    const service = new OpenAiCapabilityService([buildProvider()], silentLogger, {
      clientFactory: () => client,
    });
    await assert.rejects(
      service.invoke(invocation),
      (err: unknown) =>
        err instanceof PipelineTaskError &&
        err.code === "provider_rate_limited" &&
        err.retryable === true,
    );
  });
});

describe("classifyProviderError", () => {
  test("maps SDK errors onto the task error taxonomy", () => {
    const cases: Array<[unknown, string, boolean]> = [
      [new OpenAI.APIConnectionTimeoutError(), "provider_timeout", true],
      [new OpenAI.AuthenticationError(401, undefined, "bad key", undefined), "provider_auth", false],
      [new OpenAI.BadRequestError(400, undefined, "too long", undefined), "invalid_input", false],
      [new OpenAI.InternalServerError(503, undefined, "overloaded", undefined), "provider_unavailable", true],
      [new Error("socket hang up"), "unexpected", true],
    ];
    for (const [error, code, retryable] of cases) {
      const classified = classifyProviderError(error, "mock");
      assert.deepStrictEqual([classified.code, classified.retryable], [code, retryable]);
    }
  });

  test("passes pipeline errors through unchanged", () => {
    const original = new PipelineTaskError("provider_timeout", "slow", { retryable: true });
    assert.strictEqual(classifyProviderError(original, "mock"), original);
  });
});

describe("parseJsonOutput", () => {
  test("rejects text that is not JSON", () => {
    assert.throws(
      () => parseJsonOutput("I cannot help with that"),
      (err: unknown) => err instanceof PipelineTaskError && err.code === "invalid_ai_output",
    );
    assert.deepStrictEqual(parseJsonOutput(' {"score": 4} '), { score: 4 });
  });
});
