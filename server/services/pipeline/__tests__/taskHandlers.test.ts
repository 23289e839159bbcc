import { describe, test } from "node:test";
import assert from "node:assert";

import { DEFAULT_PROJECT_CONFIG } from "../../../config/pipelineConfiguration";
import type { AiInvocationResult } from "../aiCapabilityService";
import { PipelineTaskError } from "../errors";
import {
  countWords,
  isResultOf,
  runTaskHandler,
  type TaskHandlerContext,
} from "../taskHandlers";
import type { TaskResult, TaskType } from "../types";
import { buildProject, buildProvider, buildTask } from "./helpers";

function buildContext(
  taskType: TaskType,
  output: unknown,
  options: {
    stageResults?: TaskResult[];
    glossary?: Record<string, string>;
    qualityThreshold?: number;
  } = {},
) {
  const payloads: Record<string, unknown>[] = [];
  const response: AiInvocationResult = {
    output,
    inputTokens: 120,
    outputTokens: 80,
    tokensUsed: 200,
    latencyMs: 12,
  };
  const context: TaskHandlerContext = {
    task: buildTask({ taskType, chapterNumber: 7 }),
    project: buildProject({
      config: {
        ...DEFAULT_PROJECT_CONFIG,
        qualityThreshold: options.qualityThreshold ?? DEFAULT_PROJECT_CONFIG.qualityThreshold,
      },
    }),
    provider: buildProvider(),
    invoke: async (payload) => {
      payloads.push(payload);
      return response;
    },
    loadChapter: async () => ({
      novelId: "novel-1",
      chapterId: "chapter-7",
      chapterNumber: 7,
      title: "Chapter 7",
      characterCount: 12,
      text: "王磊推开了门。",
    }),
    stageResult: async <K extends TaskType>(type: K) => {
      const found = (options.stageResults ?? []).find((result) => result.type === type);
      return found && isResultOf(found, type) ? found : null;
    },
    glossary: async () => options.glossary ?? {},
  };
  return { context, payloads };
}

const isInvalidOutput = (err: unknown) =>
  err instanceof PipelineTaskError &&
  err.code === "invalid_ai_output" &&
  err.retryable === false;

describe("task handlers", () => {
  test("translate passes the glossary and counts words", async () => {
    const { context, payloads } = buildContext(
      "translate",
      { translatedText: "Wang Lei opened the door.", characters: [] },
      {
        stageResults: [{ type: "outline", outline: "Wang Lei arrives" }],
        glossary: { 王磊: "Wang Lei" },
      },
    );
    const output = await runTaskHandler(context);

    assert.deepStrictEqual(output.result, {
      type: "translate",
      translatedText: "Wang Lei opened the door.",
      wordCount: 5,
      characters: [],
    });
    assert.deepStrictEqual(output.usage, {
      inputTokens: 120,
      outputTokens: 80,
      tokensUsed: 200,
      latencyMs: 12,
    });
    assert.deepStrictEqual(payloads[0].glossary, { 王磊: "Wang Lei" });
    assert.strictEqual(payloads[0].outline, "Wang Lei arrives");
  });

  test("character map fills defaults and drops unknown character types", async () => {
    const { context } = buildContext("character_map", {
      characters: [
        { originalName: "王磊", translatedName: "Wang Lei", characterType: "hero" },
      ],
    });
    const output = await runTaskHandler(context);
    assert.deepStrictEqual(output.result, {
      type: "character_map",
      characters: [
        {
          originalName: "王磊",
          translatedName: "Wang Lei",
          confidence: 0.5,
          characterType: undefined,
        },
      ],
    });
  });

  test("malformed provider output is a non-retryable failure", async () => {
    const { context } = buildContext("outline", { summary: "missing field" });
    await assert.rejects(runTaskHandler(context), isInvalidOutput);
  });

  test("quality check needs the translation of its chapter", async () => {
    const { context } = buildContext("quality_check", { score: 4, issues: [] });
    await assert.rejects(
      runTaskHandler(context),
      (err: unknown) =>
        err instanceof PipelineTaskError && err.code === "missing_dependency_result",
    );
  });

  test("review below the quality threshold is never approved", async () => {
    const { context } = buildContext(
      "review",
      { verdict: "approved", notes: null },
      {
        qualityThreshold: 3.5,
        stageResults: [
          { type: "translate", translatedText: "Text", wordCount: 1, characters: [] },
          { type: "quality_check", score: 3.2, issues: [] },
        ],
      },
    );
    const output = await runTaskHandler(context);
    assert.deepStrictEqual(output.result, {
      type: "review",
      verdict: "needs_revision",
      notes: "Quality score 3.2 is below 3.5",
    });
  });

  test("review keeps the provider verdict above the threshold", async () => {
    const { context } = buildContext(
      "review",
      { verdict: "needs_revision", notes: "Tone is off" },
      {
        stageResults: [
          { type: "translate", translatedText: "Text", wordCount: 1, characters: [] },
          { type: "quality_check", score: 4.5, issues: [] },
        ],
      },
    );
    const output = await runTaskHandler(context);
    assert.deepStrictEqual(output.result, {
      type: "review",
      verdict: "needs_revision",
      notes: "Tone is off",
    });
  });

  test("countWords splits on whitespace", () => {
    assert.strictEqual(countWords("  one two\nthree\tfour "), 4);
    assert.strictEqual(countWords(""), 0);
  });
});
