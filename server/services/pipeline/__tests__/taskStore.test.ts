import { describe, test } from "node:test";
import assert from "node:assert";

import { countTasks, reduceTaskTransition } from "../projectAggregator";
import { mergeCharacterMapping } from "../characterMappings";
import { MemoryPipelineStore } from "../taskStore";
import { buildProject, buildTask, FIXED_NOW } from "./helpers";

const later = new Date("2024-05-01T00:01:00.000Z");

async function seededStore() {
  let counter = 0;
  const store = new MemoryPipelineStore({ idFactory: () => `stat-${++counter}` });
  await store.createProject(buildProject());
  const tasks = [
    buildTask({ id: "outline-1", taskType: "outline", sequence: 1, isFinalStage: false }),
    buildTask({
      id: "translate-1",
      taskType: "translate",
      sequence: 2,
      status: "pending",
      dependsOn: "outline-1",
      isFinalStage: false,
    }),
    buildTask({
      id: "review-1",
      taskType: "review",
      sequence: 3,
      status: "pending",
      dependsOn: "translate-1",
      isFinalStage: true,
    }),
  ];
  await store.seedProjectTasks(
    {
      projectId: "project-1",
      from: ["created"],
      to: "analyzing",
      patch: { totalTasks: 3, totalChapters: 1, taskCounts: countTasks(tasks) },
      at: FIXED_NOW,
    },
    tasks,
  );
  return store;
}

describe("MemoryPipelineStore", () => {
  test("seeding moves the project and stores the graph", async () => {
    const store = await seededStore();
    const project = await store.getProject("project-1");
    assert.strictEqual(project?.status, "analyzing");
    assert.strictEqual(project?.statusTimestamps.analyzing, FIXED_NOW.toISOString());
    assert.deepStrictEqual(
      (await store.listTasks("project-1")).map((task) => task.id),
      ["outline-1", "translate-1", "review-1"],
    );
  });

  test("seeding twice is rejected by the status precondition", async () => {
    const store = await seededStore();
    const again = await store.seedProjectTasks(
      { projectId: "project-1", from: ["created"], to: "analyzing", at: later },
      [buildTask({ id: "extra" })],
    );
    assert.strictEqual(again, null);
    assert.strictEqual(await store.getTask("extra"), null);
  });

  test("a stale compare-and-set returns null and changes nothing", async () => {
    const store = await seededStore();
    const outcome = await store.transitionTask(
      { taskId: "translate-1", from: ["ready"], to: "running", at: later },
      reduceTaskTransition,
    );
    assert.strictEqual(outcome, null);
    assert.strictEqual((await store.getTask("translate-1"))?.status, "pending");
  });

  test("claim ownership is checked on completion", async () => {
    const store = await seededStore();
    await store.transitionTask(
      {
        taskId: "outline-1",
        from: ["ready"],
        to: "running",
        patch: { workerId: "worker-a" },
        at: later,
      },
      reduceTaskTransition,
    );
    const foreign = await store.transitionTask(
      {
        taskId: "outline-1",
        from: ["running"],
        expectedWorkerId: "worker-b",
        to: "completed",
        at: later,
      },
      reduceTaskTransition,
    );
    assert.strictEqual(foreign, null);
  });

  test("completion releases the dependent and folds the project", async () => {
    const store = await seededStore();
    await store.transitionTask(
      { taskId: "outline-1", from: ["ready"], to: "running", at: later },
      reduceTaskTransition,
    );
    const outcome = await store.transitionTask(
      {
        taskId: "outline-1",
        from: ["running"],
        to: "completed",
        usage: {
          inputTokens: 100,
          outputTokens: 50,
          tokensUsed: 150,
          cost: 0.0002,
          latencyMs: 5,
        },
        fanOut: "release_dependents",
        at: later,
      },
      reduceTaskTransition,
    );

    assert.deepStrictEqual(
      outcome?.changes.map((change) => [change.after.id, change.after.status]),
      [
        ["outline-1", "completed"],
        ["translate-1", "ready"],
      ],
    );
    assert.strictEqual(outcome?.project.taskCounts.completed, 1);
    assert.strictEqual(outcome?.project.taskCounts.ready, 1);
    assert.strictEqual(outcome?.project.taskCounts.pending, 1);
    assert.strictEqual(outcome?.project.progress, 33.33);
    assert.strictEqual(outcome?.project.tokensUsed, 150);
    assert.strictEqual(outcome?.project.actualCost, 0.0002);
    assert.strictEqual((await store.getTask("translate-1"))?.status, "ready");
  });

  test("terminal failure cancels the rest of the chain", async () => {
    const store = await seededStore();
    await store.transitionTask(
      { taskId: "outline-1", from: ["ready"], to: "running", at: later },
      reduceTaskTransition,
    );
    const outcome = await store.transitionTask(
      {
        taskId: "outline-1",
        from: ["running"],
        to: "failed_terminal",
        patch: {
          error: {
            code: "provider_auth",
            message: "bad key",
            retryable: false,
            occurredAt: later.toISOString(),
          },
        },
        fanOut: "cancel_dependents",
        at: later,
      },
      reduceTaskTransition,
    );

    assert.deepStrictEqual(
      outcome?.changes.map((change) => change.after.status),
      ["failed_terminal", "cancelled", "cancelled"],
    );
    assert.strictEqual(outcome?.changes[1].after.error?.code, "dependency_failed");
    assert.strictEqual(outcome?.project.failedChapters, 1);
    assert.deepStrictEqual(outcome?.project.lastError, {
      code: "provider_auth",
      message: "bad key",
    });
    assert.strictEqual(outcome?.project.progress, 100);
  });

  test("statistics are listed newest first with durations", async () => {
    const store = await seededStore();
    await store.transitionTask(
      {
        taskId: "outline-1",
        from: ["ready"],
        to: "running",
        patch: { startedAt: FIXED_NOW.toISOString() },
        at: FIXED_NOW,
      },
      reduceTaskTransition,
    );
    await store.transitionTask(
      { taskId: "outline-1", from: ["running"], to: "completed", at: later },
      reduceTaskTransition,
    );

    const statistics = await store.listStatistics("project-1", 10);
    assert.deepStrictEqual(
      statistics.map((entry) => [entry.id, entry.fromStatus, entry.toStatus, entry.durationMs]),
      [
        ["stat-2", "running", "completed", 60_000],
        ["stat-1", "ready", "running", null],
      ],
    );
  });

  test("project transitions follow the lifecycle table", async () => {
    const store = await seededStore();
    const invalid = await store.transitionProject({
      projectId: "project-1",
      from: ["analyzing"],
      to: "completed",
      at: later,
    });
    assert.strictEqual(invalid, null);

    const paused = await store.transitionProject({
      projectId: "project-1",
      from: ["analyzing"],
      to: "paused",
      patch: { resumeStatus: "analyzing" },
      at: later,
    });
    assert.strictEqual(paused?.status, "paused");
    assert.strictEqual(paused?.resumeStatus, "analyzing");
    assert.strictEqual(paused?.statusTimestamps.paused, later.toISOString());
  });

  test("returned records are copies", async () => {
    const store = await seededStore();
    const task = await store.getTask("outline-1");
    assert.ok(task);
    task.status = "completed";
    assert.strictEqual((await store.getTask("outline-1"))?.status, "ready");
  });

  test("chapter records merge patches and list by page", async () => {
    const store = new MemoryPipelineStore();
    const later = new Date(FIXED_NOW.getTime() + 60_000);
    for (const chapterNumber of [3, 1, 2]) {
      await store.upsertTranslatedChapter(
        "project-1",
        chapterNumber,
        { chapterId: `chapter-${chapterNumber}`, content: "Text", wordCount: 1 },
        FIXED_NOW,
      );
    }
    const scored = await store.upsertTranslatedChapter(
      "project-1",
      1,
      { qualityScore: 3.5 },
      later,
    );
    assert.strictEqual(scored.content, "Text");
    assert.strictEqual(scored.qualityScore, 3.5);
    assert.strictEqual(scored.reviewStatus, "pending");
    assert.strictEqual(scored.createdAt, FIXED_NOW.toISOString());
    assert.strictEqual(scored.updatedAt, later.toISOString());

    const second = await store.listTranslatedChapters("project-1", { page: 2, pageSize: 2 });
    assert.strictEqual(second.total, 3);
    assert.deepStrictEqual(
      second.items.map((chapter) => chapter.chapterNumber),
      [3],
    );
    const beyond = await store.listTranslatedChapters("project-1", { page: 3, pageSize: 2 });
    assert.deepStrictEqual(beyond.items, []);
    const other = await store.listTranslatedChapters("project-2", { page: 1, pageSize: 2 });
    assert.strictEqual(other.total, 0);
  });

  test("an unverified mapping write never replaces a verified one", async () => {
    const store = new MemoryPipelineStore();
    const source = { taskId: "task-1", chapterNumber: 1, detectionMethod: "character_map" };
    const { mapping } = mergeCharacterMapping(
      "project-1",
      null,
      { originalName: "王磊", translatedName: "Wang Lei", confidence: 0.7 },
      source,
      "first_writer_wins",
      FIXED_NOW,
    );
    await store.saveCharacterMapping({ ...mapping, isVerified: true, confidence: 1 });
    await store.saveCharacterMapping({ ...mapping, translatedName: "Wang Rei" });

    const [stored] = await store.listCharacterMappings("project-1");
    assert.strictEqual(stored.translatedName, "Wang Lei");
    assert.strictEqual(stored.isVerified, true);

    await store.saveCharacterMapping({ ...mapping, translatedName: "Wáng Lěi", isVerified: true });
    const [replaced] = await store.listCharacterMappings("project-1");
    assert.strictEqual(replaced.translatedName, "Wáng Lěi");
  });
});
