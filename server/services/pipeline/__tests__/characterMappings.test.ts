import { describe, test } from "node:test";
import assert from "node:assert";

import { PipelineCommandError } from "../errors";
import { CharacterMappingRegistry, mergeCharacterMapping } from "../characterMappings";
import { MemoryPipelineStore } from "../taskStore";
import type { UnverifiedMergePolicy } from "../types";
import { FIXED_NOW, silentLogger } from "./helpers";

const source = (chapterNumber: number, taskId = `task-${chapterNumber}`) => ({
  taskId,
  chapterNumber,
  detectionMethod: "character_map",
});

function buildRegistry(mergePolicy: UnverifiedMergePolicy = "first_writer_wins") {
  const store = new MemoryPipelineStore();
  const registry = new CharacterMappingRegistry(store, {
    mergePolicy,
    logger: silentLogger,
    now: () => FIXED_NOW,
  });
  return { store, registry };
}

describe("mergeCharacterMapping", () => {
  test("creates a new entry from the first proposal", () => {
    const { mapping, outcome, discarded } = mergeCharacterMapping(
      "project-1",
      null,
      { originalName: "王磊", translatedName: "Wang Lei", confidence: 1.4 },
      source(3),
      "first_writer_wins",
      FIXED_NOW,
    );
    assert.strictEqual(outcome, "created");
    assert.strictEqual(discarded, null);
    assert.strictEqual(mapping.confidence, 1);
    assert.strictEqual(mapping.characterType, "character");
    assert.strictEqual(mapping.firstAppearanceChapter, 3);
    assert.strictEqual(mapping.appearanceFrequency, 1);
    assert.strictEqual(mapping.autoDetected, true);
  });

  test("a matching proposal reinforces confidence and widens the range", () => {
    const created = mergeCharacterMapping(
      "project-1",
      null,
      { originalName: "王磊", translatedName: "Wang Lei", confidence: 0.6 },
      source(4),
      "first_writer_wins",
      FIXED_NOW,
    ).mapping;
    const { mapping, outcome } = mergeCharacterMapping(
      "project-1",
      created,
      {
        originalName: "王磊",
        translatedName: "Wang Lei",
        confidence: 0.8,
        characterType: "protagonist",
      },
      source(2),
      "first_writer_wins",
      FIXED_NOW,
    );
    assert.strictEqual(outcome, "reinforced");
    assert.strictEqual(mapping.confidence, 0.8);
    assert.strictEqual(mapping.characterType, "protagonist");
    assert.strictEqual(mapping.firstAppearanceChapter, 2);
    assert.strictEqual(mapping.lastAppearanceChapter, 4);
    assert.strictEqual(mapping.appearanceFrequency, 2);
  });

  test("a verified entry is never overwritten by an unverified candidate", () => {
    const verified = {
      ...mergeCharacterMapping(
        "project-1",
        null,
        { originalName: "王磊", translatedName: "Wang Lei", confidence: 0.5 },
        source(1),
        "highest_confidence_wins",
        FIXED_NOW,
      ).mapping,
      isVerified: true,
    };
    const { mapping, outcome, discarded } = mergeCharacterMapping(
      "project-1",
      verified,
      { originalName: "王磊", translatedName: "Wang Rei", confidence: 0.99 },
      source(2),
      "highest_confidence_wins",
      FIXED_NOW,
    );
    assert.strictEqual(outcome, "kept_existing");
    assert.strictEqual(discarded, "Wang Rei");
    assert.strictEqual(mapping.translatedName, "Wang Lei");
    assert.deepStrictEqual(mapping.alternativeNames, ["Wang Rei"]);
  });

  test("highest confidence wins only on a strictly higher score", () => {
    const existing = mergeCharacterMapping(
      "project-1",
      null,
      { originalName: "王磊", translatedName: "Wang Lei", confidence: 0.7 },
      source(1),
      "highest_confidence_wins",
      FIXED_NOW,
    ).mapping;

    const tie = mergeCharacterMapping(
      "project-1",
      existing,
      { originalName: "王磊", translatedName: "Wang Rei", confidence: 0.7 },
      source(2),
      "highest_confidence_wins",
      FIXED_NOW,
    );
    assert.strictEqual(tie.outcome, "kept_existing");

    const higher = mergeCharacterMapping(
      "project-1",
      existing,
      { originalName: "王磊", translatedName: "Wang Rei", confidence: 0.9 },
      source(2, "task-9"),
      "highest_confidence_wins",
      FIXED_NOW,
    );
    assert.strictEqual(higher.outcome, "replaced");
    assert.strictEqual(higher.discarded, "Wang Lei");
    assert.strictEqual(higher.mapping.translatedName, "Wang Rei");
    assert.deepStrictEqual(higher.mapping.alternativeNames, ["Wang Lei"]);
    assert.strictEqual(higher.mapping.sourceTaskId, "task-9");
  });
});

describe("CharacterMappingRegistry", () => {
  test("concurrent proposals for one name keep the first writer", async () => {
    const { store, registry } = buildRegistry();

    const [first, second] = await Promise.all([
      registry.proposeOrMerge(
        "project-1",
        { originalName: "王磊", translatedName: "Wang Lei", confidence: 0.8 },
        source(1),
      ),
      registry.proposeOrMerge(
        "project-1",
        { originalName: "王磊", translatedName: "Wang Rei", confidence: 0.95 },
        source(2),
      ),
    ]);

    assert.strictEqual(first.outcome, "created");
    assert.strictEqual(second.outcome, "kept_existing");
    assert.strictEqual(second.discarded, "Wang Rei");

    const stored = await store.listCharacterMappings("project-1");
    assert.strictEqual(stored.length, 1);
    assert.strictEqual(stored[0].translatedName, "Wang Lei");
    assert.deepStrictEqual(stored[0].alternativeNames, ["Wang Rei"]);
    assert.strictEqual(stored[0].appearanceFrequency, 2);
    assert.strictEqual(registry.resolve("project-1", "王磊")?.translatedName, "Wang Lei");
  });

  test("concurrent proposals under highest_confidence_wins keep the stronger one", async () => {
    const { registry } = buildRegistry("highest_confidence_wins");

    await Promise.all([
      registry.proposeOrMerge(
        "project-1",
        { originalName: "王磊", translatedName: "Wang Lei", confidence: 0.8 },
        source(1),
      ),
      registry.proposeOrMerge(
        "project-1",
        { originalName: "王磊", translatedName: "Wang Rei", confidence: 0.95 },
        source(2),
      ),
    ]);

    const [mapping] = await registry.list("project-1");
    assert.strictEqual(mapping.translatedName, "Wang Rei");
    assert.deepStrictEqual(mapping.alternativeNames, ["Wang Lei"]);
  });

  test("names are trimmed and empty names are rejected", async () => {
    const { registry } = buildRegistry();
    const { mapping } = await registry.proposeOrMerge(
      "project-1",
      { originalName: "  李娜 ", translatedName: " Li Na ", confidence: 0.5 },
      source(1),
    );
    assert.strictEqual(mapping.originalName, "李娜");
    assert.strictEqual(mapping.translatedName, "Li Na");

    await assert.rejects(
      registry.proposeOrMerge(
        "project-1",
        { originalName: "李娜", translatedName: "   ", confidence: 0.5 },
        source(1),
      ),
      (err: unknown) =>
        err instanceof PipelineCommandError && err.code === "invalid_request",
    );
  });

  test("verification pins the translation and keeps the old one as alternative", async () => {
    const { registry } = buildRegistry();
    await registry.proposeOrMerge(
      "project-1",
      { originalName: "王磊", translatedName: "Wang Rei", confidence: 0.6 },
      source(1),
    );

    const verified = await registry.verify("project-1", "王磊", {
      translatedName: "Wang Lei",
      verifiedBy: "user-1",
      notes: "Pinyin spelling",
    });
    assert.strictEqual(verified.translatedName, "Wang Lei");
    assert.deepStrictEqual(verified.alternativeNames, ["Wang Rei"]);
    assert.strictEqual(verified.isVerified, true);
    assert.strictEqual(verified.confidence, 1);
    assert.strictEqual(verified.verifiedBy, "user-1");

    const afterProposal = await registry.proposeOrMerge(
      "project-1",
      { originalName: "王磊", translatedName: "Wang Rei", confidence: 1 },
      source(5),
    );
    assert.strictEqual(afterProposal.outcome, "kept_existing");
    assert.strictEqual(afterProposal.mapping.translatedName, "Wang Lei");
  });

  test("verifying an unknown name needs a translation", async () => {
    const { registry } = buildRegistry();
    await assert.rejects(
      registry.verify("project-1", "张伟", { verifiedBy: "user-1" }),
      (err: unknown) =>
        err instanceof PipelineCommandError && err.code === "invalid_request",
    );

    const created = await registry.verify("project-1", "张伟", {
      translatedName: "Zhang Wei",
      verifiedBy: "user-1",
    });
    assert.strictEqual(created.detectionMethod, "manual");
    assert.deepStrictEqual(await registry.glossary("project-1"), { 张伟: "Zhang Wei" });
  });

  test("a cold registry loads stored mappings before merging", async () => {
    const { store, registry } = buildRegistry();
    await registry.proposeOrMerge(
      "project-1",
      { originalName: "王磊", translatedName: "Wang Lei", confidence: 0.8 },
      source(1),
    );

    const restarted = new CharacterMappingRegistry(store, {
      mergePolicy: "first_writer_wins",
      logger: silentLogger,
      now: () => FIXED_NOW,
    });
    assert.strictEqual(restarted.resolve("project-1", "王磊"), null);
    const result = await restarted.proposeOrMerge(
      "project-1",
      { originalName: "王磊", translatedName: "Wang Lei", confidence: 0.5 },
      source(2),
    );
    assert.strictEqual(result.outcome, "reinforced");
    assert.strictEqual(result.mapping.appearanceFrequency, 2);
  });

  test("a discarded commit merges nothing", async () => {
    const { store, registry } = buildRegistry();
    const candidates = [{ originalName: "王磊", translatedName: "Wang Lei", confidence: 0.9 }];

    const skipped = await registry.mergeAfterCommit("project-1", candidates, source(1), async () => null);
    assert.strictEqual(skipped, null);
    assert.deepStrictEqual(await store.listCharacterMappings("project-1"), []);

    const committed = await registry.mergeAfterCommit(
      "project-1",
      candidates,
      source(1),
      async () => "committed",
    );
    assert.strictEqual(committed, "committed");
    assert.deepStrictEqual(await registry.glossary("project-1"), { 王磊: "Wang Lei" });
  });

  test("glossary reads wait for an open merge batch", async () => {
    const { registry } = buildRegistry();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const merging = registry.mergeAfterCommit(
      "project-1",
      [{ originalName: "王磊", translatedName: "Wang Lei", confidence: 0.9 }],
      source(1),
      async () => {
        await gate;
        return true;
      },
    );
    const reading = registry.glossary("project-1");
    release();

    assert.deepStrictEqual(await reading, { 王磊: "Wang Lei" });
    assert.strictEqual(await merging, true);
  });

  test("an evicted project reloads from the store", async () => {
    const { registry } = buildRegistry();
    await registry.proposeOrMerge(
      "project-1",
      { originalName: "王磊", translatedName: "Wang Lei", confidence: 0.8 },
      source(1),
    );
    assert.strictEqual(registry.cachedProjects, 1);

    registry.evict("project-1");
    assert.strictEqual(registry.cachedProjects, 0);
    assert.strictEqual(registry.resolve("project-1", "王磊"), null);

    assert.deepStrictEqual(await registry.glossary("project-1"), { 王磊: "Wang Lei" });
    assert.strictEqual(registry.cachedProjects, 1);
  });
});
