import type { FastifyBaseLogger } from "fastify";

import { PipelineCommandError } from "./errors";
import { KeyedMutex } from "./keyedMutex";
import type { CharacterMappingStore } from "./taskStore";
import type {
  CharacterMapping,
  CharacterProposal,
  UnverifiedMergePolicy,
} from "./types";

export type MergeOutcome = "created" | "reinforced" | "replaced" | "kept_existing";

export interface MergeResult {
  mapping: CharacterMapping;
  outcome: MergeOutcome;
  /** Candidate translation that lost the merge, if any. */
  discarded: string | null;
}

export interface ProposalSource {
  taskId: string | null;
  chapterNumber: number | null;
  detectionMethod?: string | null;
}

export interface VerifyMappingInput {
  translatedName?: string;
  verifiedBy: string;
  notes?: string | null;
}

const clampConfidence = (value: number) =>
  Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : 0;

function withAlternative(
  alternatives: readonly string[],
  name: string,
  current: string,
): string[] {
  if (name === current || alternatives.includes(name)) {
    return [...alternatives];
  }
  return [...alternatives, name];
}

function minChapter(left: number | null, right: number | null) {
  if (left === null) return right;
  if (right === null) return left;
  return Math.min(left, right);
}

function maxChapter(left: number | null, right: number | null) {
  if (left === null) return right;
  if (right === null) return left;
  return Math.max(left, right);
}

/**
 * Pure merge of a candidate into the stored entry for the same name.
 * A verified entry is never overwritten by an unverified candidate.
 */
export function mergeCharacterMapping(
  projectId: string,
  existing: CharacterMapping | null,
  candidate: CharacterProposal,
  source: ProposalSource,
  policy: UnverifiedMergePolicy,
  at: Date,
): MergeResult {
  const timestamp = at.toISOString();
  const confidence = clampConfidence(candidate.confidence);
  const verified = candidate.verified ?? false;

  if (!existing) {
    return {
      outcome: "created",
      discarded: null,
      mapping: {
        projectId,
        originalName: candidate.originalName,
        translatedName: candidate.translatedName,
        alternativeNames: [],
        characterType: candidate.characterType ?? "character",
        confidence,
        isVerified: verified,
        verifiedBy: null,
        verificationNotes: null,
        autoDetected: !verified,
        detectionMethod: source.detectionMethod ?? null,
        firstAppearanceChapter: source.chapterNumber,
        lastAppearanceChapter: source.chapterNumber,
        appearanceFrequency: 1,
        sourceTaskId: source.taskId,
        createdAt: timestamp,
        updatedAt: timestamp,
      },
    };
  }

  const touched: CharacterMapping = {
    ...existing,
    firstAppearanceChapter: minChapter(
      existing.firstAppearanceChapter,
      source.chapterNumber,
    ),
    lastAppearanceChapter: maxChapter(
      existing.lastAppearanceChapter,
      source.chapterNumber,
    ),
    appearanceFrequency: existing.appearanceFrequency + 1,
    updatedAt: timestamp,
  };

  if (existing.translatedName === candidate.translatedName) {
    return {
      outcome: "reinforced",
      discarded: null,
      mapping: {
        ...touched,
        confidence: Math.max(existing.confidence, confidence),
        characterType:
          existing.characterType === "character" && candidate.characterType
            ? candidate.characterType
            : existing.characterType,
        isVerified: existing.isVerified || verified,
      },
    };
  }

  const replaces =
    verified ||
    (!existing.isVerified &&
      policy === "highest_confidence_wins" &&
      confidence > existing.confidence);

  if (replaces) {
    return {
      outcome: "replaced",
      discarded: existing.translatedName,
      mapping: {
        ...touched,
        translatedName: candidate.translatedName,
        alternativeNames: withAlternative(
          existing.alternativeNames,
          existing.translatedName,
          candidate.translatedName,
        ),
        characterType: candidate.characterType ?? existing.characterType,
        confidence,
        isVerified: existing.isVerified || verified,
        sourceTaskId: source.taskId ?? existing.sourceTaskId,
      },
    };
  }

  return {
    outcome: "kept_existing",
    discarded: candidate.translatedName,
    mapping: {
      ...touched,
      alternativeNames: withAlternative(
        existing.alternativeNames,
        candidate.translatedName,
        existing.translatedName,
      ),
    },
  };
}

type Snapshot = ReadonlyMap<string, CharacterMapping>;

/**
 * Project-scoped canonical names. Writers are serialized per
 * (project, original name); readers see the last published snapshot.
 */
export class CharacterMappingRegistry {
  private readonly snapshots = new Map<string, Snapshot>();
  private readonly loading = new Map<string, Promise<void>>();
  /** Completions whose proposals are still being merged, per project. */
  private readonly batches = new Map<string, Set<Promise<void>>>();
  private readonly locks = new KeyedMutex();
  private readonly mergePolicy: UnverifiedMergePolicy;
  private readonly now: () => Date;
  private readonly logger: FastifyBaseLogger;

  constructor(
    private readonly store: CharacterMappingStore,
    options: {
      mergePolicy: UnverifiedMergePolicy;
      logger: FastifyBaseLogger;
      now?: () => Date;
    },
  ) {
    this.mergePolicy = options.mergePolicy;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /** Lock-free read of the published snapshot. Call `list` first to load a cold project. */
  resolve(projectId: string, originalName: string): CharacterMapping | null {
    return this.snapshots.get(projectId)?.get(originalName.trim()) ?? null;
  }

  async list(projectId: string): Promise<CharacterMapping[]> {
    await this.ensureLoaded(projectId);
    const snapshot = this.snapshots.get(projectId);
    if (!snapshot) return [];
    return [...snapshot.values()].sort((left, right) =>
      left.originalName.localeCompare(right.originalName),
    );
  }

  async glossary(projectId: string): Promise<Record<string, string>> {
    await this.settled(projectId);
    const mappings = await this.list(projectId);
    return Object.fromEntries(
      mappings.map((mapping) => [mapping.originalName, mapping.translatedName]),
    );
  }

  /**
   * Runs `commit` and merges the candidates only when it succeeds, so a
   * result discarded by the commit never reaches the registry. Glossary reads
   * for the project wait for the batch, which keeps stages released by the
   * commit from seeing a glossary without these names.
   */
  async mergeAfterCommit<T>(
    projectId: string,
    candidates: readonly CharacterProposal[],
    source: ProposalSource,
    commit: () => Promise<T | null>,
  ): Promise<T | null> {
    let settle: () => void = () => undefined;
    const batch = new Promise<void>((resolve) => {
      settle = resolve;
    });
    const open = this.batches.get(projectId) ?? new Set<Promise<void>>();
    open.add(batch);
    this.batches.set(projectId, open);
    try {
      const committed = await commit();
      if (committed) {
        for (const candidate of candidates) {
          await this.proposeOrMerge(projectId, candidate, source);
        }
      }
      return committed;
    } finally {
      open.delete(batch);
      if (open.size === 0 && this.batches.get(projectId) === open) {
        this.batches.delete(projectId);
      }
      settle();
    }
  }

  /** Drops the cached snapshot; the next read reloads it from the store. */
  evict(projectId: string) {
    this.snapshots.delete(projectId);
  }

  get cachedProjects() {
    return this.snapshots.size;
  }

  async proposeOrMerge(
    projectId: string,
    candidate: CharacterProposal,
    source: ProposalSource,
  ): Promise<MergeResult> {
    const originalName = candidate.originalName.trim();
    const translatedName = candidate.translatedName.trim();
    if (!originalName || !translatedName) {
      throw new PipelineCommandError(
        "invalid_request",
        "Character proposals need an original and a translated name",
      );
    }
    await this.ensureLoaded(projectId);

    return this.withNameLock(projectId, originalName, async () => {
      const result = mergeCharacterMapping(
        projectId,
        this.resolve(projectId, originalName),
        { ...candidate, originalName, translatedName },
        source,
        this.mergePolicy,
        this.now(),
      );
      await this.store.saveCharacterMapping(result.mapping);
      this.publish(result.mapping);
      if (result.discarded) {
        this.logger.debug(
          {
            projectId,
            originalName,
            kept: result.mapping.translatedName,
            discarded: result.discarded,
            outcome: result.outcome,
          },
          "[MAPPINGS] Candidate translation recorded as alternative",
        );
      }
      return result;
    });
  }

  async verify(
    projectId: string,
    originalName: string,
    input: VerifyMappingInput,
  ): Promise<CharacterMapping> {
    const name = originalName.trim();
    const translatedName = input.translatedName?.trim() || undefined;
    await this.ensureLoaded(projectId);

    return this.withNameLock(projectId, name, async () => {
      const existing = this.resolve(projectId, name);
      const at = this.now().toISOString();
      let next: CharacterMapping;

      if (existing) {
        const renamed =
          translatedName !== undefined &&
          translatedName !== existing.translatedName;
        next = {
          ...existing,
          translatedName: translatedName ?? existing.translatedName,
          alternativeNames: renamed
            ? withAlternative(
                existing.alternativeNames,
                existing.translatedName,
                translatedName,
              )
            : existing.alternativeNames,
          confidence: 1,
          isVerified: true,
          verifiedBy: input.verifiedBy,
          verificationNotes: input.notes ?? existing.verificationNotes,
          updatedAt: at,
        };
      } else {
        if (!translatedName) {
          throw new PipelineCommandError(
            "invalid_request",
            `No mapping exists for "${name}"; a translated name is required`,
          );
        }
        next = {
          projectId,
          originalName: name,
          translatedName,
          alternativeNames: [],
          characterType: "character",
          confidence: 1,
          isVerified: true,
          verifiedBy: input.verifiedBy,
          verificationNotes: input.notes ?? null,
          autoDetected: false,
          detectionMethod: "manual",
          firstAppearanceChapter: null,
          lastAppearanceChapter: null,
          appearanceFrequency: 0,
          sourceTaskId: null,
          createdAt: at,
          updatedAt: at,
        };
      }

      await this.store.saveCharacterMapping(next);
      this.publish(next);
      return next;
    });
  }

  private async ensureLoaded(projectId: string) {
    if (this.snapshots.has(projectId)) return;
    let pending = this.loading.get(projectId);
    if (!pending) {
      pending = this.store
        .listCharacterMappings(projectId)
        .then((mappings) => {
          if (!this.snapshots.has(projectId)) {
            this.snapshots.set(
              projectId,
              new Map(mappings.map((mapping) => [mapping.originalName, mapping])),
            );
          }
        })
        .finally(() => {
          this.loading.delete(projectId);
        });
      this.loading.set(projectId, pending);
    }
    await pending;
  }

  private async settled(projectId: string) {
    const open = this.batches.get(projectId);
    if (open && open.size > 0) {
      await Promise.all([...open]);
    }
  }

  private publish(mapping: CharacterMapping) {
    const current = this.snapshots.get(mapping.projectId);
    // evicted meanwhile: the store holds the write and the next load picks it up
    if (!current) return;
    const next = new Map<string, CharacterMapping>(current);
    next.set(mapping.originalName, mapping);
    this.snapshots.set(mapping.projectId, next);
  }

  private withNameLock<T>(
    projectId: string,
    originalName: string,
    work: () => Promise<T>,
  ): Promise<T> {
    return this.locks.run(`${projectId}\u0000${originalName}`, work);
  }
}
