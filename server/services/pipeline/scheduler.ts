import type { FastifyBaseLogger } from "fastify";

import type { ProviderRateLimiter } from "./rateLimiter";
import { compareTaskPriority, isActivePhase } from "./taskStateMachine";
import type { TaskLifecycle } from "./taskLifecycle";
import type { PipelineStore } from "./taskStore";
import type { BackoffStrategy } from "./types";
import type { WorkerPool } from "./workerPool";

export interface SchedulerDependencies {
  store: PipelineStore;
  lifecycle: TaskLifecycle;
  limiter: ProviderRateLimiter;
  pool: WorkerPool;
  logger: FastifyBaseLogger;
  /** Claims older than this are treated as lost workers. */
  livenessTimeoutMs: number;
  /** Synchronous halt flag set by pause and cancel before they commit. */
  isDispatchable: (projectId: string) => boolean;
  now?: () => Date;
}

/** Delay before retrying after a tick or claim failed in the store. */
const CLAIM_RETRY_MS = 1000;

export interface TickReport {
  promoted: number;
  recovered: number;
  dispatched: number;
  skipped: number;
  /** Claims that threw; their grants were returned. */
  failed: number;
}

/**
 * Pulls ready work into the pool. A tick never waits on the limiter: a
 * denied provider is skipped so tasks bound to other providers still run.
 */
export class PipelineScheduler {
  private ticking = false;
  private tickRequested = false;
  private running = false;
  private retryTimer: NodeJS.Timeout | null = null;
  private retryTimerAt: number | null = null;
  private unsubscribeRelease: (() => void) | null = null;
  private readonly now: () => Date;

  constructor(private readonly deps: SchedulerDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  start() {
    if (this.running) return;
    this.running = true;
    this.unsubscribeRelease = this.deps.limiter.onRelease(() => this.requestTick());
    this.requestTick();
  }

  stop() {
    this.running = false;
    this.unsubscribeRelease?.();
    this.unsubscribeRelease = null;
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
    }
    this.retryTimer = null;
    this.retryTimerAt = null;
  }

  /** Coalesces: at most one tick runs, and one more follows if requested meanwhile. */
  requestTick() {
    if (!this.running) return;
    if (this.ticking) {
      this.tickRequested = true;
      return;
    }
    void this.runTicks();
  }

  async tick(): Promise<TickReport> {
    const now = this.now();
    const report: TickReport = {
      promoted: 0,
      recovered: 0,
      dispatched: 0,
      skipped: 0,
      failed: 0,
    };
    const backoffByProject = new Map<string, BackoffStrategy>();
    const active = new Set<string>();
    for (const project of await this.deps.store.listProjects()) {
      backoffByProject.set(project.id, project.config.backoff);
      if (isActivePhase(project.status)) {
        active.add(project.id);
      }
    }

    // recovery first, so a recovered task with no delay is promoted in the same tick
    report.recovered = await this.recoverExpiredClaims(now, backoffByProject);
    report.promoted = await this.promoteDueRetries(this.now());

    const ready = (await this.deps.store.listTasksByStatus(["ready"]))
      .filter((task) => active.has(task.projectId))
      .sort(compareTaskPriority);

    for (const task of ready) {
      if (!this.running || this.deps.pool.freeSlots <= 0) {
        break;
      }
      if (!this.deps.isDispatchable(task.projectId)) {
        continue;
      }
      const grant = this.deps.limiter.tryAcquire(task.providerId);
      if (!grant.granted) {
        report.skipped += 1;
        continue;
      }
      const workerId = this.deps.pool.nextWorkerId();
      try {
        const claimed = await this.deps.lifecycle.claim(task, workerId);
        const [change] = claimed?.changes ?? [];
        if (!change) {
          this.deps.limiter.release(task.providerId, { refund: true });
          continue;
        }
        this.deps.pool.dispatch(change.after, workerId);
        report.dispatched += 1;
      } catch (err) {
        // the grant goes back; the task is still ready and is picked up next tick
        this.deps.limiter.release(task.providerId, { refund: true });
        report.failed += 1;
        this.deps.logger.error(
          { err, taskId: task.id, providerId: task.providerId },
          "[SCHEDULER] Claim failed",
        );
      }
    }

    if (report.dispatched || report.promoted || report.recovered || report.failed) {
      this.deps.logger.debug(report, "[SCHEDULER] Tick");
    }
    return report;
  }

  private async runTicks() {
    this.ticking = true;
    try {
      do {
        this.tickRequested = false;
        try {
          const report = await this.tick();
          if (report.failed > 0) {
            this.armRetryTimer(Date.now() + CLAIM_RETRY_MS, new Date());
          }
        } catch (err) {
          this.deps.logger.error({ err }, "[SCHEDULER] Tick failed");
          this.armRetryTimer(Date.now() + CLAIM_RETRY_MS, new Date());
        }
      } while (this.tickRequested && this.running);
    } finally {
      this.ticking = false;
    }
  }

  private async promoteDueRetries(now: Date) {
    const failed = await this.deps.store.listTasksByStatus(["failed"]);
    let promoted = 0;
    let nextDue: number | null = null;
    for (const task of failed) {
      const due = task.retryAt ? Date.parse(task.retryAt) : now.getTime();
      if (due <= now.getTime()) {
        if (await this.deps.lifecycle.promoteRetry(task)) {
          promoted += 1;
        }
      } else if (nextDue === null || due < nextDue) {
        nextDue = due;
      }
    }
    if (nextDue !== null) {
      this.armRetryTimer(nextDue, now);
    }
    return promoted;
  }

  private async recoverExpiredClaims(
    now: Date,
    backoffByProject: ReadonlyMap<string, BackoffStrategy>,
  ) {
    const running = await this.deps.store.listTasksByStatus(["running"]);
    const expired = running.filter(
      (task) =>
        task.claimedAt !== null &&
        Date.parse(task.claimedAt) + this.deps.livenessTimeoutMs < now.getTime(),
    );
    let recovered = 0;
    for (const task of expired) {
      this.deps.logger.warn(
        { taskId: task.id, workerId: task.workerId, claimedAt: task.claimedAt },
        "[SCHEDULER] Recovering task with expired claim",
      );
      const outcome = await this.deps.lifecycle.fail(
        task,
        task.workerId,
        {
          code: "claim_expired",
          message: `Claim held by ${task.workerId ?? "unknown worker"} expired`,
          retryable: true,
          occurredAt: now.toISOString(),
        },
        backoffByProject.get(task.projectId) ?? "linear",
      );
      if (outcome) {
        recovered += 1;
      }
    }
    return recovered;
  }

  private armRetryTimer(dueAt: number, now: Date) {
    if (this.retryTimerAt !== null && this.retryTimerAt <= dueAt) {
      return;
    }
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
    }
    this.retryTimerAt = dueAt;
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.retryTimerAt = null;
      this.requestTick();
    }, Math.max(0, dueAt - now.getTime()));
    this.retryTimer.unref();
  }
}
