import { EventEmitter } from "node:events";

import type { ProviderDescriptor } from "./types";

const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export type RateLimitDescriptor = Pick<
  ProviderDescriptor,
  "id" | "maxConcurrentRequests" | "maxRequestsPerMinute" | "maxRequestsPerDay"
>;

export type RateLimitDenialReason =
  | "unknown_provider"
  | "concurrency"
  | "per_minute"
  | "per_day";

export type AcquireResult =
  | { granted: true; providerId: string }
  | {
      granted: false;
      providerId: string;
      reason: RateLimitDenialReason;
      retryAfterMs: number | null;
    };

export interface ProviderUsageSnapshot {
  providerId: string;
  inFlight: number;
  requestsLastMinute: number;
  requestsLastDay: number;
}

interface WindowEntry {
  at: number;
  weight: number;
}

interface ProviderUsageCounter {
  limits: RateLimitDescriptor;
  inFlight: number;
  minute: WindowEntry[];
  day: WindowEntry[];
}

const sumWeights = (entries: WindowEntry[]) =>
  entries.reduce((total, entry) => total + entry.weight, 0);

function prune(entries: WindowEntry[], horizon: number) {
  while (entries.length && entries[0].at <= horizon) {
    entries.shift();
  }
}

/**
 * Non-blocking per-provider budget. Each provider has its own counter so
 * contention on one provider never touches another. There is no queue:
 * denied callers try again on a later scheduling tick.
 */
export class ProviderRateLimiter {
  private readonly counters = new Map<string, ProviderUsageCounter>();
  private readonly releases = new EventEmitter();
  private readonly now: () => number;

  constructor(
    providers: readonly RateLimitDescriptor[],
    options: { now?: () => number } = {},
  ) {
    this.now = options.now ?? Date.now;
    for (const provider of providers) {
      this.counters.set(provider.id, {
        limits: provider,
        inFlight: 0,
        minute: [],
        day: [],
      });
    }
  }

  tryAcquire(providerId: string, cost = 1): AcquireResult {
    const counter = this.counters.get(providerId);
    if (!counter) {
      return {
        granted: false,
        providerId,
        reason: "unknown_provider",
        retryAfterMs: null,
      };
    }

    const now = this.now();
    prune(counter.minute, now - MINUTE_MS);
    prune(counter.day, now - DAY_MS);

    if (counter.inFlight >= counter.limits.maxConcurrentRequests) {
      return {
        granted: false,
        providerId,
        reason: "concurrency",
        retryAfterMs: null,
      };
    }
    if (sumWeights(counter.minute) + cost > counter.limits.maxRequestsPerMinute) {
      return {
        granted: false,
        providerId,
        reason: "per_minute",
        retryAfterMs: counter.minute.length
          ? counter.minute[0].at + MINUTE_MS - now
          : null,
      };
    }
    if (sumWeights(counter.day) + cost > counter.limits.maxRequestsPerDay) {
      return {
        granted: false,
        providerId,
        reason: "per_day",
        retryAfterMs: counter.day.length
          ? counter.day[0].at + DAY_MS - now
          : null,
      };
    }

    counter.inFlight += 1;
    counter.minute.push({ at: now, weight: cost });
    counter.day.push({ at: now, weight: cost });
    return { granted: true, providerId };
  }

  /**
   * Frees the in-flight slot. `refund` also withdraws the most recent window
   * charge, for grants that never turned into a request.
   */
  release(providerId: string, options: { refund?: boolean } = {}): void {
    const counter = this.counters.get(providerId);
    if (!counter) {
      return;
    }
    counter.inFlight = Math.max(0, counter.inFlight - 1);
    if (options.refund) {
      counter.minute.pop();
      counter.day.pop();
    }
    this.releases.emit("release", providerId);
  }

  onRelease(listener: (providerId: string) => void): () => void {
    this.releases.on("release", listener);
    return () => this.releases.off("release", listener);
  }

  snapshot(providerId: string): ProviderUsageSnapshot | null {
    const counter = this.counters.get(providerId);
    if (!counter) {
      return null;
    }
    const now = this.now();
    prune(counter.minute, now - MINUTE_MS);
    prune(counter.day, now - DAY_MS);
    return {
      providerId,
      inFlight: counter.inFlight,
      requestsLastMinute: sumWeights(counter.minute),
      requestsLastDay: sumWeights(counter.day),
    };
  }
}
