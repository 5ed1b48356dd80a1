import { logger, sleep } from '@pipeline/shared';
import type { RateLimitConfig } from '../config';

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

export const DEFAULT_TENANT = 'default';

/** Resets to zero once `windowMs` has passed since the window opened. */
type Counter = { value: number; windowStart: number };

type TenantUsage = {
  /** acquire timestamps from the last day, oldest first */
  requests: number[];
  tokensMinute: Counter;
  tokensDay: Counter;
  costDay: Counter;
};

export type UsageReport = {
  tenant_id: string;
  requests: { minute: number; hour: number; day: number };
  tokens: { minute: number; day: number };
  cost: { day: number };
  limits: {
    requests_per_minute: number;
    requests_per_hour: number;
    requests_per_day: number;
    tokens_per_minute: number | null;
    tokens_per_day: number | null;
    cost_per_day: number | null;
  };
};

export type RateLimiterDeps = {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

function rollover(counter: Counter, windowMs: number, now: number): void {
  if (now - counter.windowStart >= windowMs) {
    counter.value = 0;
    counter.windowStart = now;
  }
}

/**
 * Process-local limiter: a shared token bucket for bursts plus per-tenant
 * request logs (sliding minute/hour/day) and token/cost counters.
 * Check and consume run without an await in between; a waiting caller holds
 * nothing and rechecks after its sleep.
 */
export class RateLimiter {
  private readonly usage = new Map<string, TenantUsage>();
  private bucketTokens: number;
  private lastRefill: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly config: RateLimitConfig,
    deps: RateLimiterDeps = {},
  ) {
    this.now = deps.now ?? (() => Date.now());
    this.sleep = deps.sleep ?? sleep;
    this.bucketTokens = config.burstSize;
    this.lastRefill = this.now();
  }

  async acquire(tenantId: string = DEFAULT_TENANT): Promise<void> {
    for (;;) {
      const now = this.now();
      const stats = this.tenant(tenantId, now);
      const waitMs = this.waitTime(stats, now);
      if (waitMs === null) {
        this.bucketTokens -= 1;
        stats.requests.push(now);
        return;
      }

      logger.debug(
        { service: 'rate-limiter', tenant_id: tenantId, wait_ms: waitMs },
        'rate limited',
      );
      await this.sleep(waitMs);
    }
  }

  recordUsage(usage: {
    tokens?: number;
    cost?: number;
    tenantId?: string;
  }): void {
    const stats = this.tenant(usage.tenantId ?? DEFAULT_TENANT, this.now());
    const tokens = usage.tokens ?? 0;
    stats.tokensMinute.value += tokens;
    stats.tokensDay.value += tokens;
    stats.costDay.value += usage.cost ?? 0;
  }

  getUsage(tenantId: string = DEFAULT_TENANT): UsageReport {
    const now = this.now();
    const stats = this.tenant(tenantId, now);
    return {
      tenant_id: tenantId,
      requests: {
        minute: this.requestsSince(stats, now - MINUTE_MS),
        hour: this.requestsSince(stats, now - HOUR_MS),
        day: stats.requests.length,
      },
      tokens: {
        minute: stats.tokensMinute.value,
        day: stats.tokensDay.value,
      },
      cost: { day: stats.costDay.value },
      limits: {
        requests_per_minute: this.config.requestsPerMinute,
        requests_per_hour: this.config.requestsPerHour,
        requests_per_day: this.config.requestsPerDay,
        tokens_per_minute: this.config.tokensPerMinute ?? null,
        tokens_per_day: this.config.tokensPerDay ?? null,
        cost_per_day: this.config.costPerDay ?? null,
      },
    };
  }

  async schedule<T>(
    fn: () => Promise<T>,
    tenantId: string = DEFAULT_TENANT,
  ): Promise<T> {
    await this.acquire(tenantId);
    return fn();
  }

  /** Milliseconds until every limit admits one more request, or null if they do now. */
  private waitTime(stats: TenantUsage, now: number): number | null {
    const waits: number[] = [];

    this.refill(now);
    if (this.bucketTokens < 1) {
      waits.push(
        ((1 - this.bucketTokens) * MINUTE_MS) / this.config.requestsPerMinute,
      );
    }

    const requestLimits: Array<[limit: number, windowMs: number]> = [
      [this.config.requestsPerMinute, MINUTE_MS],
      [this.config.requestsPerHour, HOUR_MS],
      [this.config.requestsPerDay, DAY_MS],
    ];
    for (const [limit, windowMs] of requestLimits) {
      const inWindow = stats.requests.filter((at) => at > now - windowMs);
      if (inWindow.length >= limit) {
        // the entry whose expiry brings the count back under the limit
        const freeing = inWindow[inWindow.length - limit];
        waits.push(freeing + windowMs - now);
      }
    }

    const counterLimits: Array<
      [limit: number | undefined, counter: Counter, windowMs: number]
    > = [
      [this.config.tokensPerMinute, stats.tokensMinute, MINUTE_MS],
      [this.config.tokensPerDay, stats.tokensDay, DAY_MS],
      [this.config.costPerDay, stats.costDay, DAY_MS],
    ];
    for (const [limit, counter, windowMs] of counterLimits) {
      if (limit !== undefined && counter.value >= limit) {
        waits.push(counter.windowStart + windowMs - now);
      }
    }

    if (waits.length === 0) {
      return null;
    }
    const shortest = Math.ceil(Math.min(...waits));
    return shortest > 0 ? shortest : this.config.burstCooldownMs;
  }

  private refill(now: number): void {
    const elapsed = now - this.lastRefill;
    this.lastRefill = now;
    this.bucketTokens = Math.min(
      this.config.burstSize,
      this.bucketTokens + (elapsed * this.config.requestsPerMinute) / MINUTE_MS,
    );
  }

  private tenant(tenantId: string, now: number): TenantUsage {
    let stats = this.usage.get(tenantId);
    if (!stats) {
      stats = {
        requests: [],
        tokensMinute: { value: 0, windowStart: now },
        tokensDay: { value: 0, windowStart: now },
        costDay: { value: 0, windowStart: now },
      };
      this.usage.set(tenantId, stats);
    }

    const firstLive = stats.requests.findIndex((at) => at > now - DAY_MS);
    stats.requests.splice(
      0,
      firstLive === -1 ? stats.requests.length : firstLive,
    );
    rollover(stats.tokensMinute, MINUTE_MS, now);
    rollover(stats.tokensDay, DAY_MS, now);
    rollover(stats.costDay, DAY_MS, now);
    return stats;
  }

  private requestsSince(stats: TenantUsage, since: number): number {
    return stats.requests.filter((at) => at > since).length;
  }
}
