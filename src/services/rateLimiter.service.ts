import type { EndpointBudget } from '../config/exporterConfig';

export const EndpointClasses = ['telemetry', 'wake'] as const;

export type EndpointClass = (typeof EndpointClasses)[number];

export type Permit = { granted: true };

export type WouldBlockUntil = { granted: false; retryAt: number };

export type AcquireResult = Permit | WouldBlockUntil;

type BucketState = {
  capacity: number;
  refillPerMs: number;
  minIntervalMs: number;
  windowMs: number;
  tokens: number;
  lastRefillAt: number;
  lastGrantAt: number | null;
  recentGrants: number[];
  deferrals: number;
};

export type RateLimitSnapshot = Record<
  EndpointClass,
  { capacity: number; tokens: number; deferrals: number }
>;

const createBucket = (budget: EndpointBudget, now: number): BucketState => {
  const refillPerMs = budget.refillPerMinute / 60_000;
  return {
    capacity: budget.capacity,
    refillPerMs,
    minIntervalMs: budget.minIntervalMs,
    windowMs: budget.capacity / refillPerMs,
    tokens: budget.capacity,
    lastRefillAt: now,
    lastGrantAt: null,
    recentGrants: [],
    deferrals: 0,
  };
};

/**
 * Token bucket per endpoint class, refilled lazily on access.
 *
 * A grant needs a whole token, `minIntervalMs` since the previous grant, and fewer than
 * `capacity` grants in the trailing `capacity / refill rate` window. The last condition
 * caps a full burst followed by refill at `capacity` per window.
 */
export class RateLimiter {
  private readonly buckets: Record<EndpointClass, BucketState>;

  private readonly now: () => number;

  constructor(budgets: Record<EndpointClass, EndpointBudget>, now: () => number = Date.now) {
    this.now = now;
    const startedAt = now();
    this.buckets = {
      telemetry: createBucket(budgets.telemetry, startedAt),
      wake: createBucket(budgets.wake, startedAt),
    };
  }

  acquire(endpointClass: EndpointClass): AcquireResult {
    const bucket = this.buckets[endpointClass];
    const now = this.now();
    this.refill(bucket, now);

    const retryAt = this.earliestGrant(bucket, now);
    if (retryAt > now) {
      bucket.deferrals += 1;
      return { granted: false, retryAt };
    }

    bucket.tokens -= 1;
    bucket.lastGrantAt = now;
    bucket.recentGrants.push(now);
    return { granted: true };
  }

  snapshot(): RateLimitSnapshot {
    const now = this.now();
    return {
      telemetry: this.describe(this.buckets.telemetry, now),
      wake: this.describe(this.buckets.wake, now),
    };
  }

  private describe(bucket: BucketState, now: number) {
    this.refill(bucket, now);
    return { capacity: bucket.capacity, tokens: bucket.tokens, deferrals: bucket.deferrals };
  }

  private refill(bucket: BucketState, now: number): void {
    const elapsed = Math.max(now - bucket.lastRefillAt, 0);
    bucket.tokens = Math.min(bucket.capacity, bucket.tokens + elapsed * bucket.refillPerMs);
    bucket.lastRefillAt = now;

    const windowStart = now - bucket.windowMs;
    while (bucket.recentGrants.length > 0 && bucket.recentGrants[0] <= windowStart) {
      bucket.recentGrants.shift();
    }
  }

  private earliestGrant(bucket: BucketState, now: number): number {
    const tokenReadyAt =
      bucket.tokens >= 1 ? now : now + Math.ceil((1 - bucket.tokens) / bucket.refillPerMs);
    const intervalReadyAt =
      bucket.lastGrantAt === null ? now : bucket.lastGrantAt + bucket.minIntervalMs;
    const windowReadyAt =
      bucket.recentGrants.length < bucket.capacity
        ? now
        : bucket.recentGrants[bucket.recentGrants.length - bucket.capacity] + bucket.windowMs;

    return Math.max(tokenReadyAt, intervalReadyAt, windowReadyAt);
  }
}
