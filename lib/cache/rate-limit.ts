import { env } from "@/lib/env";

interface Bucket {
  count: number;
  resetAt: number;
}

const WINDOW_MS = 60_000;
const buckets = new Map<string, Bucket>();

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetInSeconds: number;
  limit: number;
}

function sweepExpired(now: number): void {
  for (const [key, bucket] of buckets) {
    if (bucket.resetAt <= now) buckets.delete(key);
  }
}

/** Fixed one-minute window per key (normally the client IP). */
export function applyRateLimit(key: string, limit = env.RATE_LIMIT_PER_MINUTE): RateLimitResult {
  const now = Date.now();
  const current = buckets.get(key);

  if (!current || current.resetAt <= now) {
    if (buckets.size > 1_000) sweepExpired(now);
    buckets.set(key, { count: 1, resetAt: now + WINDOW_MS });
    return { allowed: true, remaining: limit - 1, resetInSeconds: WINDOW_MS / 1000, limit };
  }

  const resetInSeconds = Math.max(1, Math.ceil((current.resetAt - now) / 1000));
  if (current.count >= limit) {
    return { allowed: false, remaining: 0, resetInSeconds, limit };
  }

  current.count += 1;
  return { allowed: true, remaining: limit - current.count, resetInSeconds, limit };
}

export function rateLimitHeaders(result: RateLimitResult): Record<string, string> {
  return {
    "x-ratelimit-limit": String(result.limit),
    "x-ratelimit-remaining": String(result.remaining),
    "x-ratelimit-reset": String(result.resetInSeconds)
  };
}

export function resetRateLimiterForTests(): void {
  buckets.clear();
}
