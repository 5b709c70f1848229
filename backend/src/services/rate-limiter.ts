export type ClientIdentity = `key:${string}` | `ip:${string}`;

export type RateLimitDecision =
  | {
      admitted: true;
      limit: number;
      remaining: number;
      resetSeconds: number;
      resetAt: number;
    }
  | {
      admitted: false;
      limit: number;
      remaining: 0;
      retryAfterSeconds: number;
      resetAt: number;
    };

export type RateLimitStats = {
  limit: number;
  remaining: number;
  used: number;
  windowSeconds: number;
};

export type SlidingWindowRateLimiterOptions = {
  requestsPerWindow: number;
  windowSeconds: number;
  now?: () => number;
};

export type SlidingWindowRateLimiter = {
  readonly requestsPerWindow: number;
  readonly windowSeconds: number;
  readonly trackedIdentities: number;
  evaluate: (identity: ClientIdentity, nowMs?: number) => RateLimitDecision;
  getStats: (identity: ClientIdentity, nowMs?: number) => RateLimitStats;
  sweep: (nowMs?: number) => number;
};

const toEpochSeconds = (ms: number): number => Math.floor(ms / 1000);

/**
 * Sliding-window-log limiter: every admitted request is kept as a timestamp
 * until it leaves the trailing window, so the count is exact at any instant.
 *
 * All methods are synchronous. A purge-count-append sequence never yields to
 * the event loop, so concurrent requests cannot interleave inside it.
 */
export const createSlidingWindowRateLimiter = (
  options: SlidingWindowRateLimiterOptions
): SlidingWindowRateLimiter => {
  const requestsPerWindow = Math.max(1, Math.floor(options.requestsPerWindow));
  const windowSeconds = Math.max(1, Math.floor(options.windowSeconds));
  const windowMs = windowSeconds * 1000;
  const clock = options.now ?? Date.now;
  const buckets = new Map<ClientIdentity, number[]>();

  const purge = (identity: ClientIdentity, nowMs: number): number[] => {
    const cutoff = nowMs - windowMs;
    const current = buckets.get(identity) ?? [];
    const retained = current.filter((timestamp) => timestamp > cutoff);
    buckets.set(identity, retained);

    return retained;
  };

  const evaluate = (identity: ClientIdentity, nowMs = clock()): RateLimitDecision => {
    const timestamps = purge(identity, nowMs);
    const used = timestamps.length;

    if (used >= requestsPerWindow) {
      const oldest = timestamps.reduce((min, timestamp) => Math.min(min, timestamp), nowMs);
      const retryAfterSeconds = Math.max(1, Math.floor((oldest + windowMs - nowMs) / 1000));

      return {
        admitted: false,
        limit: requestsPerWindow,
        remaining: 0,
        retryAfterSeconds,
        resetAt: toEpochSeconds(nowMs) + retryAfterSeconds,
      };
    }

    timestamps.push(nowMs);

    return {
      admitted: true,
      limit: requestsPerWindow,
      remaining: requestsPerWindow - used - 1,
      resetSeconds: windowSeconds,
      resetAt: toEpochSeconds(nowMs) + windowSeconds,
    };
  };

  const getStats = (identity: ClientIdentity, nowMs = clock()): RateLimitStats => {
    const used = buckets.has(identity) ? purge(identity, nowMs).length : 0;

    return {
      limit: requestsPerWindow,
      remaining: Math.max(0, requestsPerWindow - used),
      used,
      windowSeconds,
    };
  };

  const sweep = (nowMs = clock()): number => {
    let removed = 0;

    for (const identity of [...buckets.keys()]) {
      if (purge(identity, nowMs).length === 0) {
        buckets.delete(identity);
        removed += 1;
      }
    }

    return removed;
  };

  return {
    requestsPerWindow,
    windowSeconds,
    get trackedIdentities() {
      return buckets.size;
    },
    evaluate,
    getStats,
    sweep,
  };
};
