import type { FastifyInstance } from "fastify";

import type { SlidingWindowRateLimiter } from "../services/rate-limiter";

export const runRateLimitSweepOnce = (app: FastifyInstance, limiter: SlidingWindowRateLimiter): number => {
  const removed = limiter.sweep();
  if (removed > 0) {
    app.log.debug({ removed, tracked: limiter.trackedIdentities }, "Rate limit sweep removed idle identities");
  }

  return removed;
};

export const registerRateLimitSweepJob = (
  app: FastifyInstance,
  input: { limiter: SlidingWindowRateLimiter; intervalMs: number }
): void => {
  const { limiter, intervalMs } = input;

  if (intervalMs <= 0) {
    app.log.info({ intervalMs }, "Rate limit sweep job disabled");
    return;
  }

  let timer: NodeJS.Timeout | null = null;

  app.addHook("onReady", async () => {
    timer = setInterval(() => {
      try {
        runRateLimitSweepOnce(app, limiter);
      } catch (error) {
        app.log.error({ err: error }, "Rate limit sweep failed");
      }
    }, intervalMs);
    timer.unref();

    app.log.info({ intervalMs }, "Rate limit sweep job started");
  });

  app.addHook("onClose", async () => {
    if (!timer) {
      return;
    }

    clearInterval(timer);
    timer = null;
  });
};
