import type { FastifyPluginAsync } from "fastify";

import { resolveClientIdentity } from "../middleware/rate-limit";
import type { SlidingWindowRateLimiter } from "../services/rate-limiter";

type RateLimitRoutesOptions = {
  limiter: SlidingWindowRateLimiter;
};

export const rateLimitRoutes: FastifyPluginAsync<RateLimitRoutesOptions> = async (app, options) => {
  app.get("/rate-limit/status", async (request) => {
    const identity = resolveClientIdentity(request);
    const stats = options.limiter.getStats(identity);

    return {
      identity,
      ...stats,
    };
  });
};
