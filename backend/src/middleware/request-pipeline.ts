import type { FastifyInstance } from "fastify";

import type { CredentialStore } from "@netops/auth";

import type { MetricsCollector } from "../services/metrics-collector";
import type { SlidingWindowRateLimiter } from "../services/rate-limiter";
import { createApiKeyAuthMiddleware, enforceApiKeyAuth } from "./api-key-auth";
import { createRateLimitMiddleware } from "./rate-limit";
import { createRequestMetricsHooks } from "./request-metrics";

export type RequestPipelineOptions = {
  credentials: CredentialStore;
  requireAuth: boolean;
  authExemptPaths: readonly string[];
  limiter: SlidingWindowRateLimiter;
  rateLimitExemptPaths: readonly string[];
  collector: MetricsCollector;
  metricsPath: string;
};

/**
 * Hook order: in-progress tracking, credential check, rate limit, then the
 * credential rejection (if any). The limiter keys on the authenticated
 * identity, and a request that failed authentication is charged to its
 * address before it is turned away.
 */
export const registerRequestPipeline = (app: FastifyInstance, options: RequestPipelineOptions): void => {
  const metrics = createRequestMetricsHooks({
    collector: options.collector,
    excludedPaths: new Set([options.metricsPath]),
  });

  app.addHook("onRequest", metrics.onRequest);
  app.addHook(
    "onRequest",
    createApiKeyAuthMiddleware({
      credentials: options.credentials,
      required: options.requireAuth,
      exemptPaths: new Set(options.authExemptPaths),
      collector: options.collector,
    })
  );
  app.addHook(
    "onRequest",
    createRateLimitMiddleware({
      limiter: options.limiter,
      exemptPaths: new Set(options.rateLimitExemptPaths),
      collector: options.collector,
    })
  );
  app.addHook("onRequest", enforceApiKeyAuth);
  app.addHook("onResponse", metrics.onResponse);
  app.addHook("onRequestAbort", metrics.onRequestAbort);

  app.log.info(
    {
      credentials: options.credentials.size,
      requireAuth: options.requireAuth,
      authExemptPaths: options.authExemptPaths,
      rateLimit: {
        requestsPerWindow: options.limiter.requestsPerWindow,
        windowSeconds: options.limiter.windowSeconds,
        exemptPaths: options.rateLimitExemptPaths,
      },
    },
    "Request pipeline configured"
  );
};
