import type { FastifyRequest, onRequestHookHandler } from "fastify";

import { HttpError } from "../lib/http-error";
import { getPeerAddress, getRequestPath } from "../lib/request-context";
import type { MetricsCollector } from "../services/metrics-collector";
import type { ClientIdentity, SlidingWindowRateLimiter } from "../services/rate-limiter";
import { getAuthContext } from "./api-key-auth";

type RateLimitMiddlewareOptions = {
  limiter: SlidingWindowRateLimiter;
  exemptPaths: ReadonlySet<string>;
  collector: MetricsCollector;
};

export const resolveClientIdentity = (request: FastifyRequest): ClientIdentity => {
  const auth = getAuthContext(request);
  if (auth) {
    return `key:${auth.identityDigest}`;
  }

  return `ip:${getPeerAddress(request)}`;
};

export const createRateLimitMiddleware = (options: RateLimitMiddlewareOptions): onRequestHookHandler => {
  return async (request, reply) => {
    const path = getRequestPath(request);
    if (options.exemptPaths.has(path)) {
      return;
    }

    const identity = resolveClientIdentity(request);
    const decision = options.limiter.evaluate(identity);

    if (!decision.admitted) {
      options.collector.recordRateLimitHit();
      request.log.warn({ identity, path, retryAfterSeconds: decision.retryAfterSeconds }, "Rate limit exceeded");

      throw new HttpError(
        429,
        "RATE_LIMIT_EXCEEDED",
        `Too many requests. Please try again in ${decision.retryAfterSeconds} seconds.`,
        { retry_after: decision.retryAfterSeconds },
        {
          "X-RateLimit-Limit": String(decision.limit),
          "X-RateLimit-Remaining": "0",
          "X-RateLimit-Reset": String(decision.resetAt),
          "Retry-After": String(decision.retryAfterSeconds),
        }
      );
    }

    reply.header("X-RateLimit-Limit", String(decision.limit));
    reply.header("X-RateLimit-Remaining", String(decision.remaining));
    reply.header("X-RateLimit-Reset", String(decision.resetAt));
  };
};
