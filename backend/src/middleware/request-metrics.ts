import type { FastifyRequest, onRequestAbortHookHandler, onRequestHookHandler, onResponseHookHandler } from "fastify";

import { getRequestPath } from "../lib/request-context";
import type { MetricsCollector } from "../services/metrics-collector";

type RequestMetricsOptions = {
  collector: MetricsCollector;
  excludedPaths: ReadonlySet<string>;
};

export type RequestMetricsHooks = {
  onRequest: onRequestHookHandler;
  onResponse: onResponseHookHandler;
  onRequestAbort: onRequestAbortHookHandler;
};

export const createRequestMetricsHooks = (options: RequestMetricsOptions): RequestMetricsHooks => {
  const inFlight = new WeakSet<FastifyRequest>();

  const releaseOnce = (request: FastifyRequest): void => {
    if (!inFlight.delete(request)) {
      return;
    }

    options.collector.decRequestsInProgress();
  };

  return {
    onRequest: async (request) => {
      if (options.excludedPaths.has(getRequestPath(request))) {
        return;
      }

      inFlight.add(request);
      options.collector.incRequestsInProgress();
    },
    onResponse: async (request, reply) => {
      if (!inFlight.has(request)) {
        return;
      }

      try {
        options.collector.recordHttpRequest({
          method: request.method,
          path: getRequestPath(request),
          status: reply.statusCode,
          durationSeconds: reply.elapsedTime / 1000,
        });
      } finally {
        releaseOnce(request);
      }
    },
    onRequestAbort: async (request) => {
      releaseOnce(request);
    },
  };
};
