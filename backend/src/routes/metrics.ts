import type { FastifyPluginAsync } from "fastify";

import type { MetricsCollector } from "../services/metrics-collector";

type MetricsRoutesOptions = {
  path: string;
  collector: MetricsCollector;
};

export const PROMETHEUS_CONTENT_TYPE = "text/plain; version=0.0.4; charset=utf-8";

export const metricsRoutes: FastifyPluginAsync<MetricsRoutesOptions> = async (app, options) => {
  app.get(options.path, async (_request, reply) => {
    reply.header("content-type", PROMETHEUS_CONTENT_TYPE);
    return reply.send(options.collector.exportPrometheus());
  });
};
