import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import Fastify, { type FastifyError, type FastifyServerOptions } from "fastify";
import { ZodError } from "zod";

import { createCredentialStore } from "@netops/auth";

import { serverEnv, type ServerEnv } from "./config/env";
import { registerRateLimitSweepJob } from "./jobs/rate-limit-sweep";
import { HttpError } from "./lib/http-error";
import { registerRequestPipeline } from "./middleware/request-pipeline";
import { healthRoutes } from "./routes/health";
import { metricsRoutes } from "./routes/metrics";
import { rateLimitRoutes } from "./routes/rate-limit";
import { toolRoutes } from "./routes/tools";
import { createMetricsCollector, type MetricsCollector } from "./services/metrics-collector";
import { createSlidingWindowRateLimiter, type SlidingWindowRateLimiter } from "./services/rate-limiter";
import { buildDefaultToolRegistry, type CommandRunner, type ExecutableLookup, type ToolRegistry } from "./services/tools";

export type BuildAppOptions = {
  env?: ServerEnv;
  collector?: MetricsCollector;
  limiter?: SlidingWindowRateLimiter;
  registry?: ToolRegistry;
  runCommand?: CommandRunner;
  which?: ExecutableLookup;
  now?: () => number;
  logger?: FastifyServerOptions["logger"];
};

export const buildApp = (options: BuildAppOptions = {}) => {
  const env = options.env ?? serverEnv;

  const app = Fastify({
    trustProxy: env.trustProxy,
    bodyLimit: env.bodyLimitBytes,
    logger: options.logger ?? {
      level: env.logLevel,
    },
  });

  const collector = options.collector ?? createMetricsCollector();
  const limiter =
    options.limiter ??
    createSlidingWindowRateLimiter({
      requestsPerWindow: env.rateLimit.requestsPerWindow,
      windowSeconds: env.rateLimit.windowSeconds,
      now: options.now,
    });
  const registry = options.registry ?? buildDefaultToolRegistry();
  const credentials = createCredentialStore({
    apiKeys: env.auth.apiKeys,
    apiKeyHashes: env.auth.apiKeyHashes,
  });

  app.register(helmet, {
    global: true,
  });

  app.register(cors, {
    origin: env.corsOrigins,
    exposedHeaders: ["X-RateLimit-Limit", "X-RateLimit-Remaining", "X-RateLimit-Reset", "Retry-After"],
  });

  registerRequestPipeline(app, {
    credentials,
    requireAuth: env.auth.required,
    authExemptPaths: env.auth.exemptPaths,
    limiter,
    rateLimitExemptPaths: env.rateLimit.exemptPaths,
    collector,
    metricsPath: env.metricsPath,
  });

  app.register(healthRoutes, { path: env.healthPath, toolCount: registry.size });
  app.register(metricsRoutes, { path: env.metricsPath, collector });
  app.register(rateLimitRoutes, { limiter });
  app.register(toolRoutes, {
    registry,
    collector,
    settings: env.tools,
    deps: {
      runCommand: options.runCommand,
      which: options.which,
    },
  });

  registerRateLimitSweepJob(app, {
    limiter,
    intervalMs: env.rateLimit.sweepIntervalMs,
  });

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof HttpError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, "Request failed");
      } else {
        request.log.warn({ code: error.code, statusCode: error.statusCode }, error.message);
      }

      if (error.headers) {
        reply.headers(error.headers);
      }

      return reply.status(error.statusCode).send({
        error: error.code,
        message: error.message,
        ...error.details,
      });
    }

    if (error instanceof ZodError) {
      request.log.warn({ issues: error.issues }, "Request validation failed");
      return reply.status(400).send({
        error: "VALIDATION_ERROR",
        message: "Invalid request payload",
        issues: error.issues,
      });
    }

    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      request.log.warn({ code: error.code, statusCode: error.statusCode }, error.message);
      return reply.status(error.statusCode).send({
        error: error.code,
        message: error.message,
      });
    }

    request.log.error({ err: error }, "Request failed");
    return reply.status(500).send({
      error: "INTERNAL_SERVER_ERROR",
      message: "Unexpected error",
    });
  });

  return app;
};
