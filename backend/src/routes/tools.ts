import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";

import type { ToolSettings } from "../config/env";
import { HttpError } from "../lib/http-error";
import type { MetricsCollector } from "../services/metrics-collector";
import {
  createLoggedRunner,
  executeTool,
  findExecutable,
  listTools,
  runCommand,
  type CommandRunner,
  type ExecutableLookup,
  type ToolRegistry,
} from "../services/tools";

type ToolRouteDependencies = {
  runCommand: CommandRunner;
  which: ExecutableLookup;
};

type ToolRoutesOptions = {
  registry: ToolRegistry;
  collector: MetricsCollector;
  settings: ToolSettings;
  deps?: Partial<ToolRouteDependencies>;
};

const toolParamsSchema = z.object({
  name: z.string().trim().min(1).max(64),
});

export const toolRoutes: FastifyPluginAsync<ToolRoutesOptions> = async (app, options) => {
  const deps: ToolRouteDependencies = {
    runCommand: options.deps?.runCommand ?? runCommand,
    which: options.deps?.which ?? findExecutable,
  };

  app.get("/tools", async () => ({ tools: listTools(options.registry) }));

  app.post("/tools/:name", async (request, reply) => {
    const { name } = toolParamsSchema.parse(request.params);

    const execution = await executeTool(options.registry, name, request.body, {
      exec: createLoggedRunner(deps.runCommand, request.log),
      which: deps.which,
      settings: options.settings,
      log: request.log,
      collector: options.collector,
    });

    if (!execution) {
      throw new HttpError(404, "TOOL_NOT_FOUND", `Unknown tool: ${name}`);
    }

    if (execution.kind === "rejected") {
      return reply.status(400).send(execution.failure);
    }

    return execution.envelope;
  });
};
