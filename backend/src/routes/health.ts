import type { FastifyPluginAsync } from "fastify";

type HealthRoutesOptions = {
  path: string;
  toolCount: number;
};

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (app, options) => {
  app.get(options.path, async () => ({ status: "ok", tools: options.toolCount }));
};
