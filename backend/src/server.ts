import { loadEnvironmentFiles } from "./config/load-env";

loadEnvironmentFiles();

const [{ buildApp }, { assertAuthConfigured, serverEnv }] = await Promise.all([
  import("./app"),
  import("./config/env"),
]);

assertAuthConfigured(serverEnv);

const app = buildApp();

const shutdown = async (signal: string) => {
  app.log.info({ signal }, "Shutting down tool server");
  await app.close();
  process.exit(0);
};

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

try {
  await app.listen({
    host: serverEnv.host,
    port: serverEnv.port,
  });

  app.log.info({ host: serverEnv.host, port: serverEnv.port }, "Tool server started");
} catch (error) {
  app.log.error({ err: error }, "Failed to start tool server");
  process.exit(1);
}
