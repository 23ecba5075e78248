import { type ServerType, serve } from "@hono/node-server";
import { env } from "#/env";
import { logger } from "#/infrastructure/observability/logger";
import {
  app,
  startHttpBackgroundWorkers,
  stopHttpBackgroundWorkers,
} from "#/interfaces/http";

let isShuttingDown = false;
let server: ServerType | null = null;

const closeServer = (target: ServerType) =>
  new Promise<void>((resolve, reject) => {
    target.close((error) => (error ? reject(error) : resolve()));
  });

const handleShutdown = async (signal: string) => {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.info({ signal }, "shutting down");
  try {
    if (server) {
      await closeServer(server);
    }
    await stopHttpBackgroundWorkers();
    process.exit(0);
  } catch (error) {
    logger.error({ err: error }, "shutdown failed");
    process.exit(1);
  }
};

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    void handleShutdown(signal);
  });
}

const start = async () => {
  await startHttpBackgroundWorkers();
  server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
    logger.info(
      {
        port: info.port,
        serverUrl: `http://localhost:${info.port}`,
        credentialStore: env.CREDENTIAL_STORE,
      },
      "HTTP server started",
    );
  });
};

start().catch((error: unknown) => {
  logger.error({ err: error }, "startup failed");
  process.exit(1);
});
