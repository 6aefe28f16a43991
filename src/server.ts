import { serve, type ServerType } from "@hono/node-server";
import { env, logger } from "@/config";
import { createApp } from "@/api/app";

let server: ServerType | undefined;
let isShuttingDown = false;

async function main() {
  logger.info({ nodeEnv: env.NODE_ENV }, "Starting amount-parser");

  const app = createApp();
  const port = env.PORT;

  server = serve({
    fetch: app.fetch,
    port,
  });

  logger.info({ port }, "API server listening");
}

// Graceful shutdown
async function shutdown(signal: string) {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info({ signal }, "Shutting down gracefully");

  try {
    await new Promise<void>((resolve, reject) => {
      if (!server) return resolve();
      server.close((err) => (err ? reject(err) : resolve()));
    });

    logger.info("Shutdown complete");
    process.exit(0);
  } catch (err) {
    logger.error({ err }, "Error during shutdown");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

main().catch((err) => {
  logger.fatal({ err }, "Failed to start");
  process.exit(1);
});
