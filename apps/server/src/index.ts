import { validateEnv } from "@shared/env";
import { createServer } from "http";

import { createApp } from "./app";
import { logger } from "./logger";

const env = validateEnv(process.env);
const app = createApp(env);
const server = createServer(app);

// Configure server timeouts for better dev restart stability
server.keepAliveTimeout = 75000; // 75 seconds
server.headersTimeout = 76000; // Must be > keepAliveTimeout

server.listen(env.PORT, () => {
  logger.info({ port: env.PORT }, "chart server listening");
});

function shutdown(signal: string) {
  logger.info({ signal }, "shutting down");
  server.close((err) => {
    if (err) {
      logger.error({ err }, "error during shutdown");
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
