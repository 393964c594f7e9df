import { createApp } from "../http/app.js";
import { container } from "../../infrastructure/di/container.js";
import { env, getHttpConfig } from "../../shared/config/index.js";
import { logger } from "../../shared/utils/logger.js";

function main() {
  const app = createApp({
    store: container.getPostStore(),
    config: getHttpConfig(),
  });

  const server = app.listen(env.PORT, env.HOST, () => {
    logger.info({ host: env.HOST, port: env.PORT }, "API server listening");
  });

  server.on("error", (error) => {
    logger.error({ error: error.message }, "API server failed");
    process.exit(1);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutting down");
    server.close((error) => {
      if (error) {
        logger.error({ error: error.message }, "Error while closing server");
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main();
