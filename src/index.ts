import { config } from "./config/index.js";
import { logger } from "./utils/logger.js";
import { createAppContext } from "./context.js";
import { buildApp } from "./api/app.js";

const app = await buildApp(createAppContext(config));

// Graceful shutdown
const signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];
for (const signal of signals) {
  process.on(signal, () => {
    logger.info({ signal }, "Shutting down");
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      },
    );
  });
}

// Start
try {
  await app.listen({ port: config.PORT, host: config.HOST });
  logger.info({ port: config.PORT, host: config.HOST, dataDir: config.DATA_DIR }, "Server started");
} catch (err) {
  logger.fatal({ err }, "Failed to start server");
  process.exit(1);
}
