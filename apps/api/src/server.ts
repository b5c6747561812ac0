/**
 * API Entry Point
 */

import "reflect-metadata"; // Must be first import for TSyringe
import "dotenv/config";

import { container } from "./di/Container";
import { TYPES } from "./di/types";
import { IConfig } from "./shared/config/IConfig";
import { ILogger } from "./infrastructure/logging/ILogger";
import { createApp } from "./app";

function bootstrap(): void {
  const config = container.resolve<IConfig>(TYPES.Config);
  const logger = container.resolve<ILogger>(TYPES.Logger);

  logger.info("Starting API server", {
    storageDriver: config.storageDriver,
    model: config.llmModel,
  });

  const app = createApp();

  const server = app.listen(config.port, () => {
    logger.info("API server started", {
      port: config.port,
      env: config.nodeEnv,
    });
  });

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    server.close((error) => {
      if (error) {
        logger.error("Error while closing server", error);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

try {
  bootstrap();
} catch (error) {
  console.error("Failed to start server:", error);
  process.exit(1);
}
