import "reflect-metadata"; // Must be first import for TSyringe
import express, { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";

import { container } from "./di/Container";
import { TYPES } from "./di/types";
import { IConfig } from "./shared/config/IConfig";
import { ILogger } from "./infrastructure/logging/ILogger";

// Routes
import { createComparisonsRouter } from "./presentation/http/routes/comparisons.routes";
import { createSystemRouter } from "./presentation/http/routes/system.routes";

// Middleware
import { apiLimiter } from "./presentation/http/middleware/rateLimit";
import { createErrorHandler } from "./presentation/http/middleware/ErrorHandler";

/**
 * Build the Express application from whatever the container currently holds.
 */
export function createApp(): Express {
  const app = express();

  const config = container.resolve<IConfig>(TYPES.Config);
  const logger = container.resolve<ILogger>(TYPES.Logger);
  const isProduction = config.nodeEnv === "production";

  // Security middleware
  app.use(helmet());

  // CORS
  app.use(cors({ origin: config.corsOrigins }));

  // Access log through the application logger
  if (config.nodeEnv !== "test") {
    const httpLogger = logger.child({ component: "http" });
    app.use(
      morgan(isProduction ? "combined" : "dev", {
        stream: { write: (line: string) => httpLogger.info(line.trim()) },
      }),
    );
  }

  if (config.enableRateLimiting) {
    app.use(apiLimiter);
  }

  // Body parsing
  app.use(express.json({ limit: "100kb" }));

  app.use(createSystemRouter());
  app.use(createComparisonsRouter());

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: "Not Found", code: "NOT_FOUND" });
  });

  // Centralized error handler (must be last)
  app.use(createErrorHandler(logger, isProduction));

  return app;
}
