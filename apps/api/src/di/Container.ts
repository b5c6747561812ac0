import "reflect-metadata";
import { container, instanceCachingFactory } from "tsyringe";
import { TYPES } from "./types";

// Configuration
import { IConfig } from "../shared/config/IConfig";
import { EnvConfig } from "../shared/config/EnvConfig";

// Logging
import { ILogger } from "../infrastructure/logging/ILogger";
import { PinoLogger } from "../infrastructure/logging/PinoLogger";

// Persistence
import { SupabaseClient } from "../infrastructure/persistence/supabase/SupabaseClient";
import { IResponseLogRepository } from "../domain/comparisons/repositories/IResponseLogRepository";
import { SupabaseResponseLogRepository } from "../infrastructure/persistence/supabase/repositories/SupabaseResponseLogRepository";
import { InMemoryResponseLogRepository } from "../infrastructure/persistence/in-memory/InMemoryResponseLogRepository";

// AI
import { ILLMClient } from "../infrastructure/ai/ILLMClient";
import { OpenAIClient } from "../infrastructure/ai/OpenAIClient";

// Domain Services
import { AnalysisRecoveryService } from "../domain/analysis/services/AnalysisRecoveryService";

// Use Cases
import { CompareResponsesUseCase } from "../application/comparisons/use-cases/CompareResponsesUseCase";
import { LeaveFeedbackUseCase } from "../application/comparisons/use-cases/LeaveFeedbackUseCase";
import { GetResponseLogUseCase } from "../application/comparisons/use-cases/GetResponseLogUseCase";

/**
 * Dependency Injection Container Configuration
 *
 * Registrations are lazy: nothing reads the environment until the first
 * resolve, so tests can override tokens before that happens.
 */
export class DIContainer {
  static initialize(): void {
    // Configuration
    container.register<IConfig>(TYPES.Config, {
      useFactory: instanceCachingFactory(() => new EnvConfig()),
    });

    // Logging
    container.register<ILogger>(TYPES.Logger, {
      useFactory: instanceCachingFactory((c) => {
        const config = c.resolve<IConfig>(TYPES.Config);
        return new PinoLogger({
          level: config.logLevel,
          pretty: config.nodeEnv !== "production",
        });
      }),
    });

    // Database
    container.registerSingleton<SupabaseClient>(
      TYPES.SupabaseClient,
      SupabaseClient,
    );

    // Repositories
    container.register<IResponseLogRepository>(TYPES.ResponseLogRepository, {
      useFactory: instanceCachingFactory((c) =>
        c.resolve<IConfig>(TYPES.Config).storageDriver === "memory"
          ? new InMemoryResponseLogRepository()
          : c.resolve(SupabaseResponseLogRepository),
      ),
    });

    // AI
    container.registerSingleton<ILLMClient>(TYPES.LLMClient, OpenAIClient);

    // Domain Services
    container.register(TYPES.AnalysisRecoveryService, {
      useClass: AnalysisRecoveryService,
    });

    // Use Cases
    container.register(TYPES.CompareResponsesUseCase, {
      useClass: CompareResponsesUseCase,
    });
    container.register(TYPES.LeaveFeedbackUseCase, {
      useClass: LeaveFeedbackUseCase,
    });
    container.register(TYPES.GetResponseLogUseCase, {
      useClass: GetResponseLogUseCase,
    });
  }

  static getContainer() {
    return container;
  }
}

// Initialize container on module load
DIContainer.initialize();

export { container };
