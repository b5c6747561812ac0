/**
 * Dependency Injection Types/Tokens
 *
 * All injectable dependencies are registered here using symbols
 * to avoid string-based injection which is error-prone
 */

export const TYPES = {
  // Configuration
  Config: Symbol.for("Config"),

  // Logging
  Logger: Symbol.for("Logger"),

  // Database
  SupabaseClient: Symbol.for("SupabaseClient"),

  // Repositories
  ResponseLogRepository: Symbol.for("ResponseLogRepository"),

  // Domain Services
  AnalysisRecoveryService: Symbol.for("AnalysisRecoveryService"),

  // AI Infrastructure
  LLMClient: Symbol.for("LLMClient"),

  // Use Cases
  CompareResponsesUseCase: Symbol.for("CompareResponsesUseCase"),
  LeaveFeedbackUseCase: Symbol.for("LeaveFeedbackUseCase"),
  GetResponseLogUseCase: Symbol.for("GetResponseLogUseCase"),
} as const;

export type DITypes = typeof TYPES;
