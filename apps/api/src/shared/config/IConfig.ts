/**
 * Configuration interface
 *
 * Defines all configuration values needed by the application.
 */

export type StorageDriver = "supabase" | "memory";

export interface IConfig {
  // Server
  readonly port: number;
  readonly nodeEnv: string;
  readonly corsOrigins: string[] | "*";
  readonly logLevel: string;

  // Persistence
  readonly storageDriver: StorageDriver;
  readonly supabaseUrl: string;
  readonly supabaseAnonKey: string;

  // Model
  readonly llmApiKey: string;
  readonly llmModel: string;
  readonly llmBaseUrl: string | undefined;
  readonly llmTimeoutMs: number;
  readonly llmMaxTokens: number;
  readonly llmMaxRetries: number;

  // Features
  readonly enableRateLimiting: boolean;

  // Validation
  validate(): void;
}
