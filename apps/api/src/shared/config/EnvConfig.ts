import { IConfig, StorageDriver } from "./IConfig";

const STORAGE_DRIVERS: readonly StorageDriver[] = ["supabase", "memory"];

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  return parseInt(value, 10);
}

/**
 * Environment-based configuration implementation
 *
 * Reads configuration from process.env and validates on construction.
 */
export class EnvConfig implements IConfig {
  readonly port: number;
  readonly nodeEnv: string;
  readonly corsOrigins: string[] | "*";
  readonly logLevel: string;

  readonly storageDriver: StorageDriver;
  readonly supabaseUrl: string;
  readonly supabaseAnonKey: string;

  readonly llmApiKey: string;
  readonly llmModel: string;
  readonly llmBaseUrl: string | undefined;
  readonly llmTimeoutMs: number;
  readonly llmMaxTokens: number;
  readonly llmMaxRetries: number;

  readonly enableRateLimiting: boolean;

  private readonly rawStorageDriver: string;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.port = parseInteger(env.PORT, 3001);
    this.nodeEnv = env.NODE_ENV || "development";
    this.logLevel = env.LOG_LEVEL || "info";

    const origins = (env.CORS_ORIGINS || "*").trim();
    this.corsOrigins =
      origins === "*"
        ? "*"
        : origins
            .split(",")
            .map((origin) => origin.trim())
            .filter((origin) => origin.length > 0);

    this.rawStorageDriver = (env.STORAGE_DRIVER || "supabase").toLowerCase();
    this.storageDriver =
      this.rawStorageDriver === "memory" ? "memory" : "supabase";
    this.supabaseUrl = env.SUPABASE_URL || "";
    this.supabaseAnonKey = env.SUPABASE_ANON_KEY || "";

    this.llmApiKey = env.LLM_API_KEY || "";
    this.llmModel = env.LLM_MODEL || "gpt-4o-mini";
    this.llmBaseUrl = env.LLM_BASE_URL || undefined;
    this.llmTimeoutMs = parseInteger(env.LLM_TIMEOUT_MS, 30000);
    this.llmMaxTokens = parseInteger(env.LLM_MAX_TOKENS, 1024);
    this.llmMaxRetries = parseInteger(env.LLM_MAX_RETRIES, 0);

    this.enableRateLimiting = env.ENABLE_RATE_LIMITING !== "false";

    this.validate();
  }

  validate(): void {
    const required = [{ name: "LLM_API_KEY", value: this.llmApiKey }];
    if (this.storageDriver === "supabase") {
      required.push(
        { name: "SUPABASE_URL", value: this.supabaseUrl },
        { name: "SUPABASE_ANON_KEY", value: this.supabaseAnonKey },
      );
    }

    const missing = required.filter((r) => !r.value);

    if (missing.length > 0) {
      throw new Error(
        `Missing required environment variables: ${missing.map((m) => m.name).join(", ")}`,
      );
    }

    if (!STORAGE_DRIVERS.some((driver) => driver === this.rawStorageDriver)) {
      throw new Error(`Invalid STORAGE_DRIVER: ${this.rawStorageDriver}`);
    }

    if (!Number.isInteger(this.port) || this.port < 1 || this.port > 65535) {
      throw new Error(`Invalid PORT: ${this.port}`);
    }

    const positive = [
      { name: "LLM_TIMEOUT_MS", value: this.llmTimeoutMs },
      { name: "LLM_MAX_TOKENS", value: this.llmMaxTokens },
    ];
    for (const { name, value } of positive) {
      if (!Number.isInteger(value) || value < 1) {
        throw new Error(`Invalid ${name}: ${value}`);
      }
    }

    if (!Number.isInteger(this.llmMaxRetries) || this.llmMaxRetries < 0) {
      throw new Error(`Invalid LLM_MAX_RETRIES: ${this.llmMaxRetries}`);
    }
  }
}
