import { describe, it, expect } from "@jest/globals";
import { describeConfig } from "../SystemController";
import { EnvConfig } from "../../../../shared/config/EnvConfig";

describe("describeConfig", () => {
  it("should mask the database URL and model key", () => {
    const config = new EnvConfig({
      LLM_API_KEY: "test-llm-key",
      LLM_MODEL: "test-model",
      SUPABASE_URL: "https://example.supabase.co",
      SUPABASE_ANON_KEY: "test-anon-key",
    });

    expect(describeConfig(config)).toEqual({
      storage_driver: "supabase",
      database_url_prefix: "https://...",
      llm_model: "test-model",
      llm_key_status: "Loaded",
      llm_key_first_chars: "test-...",
    });
  });

  it("should report a missing database URL", () => {
    const config = new EnvConfig({
      STORAGE_DRIVER: "memory",
      LLM_API_KEY: "test-llm-key",
    });

    expect(describeConfig(config).database_url_prefix).toBe("N/A");
  });
});
