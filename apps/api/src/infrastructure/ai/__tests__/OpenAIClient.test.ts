import { describe, it, expect } from "@jest/globals";
import OpenAI from "openai";
import { toLLMError } from "../OpenAIClient";
import {
  LLMRequestError,
  LLMTimeoutError,
  LLMUnavailableError,
} from "../../../shared/errors/LLMError";

describe("toLLMError", () => {
  it("should map SDK timeouts to LLMTimeoutError", () => {
    const mapped = toLLMError(new OpenAI.APIConnectionTimeoutError(), 30000);

    expect(mapped).toBeInstanceOf(LLMTimeoutError);
    expect(mapped.message).toBe("Model request timed out after 30000ms");
  });

  it("should map connection failures to LLMUnavailableError", () => {
    const mapped = toLLMError(
      new OpenAI.APIConnectionError({ message: "connect ECONNREFUSED" }),
      30000,
    );

    expect(mapped).toBeInstanceOf(LLMUnavailableError);
    expect(mapped.message).toBe("connect ECONNREFUSED");
  });

  it("should map provider errors to LLMRequestError with the status", () => {
    const mapped = toLLMError(
      new OpenAI.APIError(429, undefined, "rate limited", undefined),
      30000,
    );

    expect(mapped).toBeInstanceOf(LLMRequestError);
    expect(mapped instanceof LLMRequestError && mapped.status).toBe(429);
  });

  it("should wrap unknown failures", () => {
    const mapped = toLLMError(new Error("socket hang up"), 30000);

    expect(mapped).toBeInstanceOf(LLMRequestError);
    expect(mapped.message).toBe("Model request failed: socket hang up");
  });

  it("should pass LLM errors through unchanged", () => {
    const original = new LLMUnavailableError();

    expect(toLLMError(original, 30000)).toBe(original);
  });
});
