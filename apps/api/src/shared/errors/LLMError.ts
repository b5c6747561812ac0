import { AppError, ErrorBody } from "./AppError";

/**
 * Failures talking to the language model provider.
 */

export abstract class LLMError extends AppError {
  constructor(
    message: string,
    code: string,
    public readonly cause?: unknown,
  ) {
    super(message, code);
  }
}

export class LLMTimeoutError extends LLMError {
  constructor(
    public readonly timeoutMs: number,
    cause?: unknown,
  ) {
    super(`Model request timed out after ${timeoutMs}ms`, "LLM_TIMEOUT", cause);
    this.name = "LLMTimeoutError";
  }

  toJSON(): ErrorBody {
    return { ...super.toJSON(), timeoutMs: this.timeoutMs };
  }
}

export class LLMUnavailableError extends LLMError {
  constructor(message = "Model provider unreachable", cause?: unknown) {
    super(message, "LLM_UNAVAILABLE", cause);
    this.name = "LLMUnavailableError";
  }
}

export class LLMRequestError extends LLMError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, "LLM_REQUEST_FAILED", cause);
    this.name = "LLMRequestError";
  }

  toJSON(): ErrorBody {
    return { ...super.toJSON(), status: this.status };
  }
}
