/**
 * OpenAI Client Wrapper
 *
 * Talks to any OpenAI-compatible chat completions endpoint. Timeouts and
 * retries are configured on the SDK client; failures surface as LLMError.
 */

import OpenAI from "openai";
import { inject, injectable } from "tsyringe";
import { TYPES } from "../../di/types";
import { IConfig } from "../../shared/config/IConfig";
import {
  LLMError,
  LLMRequestError,
  LLMTimeoutError,
  LLMUnavailableError,
} from "../../shared/errors/LLMError";
import { ILogger } from "../logging/ILogger";
import { CompletionOptions, ILLMClient } from "./ILLMClient";

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

/**
 * Map an SDK failure onto the LLMError hierarchy.
 * The timeout check must come first: the SDK's timeout error extends its
 * connection error.
 */
export function toLLMError(error: unknown, timeoutMs: number): LLMError {
  if (error instanceof LLMError) return error;
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new LLMTimeoutError(timeoutMs, error);
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new LLMUnavailableError(error.message, error);
  }
  if (error instanceof OpenAI.APIError) {
    return new LLMRequestError(error.message, error.status, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new LLMRequestError(`Model request failed: ${message}`, undefined, error);
}

@injectable()
export class OpenAIClient implements ILLMClient {
  private readonly client: OpenAI;
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.Config) private readonly config: IConfig,
    @inject(TYPES.Logger) logger: ILogger,
  ) {
    this.logger = logger.child({ component: "OpenAIClient" });
    this.client = new OpenAI({
      apiKey: config.llmApiKey,
      baseURL: config.llmBaseUrl,
      timeout: config.llmTimeoutMs,
      maxRetries: config.llmMaxRetries,
    });
  }

  async complete(
    prompt: string,
    options: CompletionOptions = {},
  ): Promise<string> {
    const messages: ChatMessage[] = [];
    if (options.system) {
      messages.push({ role: "system", content: options.system });
    }
    messages.push({ role: "user", content: prompt });

    const startedAt = Date.now();

    try {
      const completion = await this.client.chat.completions.create({
        model: this.config.llmModel,
        messages,
        max_tokens: options.maxTokens ?? this.config.llmMaxTokens,
        temperature: options.temperature,
      });

      this.logger.debug("Completion received", {
        model: this.config.llmModel,
        durationMs: Date.now() - startedAt,
        finishReason: completion.choices[0]?.finish_reason,
      });

      return completion.choices[0]?.message?.content ?? "";
    } catch (error) {
      const mapped = toLLMError(error, this.config.llmTimeoutMs);
      this.logger.error("Completion failed", mapped, {
        model: this.config.llmModel,
        durationMs: Date.now() - startedAt,
      });
      throw mapped;
    }
  }
}
