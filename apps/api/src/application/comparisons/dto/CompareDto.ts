import { z } from "zod";
import { AnalysisPayload, RecoveryStage } from "../../../domain/analysis/AnalysisRecord";
import { parseRequest } from "../../shared/validation/parseRequest";

export const MAX_PROMPT_LENGTH = 8000;

const compareRequestSchema = z.object({
  prompt: z
    .string({ required_error: "prompt is required" })
    .trim()
    .min(1, "prompt must not be empty")
    .max(MAX_PROMPT_LENGTH, `prompt must be at most ${MAX_PROMPT_LENGTH} characters`),
});

/**
 * Compare DTO
 *
 * A prompt to answer both plainly and with emotional analysis
 */
export class CompareDto {
  constructor(public readonly prompt: string) {}

  static fromRequest(body: unknown): CompareDto {
    const { prompt } = parseRequest(compareRequestSchema, body);
    return new CompareDto(prompt);
  }
}

/**
 * Comparison DTO (Response)
 */
export class ComparisonDto {
  constructor(
    public readonly log_id: string,
    public readonly normal_response: string,
    public readonly chs_response: AnalysisPayload,
    public readonly recovery_stage: RecoveryStage,
  ) {}
}
