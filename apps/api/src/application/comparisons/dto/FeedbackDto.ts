import { z } from "zod";
import { parseRequest } from "../../shared/validation/parseRequest";

const feedbackRequestSchema = z.object({
  log_id: z.string({ required_error: "log_id is required" }).trim().min(1),
  user_rating: z
    .number({ required_error: "user_rating is required" })
    .int("user_rating must be an integer"),
  user_feedback: z.string().nullable().optional(),
});

/**
 * Feedback DTO
 */
export class FeedbackDto {
  constructor(
    public readonly logId: string,
    public readonly userRating: number,
    public readonly userFeedback: string | null,
  ) {}

  static fromRequest(body: unknown): FeedbackDto {
    const parsed = parseRequest(feedbackRequestSchema, body);
    return new FeedbackDto(
      parsed.log_id,
      parsed.user_rating,
      parsed.user_feedback ?? null,
    );
  }
}

/**
 * Feedback acknowledgement (Response)
 */
export class FeedbackResultDto {
  readonly status = "success";

  constructor(public readonly log_id: string) {}
}
