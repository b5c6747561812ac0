import { injectable, inject } from "tsyringe";
import { z } from "zod";
import { IResponseLogRepository } from "../../../../domain/comparisons/repositories/IResponseLogRepository";
import { ResponseLog } from "../../../../domain/comparisons/entities/ResponseLog";
import {
  RECOVERY_STAGES,
  toAnalysisPayload,
} from "../../../../domain/analysis/AnalysisRecord";
import { coerceAnalysisRecord } from "../../../../lib/ai/recovery/AnalysisCoercer";
import { PersistenceError } from "../../../../shared/errors/PersistenceError";
import { SupabaseClient } from "../SupabaseClient";
import { ILogger } from "../../../logging/ILogger";
import { TYPES } from "../../../../di/types";

const TABLE = "response_logs";

const dbResponseLogSchema = z.object({
  id: z.string(),
  created_at: z.string(),
  user_prompt: z.string(),
  normal_response: z.string(),
  chs_raw_response: z.string(),
  chs_analysis: z.unknown(),
  recovery_stage: z.enum(RECOVERY_STAGES),
  user_rating: z.number().int().nullable(),
  user_feedback: z.string().nullable(),
});

type DbResponseLog = z.infer<typeof dbResponseLogSchema>;

/**
 * Supabase implementation of ResponseLog Repository
 *
 * Stored analyses go back through the coercer on read, so rows written by
 * older code still come out as complete records.
 */
@injectable()
export class SupabaseResponseLogRepository implements IResponseLogRepository {
  constructor(
    @inject(TYPES.SupabaseClient) private readonly supabase: SupabaseClient,
    @inject(TYPES.Logger) private readonly logger: ILogger,
  ) {}

  async save(log: ResponseLog): Promise<void> {
    this.logger.debug("Saving response log", { logId: log.id });

    const { error } = await this.supabase
      .getClient()
      .from(TABLE)
      .insert(this.toDatabase(log));

    if (error) {
      this.logger.error("Error saving response log", new Error(error.message), {
        logId: log.id,
        code: error.code,
      });
      throw new PersistenceError(error.message, "save", error.code);
    }
  }

  async findById(id: string): Promise<ResponseLog | null> {
    this.logger.debug("Finding response log by ID", { logId: id });

    const { data, error } = await this.supabase
      .getClient()
      .from(TABLE)
      .select("*")
      .eq("id", id)
      .maybeSingle();

    if (error) {
      this.logger.error(
        "Error finding response log",
        new Error(error.message),
        { logId: id, code: error.code },
      );
      throw new PersistenceError(error.message, "findById", error.code);
    }

    if (data === null) return null;

    const row = dbResponseLogSchema.safeParse(data);
    if (!row.success) {
      throw new PersistenceError(
        `Malformed ${TABLE} row ${id}: ${row.error.message}`,
        "findById",
      );
    }

    return this.toDomain(row.data);
  }

  async update(log: ResponseLog): Promise<void> {
    this.logger.debug("Updating response log feedback", { logId: log.id });

    const { error } = await this.supabase
      .getClient()
      .from(TABLE)
      .update({
        user_rating: log.userRating,
        user_feedback: log.userFeedback,
      })
      .eq("id", log.id);

    if (error) {
      this.logger.error(
        "Error updating response log",
        new Error(error.message),
        { logId: log.id, code: error.code },
      );
      throw new PersistenceError(error.message, "update", error.code);
    }
  }

  private toDomain(row: DbResponseLog): ResponseLog {
    return ResponseLog.restore({
      id: row.id,
      createdAt: new Date(row.created_at),
      userPrompt: row.user_prompt,
      normalResponse: row.normal_response,
      analysisRawResponse: row.chs_raw_response,
      analysis: coerceAnalysisRecord(row.chs_analysis),
      recoveryStage: row.recovery_stage,
      userRating: row.user_rating,
      userFeedback: row.user_feedback,
    });
  }

  private toDatabase(log: ResponseLog): DbResponseLog {
    return {
      id: log.id,
      created_at: log.createdAt.toISOString(),
      user_prompt: log.userPrompt,
      normal_response: log.normalResponse,
      chs_raw_response: log.analysisRawResponse,
      chs_analysis: toAnalysisPayload(log.analysis),
      recovery_stage: log.recoveryStage,
      user_rating: log.userRating,
      user_feedback: log.userFeedback,
    };
  }
}
