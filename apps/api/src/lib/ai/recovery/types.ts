import { AnalysisRecord, RecoveryStage } from "../../../domain/analysis/AnalysisRecord";
import { ILogger } from "../../../infrastructure/logging/ILogger";

/**
 * Outcome of a single recovery stage. A failed stage only selects the next
 * branch of the pipeline; it never carries a partially built value.
 */
export type StageResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

export interface RecoveryOutcome {
  record: AnalysisRecord;
  stage: RecoveryStage;
}

export interface RecoveryOptions {
  logger?: ILogger;
}
