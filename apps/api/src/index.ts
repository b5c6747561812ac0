export {
  recover,
  recoverWithTrace,
  extractCandidate,
  repairJson,
  decodeStrict,
  extractPartialFields,
  coerceAnalysisRecord,
} from "./lib/ai/recovery";
export type {
  PartialFields,
  RecoveryOptions,
  RecoveryOutcome,
  StageResult,
} from "./lib/ai/recovery";
export {
  ANALYSIS_DEFAULTS,
  ANALYSIS_KEY,
  RESPONSE_KEY,
  RECOVERY_STAGES,
  createAnalysisRecord,
  isRecoveryStage,
  toAnalysisPayload,
} from "./domain/analysis/AnalysisRecord";
export type {
  AnalysisField,
  AnalysisPayload,
  AnalysisRecord,
  Coordinates,
  RecoveryStage,
} from "./domain/analysis/AnalysisRecord";
export type { ILogger, LogContext } from "./infrastructure/logging/ILogger";
