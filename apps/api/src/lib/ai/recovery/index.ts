export { recover, recoverWithTrace } from "./recoverAnalysis";
export { extractCandidate } from "./JsonExtractor";
export { repairJson } from "./JsonRepairer";
export { decodeStrict } from "./StrictDecoder";
export { extractPartialFields } from "./PartialFieldExtractor";
export type { PartialFields } from "./PartialFieldExtractor";
export {
  coerceAnalysisRecord,
  coerceBoundedNumber,
  coerceCoordinates,
  coerceNumber,
  coerceStringList,
  coerceText,
} from "./AnalysisCoercer";
export type { RecoveryOptions, RecoveryOutcome, StageResult } from "./types";
