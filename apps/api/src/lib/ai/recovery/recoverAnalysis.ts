import {
  AnalysisRecord,
  createAnalysisRecord,
} from "../../../domain/analysis/AnalysisRecord";
import { coerceAnalysisRecord, FieldRejected } from "./AnalysisCoercer";
import { extractCandidate } from "./JsonExtractor";
import { repairJson } from "./JsonRepairer";
import { extractPartialFields } from "./PartialFieldExtractor";
import { decodeStrict } from "./StrictDecoder";
import { RecoveryOptions, RecoveryOutcome } from "./types";

const PREVIEW_CHARS = 300;

/**
 * Recover an AnalysisRecord from raw model output.
 *
 * Tiers, in order: verbatim JSON, repaired JSON, per-field extraction
 * from the raw text, then the default record. The result of whichever
 * tier succeeds is always run through the coercer. Never throws.
 */
export function recoverWithTrace(
  rawText: string,
  options: RecoveryOptions = {},
): RecoveryOutcome {
  const { logger } = options;
  const text = typeof rawText === "string" ? rawText : "";

  const onRejected: FieldRejected = (field, value) => {
    logger?.debug("Field value unusable, default substituted", {
      field,
      valueType: Array.isArray(value) ? "array" : typeof value,
    });
  };

  try {
    const candidate = extractCandidate(text);

    if (candidate.ok) {
      const strict = decodeStrict(candidate.value);
      if (strict.ok) {
        logger?.debug("Model output parsed as-is");
        return {
          record: coerceAnalysisRecord(strict.value, onRejected),
          stage: "strict",
        };
      }

      logger?.warn("Initial JSON parse failed, attempting repairs", {
        reason: strict.reason,
      });

      const repairedText = repairJson(candidate.value);
      const repaired = decodeStrict(repairedText);
      if (repaired.ok) {
        logger?.info("Model output parsed after repairs");
        return {
          record: coerceAnalysisRecord(repaired.value, onRejected),
          stage: "repaired",
        };
      }

      logger?.warn("Repaired JSON still invalid, falling back to field extraction", {
        reason: repaired.reason,
        preview: repairedText.slice(0, PREVIEW_CHARS),
      });
    } else {
      logger?.warn("No JSON object in model output, falling back to field extraction", {
        reason: candidate.reason,
        length: text.length,
      });
    }

    const partial = extractPartialFields(text);
    const located = Object.keys(partial);

    if (located.length === 0) {
      logger?.warn("Field extraction located nothing, using default record");
      return { record: createAnalysisRecord(), stage: "default" };
    }

    logger?.info("Recovered fields by pattern extraction", { fields: located });
    return {
      record: coerceAnalysisRecord(partial, onRejected),
      stage: "partial",
    };
  } catch (error) {
    logger?.error(
      "Unexpected failure while recovering model output, using default record",
      error instanceof Error ? error : new Error(String(error)),
    );
    return { record: createAnalysisRecord(), stage: "default" };
  }
}

export function recover(
  rawText: string,
  options: RecoveryOptions = {},
): AnalysisRecord {
  return recoverWithTrace(rawText, options).record;
}
