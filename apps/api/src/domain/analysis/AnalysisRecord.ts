/**
 * AnalysisRecord
 *
 * The validated emotional analysis produced from a model response.
 * Every record handed out by this module is fully populated and frozen.
 */

export type Coordinates = readonly [number, number];

export interface AnalysisRecord {
  readonly primaryEmotion: string;
  readonly complexEmotion: string;
  readonly coordinates: Coordinates;
  readonly intensity: number;
  readonly instability: number;
  readonly collapseRisk: number;
  readonly keyIndicators: readonly string[];
  readonly responseStrategy: string;
  readonly riskFactors: readonly string[];
  readonly userFacingResponse: string;
}

export type AnalysisField = keyof AnalysisRecord;

export const RECOVERY_STAGES = [
  "strict",
  "repaired",
  "partial",
  "default",
] as const;

/**
 * Which recovery tier produced a record
 */
export type RecoveryStage = (typeof RECOVERY_STAGES)[number];

export function isRecoveryStage(value: unknown): value is RecoveryStage {
  return RECOVERY_STAGES.some((stage) => stage === value);
}

// Wire keys used by the model output and by API responses
export const ANALYSIS_KEY = "internal_chs_analysis";
export const RESPONSE_KEY = "user_facing_response";

export const ANALYSIS_DEFAULTS: AnalysisRecord = Object.freeze({
  primaryEmotion: "Unknown",
  complexEmotion: "Unknown",
  coordinates: Object.freeze([0, 0] as const),
  intensity: 0,
  instability: 0,
  collapseRisk: 0,
  keyIndicators: Object.freeze([]),
  responseStrategy: "General Support",
  riskFactors: Object.freeze([]),
  userFacingResponse: "",
});

export function createAnalysisRecord(
  fields: Partial<AnalysisRecord> = {},
): AnalysisRecord {
  const merged = { ...ANALYSIS_DEFAULTS, ...fields };

  return Object.freeze({
    ...merged,
    coordinates: Object.freeze([
      merged.coordinates[0],
      merged.coordinates[1],
    ] as const),
    keyIndicators: Object.freeze([...merged.keyIndicators]),
    riskFactors: Object.freeze([...merged.riskFactors]),
  });
}

export interface AnalysisPayload {
  [ANALYSIS_KEY]: {
    primaryEmotion: string;
    complexEmotion: string;
    coordinates: [number, number];
    intensity: number;
    instability: number;
    collapseRisk: number;
    keyIndicators: string[];
    responseStrategy: string;
    riskFactors: string[];
  };
  [RESPONSE_KEY]: string;
}

/**
 * Serialize a record into the shape the model is asked to produce
 */
export function toAnalysisPayload(record: AnalysisRecord): AnalysisPayload {
  return {
    [ANALYSIS_KEY]: {
      primaryEmotion: record.primaryEmotion,
      complexEmotion: record.complexEmotion,
      coordinates: [record.coordinates[0], record.coordinates[1]],
      intensity: record.intensity,
      instability: record.instability,
      collapseRisk: record.collapseRisk,
      keyIndicators: [...record.keyIndicators],
      responseStrategy: record.responseStrategy,
      riskFactors: [...record.riskFactors],
    },
    [RESPONSE_KEY]: record.userFacingResponse,
  };
}
