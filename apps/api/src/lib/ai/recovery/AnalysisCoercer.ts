import {
  ANALYSIS_DEFAULTS,
  ANALYSIS_KEY,
  AnalysisField,
  AnalysisRecord,
  Coordinates,
  RESPONSE_KEY,
  createAnalysisRecord,
} from "../../../domain/analysis/AnalysisRecord";
import { decodeStrict } from "./StrictDecoder";

/**
 * Total coercions from arbitrary decoded values into AnalysisRecord fields.
 *
 * Every function here returns a value of the target type for any input;
 * the caller's default is used whenever a value is absent or unusable.
 */

const DECIMAL_LITERAL = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

export type FieldRejected = (field: AnalysisField, value: unknown) => void;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function coerceText(value: unknown, fallback: string): string {
  if (value === null || value === undefined) return fallback;
  if (typeof value === "string") return value;
  if (
    typeof value === "number" ||
    typeof value === "boolean" ||
    typeof value === "bigint"
  ) {
    return String(value);
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return fallback;
}

export function coerceNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!DECIMAL_LITERAL.test(trimmed)) return undefined;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export function coerceBoundedNumber(value: unknown, fallback = 0): number {
  return clampUnit(coerceNumber(value) ?? fallback);
}

/**
 * Both axes or neither: anything short of a two-element sequence
 * yields the origin. Strings are read as lists first: `"0.3, -0.2"`.
 */
export function coerceCoordinates(value: unknown): Coordinates {
  const axes = coordinateAxes(value);
  if (axes === undefined) {
    return ANALYSIS_DEFAULTS.coordinates;
  }
  return [coerceNumber(axes[0]) ?? 0, coerceNumber(axes[1]) ?? 0];
}

function coordinateAxes(value: unknown): unknown[] | undefined {
  const axes: unknown = typeof value === "string" ? parseListText(value) : value;
  return Array.isArray(axes) && axes.length >= 2 ? axes : undefined;
}

export function coerceStringList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value
      .filter((item) => item !== null && item !== undefined)
      .map((item) => coerceText(item, ""));
  }
  if (typeof value === "string") return parseListText(value);
  if (!value) return [];
  if (isRecord(value) && Object.keys(value).length === 0) return [];
  return [coerceText(value, "")];
}

function parseListText(text: string): string[] {
  const trimmed = text.trim();

  if (trimmed.startsWith("[") && trimmed.endsWith("]")) {
    const decoded = decodeStrict(trimmed);
    if (decoded.ok && Array.isArray(decoded.value)) {
      return coerceStringList(decoded.value);
    }
    return splitCommaList(trimmed.slice(1, -1));
  }

  return splitCommaList(trimmed);
}

function splitCommaList(text: string): string[] {
  return text
    .split(",")
    .map((item) => item.trim().replace(/^["']+|["']+$/g, ""))
    .filter((item) => item.length > 0);
}

/**
 * Build a complete record from whatever the earlier stages produced.
 *
 * Analysis fields are read from the nested `internal_chs_analysis` object
 * when there is one, otherwise from the top level.
 */
export function coerceAnalysisRecord(
  tree: unknown,
  onRejected?: FieldRejected,
): AnalysisRecord {
  const root: Record<string, unknown> = isRecord(tree) ? tree : {};
  const nested = root[ANALYSIS_KEY];
  const analysis = isRecord(nested) ? nested : root;
  const response =
    root[RESPONSE_KEY] ??
    root.userFacingResponse ??
    analysis[RESPONSE_KEY] ??
    analysis.userFacingResponse;

  const bounded = (field: AnalysisField, value: unknown) => {
    const absent =
      value === undefined ||
      value === null ||
      (typeof value === "string" && value.trim() === "");
    if (!absent && coerceNumber(value) === undefined) {
      onRejected?.(field, value);
    }
    return coerceBoundedNumber(value, 0);
  };

  const coordinates = (value: unknown) => {
    if (value !== undefined && coordinateAxes(value) === undefined) {
      onRejected?.("coordinates", value);
    }
    return coerceCoordinates(value);
  };

  return createAnalysisRecord({
    primaryEmotion: coerceText(
      analysis.primaryEmotion,
      ANALYSIS_DEFAULTS.primaryEmotion,
    ),
    complexEmotion: coerceText(
      analysis.complexEmotion,
      ANALYSIS_DEFAULTS.complexEmotion,
    ),
    coordinates: coordinates(analysis.coordinates),
    intensity: bounded("intensity", analysis.intensity),
    instability: bounded("instability", analysis.instability),
    collapseRisk: bounded("collapseRisk", analysis.collapseRisk),
    keyIndicators: coerceStringList(analysis.keyIndicators),
    responseStrategy: coerceText(
      analysis.responseStrategy,
      ANALYSIS_DEFAULTS.responseStrategy,
    ),
    riskFactors: coerceStringList(analysis.riskFactors),
    userFacingResponse: coerceText(
      response,
      ANALYSIS_DEFAULTS.userFacingResponse,
    ),
  });
}
