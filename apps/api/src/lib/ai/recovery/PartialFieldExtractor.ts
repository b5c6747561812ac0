import { splitTopLevel, stripOuterQuotes } from "./scanner";

/**
 * Last-resort, per-field pattern extraction over the raw model output.
 *
 * Nothing here validates or defaults: a field that cannot be located is
 * simply absent, and every located value is handed to the coercer as found.
 */

export interface PartialFields {
  primaryEmotion?: string;
  complexEmotion?: string;
  responseStrategy?: string;
  userFacingResponse?: string;
  intensity?: number;
  instability?: number;
  collapseRisk?: number;
  coordinates?: number[];
  keyIndicators?: string[];
  riskFactors?: string[];
}

type TextField = "primaryEmotion" | "complexEmotion" | "responseStrategy";
type NumericField = "intensity" | "instability" | "collapseRisk";
type ListField = "keyIndicators" | "riskFactors";

const TEXT_FIELDS: readonly TextField[] = [
  "primaryEmotion",
  "complexEmotion",
  "responseStrategy",
];
const NUMERIC_FIELDS: readonly NumericField[] = [
  "intensity",
  "instability",
  "collapseRisk",
];
const LIST_FIELDS: readonly ListField[] = ["keyIndicators", "riskFactors"];

const NUMBER = String.raw`[-+]?\d+(?:\.\d+)?`;

// whole name (optionally quoted) followed by a colon
function keyPattern(...names: string[]): string {
  return String.raw`["']?(?<![A-Za-z0-9_])(?:${names.join("|")})\b["']?\s*:\s*`;
}

function textPattern(field: TextField): RegExp {
  return new RegExp(
    keyPattern(field) +
      String.raw`(?:"([^"]*)"|“([^”]*)”|'([^']*)'|‘([^’]*)’)`,
    "i",
  );
}

function numericPattern(field: NumericField): RegExp {
  return new RegExp(keyPattern(field) + `["']?(${NUMBER})`, "i");
}

function listPattern(field: ListField): RegExp {
  return new RegExp(keyPattern(field) + String.raw`\[([^\]]*)\]`, "i");
}

const RESPONSE_KEY_PATTERN = keyPattern(
  "user_facing_response",
  "userFacingResponse",
);

const RESPONSE_PATTERNS: ReadonlyArray<{ pattern: RegExp; decode: boolean }> = [
  {
    pattern: new RegExp(
      RESPONSE_KEY_PATTERN + String.raw`"((?:\\.|[^"\\])*)"`,
      "i",
    ),
    decode: true,
  },
  {
    pattern: new RegExp(
      RESPONSE_KEY_PATTERN + String.raw`'((?:\\.|[^'\\])*)'`,
      "i",
    ),
    decode: false,
  },
  {
    pattern: new RegExp(RESPONSE_KEY_PATTERN + "“([^”]*)”", "i"),
    decode: false,
  },
];

const COORDINATES_PATTERN = new RegExp(
  keyPattern("coordinates") +
    String.raw`["']?\[?\s*(${NUMBER}(?:[\s,]+${NUMBER})*)`,
  "i",
);

export function extractPartialFields(text: string): PartialFields {
  const fields: PartialFields = {};

  for (const field of TEXT_FIELDS) {
    const match = text.match(textPattern(field));
    if (match) {
      const value = match.slice(1).find((group) => group !== undefined);
      if (value !== undefined) fields[field] = value.trim();
    }
  }

  const response = extractResponse(text);
  if (response !== undefined) fields.userFacingResponse = response;

  for (const field of NUMERIC_FIELDS) {
    const match = text.match(numericPattern(field));
    if (match) fields[field] = Number(match[1]);
  }

  const coordinates = text.match(COORDINATES_PATTERN);
  if (coordinates) {
    fields.coordinates = coordinates[1]
      .split(/[\s,]+/)
      .slice(0, 2)
      .map(Number);
  }

  for (const field of LIST_FIELDS) {
    const match = text.match(listPattern(field));
    if (match) {
      fields[field] = splitTopLevel(match[1])
        .map((item) => stripOuterQuotes(item).trim())
        .filter((item) => item.length > 0);
    }
  }

  return fields;
}

function extractResponse(text: string): string | undefined {
  for (const { pattern, decode } of RESPONSE_PATTERNS) {
    const match = text.match(pattern);
    if (match) {
      return (decode ? decodeJsonString(match[1]) : match[1]).trim();
    }
  }
  return undefined;
}

function decodeJsonString(body: string): string {
  try {
    const decoded: unknown = JSON.parse(`"${body}"`);
    return typeof decoded === "string" ? decoded : body;
  } catch {
    // literal newlines or stray escapes: keep the text as written
    return body;
  }
}
