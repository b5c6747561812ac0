import { StageResult } from "./types";

// ```json ... ``` with a case-insensitive marker
const JSON_FENCE = /```json\b\s*([\s\S]*?)```/i;

/**
 * Isolate the part of a model response that most likely holds the JSON
 * object: the interior of a json-marked fence, else the span from the
 * first `{` to the last `}` (or to the end of the text when the object
 * was cut off). Well-formedness is left to the decoder.
 */
export function extractCandidate(text: string): StageResult<string> {
  const fenced = text.match(JSON_FENCE);
  if (fenced && fenced[1].includes("{")) {
    return { ok: true, value: fenced[1].trim() };
  }

  const start = text.indexOf("{");
  if (start === -1) {
    return { ok: false, reason: "no opening brace in response" };
  }

  const end = text.lastIndexOf("}");
  const candidate = end > start ? text.slice(start, end + 1) : text.slice(start);
  return { ok: true, value: candidate.trim() };
}
