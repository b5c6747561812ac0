import { StageResult } from "./types";

/**
 * All-or-nothing JSON decode
 */
export function decodeStrict(text: string): StageResult<unknown> {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return {
      ok: false,
      reason: error instanceof Error ? error.message : String(error),
    };
  }
}
