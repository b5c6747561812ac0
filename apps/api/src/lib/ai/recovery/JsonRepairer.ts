import {
  dropCommasBeforeClosers,
  findClosingBracket,
  skipDoubleQuoted,
  splitTopLevel,
} from "./scanner";

/**
 * Textual repairs for near-miss JSON emitted by language models.
 *
 * Each pass is a single left-to-right rewrite. The leading alternative of
 * every pattern consumes a whole double-quoted string, so string contents
 * are copied through untouched.
 */

const DOUBLE_QUOTED = String.raw`"(?:[^"\\]|\\.)*"`;

const BARE_KEY = new RegExp(
  String.raw`${DOUBLE_QUOTED}|(?<!['"\w])([A-Za-z_]\w*)\s*:`,
  "g",
);

const SINGLE_QUOTED_KEY_OR_VALUE = new RegExp(
  String.raw`${DOUBLE_QUOTED}|'((?:[^'\\]|\\.)*)'(?=\s*:)|(:\s*)'((?:[^'\\]|\\.)*)'`,
  "g",
);

const REPEATED_COMMA = new RegExp(String.raw`${DOUBLE_QUOTED}|,(?:\s*,)+`, "g");

const NUMERIC_LITERAL = /^-?\d+(\.\d+)?([eE][-+]?\d+)?$/;
const KEYWORD_LITERAL = /^(true|false|null)$/i;

export function repairJson(candidate: string): string {
  let text = candidate.trim();
  text = quoteBareKeys(text);
  text = convertSingleQuotes(text);
  text = retokenizeArrays(text);
  text = removeTrailingCommas(text);
  text = collapseRepeatedCommas(text);
  return text;
}

/** `{ key: 1 }` → `{ "key": 1 }` */
export function quoteBareKeys(text: string): string {
  return text.replace(BARE_KEY, (match: string, key?: string) =>
    key === undefined ? match : `"${key}":`,
  );
}

/** `{'key': 'value'}` → `{"key": "value"}` */
export function convertSingleQuotes(text: string): string {
  return text.replace(
    SINGLE_QUOTED_KEY_OR_VALUE,
    (match: string, key?: string, prefix?: string, value?: string) => {
      if (key !== undefined) return toDoubleQuoted(key);
      if (prefix !== undefined && value !== undefined) {
        return `${prefix}${toDoubleQuoted(value)}`;
      }
      return match;
    },
  );
}

/**
 * Rebuild every top-level array so each element is valid JSON:
 * `[burnout, 'fatigue',]` → `["burnout", "fatigue"]`
 */
export function retokenizeArrays(text: string): string {
  let output = "";
  let i = 0;

  while (i < text.length) {
    const char = text[i];

    if (char === '"') {
      const end = skipDoubleQuoted(text, i);
      output += text.slice(i, end);
      i = end;
      continue;
    }

    if (char === "[") {
      const close = findClosingBracket(text, i);
      if (close === -1) {
        output += text.slice(i);
        break;
      }
      output += rebuildArray(text.slice(i + 1, close));
      i = close + 1;
      continue;
    }

    output += char;
    i++;
  }

  return output;
}

/** `[1, 2, ]` → `[1, 2]` */
export function removeTrailingCommas(text: string): string {
  return dropCommasBeforeClosers(text);
}

export function collapseRepeatedCommas(text: string): string {
  return text.replace(REPEATED_COMMA, (match: string) =>
    match.startsWith('"') ? match : ",",
  );
}

function rebuildArray(content: string): string {
  const elements = splitTopLevel(content).map(normalizeElement);
  return `[${elements.join(", ")}]`;
}

function normalizeElement(element: string): string {
  const first = element[0];
  const last = element[element.length - 1];

  if (element.length >= 2 && first === '"' && last === '"') return element;
  if (element.length >= 2 && first === "'" && last === "'") {
    return toDoubleQuoted(element.slice(1, -1));
  }
  if (NUMERIC_LITERAL.test(element)) return element;
  if (KEYWORD_LITERAL.test(element)) return element.toLowerCase();
  // nested objects and arrays are left for the decoder
  if (first === "{" || first === "[") return element;

  return JSON.stringify(element);
}

/**
 * Re-quote the body of a single-quoted string with double quotes.
 * Escapes are kept except `\'`, which is not valid JSON.
 */
function toDoubleQuoted(body: string): string {
  let output = "";

  for (let i = 0; i < body.length; i++) {
    const char = body[i];

    if (char === "\\" && i + 1 < body.length) {
      const next = body[i + 1];
      output += next === "'" ? "'" : char + next;
      i++;
    } else if (char === "\\") {
      output += "\\\\";
    } else if (char === '"') {
      output += '\\"';
    } else if (char === "\n") {
      output += "\\n";
    } else if (char === "\r") {
      output += "\\r";
    } else if (char === "\t") {
      output += "\\t";
    } else {
      output += char;
    }
  }

  return `"${output}"`;
}
