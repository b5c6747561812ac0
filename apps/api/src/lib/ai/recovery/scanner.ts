/**
 * Character scanners shared by the repairer and the field extractor.
 *
 * All scans are single pass and bounded by the input length.
 */

/**
 * Index just past the double-quoted string opening at `start`,
 * or the end of the text when the string never closes.
 */
export function skipDoubleQuoted(text: string, start: number): number {
  for (let i = start + 1; i < text.length; i++) {
    const char = text[i];
    if (char === "\\") {
      i++;
    } else if (char === '"') {
      return i + 1;
    }
  }
  return text.length;
}

/**
 * Index of the `]` closing the array opened at `start`, or -1 when the
 * array is truncated. Brackets inside double-quoted strings are ignored.
 */
export function findClosingBracket(text: string, start: number): number {
  let depth = 0;
  let i = start;

  while (i < text.length) {
    const char = text[i];
    if (char === '"') {
      i = skipDoubleQuoted(text, i);
      continue;
    }
    if (char === "[") {
      depth++;
    } else if (char === "]") {
      depth--;
      if (depth === 0) return i;
    }
    i++;
  }

  return -1;
}

/**
 * Split array content on commas at bracket depth zero.
 *
 * Commas inside quoted sections, escapes and nested brackets are kept.
 * A single quote only opens a quoted section at the start of an element,
 * so apostrophes inside bare words stay literal. Elements come back
 * trimmed; empty ones are dropped.
 */
export function splitTopLevel(content: string): string[] {
  const elements: string[] = [];
  let current = "";
  let quote: string | null = null;
  let escaped = false;
  let depth = 0;

  const flush = () => {
    const element = current.trim();
    if (element) elements.push(element);
    current = "";
  };

  for (const char of content) {
    if (escaped) {
      current += char;
      escaped = false;
      continue;
    }

    if (char === "\\") {
      current += char;
      escaped = true;
      continue;
    }

    if (quote) {
      current += char;
      if (char === quote) quote = null;
      continue;
    }

    if (char === '"' || (char === "'" && current.trim() === "")) {
      quote = char;
      current += char;
      continue;
    }

    if (char === "[" || char === "{") {
      depth++;
    } else if (char === "]" || char === "}") {
      depth = Math.max(0, depth - 1);
    } else if (char === "," && depth === 0) {
      flush();
      continue;
    }

    current += char;
  }

  flush();
  return elements;
}

/**
 * Drop every run of commas (and the whitespace between them) that is
 * immediately followed by `}` or `]`. Commas inside double-quoted strings
 * are copied through.
 */
export function dropCommasBeforeClosers(text: string): string {
  let output = "";
  // comma run waiting for the next token
  let pending = "";
  let i = 0;

  while (i < text.length) {
    const char = text[i];

    if (char === ",") {
      pending += char;
      i++;
      continue;
    }

    if (/\s/.test(char)) {
      if (pending) pending += char;
      else output += char;
      i++;
      continue;
    }

    if (char !== "}" && char !== "]") output += pending;
    pending = "";

    if (char === '"') {
      const end = skipDoubleQuoted(text, i);
      output += text.slice(i, end);
      i = end;
      continue;
    }

    output += char;
    i++;
  }

  return output + pending;
}

/**
 * Remove one layer of matching single or double quotes
 */
export function stripOuterQuotes(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return value.slice(1, -1);
    }
  }
  return value;
}
