/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";

/**
 * Parse a non-negative integer argument
 * @param max - Upper bound (default: Number.MAX_SAFE_INTEGER)
 */
export function parseNonNegativeInt(value: string, name: string, max = Number.MAX_SAFE_INTEGER): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed) || parsed > max) {
    throw new InvalidArgumentError(`${name} must be <= ${max}`);
  }

  return parsed;
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Parse input text as a JSON array of documents, or as NDJSON (one document per line)
 */
export function parseDocuments(text: string, source: string): unknown[] {
  const cleaned = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  if (cleaned.trimStart().startsWith("[")) {
    const parsed = parseJson(cleaned, source);
    if (!Array.isArray(parsed)) {
      throw new InvalidArgumentError(`Expected a JSON array in ${source}`);
    }
    return parsed;
  }

  const docs: unknown[] = [];
  cleaned.split(/\r?\n/).forEach((line, i) => {
    if (line.trim() === "") return;
    docs.push(parseJson(line, `${source} line ${i + 1}`));
  });
  return docs;
}
