/**
 * Validation utilities for names stored in an artifact
 */

/**
 * Maximum UTF-8 length of an index key or type name
 */
export const MAX_NAME_BYTES = 1024;

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

function validateName(value: unknown, label: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${label} must be a non-empty string`);
  }

  if (CONTROL_CHARS.test(value)) {
    throw new Error(`${label} contains control characters: ${JSON.stringify(value)}`);
  }

  if (Buffer.byteLength(value, "utf8") > MAX_NAME_BYTES) {
    throw new Error(`${label} exceeds ${MAX_NAME_BYTES} bytes`);
  }

  return value;
}

/**
 * Validate an index key name
 * @throws Error if invalid
 */
export function validateKeyName(key: unknown): string {
  return validateName(key, "index key");
}

/**
 * Validate a record type name
 * @throws Error if invalid
 */
export function validateTypeName(typeName: unknown): string {
  return validateName(typeName, "type name");
}
