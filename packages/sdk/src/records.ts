/**
 * JSON record types: canonical JSON bytes validated by a zod schema
 */

import { z } from "zod";
import { stableStringify } from "./format.js";
import { validateKeyName, validateTypeName } from "./validation.js";
import type { PakCodec, PakIndexField, PakSearchable, PakValue } from "./types.js";

export interface JsonRecordOptions<T> {
  /** Type name; the pointer type tag is derived from it */
  name: string;
  /** Schema applied on encode and decode */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /**
   * Dot-paths to index, read from the parsed value (e.g. ["name", "address.city"]) or a custom extractor
   */
  indices?: readonly string[] | ((value: T) => Iterable<PakIndexField>);
}

export interface JsonRecordType<T> extends PakCodec<T>, PakSearchable<T> {
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Get a nested value from an object using dot-path notation
 * @param obj - Object to get value from
 * @param path - Dot-separated path (e.g., "address.city")
 * @returns Value at path, or undefined if not found
 */
export function getPath(obj: unknown, path: string): unknown {
  return path.split(".").reduce<unknown>((o, k) => {
    if (o === null || typeof o !== "object") return undefined;
    return Reflect.get(o, k);
  }, obj);
}

/**
 * Narrow a value found at a path to an index field value
 * Objects stay as-is so the builder reports them as unindexable.
 */
function toFieldValue(value: unknown): PakIndexField[1] {
  if (value === null || value === undefined) return value;
  if (Array.isArray(value)) {
    return value.filter((item): item is PakValue => item !== null && item !== undefined);
  }
  switch (typeof value) {
    case "string":
    case "number":
    case "bigint":
    case "boolean":
      return value;
    default:
      throw new TypeError(`Value of type ${typeof value} cannot be indexed`);
  }
}

/**
 * Define a record type stored as canonical JSON
 */
export function jsonRecord<T>(options: JsonRecordOptions<T>): JsonRecordType<T> {
  const typeName = validateTypeName(options.name);
  const { schema, indices } = options;

  let extract: (value: T) => Iterable<PakIndexField>;
  if (typeof indices === "function") {
    extract = indices;
  } else {
    const paths = (indices ?? []).map((path) => validateKeyName(path));
    extract = (value) => paths.map((path): PakIndexField => [path, toFieldValue(getPath(value, path))]);
  }

  return {
    typeName,
    schema,
    encode(value: T): Uint8Array {
      return textEncoder.encode(stableStringify(schema.parse(value)));
    },
    decode(bytes: Uint8Array): T {
      return schema.parse(JSON.parse(textDecoder.decode(bytes)));
    },
    indices: (value: T) => extract(schema.parse(value)),
  };
}
