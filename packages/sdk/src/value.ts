/**
 * Canonical, order-preserving encoding of indexed values
 *
 * Every encoding starts with one kind byte. Within a kind, byte-wise comparison
 * of two encodings matches the natural order of the values:
 * - boolean: false < true
 * - number: IEEE-754 total order with -0 folded into 0; NaN is rejected
 * - bigint: signed 64-bit
 * - string: Unicode code point order (UTF-8 bytes)
 */

import type { PakValue, PakValueKind } from "./types.js";

export const KindByte = {
  boolean: 0x10,
  number: 0x20,
  bigint: 0x30,
  string: 0x40,
} as const satisfies Record<PakValueKind, number>;

const KIND_BY_BYTE = new Map<number, PakValueKind>([
  [KindByte.boolean, "boolean"],
  [KindByte.number, "number"],
  [KindByte.bigint, "bigint"],
  [KindByte.string, "string"],
]);

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Get the canonical kind of a value
 * @throws TypeError if the value is not a supported index value
 */
export function kindOf(value: unknown): PakValueKind {
  switch (typeof value) {
    case "string":
      return "string";
    case "number":
      return "number";
    case "bigint":
      return "bigint";
    case "boolean":
      return "boolean";
    default:
      throw new TypeError(`Unsupported index value of type ${kindLabel(value)}`);
  }
}

function kindLabel(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * Check whether a value can be stored in an index
 */
export function isPakValue(value: unknown): value is PakValue {
  const type = typeof value;
  return type === "string" || type === "number" || type === "bigint" || type === "boolean";
}

/**
 * Encode a value into its canonical byte form
 * @throws TypeError for unsupported values, RangeError for NaN or bigints outside int64
 */
export function encodeValue(value: PakValue): Uint8Array {
  switch (typeof value) {
    case "boolean":
      return Uint8Array.of(KindByte.boolean, value ? 1 : 0);

    case "number": {
      const n = value;
      if (Number.isNaN(n)) {
        throw new RangeError("NaN cannot be indexed");
      }
      const out = new Uint8Array(9);
      out[0] = KindByte.number;
      const view = new DataView(out.buffer);
      // -0 folds into 0 so both compare equal
      view.setFloat64(1, n === 0 ? 0 : n, false);
      if ((out[1] & 0x80) !== 0) {
        for (let i = 1; i < 9; i++) out[i] = ~out[i] & 0xff;
      } else {
        out[1] = out[1] | 0x80;
      }
      return out;
    }

    case "bigint": {
      const n = value;
      if (n < INT64_MIN || n > INT64_MAX) {
        throw new RangeError(`bigint ${n} is outside the signed 64-bit range`);
      }
      const out = new Uint8Array(9);
      out[0] = KindByte.bigint;
      new DataView(out.buffer).setBigInt64(1, n, false);
      out[1] = out[1] ^ 0x80;
      return out;
    }

    case "string": {
      const utf8 = textEncoder.encode(value);
      const out = new Uint8Array(utf8.length + 1);
      out[0] = KindByte.string;
      out.set(utf8, 1);
      return out;
    }

    default:
      throw new TypeError(`Unsupported index value of type ${kindLabel(value)}`);
  }
}

/**
 * Read the kind byte of an encoded value
 * @returns Kind, or undefined if the byte is not a known kind
 */
export function kindOfEncoded(bytes: Uint8Array): PakValueKind | undefined {
  if (bytes.length === 0) return undefined;
  return KIND_BY_BYTE.get(bytes[0]);
}

/**
 * Decode a canonical encoding back into its value
 * @throws RangeError if the bytes are not a valid encoding
 */
export function decodeValue(bytes: Uint8Array): PakValue {
  const kind = kindOfEncoded(bytes);
  if (kind === undefined) {
    throw new RangeError("Unknown value kind byte");
  }

  switch (kind) {
    case "boolean":
      if (bytes.length !== 2 || bytes[1] > 1) {
        throw new RangeError("Malformed boolean encoding");
      }
      return bytes[1] === 1;

    case "number": {
      if (bytes.length !== 9) {
        throw new RangeError("Malformed number encoding");
      }
      const raw = bytes.slice(1);
      if ((raw[0] & 0x80) !== 0) {
        raw[0] = raw[0] & 0x7f;
      } else {
        for (let i = 0; i < 8; i++) raw[i] = ~raw[i] & 0xff;
      }
      return new DataView(raw.buffer).getFloat64(0, false);
    }

    case "bigint": {
      if (bytes.length !== 9) {
        throw new RangeError("Malformed bigint encoding");
      }
      const raw = bytes.slice(1);
      raw[0] = raw[0] ^ 0x80;
      return new DataView(raw.buffer).getBigInt64(0, false);
    }

    case "string":
      return textDecoder.decode(bytes.subarray(1));
  }
}

/**
 * Byte-wise comparison of two encodings
 * @returns Negative, zero or positive like Array.prototype.sort comparators
 */
export function compareEncoded(a: Uint8Array, b: Uint8Array): number {
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const diff = a[i] - b[i];
    if (diff !== 0) return diff;
  }
  return a.length - b.length;
}

/**
 * Render a value for log lines and query descriptions
 */
export function formatValue(value: PakValue): string {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "bigint":
      return `${value}n`;
    default:
      return String(value);
  }
}
