/**
 * Pointer helpers: type tags, ordering and serialized forms
 */

import type { Pointer, PointerJSON } from "./types.js";

export const POINTER_SIZE = 24;

const FNV64_OFFSET = 0xcbf29ce484222325n;
const FNV64_PRIME = 0x100000001b3n;
const U64_MASK = 0xffffffffffffffffn;

const tagCache = new Map<string, bigint>();
const textEncoder = new TextEncoder();

/**
 * Derive the 64-bit type tag of a record type name (FNV-1a over UTF-8)
 */
export function typeTagOf(typeName: string): bigint {
  const cached = tagCache.get(typeName);
  if (cached !== undefined) return cached;

  let hash = FNV64_OFFSET;
  for (const byte of textEncoder.encode(typeName)) {
    hash ^= BigInt(byte);
    hash = (hash * FNV64_PRIME) & U64_MASK;
  }

  tagCache.set(typeName, hash);
  return hash;
}

/**
 * Render a type tag as 16 lowercase hex digits
 */
export function formatTypeTag(tag: bigint): string {
  return tag.toString(16).padStart(16, "0");
}

/**
 * Create a pointer, freezing it so handles cannot be altered after creation
 */
export function createPointer(offset: number, length: number, typeTag: bigint): Pointer {
  return Object.freeze({ offset, length, typeTag });
}

/**
 * Total order over pointers: offset, then length, then tag
 */
export function comparePointers(a: Pointer, b: Pointer): number {
  if (a.offset !== b.offset) return a.offset - b.offset;
  if (a.length !== b.length) return a.length - b.length;
  if (a.typeTag === b.typeTag) return 0;
  return a.typeTag < b.typeTag ? -1 : 1;
}

export function pointersEqual(a: Pointer, b: Pointer): boolean {
  return a.offset === b.offset && a.length === b.length && a.typeTag === b.typeTag;
}

/**
 * Write a pointer as three little-endian u64 values
 */
export function writePointer(view: DataView, pos: number, pointer: Pointer): void {
  view.setBigUint64(pos, BigInt(pointer.offset), true);
  view.setBigUint64(pos + 8, BigInt(pointer.length), true);
  view.setBigUint64(pos + 16, pointer.typeTag, true);
}

/**
 * Encode a pointer into its 24-byte form
 */
export function encodePointer(pointer: Pointer): Uint8Array {
  const out = new Uint8Array(POINTER_SIZE);
  writePointer(new DataView(out.buffer), 0, pointer);
  return out;
}

/**
 * Decode a pointer from its 24-byte form
 * @throws RangeError if the buffer is too short or an offset exceeds the safe integer range
 */
export function decodePointer(bytes: Uint8Array): Pointer {
  if (bytes.length < POINTER_SIZE) {
    throw new RangeError(`Pointer needs ${POINTER_SIZE} bytes, got ${bytes.length}`);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, POINTER_SIZE);
  return createPointer(
    toSafeNumber(view.getBigUint64(0, true), "offset"),
    toSafeNumber(view.getBigUint64(8, true), "length"),
    view.getBigUint64(16, true)
  );
}

/**
 * Convert a u64 read from an artifact into a number
 * @throws RangeError if the value exceeds Number.MAX_SAFE_INTEGER
 */
export function toSafeNumber(value: bigint, label: string): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new RangeError(`${label} ${value} exceeds the safe integer range`);
  }
  return Number(value);
}

/**
 * JSON-safe form of a pointer
 */
export function pointerToJSON(pointer: Pointer): PointerJSON {
  return {
    offset: pointer.offset,
    length: pointer.length,
    typeTag: formatTypeTag(pointer.typeTag),
  };
}

/**
 * Parse the JSON form produced by `pointerToJSON`
 * @throws TypeError if the object is malformed
 */
export function pointerFromJSON(json: PointerJSON): Pointer {
  if (!Number.isSafeInteger(json.offset) || json.offset < 0) {
    throw new TypeError(`Invalid pointer offset: ${json.offset}`);
  }
  if (!Number.isSafeInteger(json.length) || json.length < 0) {
    throw new TypeError(`Invalid pointer length: ${json.length}`);
  }
  if (!/^[0-9a-f]{16}$/.test(json.typeTag)) {
    throw new TypeError(`Invalid pointer type tag: ${json.typeTag}`);
  }
  return createPointer(json.offset, json.length, BigInt(`0x${json.typeTag}`));
}
