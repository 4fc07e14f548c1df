/**
 * Binary layout of a pak artifact (all integers little-endian)
 *
 * ```
 * Header:    magic[8], format_version u32, meta_length u32,
 *            meta = name, description, author as (u32 length, UTF-8 bytes)
 * Data:      record bytes in insertion order
 * Indices:   per key, entries of (u32 value_len, value, u64 offset, u64 length, u64 type_tag)
 * Directory: u32 key_count, per key (u32 name_len, name, u64 index_offset, u64 index_length, u64 entry_count)
 * Footer:    data_offset u64, data_length u64, index_segment_offset u64,
 *            directory_offset u64, record_count u64, format_version u32
 * ```
 *
 * Pointer offsets are relative to the data segment; every other offset is absolute.
 */

import { FormatError } from "../errors.js";
import { createPointer, POINTER_SIZE, toSafeNumber, writePointer } from "../pointer.js";
import type { PakMetadata, Pointer } from "../types.js";

/** "PAKDB\0\r\n": the CR LF pair catches text-mode transfers */
export const MAGIC = Uint8Array.of(0x50, 0x41, 0x4b, 0x44, 0x42, 0x00, 0x0d, 0x0a);
export const FORMAT_VERSION = 1;
export const SUPPORTED_VERSIONS: ReadonlySet<number> = new Set([FORMAT_VERSION]);

/** magic + format_version + meta_length */
export const HEADER_FIXED_SIZE = MAGIC.length + 4 + 4;
export const FOOTER_SIZE = 5 * 8 + 4;

export interface Footer {
  dataOffset: number;
  dataLength: number;
  indexOffset: number;
  directoryOffset: number;
  recordCount: number;
  formatVersion: number;
}

export interface DirectoryEntry {
  key: string;
  /** Absolute offset of the index's first entry */
  indexOffset: number;
  indexLength: number;
  entryCount: number;
}

export interface EncodedEntry {
  value: Uint8Array;
  pointer: Pointer;
}

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Append-only little-endian writer
 */
export class ByteWriter {
  #chunks: Uint8Array[] = [];
  #length = 0;

  get length(): number {
    return this.#length;
  }

  #fixed(size: number, write: (view: DataView) => void): this {
    const chunk = new Uint8Array(size);
    write(new DataView(chunk.buffer));
    return this.bytes(chunk);
  }

  u32(value: number): this {
    return this.#fixed(4, (view) => view.setUint32(0, value, true));
  }

  u64(value: number | bigint): this {
    return this.#fixed(8, (view) => view.setBigUint64(0, BigInt(value), true));
  }

  pointer(pointer: Pointer): this {
    return this.#fixed(POINTER_SIZE, (view) => writePointer(view, 0, pointer));
  }

  bytes(bytes: Uint8Array): this {
    this.#chunks.push(bytes);
    this.#length += bytes.length;
    return this;
  }

  /** Length-prefixed (u32) UTF-8 string */
  string(value: string): this {
    const utf8 = textEncoder.encode(value);
    return this.u32(utf8.length).bytes(utf8);
  }

  toBytes(): Uint8Array {
    const out = new Uint8Array(this.#length);
    let pos = 0;
    for (const chunk of this.#chunks) {
      out.set(chunk, pos);
      pos += chunk.length;
    }
    return out;
  }
}

/**
 * Bounds-checked little-endian reader; every overrun is a FormatError
 */
export class ByteReader {
  #view: DataView;
  #bytes: Uint8Array;
  #pos = 0;
  /** Absolute offset of `bytes[0]` in the artifact, for messages */
  readonly base: number;

  constructor(bytes: Uint8Array, base = 0) {
    this.#bytes = bytes;
    this.#view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.base = base;
  }

  get pos(): number {
    return this.#pos;
  }

  get remaining(): number {
    return this.#bytes.length - this.#pos;
  }

  #take(size: number, label: string): number {
    if (size > this.remaining) {
      throw new FormatError(`truncated ${label} at byte ${this.base + this.#pos}`);
    }
    const at = this.#pos;
    this.#pos += size;
    return at;
  }

  u32(label: string): number {
    return this.#view.getUint32(this.#take(4, label), true);
  }

  u64(label: string): bigint {
    return this.#view.getBigUint64(this.#take(8, label), true);
  }

  /** u64 that must fit a safe integer */
  safe(label: string): number {
    try {
      return toSafeNumber(this.u64(label), label);
    } catch (err) {
      if (err instanceof RangeError) throw new FormatError(err.message, { cause: err });
      throw err;
    }
  }

  bytes(size: number, label: string): Uint8Array {
    const at = this.#take(size, label);
    return this.#bytes.slice(at, at + size);
  }

  string(label: string): string {
    const bytes = this.bytes(this.u32(`${label} length`), label);
    try {
      return textDecoder.decode(bytes);
    } catch (err) {
      throw new FormatError(`${label} is not valid UTF-8`, { cause: err });
    }
  }

  pointer(label: string): Pointer {
    const offset = this.safe(`${label} offset`);
    const length = this.safe(`${label} length`);
    return createPointer(offset, length, this.u64(`${label} type tag`));
  }
}

/**
 * Encode the header (magic, version and metadata)
 */
export function encodeHeader(meta: PakMetadata): Uint8Array {
  const metaBytes = new ByteWriter()
    .string(meta.name)
    .string(meta.description)
    .string(meta.author)
    .toBytes();

  return new ByteWriter()
    .bytes(MAGIC)
    .u32(FORMAT_VERSION)
    .u32(metaBytes.length)
    .bytes(metaBytes)
    .toBytes();
}

/**
 * Validate the fixed part of a header
 * @returns Format version and the length of the metadata that follows
 * @throws FormatError on bad magic or an unsupported version
 */
export function decodeHeaderPrefix(bytes: Uint8Array): { formatVersion: number; metaLength: number } {
  const reader = new ByteReader(bytes);
  const magic = reader.bytes(MAGIC.length, "magic");
  if (!magic.every((b, i) => b === MAGIC[i])) {
    throw new FormatError("bad magic");
  }

  const formatVersion = reader.u32("format version");
  if (!SUPPORTED_VERSIONS.has(formatVersion)) {
    throw new FormatError(`unsupported format version ${formatVersion}`);
  }

  return { formatVersion, metaLength: reader.u32("metadata length") };
}

/**
 * Decode the metadata block of a header
 */
export function decodeMetadata(bytes: Uint8Array): PakMetadata {
  const reader = new ByteReader(bytes, HEADER_FIXED_SIZE);
  const meta: PakMetadata = {
    name: reader.string("name"),
    description: reader.string("description"),
    author: reader.string("author"),
  };
  if (reader.remaining !== 0) {
    throw new FormatError(`${reader.remaining} unexpected bytes after metadata`);
  }
  return meta;
}

/**
 * Encode one index's sorted entries
 */
export function encodeEntries(entries: readonly EncodedEntry[]): Uint8Array {
  const writer = new ByteWriter();
  for (const entry of entries) {
    writer.u32(entry.value.length).bytes(entry.value).pointer(entry.pointer);
  }
  return writer.toBytes();
}

/**
 * Decode exactly `count` entries spanning the whole buffer
 */
export function decodeEntries(bytes: Uint8Array, count: number, base: number): EncodedEntry[] {
  const reader = new ByteReader(bytes, base);
  const entries: EncodedEntry[] = [];
  for (let i = 0; i < count; i++) {
    const value = reader.bytes(reader.u32("entry value length"), "entry value");
    entries.push({ value, pointer: reader.pointer("entry pointer") });
  }
  if (reader.remaining !== 0) {
    throw new FormatError(`index at byte ${base} has ${reader.remaining} trailing bytes`);
  }
  return entries;
}

export function encodeDirectory(entries: readonly DirectoryEntry[]): Uint8Array {
  const writer = new ByteWriter().u32(entries.length);
  for (const entry of entries) {
    writer
      .string(entry.key)
      .u64(entry.indexOffset)
      .u64(entry.indexLength)
      .u64(entry.entryCount);
  }
  return writer.toBytes();
}

/**
 * Decode a directory that must span the whole buffer
 */
export function decodeDirectory(bytes: Uint8Array, base: number): DirectoryEntry[] {
  const reader = new ByteReader(bytes, base);
  const count = reader.u32("directory key count");
  const entries: DirectoryEntry[] = [];
  for (let i = 0; i < count; i++) {
    entries.push({
      key: reader.string("index key"),
      indexOffset: reader.safe("index offset"),
      indexLength: reader.safe("index length"),
      entryCount: reader.safe("index entry count"),
    });
  }
  if (reader.remaining !== 0) {
    throw new FormatError(`directory has ${reader.remaining} trailing bytes`);
  }
  return entries;
}

export function encodeFooter(footer: Footer): Uint8Array {
  return new ByteWriter()
    .u64(footer.dataOffset)
    .u64(footer.dataLength)
    .u64(footer.indexOffset)
    .u64(footer.directoryOffset)
    .u64(footer.recordCount)
    .u32(footer.formatVersion)
    .toBytes();
}

export function decodeFooter(bytes: Uint8Array, base: number): Footer {
  const reader = new ByteReader(bytes, base);
  return {
    dataOffset: reader.safe("data offset"),
    dataLength: reader.safe("data length"),
    indexOffset: reader.safe("index segment offset"),
    directoryOffset: reader.safe("directory offset"),
    recordCount: reader.safe("record count"),
    formatVersion: reader.u32("footer format version"),
  };
}
