/**
 * Core types for pakdb
 */

/**
 * A value that can be stored in a secondary index
 */
export type PakValue = string | number | bigint | boolean;

/**
 * Canonical kind of an indexed value. All values under one key share a kind.
 */
export type PakValueKind = "boolean" | "number" | "bigint" | "string";

/**
 * Handle to a record: a byte range of the data segment plus the tag of the
 * record type stored there
 */
export interface Pointer {
  /** Offset from the start of the data segment */
  readonly offset: number;
  /** Length of the encoded record in bytes */
  readonly length: number;
  /** Unsigned 64-bit tag derived from the record type name */
  readonly typeTag: bigint;
}

/**
 * JSON-safe form of a pointer, for records that reference other records
 */
export interface PointerJSON {
  offset: number;
  length: number;
  /** Type tag as 16 lowercase hex digits */
  typeTag: string;
}

/**
 * Encode/decode capability supplied by a record type
 */
export interface PakCodec<T> {
  /** Stable name of the record type; the pointer type tag is derived from it */
  readonly typeName: string;
  encode(value: T): Uint8Array;
  decode(bytes: Uint8Array): T;
}

/**
 * One (key, value) pair yielded by an index extractor.
 * Arrays index every element under the key; null and undefined skip the key.
 */
export type PakIndexField = readonly [
  key: string,
  value: PakValue | readonly PakValue[] | null | undefined,
];

/**
 * Optional capability: extract indexable fields from a record
 */
export interface PakSearchable<T> {
  indices(value: T): Iterable<PakIndexField>;
}

/**
 * A record type as seen by the builder and the reader
 */
export type PakRecordType<T> = PakCodec<T> & Partial<PakSearchable<T>>;

/**
 * Comparison operators supported by predicates
 */
export type QueryOperator = "eq" | "lt" | "lte" | "gt" | "gte";

/**
 * Metadata carried in the artifact header
 */
export interface PakMetadata {
  name: string;
  description: string;
  author: string;
}

/**
 * Builder configuration
 */
export interface PakBuilderOptions {
  name?: string;
  description?: string;
  author?: string;
}

/**
 * Reader configuration
 */
export interface PakOpenOptions {
  /**
   * "eager" reads the whole file into memory on open; "lazy" reads byte ranges
   * from a file descriptor on demand (file sources only, default: "eager")
   */
  load?: "eager" | "lazy";
  /** Decode every index on open instead of on first use (default: false) */
  preloadIndexes?: boolean;
}

/**
 * Summary of one index from the directory
 */
export interface IndexDescription {
  key: string;
  /** Kind of the indexed values; undefined for an index with no entries */
  kind: PakValueKind | undefined;
  entryCount: number;
  byteLength: number;
}

/**
 * Artifact statistics
 */
export interface PakStats {
  formatVersion: number;
  size: number;
  dataLength: number;
  recordCount: number;
  indexes: IndexDescription[];
  /** Keys whose entry lists have been decoded so far */
  loadedIndexes: string[];
}
