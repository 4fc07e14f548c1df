/**
 * Secondary indexes: sorted (encoded value, pointer) entries per key
 *
 * Invariants:
 * - Entries are sorted by encoded value, ties by pointer offset
 * - All entries of one index share a value kind
 * - Lookups return pointers in stored order
 * - Entry lists are decoded at most once per index instance
 */

import { FormatError, InvalidQueryError, TypeMismatchError } from "./errors.js";
import type { EncodedEntry } from "./format/layout.js";
import { compareEncoded, encodeValue, kindOf, kindOfEncoded } from "./value.js";
import type { PakValue, PakValueKind, Pointer, QueryOperator } from "./types.js";
import { metrics } from "./observability/metrics.js";
import { logger } from "./observability/logs.js";

/**
 * Order entries by encoded value, then pointer offset
 */
export function compareEntries(a: EncodedEntry, b: EncodedEntry): number {
  return compareEncoded(a.value, b.value) || a.pointer.offset - b.pointer.offset;
}

/**
 * Metadata about an index taken from the artifact directory
 */
export interface IndexMetadata {
  key: string;
  entryCount: number;
  byteLength: number;
}

/**
 * One secondary index
 */
export class PakIndex {
  readonly key: string;
  readonly entryCount: number;
  readonly byteLength: number;
  #load: () => EncodedEntry[];
  #entries: EncodedEntry[] | null = null;
  #kind: PakValueKind | undefined;

  /**
   * @param meta - Directory information for the index
   * @param load - Decodes the entry list; called on first use
   */
  constructor(meta: IndexMetadata, load: () => EncodedEntry[]) {
    this.key = meta.key;
    this.entryCount = meta.entryCount;
    this.byteLength = meta.byteLength;
    this.#load = load;
  }

  /**
   * Whether the entry list has been decoded
   */
  get loaded(): boolean {
    return this.#entries !== null;
  }

  /**
   * Kind of the indexed values (undefined when the index is empty)
   */
  get kind(): PakValueKind | undefined {
    this.#ensureLoaded();
    return this.#kind;
  }

  /**
   * Decode the entry list now instead of on first lookup
   */
  load(): this {
    this.#ensureLoaded();
    return this;
  }

  /**
   * Copies of the sorted entries
   */
  entries(): EncodedEntry[] {
    return this.#ensureLoaded().map((e) => ({ value: e.value.slice(), pointer: e.pointer }));
  }

  #ensureLoaded(): EncodedEntry[] {
    if (this.#entries) return this.#entries;

    const start = performance.now();
    const entries = this.#load();
    if (entries.length !== this.entryCount) {
      throw new FormatError(
        `index "${this.key}" declares ${this.entryCount} entries but holds ${entries.length}`
      );
    }

    const kind = entries.length > 0 ? kindOfEncoded(entries[0].value) : undefined;
    if (entries.length > 0 && kind === undefined) {
      throw new FormatError(`index "${this.key}" has an unknown value kind`);
    }
    for (let i = 1; i < entries.length; i++) {
      if (kindOfEncoded(entries[i].value) !== kind) {
        throw new FormatError(`index "${this.key}" mixes value kinds`);
      }
      if (compareEntries(entries[i - 1], entries[i]) > 0) {
        throw new FormatError(`index "${this.key}" is not sorted`);
      }
    }

    this.#entries = entries;
    this.#kind = kind;

    const duration = performance.now() - start;
    metrics.recordLoad(this.key, duration);
    logger.debug("pak.index.load", {
      key: this.key,
      details: { entries: entries.length, kind, durationMs: Number(duration.toFixed(2)) },
    });
    return entries;
  }

  /**
   * Pointers of entries whose value satisfies `operator value`
   * @throws TypeMismatchError if the value kind differs from the index kind
   */
  lookup(operator: QueryOperator, value: PakValue): Pointer[] {
    return operator === "eq" ? this.lookupEq(value) : this.lookupRange(operator, value);
  }

  /**
   * Pointers of entries equal to `value`, in stored (offset) order. O(log n + k)
   */
  lookupEq(value: PakValue): Pointer[] {
    return this.#timed(() => {
      const encoded = this.#encodeQueryValue(value);
      if (encoded === null) return [];
      return this.#slice(this.#lowerBound(encoded), this.#upperBound(encoded));
    });
  }

  /**
   * Pointers of entries on one side of `value`, in stored order. O(log n + k)
   */
  lookupRange(operator: Exclude<QueryOperator, "eq">, value: PakValue): Pointer[] {
    return this.#timed(() => {
      const encoded = this.#encodeQueryValue(value);
      if (encoded === null) return [];
      const n = this.#ensureLoaded().length;

      switch (operator) {
        case "lt":
          return this.#slice(0, this.#lowerBound(encoded));
        case "lte":
          return this.#slice(0, this.#upperBound(encoded));
        case "gt":
          return this.#slice(this.#upperBound(encoded), n);
        case "gte":
          return this.#slice(this.#lowerBound(encoded), n);
      }
    });
  }

  #timed(fn: () => Pointer[]): Pointer[] {
    const start = performance.now();
    const result = fn();
    metrics.recordLookup(this.key, result.length, performance.now() - start);
    return result;
  }

  /**
   * Encode a query value after checking its kind
   * @returns Encoding, or null when the index is empty
   */
  #encodeQueryValue(value: PakValue): Uint8Array | null {
    const kind = this.kind;
    if (kind === undefined) return null;

    let actual: PakValueKind;
    try {
      actual = kindOf(value);
    } catch (err) {
      throw new InvalidQueryError(`value for key "${this.key}" is not indexable`, { cause: err });
    }
    if (actual !== kind) {
      throw new TypeMismatchError(kind, actual, `index "${this.key}"`);
    }

    try {
      return encodeValue(value);
    } catch (err) {
      throw new InvalidQueryError(`value for key "${this.key}" cannot be encoded`, { cause: err });
    }
  }

  /** First position whose value is >= encoded */
  #lowerBound(encoded: Uint8Array): number {
    const entries = this.#ensureLoaded();
    let lo = 0;
    let hi = entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (compareEncoded(entries[mid].value, encoded) < 0) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  /** First position whose value is > encoded */
  #upperBound(encoded: Uint8Array): number {
    const entries = this.#ensureLoaded();
    let lo = 0;
    let hi = entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (compareEncoded(entries[mid].value, encoded) <= 0) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  #slice(from: number, to: number): Pointer[] {
    const entries = this.#ensureLoaded();
    const out: Pointer[] = [];
    for (let i = from; i < to; i++) {
      out.push(entries[i].pointer);
    }
    return out;
  }
}
