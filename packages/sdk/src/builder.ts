/**
 * Pak builder: accumulates records and index entries, then lays them out
 *
 * Invariants:
 * - Records are stored in insertion order; pointers never change once returned
 * - A failed pak()/pakNoSearch() call leaves the builder unchanged
 * - Identical call sequences produce byte-identical artifacts
 * - The builder is single-use: any finalize consumes it
 */

import { BuildError, EncodeError, IndexExtractionError, TypeMismatchError } from "./errors.js";
import {
  ByteWriter,
  encodeDirectory,
  encodeEntries,
  encodeFooter,
  encodeHeader,
  FORMAT_VERSION,
  type DirectoryEntry,
  type EncodedEntry,
} from "./format/layout.js";
import { compareEntries } from "./indexes.js";
import { atomicWrite } from "./io.js";
import { createPointer, typeTagOf } from "./pointer.js";
import { Pak } from "./reader.js";
import { validateKeyName, validateTypeName } from "./validation.js";
import { compareEncoded, encodeValue, kindOfEncoded } from "./value.js";
import type {
  PakBuilderOptions,
  PakCodec,
  PakMetadata,
  PakOpenOptions,
  PakRecordType,
  PakValueKind,
  Pointer,
} from "./types.js";
import { logger } from "./observability/logs.js";

interface IndexAccumulator {
  entries: EncodedEntry[];
  /** First kind seen and the type that produced it */
  kind: PakValueKind;
  typeName: string;
  /** First conflicting kind, reported at finalize */
  conflict?: { kind: PakValueKind; typeName: string };
}

const textEncoder = new TextEncoder();

export class PakBuilder {
  #chunks: Uint8Array[] = [];
  #size = 0;
  #count = 0;
  #indexes = new Map<string, IndexAccumulator>();
  #tags = new Map<bigint, string>();
  #meta: PakMetadata;
  #finalized = false;

  constructor(options: PakBuilderOptions = {}) {
    this.#meta = {
      name: options.name ?? "",
      description: options.description ?? "",
      author: options.author ?? "",
    };
  }

  /**
   * Bytes of record data packed so far
   */
  get size(): number {
    return this.#size;
  }

  /**
   * Number of records packed so far
   */
  get length(): number {
    return this.#count;
  }

  setName(name: string): this {
    this.#meta.name = name;
    return this;
  }

  setDescription(description: string): this {
    this.#meta.description = description;
    return this;
  }

  setAuthor(author: string): this {
    this.#meta.author = author;
    return this;
  }

  /**
   * Pack a record and, if its type is searchable, its index entries
   * @throws EncodeError if the codec fails
   * @throws IndexExtractionError if index extraction fails
   * @throws BuildError if the builder was finalized or the type tag collides
   */
  pak<T>(type: PakRecordType<T>, item: T): Pointer {
    return this.#append(type, item, true);
  }

  /**
   * Pack a record without extracting index entries
   */
  pakNoSearch<T>(type: PakCodec<T>, item: T): Pointer {
    return this.#append(type, item, false);
  }

  #append<T>(type: PakRecordType<T>, item: T, search: boolean): Pointer {
    this.#assertOpen();
    const typeTag = this.#tagFor(type.typeName);

    let bytes: Uint8Array;
    try {
      bytes = type.encode(item);
    } catch (err) {
      throw new EncodeError(type.typeName, { cause: err });
    }
    if (!(bytes instanceof Uint8Array)) {
      throw new EncodeError(type.typeName, {
        cause: new TypeError("encode() must return a Uint8Array"),
      });
    }

    const fields = search && type.indices ? this.#extract(type, item) : [];

    const pointer = createPointer(this.#size, bytes.length, typeTag);
    this.#chunks.push(bytes.slice());
    this.#size += bytes.length;
    this.#count++;
    this.#tags.set(typeTag, type.typeName);

    for (const { key, value } of fields) {
      const kind = kindOfEncoded(value);
      if (kind === undefined) continue;
      const acc = this.#indexes.get(key);
      if (!acc) {
        this.#indexes.set(key, { entries: [{ value, pointer }], kind, typeName: type.typeName });
        continue;
      }
      acc.entries.push({ value, pointer });
      if (kind !== acc.kind && !acc.conflict) {
        acc.conflict = { kind, typeName: type.typeName };
      }
    }

    return pointer;
  }

  /**
   * Run the extractor and encode every field before anything is mutated
   */
  #extract<T>(type: PakRecordType<T>, item: T): Array<{ key: string; value: Uint8Array }> {
    const out: Array<{ key: string; value: Uint8Array }> = [];
    let fields: Iterable<unknown>;
    try {
      fields = type.indices ? Array.from(type.indices(item)) : [];
    } catch (err) {
      throw new IndexExtractionError(type.typeName, "extractor threw", { cause: err });
    }

    for (const field of fields) {
      if (!Array.isArray(field) || field.length !== 2) {
        throw new IndexExtractionError(type.typeName, "each field must be a [key, value] pair");
      }
      const [rawKey, raw]: unknown[] = field;

      let key: string;
      try {
        key = validateKeyName(rawKey);
      } catch (err) {
        throw new IndexExtractionError(type.typeName, messageOf(err), { cause: err });
      }

      if (raw === null || raw === undefined) continue;
      const values: unknown[] = Array.isArray(raw) ? raw : [raw];
      for (const value of values) {
        if (
          typeof value !== "string" &&
          typeof value !== "number" &&
          typeof value !== "bigint" &&
          typeof value !== "boolean"
        ) {
          throw new IndexExtractionError(
            type.typeName,
            `value for key "${key}" is not a string, number, bigint or boolean`
          );
        }
        try {
          out.push({ key, value: encodeValue(value) });
        } catch (err) {
          throw new IndexExtractionError(
            type.typeName,
            `value for key "${key}" cannot be indexed`,
            { cause: err }
          );
        }
      }
    }
    return out;
  }

  #tagFor(typeName: string): bigint {
    try {
      validateTypeName(typeName);
    } catch (err) {
      throw new BuildError(messageOf(err), { cause: err });
    }
    const tag = typeTagOf(typeName);
    const existing = this.#tags.get(tag);
    if (existing !== undefined && existing !== typeName) {
      throw new BuildError(`Type names "${existing}" and "${typeName}" share type tag ${tag}`);
    }
    return tag;
  }

  #assertOpen(): void {
    if (this.#finalized) {
      throw new BuildError("Builder has already been finalized");
    }
  }

  /**
   * Lay out the artifact and consume the builder
   * @throws TypeMismatchError if one key received values of different kinds
   */
  finalizeToBuffer(): Uint8Array {
    this.#assertOpen();
    this.#finalized = true;

    const start = performance.now();

    for (const [key, acc] of this.#indexes) {
      if (acc.conflict) {
        throw new TypeMismatchError(
          `${acc.kind} (from "${acc.typeName}")`,
          `${acc.conflict.kind} (from "${acc.conflict.typeName}")`,
          `index "${key}"`
        );
      }
    }

    const header = encodeHeader(this.#meta);
    const dataOffset = header.length;
    const indexOffset = dataOffset + this.#size;

    const keys = [...this.#indexes.keys()].sort((a, b) =>
      compareEncoded(textEncoder.encode(a), textEncoder.encode(b))
    );

    const indexSegment = new ByteWriter();
    const directory: DirectoryEntry[] = [];
    for (const key of keys) {
      const acc = this.#indexes.get(key);
      if (!acc) continue;
      // equal (value, offset) pairs keep insertion order
      const sorted = [...acc.entries].sort(compareEntries);
      const bytes = encodeEntries(sorted);
      directory.push({
        key,
        indexOffset: indexOffset + indexSegment.length,
        indexLength: bytes.length,
        entryCount: sorted.length,
      });
      indexSegment.bytes(bytes);
    }

    const directoryOffset = indexOffset + indexSegment.length;
    const out = new ByteWriter()
      .bytes(header)
      .bytes(concat(this.#chunks, this.#size))
      .bytes(indexSegment.toBytes())
      .bytes(encodeDirectory(directory))
      .bytes(
        encodeFooter({
          dataOffset,
          dataLength: this.#size,
          indexOffset,
          directoryOffset,
          recordCount: this.#count,
          formatVersion: FORMAT_VERSION,
        })
      )
      .toBytes();

    this.#chunks = [];
    this.#indexes.clear();

    logger.info("pak.build.finalize", {
      details: {
        records: this.#count,
        dataBytes: this.#size,
        indexes: directory.length,
        totalBytes: out.length,
        durationMs: Number((performance.now() - start).toFixed(2)),
      },
    });

    return out;
  }

  /**
   * Finalize and open the artifact from memory
   */
  finalizeToMemory(options?: Omit<PakOpenOptions, "load">): Pak {
    return Pak.open(this.finalizeToBuffer(), options);
  }

  /**
   * Finalize, publish the artifact atomically at `filePath`, and open it
   * @throws BuildError if writing fails; no partial file is left behind
   */
  async finalizeToFile(filePath: string, options?: PakOpenOptions): Promise<Pak> {
    const bytes = this.finalizeToBuffer();
    await atomicWrite(filePath, bytes);
    return Pak.openFile(filePath, options);
  }
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function concat(chunks: readonly Uint8Array[], total: number): Uint8Array {
  const out = new Uint8Array(total);
  let pos = 0;
  for (const chunk of chunks) {
    out.set(chunk, pos);
    pos += chunk.length;
  }
  return out;
}
