/**
 * Pak reader: opens a finalized artifact, resolves pointers and runs queries
 *
 * Invariants:
 * - Open either validates the whole frame (header, footer, directory) or fails
 * - Index entry lists are decoded on first use unless preloaded
 * - get() always returns a freshly decoded value, never a view of the source
 * - query() fails as a whole; there are no partial results
 */

import {
  DecodeError,
  FormatError,
  PakClosedError,
  PointerOutOfBoundsError,
  TypeMismatchError,
} from "./errors.js";
import {
  decodeDirectory,
  decodeEntries,
  decodeFooter,
  decodeHeaderPrefix,
  decodeMetadata,
  FOOTER_SIZE,
  HEADER_FIXED_SIZE,
  type DirectoryEntry,
  type Footer,
} from "./format/layout.js";
import { PakIndex } from "./indexes.js";
import { BufferSource, FileSource, readArtifact, type PakSource } from "./io.js";
import { formatTypeTag, typeTagOf } from "./pointer.js";
import { describeQuery, evaluateQuery, type IndexSource, type PakQuery } from "./query.js";
import type {
  IndexDescription,
  PakCodec,
  PakMetadata,
  PakOpenOptions,
  PakStats,
  Pointer,
} from "./types.js";
import { logger } from "./observability/logs.js";

/** Smallest possible entry: u32 length, one kind byte, 24-byte pointer */
const MIN_ENTRY_SIZE = 4 + 1 + 24;

export class Pak implements IndexSource {
  #source: PakSource;
  #footer: Footer;
  #meta: PakMetadata;
  #directory: Map<string, DirectoryEntry>;
  #indexes = new Map<string, PakIndex>();
  #closed = false;

  private constructor(
    source: PakSource,
    footer: Footer,
    meta: PakMetadata,
    directory: Map<string, DirectoryEntry>
  ) {
    this.#source = source;
    this.#footer = footer;
    this.#meta = meta;
    this.#directory = directory;
  }

  /**
   * Open an artifact held in memory. The bytes are copied.
   * @throws FormatError if the artifact is invalid
   */
  static open(bytes: Uint8Array, options: Omit<PakOpenOptions, "load"> = {}): Pak {
    return Pak.#fromSource(new BufferSource(new Uint8Array(bytes)), options);
  }

  /**
   * Open an artifact file
   * @throws ArtifactNotFoundError if the file does not exist
   * @throws FormatError if the artifact is invalid
   */
  static openFile(filePath: string, options: PakOpenOptions = {}): Pak {
    const source =
      options.load === "lazy" ? FileSource.open(filePath) : new BufferSource(readArtifact(filePath));
    return Pak.#fromSource(source, options);
  }

  static #fromSource(source: PakSource, options: Omit<PakOpenOptions, "load">): Pak {
    const start = performance.now();
    let pak: Pak;
    try {
      pak = new Pak(source, ...Pak.#readFrame(source));
      if (options.preloadIndexes) {
        for (const key of pak.keys()) {
          pak.index(key)?.load();
        }
      }
    } catch (err) {
      source.close();
      logger.warn("pak.open.failed", { message: err instanceof Error ? err.message : String(err) });
      throw err;
    }

    logger.debug("pak.open", {
      details: {
        size: source.size,
        records: pak.recordCount,
        indexes: pak.#directory.size,
        durationMs: Number((performance.now() - start).toFixed(2)),
      },
    });
    return pak;
  }

  /**
   * Read and validate header, footer and directory
   */
  static #readFrame(source: PakSource): [Footer, PakMetadata, Map<string, DirectoryEntry>] {
    const size = source.size;
    if (size < HEADER_FIXED_SIZE + FOOTER_SIZE) {
      throw new FormatError(`truncated artifact of ${size} bytes`);
    }

    const { formatVersion, metaLength } = decodeHeaderPrefix(source.read(0, HEADER_FIXED_SIZE));
    const headerLength = HEADER_FIXED_SIZE + metaLength;
    if (headerLength + FOOTER_SIZE > size) {
      throw new FormatError(`metadata of ${metaLength} bytes exceeds artifact of ${size} bytes`);
    }
    const meta = decodeMetadata(source.read(HEADER_FIXED_SIZE, metaLength));

    const footerOffset = size - FOOTER_SIZE;
    const footer = decodeFooter(source.read(footerOffset, FOOTER_SIZE), footerOffset);

    if (footer.formatVersion !== formatVersion) {
      throw new FormatError(
        `footer version ${footer.formatVersion} does not match header version ${formatVersion}`
      );
    }
    if (footer.dataOffset !== headerLength) {
      throw new FormatError(`data offset ${footer.dataOffset} does not follow the header`);
    }
    if (footer.indexOffset !== footer.dataOffset + footer.dataLength) {
      throw new FormatError(`index segment offset ${footer.indexOffset} does not follow the data`);
    }
    if (footer.directoryOffset < footer.indexOffset || footer.directoryOffset > footerOffset) {
      throw new FormatError(`directory offset ${footer.directoryOffset} is out of range`);
    }

    const entries = decodeDirectory(
      source.read(footer.directoryOffset, footerOffset - footer.directoryOffset),
      footer.directoryOffset
    );

    const directory = new Map<string, DirectoryEntry>();
    for (const entry of entries) {
      if (directory.has(entry.key)) {
        throw new FormatError(`duplicate index key "${entry.key}"`);
      }
      const end = entry.indexOffset + entry.indexLength;
      if (entry.indexOffset < footer.indexOffset || end > footer.directoryOffset) {
        throw new FormatError(`index "${entry.key}" lies outside the index segment`);
      }
      if (entry.entryCount * MIN_ENTRY_SIZE > entry.indexLength) {
        throw new FormatError(
          `index "${entry.key}" declares ${entry.entryCount} entries in ${entry.indexLength} bytes`
        );
      }
      directory.set(entry.key, entry);
    }

    return [footer, meta, directory];
  }

  #read(offset: number, length: number): Uint8Array {
    if (this.#closed) throw new PakClosedError();
    return this.#source.read(offset, length);
  }

  get name(): string {
    return this.#meta.name;
  }

  get description(): string {
    return this.#meta.description;
  }

  get author(): string {
    return this.#meta.author;
  }

  get metadata(): PakMetadata {
    return { ...this.#meta };
  }

  get formatVersion(): number {
    return this.#footer.formatVersion;
  }

  /**
   * Size of the artifact in bytes
   */
  get size(): number {
    return this.#source.size;
  }

  get dataLength(): number {
    return this.#footer.dataLength;
  }

  get recordCount(): number {
    return this.#footer.recordCount;
  }

  /**
   * Indexed key names in directory order
   */
  keys(): string[] {
    return [...this.#directory.keys()];
  }

  /**
   * Get the index for a key
   * @returns Index, or undefined if no record was indexed under the key
   */
  index(key: string): PakIndex | undefined {
    const cached = this.#indexes.get(key);
    if (cached) return cached;

    const entry = this.#directory.get(key);
    if (!entry) return undefined;

    const index = new PakIndex(
      { key, entryCount: entry.entryCount, byteLength: entry.indexLength },
      () =>
        decodeEntries(
          this.#read(entry.indexOffset, entry.indexLength),
          entry.entryCount,
          entry.indexOffset
        )
    );
    this.#indexes.set(key, index);
    return index;
  }

  /**
   * Summarize one index
   */
  describeIndex(key: string): IndexDescription | undefined {
    const index = this.index(key);
    if (!index) return undefined;
    return {
      key,
      kind: index.kind,
      entryCount: index.entryCount,
      byteLength: index.byteLength,
    };
  }

  /**
   * Artifact statistics; describing the indexes decodes any not loaded yet
   */
  stats(): PakStats {
    const loadedIndexes = [...this.#indexes.values()].filter((i) => i.loaded).map((i) => i.key);
    const indexes: IndexDescription[] = [];
    for (const key of this.keys()) {
      const description = this.describeIndex(key);
      if (description) indexes.push(description);
    }
    return {
      formatVersion: this.formatVersion,
      size: this.size,
      dataLength: this.dataLength,
      recordCount: this.recordCount,
      indexes,
      loadedIndexes,
    };
  }

  /**
   * Decode the record a pointer refers to
   * @throws PointerOutOfBoundsError if the pointer lies outside the data segment
   * @throws TypeMismatchError if the pointer's tag is not the tag of `type`
   * @throws DecodeError if the codec rejects the bytes
   */
  get<T>(type: PakCodec<T>, pointer: Pointer): T {
    const { offset, length } = pointer;
    const dataLength = this.#footer.dataLength;
    if (
      !Number.isSafeInteger(offset) ||
      !Number.isSafeInteger(length) ||
      offset < 0 ||
      length < 0 ||
      offset + length > dataLength
    ) {
      throw new PointerOutOfBoundsError(offset, length, dataLength);
    }

    const expected = typeTagOf(type.typeName);
    if (pointer.typeTag !== expected) {
      throw new TypeMismatchError(
        `"${type.typeName}" (tag ${formatTypeTag(expected)})`,
        `tag ${formatTypeTag(pointer.typeTag)}`,
        `pointer at offset ${offset}`
      );
    }

    const bytes = this.#read(this.#footer.dataOffset + offset, length);
    try {
      return type.decode(bytes);
    } catch (err) {
      throw new DecodeError(type.typeName, { cause: err });
    }
  }

  /**
   * Evaluate a query to its pointer set
   * @returns Duplicate-free pointers sorted by offset
   */
  queryPointers(query: PakQuery): Pointer[] {
    if (this.#closed) throw new PakClosedError();

    const start = performance.now();
    const pointers = evaluateQuery(query, this);
    logger.debug("pak.query", {
      message: describeQuery(query),
      details: {
        matches: pointers.length,
        durationMs: Number((performance.now() - start).toFixed(2)),
      },
    });
    return pointers;
  }

  /**
   * Evaluate a query and decode every match as `type`, in offset order
   * @throws TypeMismatchError if any match is not a `type` record
   */
  query<T>(type: PakCodec<T>, query: PakQuery): T[] {
    return this.queryPointers(query).map((pointer) => this.get(type, pointer));
  }

  /**
   * Evaluate a query and split the matches by record type.
   * Matches whose tag belongs to none of the types are skipped.
   */
  queryGroup<A>(query: PakQuery, a: PakCodec<A>): [A[]];
  queryGroup<A, B>(query: PakQuery, a: PakCodec<A>, b: PakCodec<B>): [A[], B[]];
  queryGroup<A, B, C>(
    query: PakQuery,
    a: PakCodec<A>,
    b: PakCodec<B>,
    c: PakCodec<C>
  ): [A[], B[], C[]];
  queryGroup<A, B, C, D>(
    query: PakQuery,
    a: PakCodec<A>,
    b: PakCodec<B>,
    c: PakCodec<C>,
    d: PakCodec<D>
  ): [A[], B[], C[], D[]];
  queryGroup(query: PakQuery, ...types: PakCodec<unknown>[]): unknown[][] {
    const slots = new Map<bigint, number>();
    types.forEach((type, i) => {
      const tag = typeTagOf(type.typeName);
      if (!slots.has(tag)) slots.set(tag, i);
    });

    const groups = types.map((): unknown[] => []);
    for (const pointer of this.queryPointers(query)) {
      const slot = slots.get(pointer.typeTag);
      if (slot === undefined) continue;
      groups[slot].push(this.get(types[slot], pointer));
    }
    return groups;
  }

  /**
   * Release the underlying source; later reads fail with PakClosedError
   */
  close(): void {
    if (this.#closed) return;
    this.#closed = true;
    this.#source.close();
  }
}
