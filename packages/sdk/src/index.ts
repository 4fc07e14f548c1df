/**
 * pakdb SDK
 *
 * Immutable, file-backed object store: pack typed records once, open the
 * artifact, and look them up through sorted secondary indexes.
 */

export type {
  PakValue,
  PakValueKind,
  Pointer,
  PointerJSON,
  PakCodec,
  PakIndexField,
  PakSearchable,
  PakRecordType,
  QueryOperator,
  PakMetadata,
  PakBuilderOptions,
  PakOpenOptions,
  IndexDescription,
  PakStats,
} from "./types.js";

export { PakBuilder } from "./builder.js";
export { Pak } from "./reader.js";
export { PakIndex, compareEntries } from "./indexes.js";

export type { PakQuery, PredicateNode, AndNode, OrNode, IndexSource } from "./query.js";
export {
  predicate,
  equals,
  lessThan,
  lessThanOrEqual,
  greaterThan,
  greaterThanOrEqual,
  and,
  or,
  evaluateQuery,
  normalizePointers,
  intersectPointers,
  unionPointers,
  describeQuery,
  queryKeys,
} from "./query.js";
export { parseFilter, parseFilterJSON } from "./filter.js";

export type { JsonRecordOptions, JsonRecordType } from "./records.js";
export { jsonRecord, getPath } from "./records.js";
export { stableStringify } from "./format.js";

export {
  POINTER_SIZE,
  typeTagOf,
  formatTypeTag,
  createPointer,
  comparePointers,
  pointersEqual,
  pointerToJSON,
  pointerFromJSON,
} from "./pointer.js";
export { encodeValue, decodeValue, compareEncoded, kindOf, isPakValue, formatValue } from "./value.js";
export { FORMAT_VERSION, MAGIC } from "./format/layout.js";
export { validateKeyName, validateTypeName, MAX_NAME_BYTES } from "./validation.js";

export {
  PakError,
  BuildError,
  EncodeError,
  IndexExtractionError,
  FormatError,
  ArtifactNotFoundError,
  ArtifactReadError,
  TypeMismatchError,
  DecodeError,
  PointerOutOfBoundsError,
  PakClosedError,
  InvalidQueryError,
} from "./errors.js";

export type { LogLevel, LogEntry, LogSink } from "./observability/logs.js";
export { Logger, logger, resolveLogLevel } from "./observability/logs.js";
export type { IndexMetrics } from "./observability/metrics.js";
export { MetricsCollector, metrics } from "./observability/metrics.js";
