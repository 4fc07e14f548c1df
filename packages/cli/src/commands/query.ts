/**
 * pakdb query: evaluate a filter document against an artifact
 */

import { Pak, parseFilterJSON, pointerToJSON, queryKeys, type PointerJSON } from "@pakdb/sdk";
import { documentType } from "../lib/documents.js";

export interface QueryOptions {
  /** Filter document as JSON text */
  filter: string;
  type: string;
  limit?: number;
  /** Skip decoding; `documents` is left empty */
  pointers?: boolean;
}

export interface QueryResult {
  /** Index keys the filter referenced */
  keys: string[];
  /** Matches in offset order, after the limit */
  pointers: PointerJSON[];
  /** Decoded matches; empty when only pointers were asked for */
  documents: unknown[];
}

/**
 * Match documents of one record type
 * @throws InvalidQueryError for a malformed filter
 * @throws TypeMismatchError if a match belongs to another record type
 */
export function queryCommand(file: string, options: QueryOptions): QueryResult {
  const query = parseFilterJSON(options.filter);
  const type = documentType(options.type);

  const pak = Pak.openFile(file);
  try {
    const matches = pak.queryPointers(query);
    const pointers = options.limit === undefined ? matches : matches.slice(0, options.limit);
    return {
      keys: queryKeys(query),
      pointers: pointers.map(pointerToJSON),
      documents: options.pointers ? [] : pointers.map((pointer) => pak.get(type, pointer)),
    };
  } finally {
    pak.close();
  }
}
