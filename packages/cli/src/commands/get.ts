/**
 * pakdb get: dereference one pointer
 */

import { Pak, pointerFromJSON, typeTagOf, formatTypeTag, type Pointer } from "@pakdb/sdk";
import { documentType } from "../lib/documents.js";
import { CliError } from "../lib/errors.js";

export interface GetOptions {
  type: string;
  /** Pointer type tag as 16 hex digits (default: the tag of `type`) */
  tag?: string;
}

/**
 * Decode the document at [offset, offset + length) of the data segment
 * @throws TypeMismatchError if `tag` names another record type
 */
export function getCommand(file: string, offset: number, length: number, options: GetOptions): unknown {
  const pointer = pointerFor(offset, length, options);
  const pak = Pak.openFile(file, { load: "lazy" });
  try {
    return pak.get(documentType(options.type), pointer);
  } finally {
    pak.close();
  }
}

function pointerFor(offset: number, length: number, options: GetOptions): Pointer {
  try {
    return pointerFromJSON({
      offset,
      length,
      typeTag: options.tag?.toLowerCase() ?? formatTypeTag(typeTagOf(options.type)),
    });
  } catch (err) {
    throw new CliError(err instanceof Error ? err.message : String(err), { cause: err });
  }
}
