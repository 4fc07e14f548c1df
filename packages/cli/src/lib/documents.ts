/**
 * Record type for JSON documents packed by the CLI
 */

import { z } from "zod";
import { jsonRecord, type JsonRecordType } from "@pakdb/sdk";

/**
 * Any JSON document, stored as canonical JSON and indexed on the given dot-paths
 */
export function documentType(name: string, indices: readonly string[] = []): JsonRecordType<unknown> {
  return jsonRecord({ name, schema: z.unknown(), indices });
}
