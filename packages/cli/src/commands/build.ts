/**
 * pakdb build: pack JSON or NDJSON documents into an artifact
 */

import { PakBuilder } from "@pakdb/sdk";
import { parseDocuments } from "../lib/arg.js";
import { documentType } from "../lib/documents.js";
import { CliError } from "../lib/errors.js";

export interface BuildOptions {
  /** Artifact path to write */
  output: string;
  /** Record type name for every document */
  type: string;
  /** Dot-paths to index */
  index: readonly string[];
  name?: string;
  description?: string;
  author?: string;
}

export interface BuildResult {
  output: string;
  records: number;
  size: number;
  indexes: string[];
}

/**
 * Pack every document of `text` and publish the artifact
 * @param text - JSON array or NDJSON
 * @param source - Input name for error messages
 */
export async function buildCommand(text: string, source: string, options: BuildOptions): Promise<BuildResult> {
  const docs = parseDocuments(text, source);
  const type = documentType(options.type, options.index);

  const builder = new PakBuilder({
    name: options.name,
    description: options.description,
    author: options.author,
  });

  docs.forEach((doc, i) => {
    try {
      builder.pak(type, doc);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new CliError(`Document ${i + 1} of ${source}: ${reason}`, { cause: err });
    }
  });

  const pak = await builder.finalizeToFile(options.output);
  try {
    return {
      output: options.output,
      records: pak.recordCount,
      size: pak.size,
      indexes: pak.keys(),
    };
  } finally {
    pak.close();
  }
}
