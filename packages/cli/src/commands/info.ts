/**
 * pakdb info: describe an artifact
 */

import { Pak, type IndexDescription, type PakMetadata } from "@pakdb/sdk";
import { formatBytes } from "../lib/render.js";

export interface PakInfo extends PakMetadata {
  file: string;
  formatVersion: number;
  size: number;
  dataLength: number;
  records: number;
  indexes: IndexDescription[];
}

export function infoCommand(file: string): PakInfo {
  const pak = Pak.openFile(file, { load: "lazy" });
  try {
    const stats = pak.stats();
    return {
      file,
      ...pak.metadata,
      formatVersion: stats.formatVersion,
      size: stats.size,
      dataLength: stats.dataLength,
      records: stats.recordCount,
      indexes: stats.indexes,
    };
  } finally {
    pak.close();
  }
}

/**
 * Human-readable rendering of `infoCommand` output
 */
export function formatInfo(info: PakInfo): string[] {
  const lines = [
    `File: ${info.file}`,
    `Format version: ${info.formatVersion}`,
    `Size: ${formatBytes(info.size)}`,
    `Records: ${info.records} (${formatBytes(info.dataLength)})`,
  ];
  if (info.name) lines.push(`Name: ${info.name}`);
  if (info.description) lines.push(`Description: ${info.description}`);
  if (info.author) lines.push(`Author: ${info.author}`);

  if (info.indexes.length === 0) {
    lines.push("Indexes: none");
  } else {
    lines.push("Indexes:");
    for (const index of info.indexes) {
      lines.push(`  ${index.key}: ${index.entryCount} entries, ${index.kind ?? "empty"}`);
    }
  }
  return lines;
}
