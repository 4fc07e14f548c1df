/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve an artifact or input path against the working directory
 */
export function resolveFile(file: string): string {
  return path.resolve(expandTilde(file));
}

/**
 * Default record type name for documents packed by the CLI
 */
export function defaultType(): string {
  return process.env.PAKDB_DEFAULT_TYPE || "document";
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.PAKDB_CLI_DEBUG === "1";
}

/**
 * Check if output is a TTY
 */
export function isTTY(): boolean {
  return process.stdout.isTTY ?? false;
}
