/**
 * CLI error handling and exit code mapping
 */

import {
  ArtifactNotFoundError,
  DecodeError,
  FormatError,
  TypeMismatchError,
} from "@pakdb/sdk";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/IO/unknown error
 * - 2: artifact missing or invalid
 * - 3: record type mismatch or undecodable record
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof ArtifactNotFoundError || error instanceof FormatError) {
    return 2;
  }

  if (error instanceof TypeMismatchError || error instanceof DecodeError) {
    return 3;
  }

  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${formatCause(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}

function formatCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
