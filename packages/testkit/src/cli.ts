/**
 * CLI testing utilities
 */

import { createRequire } from "node:module";
import { fileURLToPath, pathToFileURL } from "node:url";
import { execa } from "execa";

/**
 * Entry point of the pakdb CLI, run from its TypeScript source
 */
export const CLI_PATH = fileURLToPath(new URL("../../cli/src/cli.ts", import.meta.url));

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code (undefined if process was killed by signal) */
  exitCode: number | undefined;
}

/**
 * TypeScript loader, resolved from this package so it loads from any cwd
 */
const TSX_LOADER = pathToFileURL(createRequire(import.meta.url).resolve("tsx")).href;

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Current working directory */
  cwd?: string;
  /** Environment variables */
  env?: Record<string, string>;
  /** Input to pass to stdin */
  input?: string;
}

/**
 * Execute the CLI in a child process; non-zero exits resolve instead of rejecting
 * @param args - Command arguments
 * @param options - Execution options
 */
export async function runCli(args: string[], options: CliExecOptions = {}): Promise<CliResult> {
  const { cwd, env, input } = options;
  const result = await execa("node", ["--import", TSX_LOADER, CLI_PATH, ...args], {
    cwd,
    env: { PAKDB_LOG_LEVEL: "silent", ...env },
    input,
    reject: false,
    timeout: 30_000,
  });

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode,
  };
}

/**
 * Parse JSON output from CLI
 * @param stdout - Standard output from CLI
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
