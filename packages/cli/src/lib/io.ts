/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { CliError } from "./errors.js";

/**
 * Read from stdin with size limit (default 64MB)
 * @param maxBytes - Maximum bytes to read
 * @throws Error if input exceeds size limit
 */
export async function readStdin(maxBytes = 64 * 1024 * 1024): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    let bytesRead = 0;
    process.stdin.setEncoding("utf8");

    process.stdin.on("data", (chunk: string) => {
      bytesRead += Buffer.byteLength(chunk, "utf8");

      // Enforce size limit during streaming to prevent memory exhaustion
      if (bytesRead > maxBytes) {
        process.stdin.pause();
        process.stdin.removeAllListeners();
        reject(new Error(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`));
        return;
      }

      data += chunk;
    });

    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", reject);
  });
}

/**
 * Read an input file, or stdin when the path is "-"
 */
export async function readInput(file: string): Promise<string> {
  if (file === "-") {
    if (isStdinTTY()) {
      throw new CliError("No input provided. Pipe JSON or NDJSON to stdin");
    }
    return await readStdin();
  }

  try {
    return await fs.readFile(file, "utf8");
  } catch (err) {
    throw new CliError(`Cannot read input ${file}`, { cause: err });
  }
}

/**
 * Write to stdout
 */
export function writeStdout(content: string): void {
  process.stdout.write(content);
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}
