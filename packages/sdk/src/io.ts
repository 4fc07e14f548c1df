/**
 * Artifact I/O: crash-safe publishing and byte sources for readers
 *
 * Invariants:
 * - Writes are atomic: never observe a partial artifact
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Sources hand out copies, never views into their backing storage
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { closeSync, fstatSync, openSync, readFileSync, readSync } from "node:fs";
import { dirname, basename, join } from "node:path";
import { ArtifactNotFoundError, ArtifactReadError, BuildError, PakClosedError } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

/**
 * Extract the errno code of a Node.js system error
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Atomically write an artifact using the write-rename-sync pattern
 * @param filePath - Target file path
 * @param bytes - Complete artifact
 * @throws BuildError if any step fails; the target is left untouched
 */
export async function atomicWrite(filePath: string, bytes: Uint8Array): Promise<void> {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  let fileHandle: fs.FileHandle | null = null;

  try {
    await fs.mkdir(dir, { recursive: true });

    fileHandle = await fs.open(tmp, "w", 0o644);
    await fileHandle.writeFile(bytes);

    // Sync file data to disk (prefer datasync for performance, fall back to sync)
    try {
      await fileHandle.datasync();
    } catch (err) {
      // ENOTSUP/ENOSYS: not supported on this platform
      // EINVAL: some CIFS/FUSE mounts report this instead
      const code = errnoCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);

    if (ENABLE_DIR_FSYNC) {
      await syncDirectory(dir);
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.write.close_failed", { message: String(closeErr) });
      });
    }

    await fs.unlink(tmp).catch((unlinkErr: unknown) => {
      // ENOENT: the temp file was never created or was already renamed
      if (errnoCode(unlinkErr) !== "ENOENT") {
        logger.warn("io.write.cleanup_failed", { message: `${tmp}: ${String(unlinkErr)}` });
      }
    });

    throw new BuildError(`Failed to write pak artifact: ${filePath}`, { cause: err });
  }
}

/**
 * fsync a directory so the rename is durable (best-effort)
 */
async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // Platforms without directory fsync report EINVAL, ENOTSUP or EBADF
    const code = errnoCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR") {
      logger.debug("io.dir_fsync.failed", { message: `${dir}: ${String(err)}` });
    }
  }
}

/**
 * Random-access byte source behind a reader
 */
export interface PakSource {
  /** Total size in bytes */
  readonly size: number;
  /**
   * Read an owned copy of a byte range
   * @throws RangeError if the range exceeds the source
   */
  read(offset: number, length: number): Uint8Array;
  close(): void;
}

/**
 * Source over bytes held in memory
 */
export class BufferSource implements PakSource {
  #bytes: Uint8Array | null;
  readonly size: number;

  constructor(bytes: Uint8Array) {
    this.#bytes = bytes;
    this.size = bytes.length;
  }

  read(offset: number, length: number): Uint8Array {
    if (!this.#bytes) throw new PakClosedError();
    checkRange(offset, length, this.size);
    // Buffer#slice returns a view; copy
    return new Uint8Array(this.#bytes.subarray(offset, offset + length));
  }

  close(): void {
    this.#bytes = null;
  }
}

/**
 * Source reading byte ranges from an open file descriptor on demand
 */
export class FileSource implements PakSource {
  #fd: number | null;
  readonly size: number;
  readonly path: string;

  private constructor(path: string, fd: number, size: number) {
    this.path = path;
    this.#fd = fd;
    this.size = size;
  }

  /**
   * Open a file for lazy reads
   * @throws ArtifactNotFoundError if the file does not exist
   * @throws ArtifactReadError for other failures
   */
  static open(filePath: string): FileSource {
    let fd: number;
    try {
      fd = openSync(filePath, "r");
    } catch (err) {
      throw toReadError(filePath, err);
    }

    try {
      return new FileSource(filePath, fd, fstatSync(fd).size);
    } catch (err) {
      closeSync(fd);
      throw toReadError(filePath, err);
    }
  }

  read(offset: number, length: number): Uint8Array {
    if (this.#fd === null) throw new PakClosedError();
    checkRange(offset, length, this.size);

    const out = new Uint8Array(length);
    let done = 0;
    try {
      while (done < length) {
        const n = readSync(this.#fd, out, done, length - done, offset + done);
        if (n === 0) {
          throw new RangeError(`Unexpected end of file at ${offset + done}`);
        }
        done += n;
      }
    } catch (err) {
      if (err instanceof RangeError) throw err;
      throw new ArtifactReadError(this.path, { cause: err });
    }
    return out;
  }

  close(): void {
    if (this.#fd !== null) {
      closeSync(this.#fd);
      this.#fd = null;
    }
  }
}

/**
 * Read a whole artifact file into memory
 * @throws ArtifactNotFoundError if the file does not exist
 * @throws ArtifactReadError for other failures
 */
export function readArtifact(filePath: string): Uint8Array {
  try {
    return readFileSync(filePath);
  } catch (err) {
    throw toReadError(filePath, err);
  }
}

function toReadError(filePath: string, err: unknown): ArtifactNotFoundError | ArtifactReadError {
  if (errnoCode(err) === "ENOENT") {
    return new ArtifactNotFoundError(filePath, { cause: err });
  }
  return new ArtifactReadError(filePath, { cause: err });
}

function checkRange(offset: number, length: number, size: number): void {
  if (offset < 0 || length < 0 || offset + length > size) {
    throw new RangeError(`Range [${offset}, +${length}) exceeds source of ${size} bytes`);
  }
}
