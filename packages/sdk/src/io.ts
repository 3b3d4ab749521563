/**
 * Atomic file I/O operations for crash-safe writes
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Missing files throw FileNotFoundError
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import {
  FileNotFoundError,
  FileReadError,
  FileWriteError,
  DirectoryError,
  ListFilesError,
} from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @param dirPath - Directory path to create
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new DirectoryError(String(dirPath), {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - UTF-8 string or raw bytes
 */
export async function atomicWrite(filePath: string, content: string | Uint8Array): Promise<void> {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o644);
    await fileHandle.writeFile(content);

    // Prefer datasync, fall back to a full sync where it is unsupported
    try {
      await fileHandle.datasync();
    } catch (err) {
      const code = errorCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    // Atomic rename (last-writer-wins for concurrent writes)
    try {
      await fs.rename(tmp, filePath);
    } catch (err) {
      // On Windows, rename may fail transiently when antivirus or indexing grabs the file
      const code = errorCode(err);
      if ((code === "EPERM" || code === "EACCES" || code === "EBUSY") && process.platform === "win32") {
        await new Promise((resolve) => setTimeout(resolve, 10));
        await fs.rename(tmp, filePath);
      } else {
        throw err;
      }
    }

    if (ENABLE_DIR_FSYNC) {
      try {
        const dirHandle = await fs.open(dir, "r");
        try {
          await dirHandle.sync();
        } finally {
          await dirHandle.close();
        }
      } catch (err) {
        const code = errorCode(err);
        if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF") {
          logger.debug("io.fsync.dir", {
            message: `Directory fsync failed for ${dir}`,
            details: { code },
          });
        }
      }
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch(() => undefined);
    }

    // Temp file may not exist
    await fs.unlink(tmp).catch(() => undefined);

    throw new FileWriteError(filePath, { cause: err });
  }
}

/**
 * Read a file as raw bytes
 * @throws FileNotFoundError if file doesn't exist
 * @throws FileReadError for other read failures
 */
export async function readBytes(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      throw new FileNotFoundError(filePath, { cause: err });
    }
    throw new FileReadError(filePath, { cause: err });
  }
}

/**
 * Read a file as UTF-8 text
 * @throws FileNotFoundError if file doesn't exist
 * @throws FileReadError for other read failures
 */
export async function readText(filePath: string): Promise<string> {
  const bytes = await readBytes(filePath);
  return bytes.toString("utf-8");
}

/**
 * List files in a directory, optionally filtering by extension
 * @param dirPath - Directory path to list
 * @param extension - Optional file extension to filter by (e.g., ".json")
 * @returns Sorted array of filenames (not full paths)
 */
export async function listFiles(dirPath: string, extension?: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });

    let files = entries
      .filter((entry) => entry.isFile() && !entry.isSymbolicLink())
      .map((entry) => entry.name);

    if (extension) {
      const ext = extension.startsWith(".") ? extension : `.${extension}`;
      files = files.filter((name) => name.endsWith(ext));
    }

    // Sorted for determinism
    return files.sort();
  } catch (err) {
    // Missing directory lists as empty
    if (errorCode(err) === "ENOENT") {
      return [];
    }

    throw new ListFilesError(dirPath, { cause: err });
  }
}

/**
 * Check whether a path is an existing directory
 */
export async function isDirectory(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isDirectory();
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return false;
    }
    throw new FileReadError(targetPath, { cause: err });
  }
}
