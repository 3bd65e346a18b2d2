import fs from "node:fs";
import fsp from "node:fs/promises";
import { ReadmeError, errorMessage } from "./errors.js";

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code == "string") {
    return err.code;
  }
  return undefined;
}

function getPathStats(path: string): fs.Stats | null {
  try {
    return fs.statSync(path);
  } catch (err) {
    const code = errorCode(err);
    if (code == "ENOENT" || code == "ENOTDIR") {
      return null;
    }
    if (code == "EACCES") {
      throw new ReadmeError("Permission denied while accessing path", `Path: ${path}`);
    }

    throw new ReadmeError("Filesystem error", errorMessage(err));
  }
}

export function fileExists(path: string): boolean {
  const stats = getPathStats(path);
  return stats ? stats.isFile() : false;
}

export function dirExists(path: string): boolean {
  const stats = getPathStats(path);
  return stats ? stats.isDirectory() : false;
}

/** Reads a UTF-8 file, or returns null when it is missing or unreadable. */
export async function readTextFile(path: string): Promise<string | null> {
  if (!fileExists(path)) return null;
  try {
    return await fsp.readFile(path, "utf-8");
  } catch {
    return null;
  }
}

/**
 * Map over items with at most `limit` calls in flight. Results keep the
 * order of `items`; the first rejection rejects the whole call.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  const workers = Math.max(1, Math.min(limit, items.length));
  let next = 0;

  const run = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: workers }, run));
  return results;
}
