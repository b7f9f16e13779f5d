import type { StorageAdapter } from "../adapter/StorageAdapter.js";
import { StorageError } from "../StorageError.js";

const CONTROL_CHARACTERS = /\p{C}/u;

/**
 * Turn a caller path into a traversal-free relative path.
 *
 * Backslashes count as separators. Empty and `.` segments are dropped and
 * `..` pops the previous segment.
 *
 * @param rawPath - Caller-supplied path.
 * @param adapter - Adapter reported on the thrown error.
 * @returns Segments joined with "/" ("" for the root itself).
 * @throws StorageError `invalid_path` on control or format characters,
 *   `path_traversal` when `..` would leave the root.
 */
export function normalizePath(rawPath: string, adapter?: StorageAdapter): string {
  const path = rawPath.replace(/\\/g, "/");

  if (CONTROL_CHARACTERS.test(path)) {
    throw new StorageError("invalid_path", "Invalid path", adapter);
  }

  const parts: string[] = [];
  for (const part of path.split("/")) {
    switch (part) {
      case "":
      case ".":
        break;
      case "..":
        if (parts.length === 0) {
          throw new StorageError(
            "path_traversal",
            "Directory traversal detected",
            adapter
          );
        }
        parts.pop();
        break;
      default:
        parts.push(part);
    }
  }

  return parts.join("/");
}

/**
 * Trim trailing separators ("/" and "\").
 */
export function trimSeparators(path: string): string {
  while (path.endsWith("/") || path.endsWith("\\")) {
    path = path.slice(0, -1);
  }

  return path;
}

/**
 * Case-insensitive ordering for listings. Ties between names that only differ
 * by case fall back to the raw strings, so the order is total.
 */
export function compareNames(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();

  if (la !== lb) return la < lb ? -1 : 1;
  if (a === b) return 0;

  return a < b ? -1 : 1;
}
