import type { StorageAdapter } from "./adapter/StorageAdapter.js";

/**
 * Kinds of misuse an adapter reports by throwing.
 *
 * Routine I/O failures are not errors: they come back as `false`, `0` or empty content.
 */
export type StorageErrorKind =
  | "already_exists"
  | "not_found"
  | "invalid_path"
  | "path_traversal"
  | "invalid_directory"
  | "invalid_config";

/**
 * StorageError: raised for bad paths and unmet preconditions.
 *
 * Carries the adapter that raised it (when there is one), so callers can tell
 * which backend failed by looking at `adapter` and branch on `kind`.
 */
export class StorageError extends Error {
  readonly kind: StorageErrorKind;
  readonly adapter?: StorageAdapter;

  constructor(
    kind: StorageErrorKind,
    message: string,
    adapter?: StorageAdapter,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "StorageError";
    this.kind = kind;
    this.adapter = adapter;
  }
}

/**
 * Narrows an unknown value to a StorageError, optionally of a given kind.
 */
export function isStorageError(
  value: unknown,
  kind?: StorageErrorKind
): value is StorageError {
  if (!(value instanceof StorageError)) return false;

  return kind === undefined || value.kind === kind;
}
