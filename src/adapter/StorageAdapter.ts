/**
 * Per-write options.
 *
 * Only `overwrite` is interpreted. Any other key is adapter metadata: the S3
 * adapter sends it as a request header (e.g. `Content-Type`, `x-amz-acl`), the
 * local adapter ignores it.
 */
export interface WriteConfig {
  overwrite?: boolean;
  [key: string]: string | boolean | undefined;
}

export type FileContent = string | Uint8Array;

/**
 * StorageAdapter: the operation set every backend implements.
 *
 * Paths are relative to the adapter's root (directory or bucket). Bad paths
 * and unmet preconditions throw a StorageError; routine I/O failures resolve
 * to `false`, `0`, `""` or `[]`.
 */
export interface StorageAdapter {
  /**
   * Short backend name used in log lines ("local", "s3").
   */
  readonly name: string;

  /**
   * Checks whether the resource exists. A missing resource is `false`, not an error.
   */
  exists(path: string): Promise<boolean>;

  /**
   * Reads the resource as UTF-8 text.
   *
   * @returns The content, or "" when the read fails.
   */
  read(path: string): Promise<string>;

  /**
   * Reads the resource as raw bytes.
   *
   * @returns The content, or an empty array when the read fails.
   */
  readBytes(path: string): Promise<Uint8Array>;

  /**
   * Creates or replaces the resource.
   *
   * @throws StorageError `already_exists` if the target exists and
   *   `config.overwrite` is not set.
   * @returns Whether the backend reported a successful write.
   */
  write(path: string, content: FileContent, config?: WriteConfig): Promise<boolean>;

  delete(path: string): Promise<boolean>;

  /**
   * Size in bytes.
   */
  size(path: string): Promise<number>;

  /**
   * Last modification time as a unix timestamp (seconds).
   */
  lastModified(path: string): Promise<number>;

  /**
   * Backend-meaningful locator for the resource: a filesystem path or the object key.
   *
   * @throws StorageError `not_found` when the resource does not exist.
   */
  resolveAbsolutePath(path: string): Promise<string>;

  /**
   * @returns `false` when `from` does not exist.
   */
  copy(from: string, to: string): Promise<boolean>;

  /**
   * Not atomic: a failure part-way can leave both source and destination.
   *
   * @returns `false` when `from` does not exist.
   */
  move(from: string, to: string): Promise<boolean>;

  listFiles(directory: string, recursive?: boolean): Promise<string[]>;

  listDirectories(directory: string, recursive?: boolean): Promise<string[]>;

  createDirectory(path: string): Promise<boolean>;

  deleteDirectory(path: string): Promise<boolean>;
}
