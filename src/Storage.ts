import type {
  FileContent,
  StorageAdapter,
  WriteConfig,
} from "./adapter/StorageAdapter.js";

/**
 * Storage: the single entry point for file operations.
 *
 * Holds one adapter and forwards to it, so callers behave the same against
 * any backend. `append` and `prepend` are built from read and write; they
 * rewrite the whole file and are not atomic.
 */
export class Storage {
  constructor(private adapter: StorageAdapter) {}

  getAdapter(): StorageAdapter {
    return this.adapter;
  }

  exists(path: string): Promise<boolean> {
    return this.adapter.exists(path);
  }

  async missing(path: string): Promise<boolean> {
    return !(await this.adapter.exists(path));
  }

  read(path: string): Promise<string> {
    return this.adapter.read(path);
  }

  readBytes(path: string): Promise<Uint8Array> {
    return this.adapter.readBytes(path);
  }

  /**
   * @throws StorageError `already_exists` when the file exists and `config.overwrite` is not set.
   */
  write(path: string, content: FileContent, config: WriteConfig = {}): Promise<boolean> {
    return this.adapter.write(path, content, config);
  }

  /**
   * Appends `data` after the current content, joined by `separator`.
   * Creates the file with just `data` when it does not exist.
   */
  async append(path: string, data: string, separator = "\n"): Promise<boolean> {
    if (await this.exists(path)) {
      const current = await this.read(path);
      return this.write(path, current + separator + data, { overwrite: true });
    }

    return this.write(path, data);
  }

  /**
   * Prepends `data` before the current content, joined by `separator`.
   * Creates the file with just `data` when it does not exist.
   */
  async prepend(path: string, data: string, separator = "\n"): Promise<boolean> {
    if (await this.exists(path)) {
      const current = await this.read(path);
      return this.write(path, data + separator + current, { overwrite: true });
    }

    return this.write(path, data);
  }

  delete(path: string): Promise<boolean> {
    return this.adapter.delete(path);
  }

  size(path: string): Promise<number> {
    return this.adapter.size(path);
  }

  lastModified(path: string): Promise<number> {
    return this.adapter.lastModified(path);
  }

  /**
   * Absolute location of an existing file.
   *
   * @throws StorageError `not_found` when the file does not exist.
   */
  path(path: string): Promise<string> {
    return this.adapter.resolveAbsolutePath(path);
  }

  copy(from: string, to: string): Promise<boolean> {
    return this.adapter.copy(from, to);
  }

  move(from: string, to: string): Promise<boolean> {
    return this.adapter.move(from, to);
  }

  files(directory: string, recursive = false): Promise<string[]> {
    return this.adapter.listFiles(directory, recursive);
  }

  directories(directory: string, recursive = false): Promise<string[]> {
    return this.adapter.listDirectories(directory, recursive);
  }

  createDirectory(path: string): Promise<boolean> {
    return this.adapter.createDirectory(path);
  }

  deleteDirectory(path: string): Promise<boolean> {
    return this.adapter.deleteDirectory(path);
  }
}
