import { promises as fs, type Dir } from "fs";
import * as path from "path";
import type { FileContent, StorageAdapter, WriteConfig } from "./StorageAdapter.js";
import { scopeLogger, type LoggerProvider } from "../logger/LoggerProvider.js";
import { ConsoleLogger } from "../logger/ConsoleLogger.js";
import { StorageError } from "../StorageError.js";
import { compareNames, normalizePath, trimSeparators } from "../utils/path.js";

export interface LocalAdapterOptions {
  logger?: LoggerProvider;
}

type WalkEntry = { path: string; isDirectory: boolean };

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * LocalAdapter: StorageAdapter implementation for a rooted local directory.
 *
 * Every caller path goes through `normalizePath` before any filesystem call,
 * so nothing outside the root is ever touched.
 */
export class LocalAdapter implements StorageAdapter {
  readonly name = "local";
  readonly root: string;
  private logger: LoggerProvider;

  constructor(root: string, options: LocalAdapterOptions = {}) {
    this.root = trimSeparators(root);
    this.logger = scopeLogger(options.logger ?? new ConsoleLogger(), this.name);
  }

  /**
   * Absolute location of a caller path under the root. Does not check existence.
   *
   * @throws StorageError `invalid_path` or `path_traversal`.
   */
  absolutePath(filePath: string): string {
    return `${this.root}/${normalizePath(filePath, this)}`;
  }

  async exists(filePath: string): Promise<boolean> {
    const abs = this.absolutePath(filePath);

    try {
      await fs.access(abs);
      return true;
    } catch {
      return false;
    }
  }

  async resolveAbsolutePath(filePath: string): Promise<string> {
    if (!(await this.exists(filePath))) {
      throw new StorageError("not_found", "File does not exist", this);
    }

    return this.absolutePath(filePath);
  }

  async read(filePath: string): Promise<string> {
    const abs = await this.resolveAbsolutePath(filePath);

    try {
      return await fs.readFile(abs, "utf-8");
    } catch (err) {
      this.logger.warn(`could not read ${abs}`, err);
      return "";
    }
  }

  async readBytes(filePath: string): Promise<Uint8Array> {
    const abs = await this.resolveAbsolutePath(filePath);

    try {
      return await fs.readFile(abs);
    } catch (err) {
      this.logger.warn(`could not read ${abs}`, err);
      return new Uint8Array();
    }
  }

  /**
   * Writes a file, creating missing parent directories.
   *
   * An empty write still creates the file but reports `false`: success means
   * a non-zero number of bytes was written.
   */
  async write(
    filePath: string,
    content: FileContent,
    config: WriteConfig = {}
  ): Promise<boolean> {
    if ((await this.exists(filePath)) && !config.overwrite) {
      throw new StorageError("already_exists", "File already exists", this);
    }

    const abs = this.absolutePath(filePath);
    const byteCount =
      typeof content === "string"
        ? Buffer.byteLength(content)
        : content.byteLength;

    try {
      await fs.mkdir(path.dirname(abs), { recursive: true });
      await fs.writeFile(abs, content);
    } catch (err) {
      this.logger.warn(`could not write ${abs}`, err);
      return false;
    }

    return byteCount > 0;
  }

  async delete(filePath: string): Promise<boolean> {
    const abs = await this.resolveAbsolutePath(filePath);

    try {
      await fs.unlink(abs);
      return true;
    } catch (err) {
      this.logger.warn(`could not delete ${abs}`, err);
      return false;
    }
  }

  async size(filePath: string): Promise<number> {
    const abs = await this.resolveAbsolutePath(filePath);

    try {
      return (await fs.stat(abs)).size;
    } catch (err) {
      this.logger.warn(`could not stat ${abs}`, err);
      return 0;
    }
  }

  async lastModified(filePath: string): Promise<number> {
    const abs = await this.resolveAbsolutePath(filePath);

    try {
      return Math.floor((await fs.stat(abs)).mtimeMs / 1000);
    } catch (err) {
      this.logger.warn(`could not stat ${abs}`, err);
      return 0;
    }
  }

  /**
   * Copies a file, replacing the destination if it exists.
   */
  async copy(from: string, to: string): Promise<boolean> {
    const source = this.absolutePath(from);
    const target = this.absolutePath(to);
    if (!(await this.exists(from))) return false;

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.copyFile(source, target);
      return true;
    } catch (err) {
      this.logger.warn(`could not copy ${source} to ${target}`, err);
      return false;
    }
  }

  /**
   * Renames the file. Across devices it falls back to copy then unlink.
   */
  async move(from: string, to: string): Promise<boolean> {
    const source = this.absolutePath(from);
    const target = this.absolutePath(to);
    if (!(await this.exists(from))) return false;

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.rename(source, target);
      return true;
    } catch (err) {
      if (errorCode(err) === "EXDEV") {
        return this.copyThenUnlink(source, target);
      }
      this.logger.warn(`could not move ${source} to ${target}`, err);
      return false;
    }
  }

  private async copyThenUnlink(source: string, target: string): Promise<boolean> {
    try {
      await fs.copyFile(source, target);
      await fs.unlink(source);
      return true;
    } catch (err) {
      this.logger.warn(`could not move ${source} to ${target}`, err);
      return false;
    }
  }

  /**
   * Lists files (every non-directory entry) as absolute paths.
   *
   * @param directory - Directory relative to the root.
   * @param recursive - Include files in nested directories.
   */
  async listFiles(directory: string, recursive = false): Promise<string[]> {
    return this.list(this.absolutePath(directory), false, recursive);
  }

  /**
   * Lists directories as absolute paths.
   *
   * @param directory - Directory relative to the root.
   * @param recursive - Include nested directories.
   */
  async listDirectories(directory: string, recursive = false): Promise<string[]> {
    return this.list(this.absolutePath(directory), true, recursive);
  }

  private async list(
    abs: string,
    directories: boolean,
    recursive: boolean
  ): Promise<string[]> {
    const result: string[] = [];

    for await (const entry of this.walk(abs, recursive)) {
      if (entry.isDirectory === directories) {
        result.push(entry.path);
      }
    }

    return result.sort(compareNames);
  }

  /**
   * Depth-first walk yielding each entry before its children. Directory
   * symlinks are reported as directories but not descended into.
   */
  private async *walk(
    dir: string,
    recursive: boolean
  ): AsyncGenerator<WalkEntry, void, unknown> {
    let dirHandle: Dir;
    try {
      dirHandle = await fs.opendir(dir);
    } catch (err) {
      this.logger.warn(`could not list ${dir}`, err);
      return;
    }

    // a read failing midway keeps the entries already yielded
    try {
      for await (const entry of dirHandle) {
        const full = path.join(dir, entry.name);
        const isDirectory =
          entry.isDirectory() ||
          (entry.isSymbolicLink() && (await this.isDirectory(full)));

        yield { path: full, isDirectory };

        if (recursive && entry.isDirectory()) {
          yield* this.walk(full, true);
        }
      }
    } catch (err) {
      this.logger.warn(`could not list ${dir}`, err);
    }
  }

  /**
   * Creates the directory and any missing parents.
   *
   * @returns `true` only when something was created.
   */
  async createDirectory(dirPath: string): Promise<boolean> {
    const abs = this.absolutePath(dirPath);

    try {
      const created = await fs.mkdir(abs, { recursive: true, mode: 0o755 });
      return created !== undefined;
    } catch (err) {
      this.logger.warn(`could not create ${abs}`, err);
      return false;
    }
  }

  /**
   * Removes an empty directory.
   *
   * @throws StorageError `invalid_directory` when the target is missing or not a directory.
   */
  async deleteDirectory(dirPath: string): Promise<boolean> {
    const abs = this.absolutePath(dirPath);
    if (!(await this.isDirectory(abs))) {
      throw new StorageError("invalid_directory", "Invalid directory", this);
    }

    try {
      await fs.rmdir(abs);
      return true;
    } catch (err) {
      this.logger.warn(`could not delete ${abs}`, err);
      return false;
    }
  }

  /**
   * Follows symlinks; a missing target or dangling link is not a directory.
   */
  private async isDirectory(abs: string): Promise<boolean> {
    try {
      return (await fs.stat(abs)).isDirectory();
    } catch {
      return false;
    }
  }
}
