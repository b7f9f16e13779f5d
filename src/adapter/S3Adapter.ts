import type { FileContent, StorageAdapter, WriteConfig } from "./StorageAdapter.js";
import type {
  ObjectStoreClient,
  ObjectStoreResponse,
} from "../client/ObjectStoreClient.js";
import type { CacheProvider } from "../cache/CacheProvider.js";
import { InMemoryCacheProvider } from "../cache/InMemoryCacheProvider.js";
import { scopeLogger, type LoggerProvider } from "../logger/LoggerProvider.js";
import { ConsoleLogger } from "../logger/ConsoleLogger.js";
import { StorageError } from "../StorageError.js";
import { cacheAsyncFunc, toCacheKey } from "../utils/cache.js";

export interface S3AdapterOptions {
  /**
   * Metadata cache, keyed by the MD5 digest of the object key. Defaults to an
   * unbounded in-memory map owned by this adapter.
   */
  cache?: CacheProvider<ObjectStoreResponse>;
  logger?: LoggerProvider;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const isFound = (response: ObjectStoreResponse): boolean =>
  response.error === null && response.code === 200;

function headerValue(
  headers: Record<string, string>,
  name: string
): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

/**
 * S3Adapter: StorageAdapter implementation for an S3-compatible bucket.
 *
 * Keys are used verbatim. Successful metadata probes are cached for the life
 * of the instance; a probe that finds nothing is repeated on the next call.
 * Writes and deletes through this adapter drop the cached entry for their key.
 *
 * The bucket has no directories: listings are empty and directory operations
 * return `false`.
 */
export class S3Adapter implements StorageAdapter {
  readonly name = "s3";
  private cache: CacheProvider<ObjectStoreResponse>;
  private logger: LoggerProvider;
  private probe: (
    key: string
  ) => Promise<{ value: ObjectStoreResponse; cached: boolean }>;

  constructor(
    readonly bucket: string,
    private client: ObjectStoreClient,
    options: S3AdapterOptions = {}
  ) {
    this.cache = options.cache ?? new InMemoryCacheProvider();
    this.logger = scopeLogger(options.logger ?? new ConsoleLogger(), this.name);
    this.probe = cacheAsyncFunc(
      (key: string) => this.client.getObjectInfo(this.bucket, key),
      toCacheKey,
      this.cache,
      isFound
    );
  }

  /**
   * Metadata for an existing object, or `null` when it is missing or the probe failed.
   */
  async getMetadata(key: string): Promise<ObjectStoreResponse | null> {
    const { value, cached } = await this.probe(key);
    this.logger.debug(`metadata ${cached ? "hit" : "probe"} ${key}`);

    return isFound(value) ? value : null;
  }

  async exists(key: string): Promise<boolean> {
    return (await this.getMetadata(key)) !== null;
  }

  async read(key: string): Promise<string> {
    return decoder.decode(await this.readBytes(key));
  }

  async readBytes(key: string): Promise<Uint8Array> {
    const response = await this.client.getObject(this.bucket, key);
    if (response.error !== null) {
      this.logger.warn(`could not read ${key}`, response.error);
      return new Uint8Array();
    }

    return response.body;
  }

  /**
   * Uploads the object. Config keys other than `overwrite` become request headers.
   */
  async write(
    key: string,
    content: FileContent,
    config: WriteConfig = {}
  ): Promise<boolean> {
    const { overwrite, ...metadata } = config;
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(metadata)) {
      if (value !== undefined) headers[name] = String(value);
    }

    if ((await this.exists(key)) && !overwrite) {
      throw new StorageError("already_exists", "File already exists", this);
    }

    const body = typeof content === "string" ? encoder.encode(content) : content;
    const response = await this.client.putObject(this.bucket, key, body, headers);
    if (response.error !== null) {
      this.logger.warn(`could not write ${key}`, response.error);
      return false;
    }

    await this.cache.delete(toCacheKey(key));
    return true;
  }

  async delete(key: string): Promise<boolean> {
    const response = await this.client.deleteObject(this.bucket, key);
    if (response.error !== null) {
      this.logger.warn(`could not delete ${key}`, response.error);
      return false;
    }

    await this.cache.delete(toCacheKey(key));
    return true;
  }

  /**
   * Content-Length of the object, 0 when unknown.
   */
  async size(key: string): Promise<number> {
    const metadata = await this.getMetadata(key);
    const raw = metadata ? headerValue(metadata.headers, "Content-Length") : undefined;
    if (raw === undefined) return 0;

    const size = Number.parseInt(raw, 10);
    return Number.isNaN(size) ? 0 : size;
  }

  /**
   * Last-Modified of the object as a unix timestamp, 0 when unknown.
   */
  async lastModified(key: string): Promise<number> {
    const metadata = await this.getMetadata(key);
    const raw = metadata ? headerValue(metadata.headers, "Last-Modified") : undefined;
    if (raw === undefined) return 0;

    const time = Date.parse(raw);
    return Number.isNaN(time) ? 0 : Math.floor(time / 1000);
  }

  async resolveAbsolutePath(key: string): Promise<string> {
    if (!(await this.exists(key))) {
      throw new StorageError("not_found", "File does not exist", this);
    }

    return key;
  }

  /**
   * Downloads the source and uploads it under the new key. Without the
   * overwrite option, so an existing destination raises `already_exists`.
   */
  async copy(from: string, to: string): Promise<boolean> {
    if (!(await this.exists(from))) return false;

    return this.write(to, await this.readBytes(from));
  }

  /**
   * Copy, then delete the source once the copy has succeeded.
   */
  async move(from: string, to: string): Promise<boolean> {
    if (!(await this.copy(from, to))) return false;

    return this.delete(from);
  }

  async listFiles(_directory: string, _recursive = false): Promise<string[]> {
    return [];
  }

  async listDirectories(_directory: string, _recursive = false): Promise<string[]> {
    return [];
  }

  async createDirectory(_path: string): Promise<boolean> {
    return false;
  }

  async deleteDirectory(_path: string): Promise<boolean> {
    return false;
  }
}
