import { Storage } from "./Storage.js";
import { LocalAdapter } from "./adapter/LocalAdapter.js";
import { S3Adapter } from "./adapter/S3Adapter.js";
import { S3Client } from "./client/S3Client.js";
import type { ObjectStoreClient, ObjectStoreResponse } from "./client/ObjectStoreClient.js";
import type { CacheProvider } from "./cache/CacheProvider.js";
import { ConsoleLogger } from "./logger/ConsoleLogger.js";
import type { LoggerProvider } from "./logger/LoggerProvider.js";
import { parseStorageConfig } from "./config.js";

/**
 * Options that cannot come from a config file.
 */
export interface StorageInitOptions {
  logger?: LoggerProvider;
  /** Replaces the aws4fetch client built from the config (s3 only). */
  client?: ObjectStoreClient;
  /** Metadata cache for the S3 adapter. */
  cache?: CacheProvider<ObjectStoreResponse>;
}

/**
 * Builds a Storage from a config object.
 *
 * @param config - Raw config; validated with `parseStorageConfig`.
 * @param options - Logger, client and cache overrides.
 * @throws StorageError `invalid_config` when the config does not validate.
 *
 * @example
 * ```ts
 * const storage = defineStorage({ adapter: "local", root: "./data" });
 * await storage.write("notes/today.md", "# Today");
 * ```
 */
export function defineStorage(
  config: unknown,
  options: StorageInitOptions = {}
): Storage {
  const resolved = parseStorageConfig(config);
  const logger = options.logger ?? new ConsoleLogger(resolved.logLevel ?? "warn");

  if (resolved.adapter === "local") {
    return new Storage(new LocalAdapter(resolved.root, { logger }));
  }

  const client =
    options.client ??
    new S3Client({
      endpoint: resolved.endpoint,
      accessKeyId: resolved.accessKeyId,
      secretAccessKey: resolved.secretAccessKey,
      region: resolved.region,
      sessionToken: resolved.sessionToken,
      retries: resolved.retries,
    });

  return new Storage(
    new S3Adapter(resolved.bucket, client, { logger, cache: options.cache })
  );
}

export { Storage } from "./Storage.js";
export { LocalAdapter, type LocalAdapterOptions } from "./adapter/LocalAdapter.js";
export { S3Adapter, type S3AdapterOptions } from "./adapter/S3Adapter.js";
export type {
  StorageAdapter,
  WriteConfig,
  FileContent,
} from "./adapter/StorageAdapter.js";
export { S3Client, type S3ClientOptions } from "./client/S3Client.js";
export type {
  ObjectStoreClient,
  ObjectStoreResponse,
} from "./client/ObjectStoreClient.js";
export { StorageError, isStorageError, type StorageErrorKind } from "./StorageError.js";
export { normalizePath } from "./utils/path.js";
export type { CacheProvider } from "./cache/CacheProvider.js";
export { InMemoryCacheProvider } from "./cache/InMemoryCacheProvider.js";
export { ConsoleLogger } from "./logger/ConsoleLogger.js";
export { scopeLogger, type LoggerProvider, type LogLevel } from "./logger/LoggerProvider.js";
export {
  parseStorageConfig,
  loadStorageConfig,
  type StorageConfig,
  type LocalStorageConfig,
  type S3StorageConfig,
} from "./config.js";
