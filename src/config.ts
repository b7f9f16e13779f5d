import { promises as fs } from "fs";
import * as path from "path";
import yaml from "js-yaml";
import { z } from "zod";
import { StorageError } from "./StorageError.js";

const logLevel = z.enum(["debug", "warn", "silent"]);

export const localConfigSchema = z.object({
  adapter: z.literal("local"),
  root: z.string().min(1),
  logLevel: logLevel.optional(),
});

export const s3ConfigSchema = z.object({
  adapter: z.literal("s3"),
  bucket: z.string().min(1),
  endpoint: z.string().url(),
  accessKeyId: z.string().min(1),
  secretAccessKey: z.string().min(1),
  region: z.string().min(1).optional(),
  sessionToken: z.string().optional(),
  retries: z.number().int().nonnegative().optional(),
  logLevel: logLevel.optional(),
});

export const storageConfigSchema = z.discriminatedUnion("adapter", [
  localConfigSchema,
  s3ConfigSchema,
]);

export type LocalStorageConfig = z.infer<typeof localConfigSchema>;
export type S3StorageConfig = z.infer<typeof s3ConfigSchema>;
export type StorageConfig = z.infer<typeof storageConfigSchema>;

/**
 * Validates a plain object as a storage configuration.
 *
 * @throws StorageError `invalid_config` listing every issue found.
 */
export function parseStorageConfig(raw: unknown): StorageConfig {
  const result = storageConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new StorageError("invalid_config", `Invalid storage config: ${issues}`);
  }

  return result.data;
}

/**
 * Reads a `.json`, `.yaml` or `.yml` config file and validates it.
 *
 * @param file - Path to the config file.
 */
export async function loadStorageConfig(file: string): Promise<StorageConfig> {
  const raw = await fs.readFile(file, "utf-8");
  const ext = path.extname(file).toLowerCase();

  let parsed: unknown;
  try {
    parsed = ext === ".yaml" || ext === ".yml" ? yaml.load(raw) : JSON.parse(raw);
  } catch (err) {
    throw new StorageError(
      "invalid_config",
      `Could not parse storage config: ${file}`,
      undefined,
      { cause: err }
    );
  }

  return parseStorageConfig(parsed);
}
