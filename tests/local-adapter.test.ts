import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { promises as fs } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { LocalAdapter } from "../src/adapter/LocalAdapter";
import { Storage } from "../src/Storage";
import { isStorageError } from "../src/StorageError";
import type { LoggerProvider } from "../src/logger/LoggerProvider";

function silentLogger(): LoggerProvider {
  return { debug: vi.fn(), warn: vi.fn() };
}

describe("LocalAdapter", () => {
  let root: string;
  let logger: LoggerProvider;
  let adapter: LocalAdapter;
  let storage: Storage;

  beforeEach(async () => {
    root = await fs.mkdtemp(join(tmpdir(), "storage-local-"));
    logger = silentLogger();
    adapter = new LocalAdapter(root, { logger });
    storage = new Storage(adapter);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  describe("constructor", () => {
    it("strips trailing separators from the root", () => {
      expect(new LocalAdapter(`${root}/`, { logger }).root).toBe(root);
      expect(adapter.name).toBe("local");
    });
  });

  describe("paths", () => {
    it("resolves a written file under the root", async () => {
      expect(await storage.write("a/b.txt", "hi")).toBe(true);
      expect(await storage.exists("a/b.txt")).toBe(true);
      expect(await storage.size("a/b.txt")).toBe(2);
      expect(await storage.path("a/b.txt")).toBe(`${root}/a/b.txt`);
    });

    it("rejects traversal before touching the filesystem", async () => {
      const error = await storage.exists("../etc/passwd").catch((e: unknown) => e);

      expect(isStorageError(error, "path_traversal")).toBe(true);
      if (isStorageError(error)) {
        expect(error.adapter).toBe(adapter);
      }
    });

    it("rejects control characters", async () => {
      const error = await storage.exists("s\x09i.txt").catch((e: unknown) => e);

      expect(isStorageError(error, "invalid_path")).toBe(true);
    });

    it("accepts backslash separators", async () => {
      await storage.write("win\\style.txt", "w");

      expect(await storage.exists("win/style.txt")).toBe(true);
      expect(await storage.path("win\\style.txt")).toBe(`${root}/win/style.txt`);
    });

    it("fails path() for a missing file", async () => {
      const error = await storage.path("dummy.txt").catch((e: unknown) => e);

      expect(isStorageError(error, "not_found")).toBe(true);
    });
  });

  describe("exists", () => {
    it("is false for a missing file and stable across calls", async () => {
      expect(await storage.exists("nope.txt")).toBe(false);
      expect(await storage.exists("nope.txt")).toBe(false);
      expect(await storage.missing("nope.txt")).toBe(true);
    });

    it("is true for directories", async () => {
      await fs.mkdir(join(root, "dir"));

      expect(await storage.exists("dir")).toBe(true);
    });
  });

  describe("read and write", () => {
    it("round-trips content", async () => {
      const contents = "# Storage Test";
      await storage.write("storage_test.md", contents, { overwrite: true });

      expect(await storage.read("storage_test.md")).toBe(contents);
    });

    it("round-trips bytes", async () => {
      const bytes = new Uint8Array([0x00, 0x01, 0xfe, 0xff]);
      await storage.write("blob.bin", bytes);

      expect(Array.from(await storage.readBytes("blob.bin"))).toEqual([0, 1, 254, 255]);
    });

    it("refuses to overwrite without the flag and keeps the old content", async () => {
      await storage.write("keep.txt", "original");
      const error = await storage.write("keep.txt", "replacement").catch((e: unknown) => e);

      expect(isStorageError(error, "already_exists")).toBe(true);
      expect(await fs.readFile(join(root, "keep.txt"), "utf-8")).toBe("original");
    });

    it("overwrites with the flag", async () => {
      await storage.write("over.txt", "one");

      expect(await storage.write("over.txt", "two", { overwrite: true })).toBe(true);
      expect(await storage.read("over.txt")).toBe("two");
    });

    it("ignores adapter metadata keys", async () => {
      expect(await storage.write("typed.md", "# x", { "Content-Type": "text/markdown" })).toBe(true);
      expect(await storage.read("typed.md")).toBe("# x");
    });

    it("reports an empty write as a failure but still creates the file", async () => {
      expect(await storage.write("empty.txt", "")).toBe(false);
      expect(await storage.exists("empty.txt")).toBe(true);
      expect(await storage.size("empty.txt")).toBe(0);
    });

    it("throws not_found when reading a missing file", async () => {
      const error = await storage.read("ghost.txt").catch((e: unknown) => e);

      expect(isStorageError(error, "not_found")).toBe(true);
    });

    it("returns false and warns when the target is a directory", async () => {
      await fs.mkdir(join(root, "taken"));

      expect(await storage.write("taken", "x", { overwrite: true })).toBe(false);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe("append and prepend", () => {
    beforeEach(async () => {
      await storage.write("log.txt", "X");
    });

    it("appends after a newline by default", async () => {
      expect(await storage.append("log.txt", "12345")).toBe(true);
      expect(await storage.read("log.txt")).toBe("X\n12345");
    });

    it("prepends before a newline by default", async () => {
      expect(await storage.prepend("log.txt", "12345")).toBe(true);
      expect(await storage.read("log.txt")).toBe("12345\nX");
    });

    it("uses a custom separator", async () => {
      await storage.append("log.txt", "Y", ", ");

      expect(await storage.read("log.txt")).toBe("X, Y");
    });

    it("creates a missing file with just the data", async () => {
      expect(await storage.append("fresh.txt", "12345")).toBe(true);
      expect(await storage.read("fresh.txt")).toBe("12345");
    });
  });

  describe("metadata", () => {
    it("reads the modification time in seconds", async () => {
      await storage.write("dated.txt", "x");
      await fs.utimes(join(root, "dated.txt"), 1700000000, 1700000000);

      expect(await storage.lastModified("dated.txt")).toBe(1700000000);
    });

    it("counts bytes, not characters", async () => {
      await storage.write("utf8.txt", "é");

      expect(await storage.size("utf8.txt")).toBe(2);
    });
  });

  describe("copy and move", () => {
    it("returns false for a missing source and creates nothing", async () => {
      expect(await storage.copy("dummy.txt", "copy.txt")).toBe(false);
      expect(await storage.exists("copy.txt")).toBe(false);

      expect(await storage.move("dummy.txt", "moved.txt")).toBe(false);
      expect(await storage.exists("dummy.txt")).toBe(false);
      expect(await storage.exists("moved.txt")).toBe(false);
    });

    it("copies and keeps the source", async () => {
      await storage.write("source.md", "# Source");

      expect(await storage.copy("source.md", "backup/source.md")).toBe(true);
      expect(await storage.read("backup/source.md")).toBe("# Source");
      expect(await storage.exists("source.md")).toBe(true);
    });

    it("copies over an existing destination", async () => {
      await storage.write("source.md", "new");
      await storage.write("target.md", "old");

      expect(await storage.copy("source.md", "target.md")).toBe(true);
      expect(await storage.read("target.md")).toBe("new");
    });

    it("moves and removes the source", async () => {
      await storage.write("source.md", "# Source");

      expect(await storage.move("source.md", "nested/moved.md")).toBe(true);
      expect(await storage.exists("source.md")).toBe(false);
      expect(await storage.read("nested/moved.md")).toBe("# Source");
    });

    it("rejects traversal in the destination", async () => {
      await storage.write("source.md", "x");
      const error = await storage.copy("source.md", "../escape.md").catch((e: unknown) => e);

      expect(isStorageError(error, "path_traversal")).toBe(true);
    });
  });

  describe("delete", () => {
    it("deletes a file", async () => {
      await storage.write("bye.txt", "x");

      expect(await storage.delete("bye.txt")).toBe(true);
      expect(await storage.missing("bye.txt")).toBe(true);
    });

    it("throws not_found for a missing file", async () => {
      const error = await storage.delete("ghost.txt").catch((e: unknown) => e);

      expect(isStorageError(error, "not_found")).toBe(true);
    });

    it("returns false for a directory", async () => {
      await fs.mkdir(join(root, "folder"));

      expect(await storage.delete("folder")).toBe(false);
    });
  });

  describe("listing", () => {
    beforeEach(async () => {
      await fs.mkdir(join(root, "docs", "guides"), { recursive: true });
      await fs.writeFile(join(root, "top.txt"), "t");
      await fs.writeFile(join(root, "docs", "readme.md"), "r");
      await fs.writeFile(join(root, "docs", "guides", "deep.md"), "d");
    });

    it("lists direct files only", async () => {
      expect(await storage.files("/")).toEqual([`${root}/top.txt`]);
      expect(await storage.files("docs")).toEqual([`${root}/docs/readme.md`]);
    });

    it("lists nested files recursively", async () => {
      expect(await storage.files("/", true)).toEqual([
        `${root}/docs/guides/deep.md`,
        `${root}/docs/readme.md`,
        `${root}/top.txt`,
      ]);
    });

    it("lists directories", async () => {
      expect(await storage.directories("")).toEqual([`${root}/docs`]);
      expect(await storage.directories("", true)).toEqual([
        `${root}/docs`,
        `${root}/docs/guides`,
      ]);
    });

    it("sorts case-insensitively", async () => {
      await fs.mkdir(join(root, "sorted"));
      for (const name of ["b.txt", "C.txt", "a.txt"]) {
        await fs.writeFile(join(root, "sorted", name), name);
      }

      expect(await storage.files("sorted")).toEqual([
        `${root}/sorted/a.txt`,
        `${root}/sorted/b.txt`,
        `${root}/sorted/C.txt`,
      ]);
    });

    it("keeps earlier entries when reading a directory fails midway", async () => {
      const opendir = fs.opendir.bind(fs);
      vi.spyOn(fs, "opendir").mockImplementation(async (dir, options) => {
        const handle = await opendir(dir, options);
        if (String(dir).endsWith("guides")) {
          vi.spyOn(handle, Symbol.asyncIterator).mockImplementation(async function* () {
            await handle.close();
            throw new Error("EIO: i/o error, scandir");
          });
        }
        return handle;
      });

      expect(await storage.files("/", true)).toEqual([
        `${root}/docs/readme.md`,
        `${root}/top.txt`,
      ]);
      expect(logger.warn).toHaveBeenCalledWith(
        `could not list ${root}/docs/guides`,
        expect.any(Error)
      );
    });

    it("lists a missing directory as empty and warns", async () => {
      expect(await storage.files("nope")).toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith(
        `could not list ${root}/nope`,
        expect.anything()
      );
    });
  });

  describe("directories", () => {
    it("creates missing parents", async () => {
      expect(await storage.createDirectory("x/y/z")).toBe(true);
      expect(await storage.exists("x/y")).toBe(true);
      expect(await storage.directories("x", true)).toEqual([`${root}/x/y`, `${root}/x/y/z`]);
    });

    it("returns false when the directory already exists", async () => {
      await storage.createDirectory("again");

      expect(await storage.createDirectory("again")).toBe(false);
    });

    it("deletes an empty directory", async () => {
      await storage.createDirectory("output/test");

      expect(await storage.deleteDirectory("output/test")).toBe(true);
      expect(await storage.exists("output/test")).toBe(false);
      expect(await storage.exists("output")).toBe(true);
    });

    it("does not delete a directory with content", async () => {
      await storage.write("full/file.txt", "x");

      expect(await storage.deleteDirectory("full")).toBe(false);
      expect(await storage.exists("full/file.txt")).toBe(true);
    });

    it("throws invalid_directory for a missing path or a file", async () => {
      await storage.write("plain.txt", "x");

      for (const target of ["output/foo", "plain.txt"]) {
        const error = await storage.deleteDirectory(target).catch((e: unknown) => e);
        expect(isStorageError(error, "invalid_directory")).toBe(true);
      }
    });
  });
});
