import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as path from "path";

import { ValidationError } from "../../core/src/index.js";
import {
  SecureDeleteError,
  filterFilesByExtension,
  getFileNameFromPath,
  getFilesInDirectory,
  isFullPath,
  normalizePath,
  removeFileExtension,
  secureDelete,
  secureDeleteDirectory,
} from "../src/file-helper.js";
import { createTempDir } from "./helpers.js";

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

describe("Names & Paths", () => {
  it("should remove the last extension", () => {
    expect(removeFileExtension("settings.json")).toBe("settings");
    expect(removeFileExtension("/var/backups/archive.tar.gz")).toBe("archive.tar");
    expect(removeFileExtension(".env")).toBe(".env");
  });

  it("should take the file name from a path", () => {
    expect(getFileNameFromPath("/var/data/profile.yaml")).toBe("profile.yaml");
    expect(getFileNameFromPath("profile.yaml")).toBe("profile.yaml");
  });

  it("should reject blank names", () => {
    expect(() => removeFileExtension("  ")).toThrow("File name cannot be empty.");
    expect(() => getFileNameFromPath("")).toThrow(ValidationError);
    expect(() => isFullPath("")).toThrow("Path cannot be empty.");
  });

  it("should tell absolute from relative paths", () => {
    expect(isFullPath("/etc/hosts")).toBe(true);
    expect(isFullPath("etc/hosts")).toBe(false);
  });

  it("should normalize paths against the working directory", () => {
    expect(normalizePath("relative/dir")).toBe(path.resolve("relative/dir").replace(/\\/g, "/"));
    expect(normalizePath("  ")).toBe(process.cwd().replace(/\\/g, "/"));
  });

  it("should filter by extension with or without the dot", () => {
    const files = ["/x/a.json", "/x/b.JSON", "/x/c.yaml", "/x/json"];

    expect(filterFilesByExtension(files, ".json")).toEqual(["/x/a.json", "/x/b.JSON"]);
    expect(filterFilesByExtension(files, "yaml")).toEqual(["/x/c.yaml"]);
    expect(() => filterFilesByExtension(files, " ")).toThrow("Extension cannot be empty.");
  });
});

describe("Directory Listing", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should list files directly inside a directory", async () => {
    await fs.writeFile(path.join(dir, "b.yaml"), "b");
    await fs.writeFile(path.join(dir, "a.json"), "a");
    await fs.mkdir(path.join(dir, "nested"));
    await fs.writeFile(path.join(dir, "nested", "c.json"), "c");

    await expect(getFilesInDirectory(dir)).resolves.toEqual([path.join(dir, "a.json"), path.join(dir, "b.yaml")]);
  });

  it("should reject a missing directory", async () => {
    const missing = path.join(dir, "missing");

    await expect(getFilesInDirectory(missing)).rejects.toThrow(`The specified directory does not exist: ${missing}`);
  });
});

describe("Secure Deletion", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should zero the file contents before unlinking", async () => {
    const target = path.join(dir, "secret.txt");
    const witness = path.join(dir, "witness.txt");
    await fs.writeFile(target, "secret-data");
    // A hard link still sees the inode after the unlink
    await fs.link(target, witness);

    await secureDelete(target);

    expect(await exists(target)).toBe(false);
    expect(await fs.readFile(witness)).toEqual(Buffer.alloc(11));
  });

  it("should reject a missing file", async () => {
    const missing = path.join(dir, "missing.txt");

    await expect(secureDelete(missing)).rejects.toThrow(`The specified file does not exist: ${missing}`);
  });

  it("should reject a directory passed as a file", async () => {
    await expect(secureDelete(dir)).rejects.toBeInstanceOf(ValidationError);
  });

  it("should shred a whole tree", async () => {
    const tree = path.join(dir, "tree");
    const nested = path.join(tree, "a", "b");
    await fs.mkdir(nested, { recursive: true });
    await fs.writeFile(path.join(tree, "top.json"), "{}");
    await fs.writeFile(path.join(nested, "deep.json"), "deep");
    const witness = path.join(dir, "witness.json");
    await fs.link(path.join(nested, "deep.json"), witness);

    await secureDeleteDirectory(tree);

    expect(await exists(tree)).toBe(false);
    expect(await fs.readFile(witness)).toEqual(Buffer.alloc(4));
  });

  it("should reject a missing directory", async () => {
    await expect(secureDeleteDirectory(path.join(dir, "missing"))).rejects.toBeInstanceOf(ValidationError);
  });

  it("should describe the failed target", () => {
    const error = new SecureDeleteError("/tmp/locked", new Error("EACCES: permission denied"));

    expect(error.message).toBe("Failed to permanently delete /tmp/locked: EACCES: permission denied");
    expect(error.code).toBe("SECURE_DELETE_FAILED");
  });
});
