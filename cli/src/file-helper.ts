/**
 * File helpers for the settings directory: name handling, listings and
 * secure deletion (overwrite with zeros, then unlink).
 */

import type { Stats } from "fs";
import * as fs from "fs/promises";
import * as path from "path";

import { SettingsError, ValidationError, errorMessage } from "../../core/src/index.js";

const OVERWRITE_CHUNK_SIZE = 64 * 1024;

/**
 * Thrown when a file or directory could not be securely deleted.
 */
export class SecureDeleteError extends SettingsError {
  readonly code = "SECURE_DELETE_FAILED";

  constructor(
    readonly target: string,
    cause: unknown,
  ) {
    super(`Failed to permanently delete ${target}: ${errorMessage(cause)}`, { cause });
  }
}

function requireText(value: string, what: string): string {
  if (!value?.trim()) {
    throw new ValidationError(`${what} cannot be empty.`);
  }
  return value.trim();
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
}

// ============================================================================
// Names & Paths
// ============================================================================

export function removeFileExtension(fileName: string): string {
  const name = path.basename(requireText(fileName, "File name"));
  return path.basename(name, path.extname(name));
}

export function getFileNameFromPath(filePath: string): string {
  return path.basename(requireText(filePath, "Path"));
}

/**
 * Absolute path with forward slashes; blank input means the working
 * directory. UNC paths are left as they are.
 */
export function normalizePath(input: string): string {
  const resolved = path.resolve(input?.trim() ? input.trim() : process.cwd());
  return resolved.startsWith("\\\\") ? resolved : resolved.replace(/\\/g, "/");
}

export function isFullPath(input: string): boolean {
  return path.isAbsolute(requireText(input, "Path"));
}

// ============================================================================
// Listings
// ============================================================================

/**
 * Files (not subdirectories) directly inside a directory, sorted by name.
 */
export async function getFilesInDirectory(directoryPath: string): Promise<string[]> {
  const directory = requireText(directoryPath, "Path");
  const stats = await statOrNull(directory);
  if (!stats?.isDirectory()) {
    throw new ValidationError(`The specified directory does not exist: ${directory}`);
  }

  const entries = await fs.readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => path.join(directory, entry.name))
    .sort();
}

/**
 * Keep the files whose extension matches, case-insensitively. The extension
 * may be given with or without its leading dot.
 */
export function filterFilesByExtension(files: readonly string[], extension: string): string[] {
  const wanted = requireText(extension, "Extension").replace(/^\./, "").toLowerCase();
  return files.filter((file) => path.extname(file).replace(/^\./, "").toLowerCase() === wanted);
}

// ============================================================================
// Secure Deletion
// ============================================================================

/**
 * Overwrite a file's bytes with zeros, flush, then unlink it.
 */
export async function secureDelete(filePath: string): Promise<void> {
  const target = path.resolve(requireText(filePath, "File path"));
  const stats = await statOrNull(target);
  if (!stats?.isFile()) {
    throw new ValidationError(`The specified file does not exist: ${target}`);
  }

  try {
    await overwriteWithZeros(target, stats.size);
    await fs.unlink(target);
  } catch (error) {
    throw new SecureDeleteError(target, error);
  }
}

async function overwriteWithZeros(target: string, size: number): Promise<void> {
  const handle = await fs.open(target, "r+");
  try {
    const zeros = Buffer.alloc(Math.min(size, OVERWRITE_CHUNK_SIZE));
    let offset = 0;
    while (offset < size) {
      const length = Math.min(zeros.length, size - offset);
      await handle.write(zeros, 0, length, offset);
      offset += length;
    }
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Securely delete every file below a directory, then remove the tree.
 */
export async function secureDeleteDirectory(directoryPath: string): Promise<void> {
  const target = path.resolve(requireText(directoryPath, "Directory path"));
  const stats = await statOrNull(target);
  if (!stats?.isDirectory()) {
    throw new ValidationError(`The specified directory does not exist: ${target}`);
  }

  try {
    await shredTree(target);
  } catch (error) {
    if (error instanceof SecureDeleteError) throw error;
    throw new SecureDeleteError(target, error);
  }
}

async function shredTree(directory: string): Promise<void> {
  const entries = await fs.readdir(directory, { withFileTypes: true });

  for (const entry of entries) {
    const entryPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      await shredTree(entryPath);
    } else if (entry.isFile()) {
      await secureDelete(entryPath);
    } else {
      await fs.unlink(entryPath);
    }
  }

  await fs.rmdir(directory);
}
