/**
 * Text-file stores for settings documents.
 */

import * as fs from "fs/promises";
import * as path from "path";

import type { TextFileStore } from "./types.js";

// ============================================================================
// Local Filesystem
// ============================================================================

/**
 * Plain filesystem store. Writes are not atomic.
 */
export class NodeFileStore implements TextFileStore {
  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async readAll(filePath: string): Promise<string> {
    return fs.readFile(filePath, "utf-8");
  }

  async writeAll(filePath: string, content: string): Promise<void> {
    await fs.writeFile(filePath, content);
  }

  async ensureDirectory(directoryPath: string): Promise<void> {
    await fs.mkdir(directoryPath, { recursive: true });
  }
}

// ============================================================================
// In-Memory
// ============================================================================

/**
 * In-memory store (for testing). Records every write in order.
 */
export class MemoryFileStore implements TextFileStore {
  private files: Map<string, string> = new Map();
  private directories: Set<string> = new Set();
  readonly writes: string[] = [];

  async exists(filePath: string): Promise<boolean> {
    return this.files.has(path.resolve(filePath));
  }

  async readAll(filePath: string): Promise<string> {
    const content = this.files.get(path.resolve(filePath));
    if (content === undefined) {
      throw new Error(`ENOENT: no such file, open '${filePath}'`);
    }
    return content;
  }

  async writeAll(filePath: string, content: string): Promise<void> {
    const resolved = path.resolve(filePath);
    if (!this.directories.has(path.dirname(resolved))) {
      throw new Error(`ENOENT: no such directory, open '${filePath}'`);
    }
    this.files.set(resolved, content);
    this.writes.push(resolved);
  }

  async ensureDirectory(directoryPath: string): Promise<void> {
    this.addDirectory(directoryPath);
  }

  /** Seed or overwrite a file directly, bypassing the write log. */
  put(filePath: string, content: string): void {
    const resolved = path.resolve(filePath);
    this.files.set(resolved, content);
    this.addDirectory(path.dirname(resolved));
  }

  /** Current content of a file, if any. */
  peek(filePath: string): string | undefined {
    return this.files.get(path.resolve(filePath));
  }

  private addDirectory(directoryPath: string): void {
    let current = path.resolve(directoryPath);
    while (!this.directories.has(current)) {
      this.directories.add(current);
      const parent = path.dirname(current);
      if (parent === current) break;
      current = parent;
    }
  }
}
