/**
 * In-memory file source. For tests.
 */

import type { FileLoadResult, FileSource } from "../domain/fileSource.js";

export class MemoryFileSource implements FileSource {
  private readonly files = new Map<string, Buffer>();
  private readonly broken = new Map<string, string>();

  /** Registers content under a path relative to the root, e.g. `test_file`. */
  put(relativePath: string, data: Buffer | string): this {
    this.files.set(relativePath, typeof data === "string" ? Buffer.from(data) : data);
    return this;
  }

  /** Makes a path load as unreadable. */
  breakFile(relativePath: string, reason = "unreadable"): this {
    this.broken.set(relativePath, reason);
    return this;
  }

  async load(relativePath: string): Promise<FileLoadResult> {
    const reason = this.broken.get(relativePath);
    if (reason !== undefined) return { kind: "unreadable", reason };
    const data = this.files.get(relativePath);
    if (!data) return { kind: "not-found" };
    // fresh copy per request, like a disk read
    return { kind: "found", data: Buffer.from(data) };
  }
}
