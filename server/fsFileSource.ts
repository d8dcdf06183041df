/**
 * Filesystem-backed file source, rooted at a document directory.
 * Paths that escape the root are reported as missing.
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import type { FileLoadResult, FileSource } from "../domain/fileSource.js";

export const DEFAULT_MAX_FILE_SIZE = 8_000_000;

export class FsFileSource implements FileSource {
  private readonly rootDir: string;
  private readonly maxFileSize: number;

  constructor(rootDir: string, maxFileSize = DEFAULT_MAX_FILE_SIZE) {
    this.rootDir = path.resolve(rootDir);
    this.maxFileSize = maxFileSize;
  }

  private resolve(relativePath: string): string | null {
    const file = path.resolve(this.rootDir, relativePath);
    const rel = path.relative(this.rootDir, file);
    if (rel === "" || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) return null;
    return file;
  }

  async load(relativePath: string): Promise<FileLoadResult> {
    const file = this.resolve(relativePath);
    if (file === null) return { kind: "not-found" };

    try {
      const stat = await fs.stat(file);
      if (!stat.isFile()) return { kind: "unreadable", reason: "not a regular file" };
      if (stat.size > this.maxFileSize) {
        return { kind: "unreadable", reason: `file exceeds ${this.maxFileSize} bytes` };
      }
      const data = await fs.readFile(file);
      return { kind: "found", data };
    } catch (err: unknown) {
      const code = typeof err === "object" && err !== null && "code" in err ? err.code : undefined;
      if (code === "ENOENT" || code === "ENOTDIR") return { kind: "not-found" };
      return { kind: "unreadable", reason: err instanceof Error ? err.message : String(err) };
    }
  }
}
