/**
 * File source port. Where served bytes come from.
 * Loaded fresh per request; implementations must not cache across calls.
 */

export type FileLoadResult =
  | { readonly kind: "found"; readonly data: Buffer }
  | { readonly kind: "not-found" }
  /** Too large, not a regular file, or failed to read. */
  | { readonly kind: "unreadable"; readonly reason: string };

export interface FileSource {
  load(relativePath: string): Promise<FileLoadResult>;
}
