/**
 * Byte-range resolver for the single `bytes=<start>-<end>` form.
 * Suffix, open-ended and multi-range requests are reported as malformed.
 */

/** Inclusive interval over a file's bytes. 0 <= start <= end < length. */
export interface ByteRange {
  readonly start: number;
  readonly end: number;
}

export type RangeResolution =
  | { readonly kind: "satisfiable"; readonly range: ByteRange }
  | { readonly kind: "malformed" }
  | { readonly kind: "unsatisfiable" };

const SINGLE_RANGE = /^bytes=(\d+)-(\d+)$/i;

export function resolveByteRange(headerValue: string, contentLength: number): RangeResolution {
  const match = SINGLE_RANGE.exec(headerValue.trim());
  if (!match) return { kind: "malformed" };

  const start = Number.parseInt(match[1] ?? "", 10);
  const end = Number.parseInt(match[2] ?? "", 10);
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
    return { kind: "malformed" };
  }

  if (start > end || end >= contentLength) return { kind: "unsatisfiable" };
  return { kind: "satisfiable", range: { start, end } };
}

/** Number of bytes covered by the range. */
export function rangeLength(range: ByteRange): number {
  return range.end - range.start + 1;
}

/** `Content-Range` value for a 416 answer. */
export function unsatisfiedContentRange(contentLength: number): string {
  return `bytes */${contentLength}`;
}
