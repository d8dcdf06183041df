/**
 * Incremental HTTP/1.0 request parser.
 * Fed one chunk at a time; never blocks and never touches a socket.
 */

import { ProtocolError } from "./errors.js";

/** A fully received request. Header names are lower-cased; the last repeat wins. */
export interface ParsedRequest {
  readonly method: string;
  readonly path: string;
  readonly version: string;
  readonly headers: ReadonlyMap<string, string>;
  readonly body: Buffer;
}

export type ParseResult =
  | { readonly kind: "incomplete" }
  | { readonly kind: "complete"; readonly request: ParsedRequest }
  | { readonly kind: "malformed"; readonly reason: string };

export interface RequestParserOptions {
  /** Longest accepted request head, terminator included. */
  maxHeadLength?: number;
  /** Largest accepted `content-length`. */
  maxBodyLength?: number;
}

export const DEFAULT_MAX_HEAD_LENGTH = 10_000;
export const DEFAULT_MAX_BODY_LENGTH = 1_000_000;

const LF = 0x0a;
const CR = 0x0d;
const INCOMPLETE: ParseResult = { kind: "incomplete" };

interface RequestHead {
  method: string;
  path: string;
  version: string;
  headers: Map<string, string>;
  bodyLength: number;
}

type HeadCut =
  | { readonly kind: "incomplete" }
  | { readonly kind: "malformed"; readonly reason: string }
  | { readonly kind: "head"; readonly head: RequestHead };

const INCOMPLETE_HEAD: HeadCut = { kind: "incomplete" };

// growable accumulation buffer
type DynBuf = { data: Buffer; length: number };

function bufPush(buf: DynBuf, data: Buffer): void {
  const newLen = buf.length + data.length;
  if (buf.data.length < newLen) {
    let cap = Math.max(buf.data.length, 32);
    while (cap < newLen) cap *= 2;
    const grown = Buffer.alloc(cap);
    buf.data.copy(grown, 0, 0, buf.length);
    buf.data = grown;
  }
  data.copy(buf.data, buf.length);
  buf.length = newLen;
}

/**
 * Locates the empty line that ends the head. Lines end at LF with an optional CR before it.
 * `headEnd` excludes the empty line; `bodyStart` is the first byte after it.
 */
function findHeadEnd(view: Buffer): { headEnd: number; bodyStart: number } | null {
  let lineStart = 0;
  for (let nl = view.indexOf(LF); nl >= 0; nl = view.indexOf(LF, lineStart)) {
    const lineEnd = nl > lineStart && view[nl - 1] === CR ? nl - 1 : nl;
    if (lineEnd === lineStart) return { headEnd: lineStart, bodyStart: nl + 1 };
    lineStart = nl + 1;
  }
  return null;
}

function parseTarget(target: string): string {
  if (target.startsWith("/")) return target;
  if (/^https?:\/\//i.test(target)) {
    try {
      const url = new URL(target);
      return url.pathname + url.search;
    } catch {
      throw new ProtocolError("bad absolute request target", { target });
    }
  }
  throw new ProtocolError("request target must start with '/'", { target });
}

function parseRequestLine(line: string): [string, string, string] {
  const parts = line.trim().split(/\s+/);
  const [method, target, version] = parts;
  if (method === undefined || target === undefined || version === undefined) {
    throw new ProtocolError("bad request line", { line });
  }
  return [method.toLowerCase(), parseTarget(target), version];
}

function parseHeaders(lines: readonly string[]): Map<string, string> {
  const headers = new Map<string, string>();
  for (const line of lines) {
    const colon = line.indexOf(":");
    // lines without a separator are skipped, not fatal
    if (colon < 0) continue;
    const name = line.slice(0, colon).trim().toLowerCase();
    if (!name) continue;
    headers.set(name, line.slice(colon + 1).trim());
  }
  return headers;
}

function parseBodyLength(headers: ReadonlyMap<string, string>, maxBodyLength: number): number {
  const raw = headers.get("content-length");
  if (raw === undefined) return 0;
  if (!/^\d+$/.test(raw)) throw new ProtocolError("bad content-length", { value: raw });
  const length = Number.parseInt(raw, 10);
  if (length > maxBodyLength) {
    throw new ProtocolError("request body too large", { length, maxBodyLength });
  }
  return length;
}

function parseHead(data: Buffer, maxBodyLength: number): RequestHead {
  const lines = data.toString("latin1").split(/\r?\n/);
  const [method, path, version] = parseRequestLine(lines[0] ?? "");
  const headers = parseHeaders(lines.slice(1));
  const bodyLength = parseBodyLength(headers, maxBodyLength);
  return { method, path, version, headers, bodyLength };
}

export class RequestParser {
  private readonly maxHeadLength: number;
  private readonly maxBodyLength: number;
  private readonly buf: DynBuf = { data: Buffer.alloc(0), length: 0 };
  private head: RequestHead | null = null;
  private bodyStart = 0;
  private settled: ParseResult | null = null;

  constructor(options: RequestParserOptions = {}) {
    this.maxHeadLength = options.maxHeadLength ?? DEFAULT_MAX_HEAD_LENGTH;
    this.maxBodyLength = options.maxBodyLength ?? DEFAULT_MAX_BODY_LENGTH;
  }

  /** Appends a chunk and reports progress. Once complete or malformed, the result is sticky. */
  push(chunk: Buffer): ParseResult {
    if (this.settled) return this.settled;
    bufPush(this.buf, chunk);

    let head = this.head;
    if (head === null) {
      const cut = this.cutHead();
      if (cut.kind === "incomplete") return cut;
      if (cut.kind === "malformed") return this.settle(cut);
      head = cut.head;
    }

    if (this.buf.length - this.bodyStart < head.bodyLength) return INCOMPLETE;

    const body = Buffer.from(this.buf.data.subarray(this.bodyStart, this.bodyStart + head.bodyLength));
    return this.settle({
      kind: "complete",
      request: {
        method: head.method,
        path: head.path,
        version: head.version,
        headers: head.headers,
        body,
      },
    });
  }

  private cutHead(): HeadCut {
    const view = this.buf.data.subarray(0, this.buf.length);
    const end = findHeadEnd(view);
    if (end === null ? this.buf.length >= this.maxHeadLength : end.bodyStart > this.maxHeadLength) {
      return { kind: "malformed", reason: "request head too large" };
    }
    if (end === null) return INCOMPLETE_HEAD;

    let head: RequestHead;
    try {
      head = parseHead(view.subarray(0, end.headEnd), this.maxBodyLength);
    } catch (err) {
      if (!(err instanceof ProtocolError)) throw err;
      return { kind: "malformed", reason: err.message };
    }
    this.head = head;
    this.bodyStart = end.bodyStart;
    return { kind: "head", head };
  }

  private settle(result: ParseResult): ParseResult {
    this.settled = result;
    return result;
  }
}
