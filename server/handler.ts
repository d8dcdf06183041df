/**
 * Request router/dispatcher. No sockets.
 * Turns a parsed request into a reply, or null when the connection should be dropped.
 */

import type { ParsedRequest } from "../domain/requestParser.js";
import type { FileSource } from "../domain/fileSource.js";
import { resolveRoute, precompressedEncoding, type RouteTable, defaultRouteTable } from "../domain/routes.js";
import { resolveByteRange, rangeLength, unsatisfiedContentRange } from "../domain/byteRange.js";
import { STATUS, type Status } from "../domain/responseFramer.js";
import { assertNever } from "../domain/validation.js";
import type { Logger } from "./logger.js";

export interface Reply {
  readonly status: Status;
  readonly extraHeader?: string;
  readonly body: Buffer;
}

export interface HandlerDeps {
  files: FileSource;
  routes?: RouteTable;
  logger: Logger;
}

const SUPPORTED_METHODS: ReadonlySet<string> = new Set(["get", "post"]);
const EMPTY = Buffer.alloc(0);

function empty(status: Status, extraHeader?: string): Reply {
  return extraHeader !== undefined ? { status, extraHeader, body: EMPTY } : { status, body: EMPTY };
}

function withEncoding(status: Status, body: Buffer, encoding: string | undefined): Reply {
  return encoding !== undefined ? { status, extraHeader: `Content-Encoding: ${encoding}`, body } : { status, body };
}

async function serveFile(request: ParsedRequest, relativePath: string, deps: HandlerDeps): Promise<Reply> {
  deps.logger.info(`serving file ${relativePath}`);
  const loaded = await deps.files.load(relativePath);
  switch (loaded.kind) {
    case "not-found":
      return empty(STATUS.notFound);
    case "unreadable":
      deps.logger.warn(`cannot serve ${relativePath}: ${loaded.reason}`);
      return empty(STATUS.internalError);
    case "found":
      break;
    default:
      return assertNever(loaded);
  }

  const data = loaded.data;
  const encoding = precompressedEncoding(relativePath);
  const rangeHeader = request.headers.get("range");
  if (rangeHeader === undefined || rangeHeader === "") {
    return withEncoding(STATUS.ok, data, encoding);
  }

  const resolved = resolveByteRange(rangeHeader, data.length);
  switch (resolved.kind) {
    case "satisfiable": {
      const { start } = resolved.range;
      return withEncoding(STATUS.partial, data.subarray(start, start + rangeLength(resolved.range)), encoding);
    }
    case "malformed":
      deps.logger.warn(`malformed range header: ${rangeHeader}`);
      return empty(STATUS.badRequest);
    case "unsatisfiable":
      return empty(STATUS.rangeNotSatisfiable, `Content-Range: ${unsatisfiedContentRange(data.length)}`);
    default:
      return assertNever(resolved);
  }
}

export async function handleRequest(request: ParsedRequest, deps: HandlerDeps): Promise<Reply | null> {
  if (!SUPPORTED_METHODS.has(request.method)) {
    deps.logger.warn(`incorrect method: ${request.method}`);
    return null;
  }

  const route = resolveRoute(request.path, deps.routes ?? defaultRouteTable);
  switch (route.kind) {
    case "redirect":
    case "infinite-redirect":
    case "relative-redirect":
      return empty(STATUS.movedPermanently, `Location: ${route.location}`);
    case "file":
      return serveFile(request, route.relativePath, deps);
    default:
      return assertNever(route);
  }
}
