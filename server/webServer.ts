/**
 * Connection acceptor loop. One connection at a time, each closed after its response.
 * The handle returned by startWebServer owns the listener; stop() waits for the loop to exit.
 */

import * as net from "node:net";
import type { FileSource } from "../domain/fileSource.js";
import type { RouteTable } from "../domain/routes.js";
import { RequestParser, type ParsedRequest, type RequestParserOptions } from "../domain/requestParser.js";
import { frameResponseHead } from "../domain/responseFramer.js";
import { ConnectionClosedError, ListenError, ProtocolError } from "../domain/errors.js";
import { assertNever } from "../domain/validation.js";
import { soInit, soRead, soWrite, type TCPConn } from "./connection.js";
import { handleRequest, type HandlerDeps, type Reply } from "./handler.js";
import { consoleLogger, type Logger } from "./logger.js";

/**
 * Lifecycle of a started server. A failed bind never yields a handle:
 * startWebServer rejects with ListenError instead.
 */
export type ServerState = "listening" | "stopping" | "stopped";

export interface WebServerOptions {
  port: number;
  /** Defaults to every IPv4 interface. */
  host?: string;
  /** Accepted for interface parity; the server always speaks plaintext. */
  secure?: boolean;
  files: FileSource;
  routes?: RouteTable;
  logger?: Logger;
  parser?: RequestParserOptions;
  /** Connections allowed to wait behind the one being served; later ones are closed. Defaults to the listen backlog. */
  maxPending?: number;
}

export const DEFAULT_HOST = "0.0.0.0";
const LISTEN_BACKLOG = 10;

async function readRequest(conn: TCPConn, parser: RequestParser): Promise<ParsedRequest> {
  for (;;) {
    const data = await soRead(conn);
    if (data.length === 0) {
      throw new ConnectionClosedError("connection closed before request completed");
    }
    const result = parser.push(data);
    switch (result.kind) {
      case "incomplete":
        continue;
      case "malformed":
        throw new ProtocolError(result.reason);
      case "complete":
        return result.request;
      default:
        return assertNever(result);
    }
  }
}

async function writeReply(conn: TCPConn, reply: Reply, logger: Logger): Promise<void> {
  const head = frameResponseHead({
    status: reply.status.code,
    reason: reply.status.reason,
    contentLength: reply.body.length,
    extraHeader: reply.extraHeader,
  });
  logger.info(`>> ${reply.status.code} ${reply.status.reason}${reply.extraHeader ? ` (${reply.extraHeader})` : ""}`);
  await soWrite(conn, head);
  if (reply.body.length > 0) await soWrite(conn, reply.body);
}

/** Serves exactly one request. Never rejects; the socket is destroyed on every path. */
async function serveConnection(conn: TCPConn, deps: HandlerDeps, parserOptions?: RequestParserOptions): Promise<void> {
  try {
    const request = await readRequest(conn, new RequestParser(parserOptions));
    const reply = await handleRequest(request, deps);
    if (reply === null) return;
    await writeReply(conn, reply, deps.logger);
  } catch (err) {
    if (err instanceof ProtocolError || err instanceof ConnectionClosedError) {
      deps.logger.warn(`abandoning connection: ${err.message}`);
    } else {
      deps.logger.error("connection failed:", err);
    }
  } finally {
    conn.socket.destroy();
  }
}

export class WebServer {
  private readonly listener: net.Server;
  private readonly deps: HandlerDeps;
  private readonly parserOptions: RequestParserOptions | undefined;
  private readonly logger: Logger;
  private readonly queue: TCPConn[] = [];
  private readonly maxPending: number;
  private readonly listenerClosed: Promise<void>;
  private waiter: ((conn: TCPConn | null) => void) | null = null;
  private closing = false;
  private loop: Promise<void> = Promise.resolve();
  private stopping: Promise<void> | null = null;
  private started = false;
  private currentState: ServerState = "listening";
  private boundPort = 0;

  private constructor(options: WebServerOptions) {
    this.logger = options.logger ?? consoleLogger;
    this.deps = { files: options.files, routes: options.routes, logger: this.logger };
    this.parserOptions = options.parser;
    this.maxPending = options.maxPending ?? LISTEN_BACKLOG;
    this.listener = net.createServer({ pauseOnConnect: true });
    this.listenerClosed = new Promise((resolve) => this.listener.once("close", () => resolve()));

    this.listener.on("connection", (socket: net.Socket) => this.enqueue(socket));
    this.listener.on("error", (err: Error) => {
      // listen failures are reported by listen() itself
      if (!this.started) return;
      this.logger.error(`accept failed: ${err.message}`);
      this.closeListener();
    });
  }

  /** Binds, listens and starts the accept loop. Rejects with ListenError if the endpoint cannot be opened. */
  static async start(options: WebServerOptions): Promise<WebServer> {
    const server = new WebServer(options);
    const host = options.host ?? DEFAULT_HOST;
    if (options.secure) {
      server.logger.warn("TLS is not supported; serving plaintext");
    }
    try {
      await server.listen(host, options.port);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      server.logger.error(`Error listening on ${host}:${options.port}: ${message}`);
      throw new ListenError(message, { host, port: options.port });
    }
    server.started = true;
    server.loop = server.run();
    server.logger.info(`web server listening on ${host}:${server.boundPort}`);
    return server;
  }

  get port(): number {
    return this.boundPort;
  }

  get state(): ServerState {
    return this.currentState;
  }

  /** Closes the listener and resolves once the loop has exited and the port is released. Idempotent. */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    if (this.currentState === "listening") this.currentState = "stopping";
    this.closeListener();
    await this.loop;
  }

  private listen(host: string, port: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error): void => reject(err);
      this.listener.once("error", onError);
      this.listener.listen({ host, port, backlog: LISTEN_BACKLOG }, () => {
        this.listener.off("error", onError);
        const address = this.listener.address();
        this.boundPort = address !== null && typeof address === "object" ? address.port : port;
        resolve();
      });
    });
  }

  private enqueue(socket: net.Socket): void {
    if (this.closing) {
      socket.destroy();
      return;
    }
    if (this.queue.length >= this.maxPending) {
      this.logger.warn(`dropping connection: ${this.queue.length} already waiting`);
      socket.destroy();
      return;
    }
    const conn = soInit(socket);
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(conn);
    } else {
      this.queue.push(conn);
    }
  }

  /** Next connection in arrival order, or null once the listener is closed. */
  private accept(): Promise<TCPConn | null> {
    const next = this.queue.shift();
    if (next) return Promise.resolve(next);
    if (this.closing) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  private closeListener(): void {
    if (this.closing) return;
    this.closing = true;
    this.listener.close();
    for (const conn of this.queue.splice(0)) conn.socket.destroy();
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.(null);
  }

  private async run(): Promise<void> {
    for (;;) {
      const conn = await this.accept();
      if (conn === null) break;
      await serveConnection(conn, this.deps, this.parserOptions);
    }
    await this.listenerClosed;
    this.currentState = "stopped";
    this.logger.info(`web server on port ${this.boundPort} stopped`);
  }
}

export function startWebServer(options: WebServerOptions): Promise<WebServer> {
  return WebServer.start(options);
}

export function stopWebServer(server: WebServer): Promise<void> {
  return server.stop();
}
