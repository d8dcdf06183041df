/**
 * Promise-based API over a paused TCP socket.
 * One outstanding read at a time; the socket only flows while a read waits.
 */

import type * as net from "node:net";
import { InvariantViolation } from "../domain/errors.js";

export type TCPConn = {
  socket: net.Socket;
  // from the 'error' event
  err: null | Error;
  // EOF, from the 'end' event
  ended: boolean;
  // callbacks of the pending read
  reader: null | {
    resolve: (value: Buffer) => void;
    reject: (reason: Error) => void;
  };
};

export function soInit(socket: net.Socket): TCPConn {
  const conn: TCPConn = { socket, err: null, ended: false, reader: null };

  socket.on("data", (data: Buffer) => {
    // pause until the next read
    conn.socket.pause();
    const reader = conn.reader;
    conn.reader = null;
    reader?.resolve(data);
  });

  socket.on("end", () => {
    conn.ended = true;
    const reader = conn.reader;
    conn.reader = null;
    reader?.resolve(Buffer.alloc(0));
  });

  socket.on("error", (err: Error) => {
    conn.err = err;
    const reader = conn.reader;
    conn.reader = null;
    reader?.reject(err);
  });

  return conn;
}

/** Resolves with the next chunk, or an empty buffer at EOF. */
export function soRead(conn: TCPConn): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    if (conn.reader) {
      reject(new InvariantViolation("concurrent read on one connection"));
      return;
    }
    if (conn.err) {
      reject(conn.err);
      return;
    }
    if (conn.ended) {
      resolve(Buffer.alloc(0));
      return;
    }
    conn.reader = { resolve, reject };
    conn.socket.resume();
  });
}

/** Resolves once the data has been handed to the kernel in full. */
export function soWrite(conn: TCPConn, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    if (conn.err) {
      reject(conn.err);
      return;
    }
    conn.socket.write(data, (err) => (err ? reject(err) : resolve()));
  });
}
