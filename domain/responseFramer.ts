/**
 * Response framer — HTTP/1.0 status line and headers.
 * The body is not framed here; callers write it separately after the head.
 */

import { invariant } from "./validation.js";

export const STATUS = {
  ok: { code: 200, reason: "OK" },
  partial: { code: 206, reason: "Partial" },
  movedPermanently: { code: 301, reason: "Moved Permanently" },
  badRequest: { code: 400, reason: "Bad Request" },
  notFound: { code: 404, reason: "Not Found" },
  rangeNotSatisfiable: { code: 416, reason: "Range Not Satisfiable" },
  internalError: { code: 503, reason: "Internal Error" },
} as const;

export type Status = (typeof STATUS)[keyof typeof STATUS];

export interface ResponseHead {
  status: number;
  reason: string;
  contentLength: number;
  /** One header line, e.g. `Location: /test_file`, without its CRLF. */
  extraHeader?: string;
}

const CRLF = "\r\n";

export function frameResponseHead(head: ResponseHead): Buffer {
  const { status, reason, contentLength, extraHeader } = head;
  invariant(Number.isInteger(status) && status >= 100 && status <= 999, "status code out of range", { status });
  invariant(!/[\r\n]/.test(reason), "reason phrase must be a single line", { reason });
  invariant(Number.isSafeInteger(contentLength) && contentLength >= 0, "content length must be a non-negative integer", {
    contentLength,
  });
  invariant(extraHeader === undefined || !/[\r\n]/.test(extraHeader), "extra header must be a single line", {
    extraHeader,
  });

  const text =
    `HTTP/1.0 ${status} ${reason}${CRLF}` +
    `content-length: ${contentLength}${CRLF}` +
    `connection: close${CRLF}` +
    (extraHeader !== undefined ? `${extraHeader}${CRLF}` : "") +
    CRLF;
  return Buffer.from(text, "latin1");
}
