import { describe, expect, it } from "vitest";
import { frameResponseHead, STATUS } from "./responseFramer.js";
import { InvariantViolation } from "./errors.js";

describe("frameResponseHead", () => {
  it("frames status line, length and connection: close", () => {
    const head = frameResponseHead({ status: 200, reason: "OK", contentLength: 1000 });
    expect(head.toString("latin1")).toBe("HTTP/1.0 200 OK\r\ncontent-length: 1000\r\nconnection: close\r\n\r\n");
  });

  it("appends the extra header line before the blank line", () => {
    const head = frameResponseHead({
      status: STATUS.movedPermanently.code,
      reason: STATUS.movedPermanently.reason,
      contentLength: 0,
      extraHeader: "Location: /test_file",
    });
    expect(head.toString("latin1")).toBe(
      "HTTP/1.0 301 Moved Permanently\r\ncontent-length: 0\r\nconnection: close\r\nLocation: /test_file\r\n\r\n"
    );
  });

  it("rejects an extra header spanning lines", () => {
    expect(() =>
      frameResponseHead({ status: 200, reason: "OK", contentLength: 0, extraHeader: "A: 1\r\nB: 2" })
    ).toThrow(InvariantViolation);
  });

  it("rejects a negative content length", () => {
    expect(() => frameResponseHead({ status: 200, reason: "OK", contentLength: -1 })).toThrow(
      "content length must be a non-negative integer"
    );
  });

  it("rejects a status outside three digits", () => {
    expect(() => frameResponseHead({ status: 42, reason: "Odd", contentLength: 0 })).toThrow("status code out of range");
  });
});

describe("STATUS", () => {
  it("uses the fixture reason phrases", () => {
    expect(STATUS.partial).toEqual({ code: 206, reason: "Partial" });
    expect(STATUS.internalError).toEqual({ code: 503, reason: "Internal Error" });
  });
});
