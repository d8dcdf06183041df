import { describe, expect, it } from "vitest";
import { RequestParser, type ParseResult, type ParsedRequest } from "./requestParser.js";

function completed(result: ParseResult): ParsedRequest {
  if (result.kind !== "complete") throw new Error(`expected complete, got ${result.kind}`);
  return result.request;
}

describe("RequestParser", () => {
  it("parses a complete request delivered in one chunk", () => {
    const parser = new RequestParser();
    const request = completed(parser.push(Buffer.from("GET /test_file HTTP/1.0\r\nHost: localhost\r\n\r\n")));
    expect(request.method).toBe("get");
    expect(request.path).toBe("/test_file");
    expect(request.version).toBe("HTTP/1.0");
    expect(request.headers.get("host")).toBe("localhost");
    expect(request.body.length).toBe(0);
  });

  it("reports incomplete until the blank line arrives", () => {
    const parser = new RequestParser();
    expect(parser.push(Buffer.from("GET /data.b"))).toEqual({ kind: "incomplete" });
    expect(parser.push(Buffer.from("in HTTP/1.0\r\nRange: bytes=1-2\r"))).toEqual({ kind: "incomplete" });
    expect(parser.push(Buffer.from("\n\r"))).toEqual({ kind: "incomplete" });
    const request = completed(parser.push(Buffer.from("\n")));
    expect(request.path).toBe("/data.bin");
    expect(request.headers.get("range")).toBe("bytes=1-2");
  });

  it("survives byte-at-a-time delivery", () => {
    const parser = new RequestParser();
    const raw = "POST /x HTTP/1.0\r\nA: 1\r\n\r\n";
    let result: ParseResult = { kind: "incomplete" };
    for (const byte of Buffer.from(raw)) {
      result = parser.push(Buffer.from([byte]));
    }
    expect(completed(result)).toMatchObject({ method: "post", path: "/x" });
  });

  it("accepts a head with bare LF line endings", () => {
    const parser = new RequestParser();
    const request = completed(parser.push(Buffer.from("GET /test_file HTTP/1.0\nRange: bytes=0-1\n\n")));
    expect(request.path).toBe("/test_file");
    expect(request.version).toBe("HTTP/1.0");
    expect([...request.headers.entries()]).toEqual([["range", "bytes=0-1"]]);
  });

  it("accepts a head mixing CRLF and LF line endings", () => {
    const parser = new RequestParser();
    const request = completed(parser.push(Buffer.from("GET /a HTTP/1.0\r\nX-One: 1\nX-Two: 2\r\n\n")));
    expect(request.headers.get("x-one")).toBe("1");
    expect(request.headers.get("x-two")).toBe("2");
  });

  it("finds a bare LF terminator split across chunks", () => {
    const parser = new RequestParser();
    expect(parser.push(Buffer.from("GET /data.bin HTTP/1.0\nRange: bytes=5-9"))).toEqual({ kind: "incomplete" });
    expect(parser.push(Buffer.from("\n"))).toEqual({ kind: "incomplete" });
    const request = completed(parser.push(Buffer.from("\n")));
    expect(request.headers.get("range")).toBe("bytes=5-9");
  });

  it("starts the body right after a bare LF empty line", () => {
    const parser = new RequestParser();
    const request = completed(parser.push(Buffer.from("POST /up HTTP/1.0\nContent-Length: 3\n\nxyz")));
    expect(request.body.toString()).toBe("xyz");
  });

  it("lower-cases method and header names, last repeat wins", () => {
    const parser = new RequestParser();
    const request = completed(
      parser.push(Buffer.from("gEt / HTTP/1.0\r\nX-Thing: one\r\nx-thing: two\r\n\r\n"))
    );
    expect(request.method).toBe("get");
    expect(request.headers.get("x-thing")).toBe("two");
    expect(request.headers.size).toBe(1);
  });

  it("ignores header lines without a colon", () => {
    const parser = new RequestParser();
    const request = completed(parser.push(Buffer.from("GET / HTTP/1.0\r\ngarbage line\r\nRange: bytes=0-1\r\n\r\n")));
    expect([...request.headers.entries()]).toEqual([["range", "bytes=0-1"]]);
  });

  it("rejects a request line with fewer than three tokens", () => {
    const parser = new RequestParser();
    expect(parser.push(Buffer.from("GET /\r\n\r\n"))).toEqual({ kind: "malformed", reason: "bad request line" });
  });

  it("rejects a target that is not a path", () => {
    const parser = new RequestParser();
    expect(parser.push(Buffer.from("GET test_file HTTP/1.0\r\n\r\n"))).toEqual({
      kind: "malformed",
      reason: "request target must start with '/'",
    });
  });

  it("reduces an absolute-form target to its path", () => {
    const parser = new RequestParser();
    const request = completed(parser.push(Buffer.from("GET http://127.0.0.1:8080/test_file?x=1 HTTP/1.0\r\n\r\n")));
    expect(request.path).toBe("/test_file?x=1");
  });

  it("waits for a declared body before completing", () => {
    const parser = new RequestParser();
    expect(parser.push(Buffer.from("POST /upload HTTP/1.0\r\nContent-Length: 5\r\n\r\nab"))).toEqual({
      kind: "incomplete",
    });
    const request = completed(parser.push(Buffer.from("cde")));
    expect(request.body.toString()).toBe("abcde");
  });

  it("rejects a non-numeric content-length", () => {
    const parser = new RequestParser();
    expect(parser.push(Buffer.from("POST / HTTP/1.0\r\nContent-Length: five\r\n\r\n"))).toEqual({
      kind: "malformed",
      reason: "bad content-length",
    });
  });

  it("rejects a body larger than the limit", () => {
    const parser = new RequestParser({ maxBodyLength: 4 });
    expect(parser.push(Buffer.from("POST / HTTP/1.0\r\nContent-Length: 5\r\n\r\n"))).toEqual({
      kind: "malformed",
      reason: "request body too large",
    });
  });

  it("rejects a head that never terminates within the limit", () => {
    const parser = new RequestParser({ maxHeadLength: 32 });
    expect(parser.push(Buffer.from("GET / HTTP/1.0\r\n"))).toEqual({ kind: "incomplete" });
    expect(parser.push(Buffer.from("X-Long: aaaaaaaaaaaaaaaa"))).toEqual({
      kind: "malformed",
      reason: "request head too large",
    });
  });

  it("keeps its result once settled", () => {
    const parser = new RequestParser();
    const first = parser.push(Buffer.from("GET /a HTTP/1.0\r\n\r\n"));
    const again = parser.push(Buffer.from("GET /b HTTP/1.0\r\n\r\n"));
    expect(again).toBe(first);
  });
});
