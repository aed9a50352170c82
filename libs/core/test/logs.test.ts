import { Readable } from "node:stream";
import { describe, expect, test } from "vitest";
import {
  UNASSIGNED_BODY,
  createContent,
  formatRequestLog,
  formatResponseLog,
  formatStatusLine,
} from "../src/index.js";

describe("formatRequestLog", () => {
  test("renders the request line and a blank line when there are no headers or body", () => {
    expect(formatRequestLog("GET", new URL("http://api.test/ok"), [])).toBe(
      "GET http://api.test/ok\r\n\r\n",
    );
  });

  test("renders headers in order followed by the text body", () => {
    const content = createContent('{"id":1}', "utf8", "application/json");

    const log = formatRequestLog(
      "POST",
      new URL("http://api.test/items"),
      [
        ["Cookie", "a=1"],
        ["X-Trace", "t1"],
      ],
      content,
    );

    expect(log).toBe(
      'POST http://api.test/items\r\nCookie: a=1\r\nX-Trace: t1\r\n\r\n{"id":1}\r\n',
    );
  });

  test("renders bytes as base64 and streams as a marker", () => {
    const url = new URL("http://api.test/upload");

    expect(
      formatRequestLog("PUT", url, [], createContent(new Uint8Array([1, 2, 3]), "utf8", "x/y")),
    ).toBe("PUT http://api.test/upload\r\n\r\nAQID\r\n");
    expect(
      formatRequestLog("PUT", url, [], createContent(Readable.from(["a"]), "utf8", "x/y")),
    ).toBe("PUT http://api.test/upload\r\n\r\n<stream>\r\n");
  });
});

describe("formatResponseLog", () => {
  test("uses the upper-cased scheme and a PascalCase status name", () => {
    expect(formatStatusLine(new URL("https://api.test/"), 404)).toBe("HTTPS 1.1 404 NotFound");
  });

  test("renders only the status line for an unsuccessful response", () => {
    expect(formatResponseLog(new URL("http://api.test/err"), 500, null, UNASSIGNED_BODY)).toBe(
      "HTTP 1.1 500 InternalServerError\r\n",
    );
  });

  test("renders headers and a text body", () => {
    const log = formatResponseLog(
      new URL("http://api.test/ok"),
      200,
      { "content-type": "text/plain" },
      { value: "hi", rawValue: null, isRaw: false, isAssigned: true },
    );

    expect(log).toBe("HTTP 1.1 200 OK\r\ncontent-type: text/plain\r\n\r\nhi\r\n");
  });

  test("renders a raw body as base64", () => {
    const log = formatResponseLog(
      new URL("https://api.test/file"),
      200,
      { "content-type": "application/pdf" },
      { value: null, rawValue: new Uint8Array([1, 2, 3]), isRaw: true, isAssigned: true },
    );

    expect(log).toBe("HTTPS 1.1 200 OK\r\ncontent-type: application/pdf\r\n\r\nAQID\r\n");
  });
});
