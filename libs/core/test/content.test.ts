import { Readable } from "node:stream";
import { describe, expect, test } from "vitest";
import { WirecallError, createContent, extractContentType } from "../src/index.js";

describe("createContent", () => {
  test("returns no content without a body", () => {
    expect(createContent(undefined, "utf8", "application/json")).toBeUndefined();
    expect(createContent(null, "utf8", "application/json")).toBeUndefined();
  });

  test("encodes strings with the configured encoding and charset", () => {
    const content = createContent("héllo", "latin1", "text/plain");

    expect(content?.kind).toBe("text");
    expect(content?.contentType).toBe("text/plain; charset=iso-8859-1");
    if (content?.kind === "text") {
      expect([...content.data]).toEqual([0x68, 0xe9, 0x6c, 0x6c, 0x6f]);
      expect(content.text).toBe("héllo");
    }
  });

  test("keeps a content type that already carries parameters", () => {
    const content = createContent("{}", "utf8", "application/json; charset=utf-8");
    expect(content?.contentType).toBe("application/json; charset=utf-8");
  });

  test("passes byte buffers and streams through with the explicit content type", () => {
    const bytes = new Uint8Array([1, 2, 3]);
    const stream = Readable.from(["chunk"]);

    expect(createContent(bytes, "utf8", "application/octet-stream")).toEqual({
      kind: "bytes",
      data: bytes,
      contentType: "application/octet-stream",
    });

    const streamed = createContent(stream, "utf8", "text/csv");
    expect(streamed?.kind).toBe("stream");
    expect(streamed?.data).toBe(stream);
    expect(streamed?.contentType).toBe("text/csv");
  });

  test("rejects any other body shape", () => {
    expect(() => createContent({ id: 1 }, "utf8", "application/json")).toThrow(
      new WirecallError("UNSUPPORTED_BODY", "Request body of type Object is not supported"),
    );

    expect(() => createContent(42, "utf8", "application/json")).toThrow(
      "Request body of type number is not supported",
    );
  });
});

describe("extractContentType", () => {
  test("takes the first content type header regardless of case", () => {
    const { contentType, headers } = extractContentType([
      ["Accept", "text/plain"],
      ["content-type", "text/xml"],
      ["Content-Type", "application/json"],
    ]);

    expect(contentType).toBe("text/xml");
    expect(headers).toEqual([["Accept", "text/plain"]]);
  });

  test("defaults to application/json", () => {
    expect(extractContentType([]).contentType).toBe("application/json");
  });
});
