import { Buffer } from "node:buffer";
import { Readable } from "node:stream";
import { WirecallError } from "./errors.js";
import type { TextEncoding } from "./schemas.js";

export const DEFAULT_CONTENT_TYPE = "application/json";

export type RequestBody = string | Uint8Array | Readable;

export type RequestContent =
  | { kind: "text"; data: Buffer; text: string; contentType: string }
  | { kind: "bytes"; data: Uint8Array; contentType: string }
  | { kind: "stream"; data: Readable; contentType: string };

const CHARSETS: Record<TextEncoding, string> = {
  utf8: "utf-8",
  utf16le: "utf-16le",
  latin1: "iso-8859-1",
  ascii: "us-ascii",
};

export function charsetOf(encoding: TextEncoding): string {
  return CHARSETS[encoding];
}

function describeShape(data: unknown): string {
  if (typeof data === "object" && data !== null) {
    return data.constructor?.name ?? "Object";
  }

  return typeof data;
}

/**
 * Encodes a request body by its runtime shape. `undefined` and `null` mean no content.
 */
export function createContent(
  data: unknown,
  encoding: TextEncoding,
  contentType: string,
): RequestContent | undefined {
  if (data === undefined || data === null) {
    return undefined;
  }

  if (typeof data === "string") {
    const textContentType = contentType.includes(";")
      ? contentType
      : `${contentType}; charset=${charsetOf(encoding)}`;
    return {
      kind: "text",
      data: Buffer.from(data, encoding),
      text: data,
      contentType: textContentType,
    };
  }

  if (data instanceof Uint8Array) {
    return { kind: "bytes", data, contentType };
  }

  if (data instanceof Readable) {
    return { kind: "stream", data, contentType };
  }

  throw new WirecallError(
    "UNSUPPORTED_BODY",
    `Request body of type ${describeShape(data)} is not supported`,
  );
}

/**
 * Splits configured headers into the content type and the remaining request headers.
 */
export function extractContentType(headers: ReadonlyArray<readonly [string, string]>): {
  contentType: string;
  headers: Array<[string, string]>;
} {
  let contentType: string | undefined;
  const remaining: Array<[string, string]> = [];

  for (const [key, value] of headers) {
    if (key.toLowerCase() === "content-type") {
      contentType ??= value;
      continue;
    }
    remaining.push([key, value]);
  }

  return { contentType: contentType ?? DEFAULT_CONTENT_TYPE, headers: remaining };
}
