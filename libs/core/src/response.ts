import { Buffer } from "node:buffer";
import { STATUS_CODES } from "node:http";
import type { Response } from "undici";
import { type Cookie, CookieJar } from "./cookies.js";
import type { TextEncoding } from "./schemas.js";

export const RAW_MEDIA_TYPES: readonly string[] = [
  "application/octet-stream",
  "application/pdf",
  "application/rtf",
  "application/zip",
];

export type ResponseBody =
  | { value: string; rawValue: null; isRaw: false; isAssigned: true }
  | { value: null; rawValue: Uint8Array; isRaw: true; isAssigned: true }
  | { value: null; rawValue: null; isRaw: false; isAssigned: false };

export const UNASSIGNED_BODY: ResponseBody = {
  value: null,
  rawValue: null,
  isRaw: false,
  isAssigned: false,
};

export function mediaTypeOf(contentType: string | null | undefined): string | null {
  if (!contentType) {
    return null;
  }

  const [mediaType = ""] = contentType.split(";");
  const normalized = mediaType.trim().toLowerCase();
  return normalized || null;
}

export function isRawMediaType(contentType: string | null | undefined): boolean {
  const mediaType = mediaTypeOf(contentType);
  return mediaType !== null && RAW_MEDIA_TYPES.includes(mediaType);
}

/**
 * Builds a header map from one or more header sources.
 * Values of a repeated key within a source are joined with ", "; across sources the first source wins.
 */
export function collectHeaders(
  ...sources: Array<Iterable<readonly [string, string]>>
): Record<string, string> {
  const result: Record<string, string> = {};

  for (const source of sources) {
    const grouped = new Map<string, string[]>();
    for (const [key, value] of source) {
      const values = grouped.get(key);
      if (values) {
        values.push(value);
      } else {
        grouped.set(key, [value]);
      }
    }

    for (const [key, values] of grouped) {
      if (!Object.hasOwn(result, key)) {
        result[key] = values.join(", ");
      }
    }
  }

  return result;
}

export function collectCookies(
  setCookieHeaders: readonly string[],
  url: URL,
  jar = new CookieJar(),
): Cookie[] {
  if (setCookieHeaders.length === 0) {
    return [];
  }

  for (const header of setCookieHeaders) {
    jar.setCookie(url, header);
  }

  return jar.getCookies(url);
}

export function classifyBody(
  bytes: Uint8Array,
  contentType: string | null,
  encoding: TextEncoding,
): ResponseBody {
  if (isRawMediaType(contentType)) {
    return { value: null, rawValue: bytes, isRaw: true, isAssigned: true };
  }

  const value = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(encoding);
  return { value, rawValue: null, isRaw: false, isAssigned: true };
}

export async function readResponseBody(
  response: Response,
  encoding: TextEncoding,
): Promise<ResponseBody> {
  const bytes = new Uint8Array(await response.arrayBuffer());
  return classifyBody(bytes, response.headers.get("content-type"), encoding);
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status <= 299;
}

/** Status name in PascalCase, e.g. 500 -> "InternalServerError". */
export function statusName(status: number, fallback = ""): string {
  const phrase = STATUS_CODES[status] ?? fallback;
  const name = phrase
    .split(/[^A-Za-z0-9]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join("");

  return name || String(status);
}

/** URL the response was finally served from, after any redirects. */
export function effectiveUrl(response: Response, requestUrl: URL): URL {
  return response.url ? new URL(response.url) : requestUrl;
}

export interface CapturedResponse {
  statusCode: number;
  headers: Record<string, string> | null;
  cookies: Cookie[] | null;
  body: ResponseBody;
}

/**
 * Records the status of every response; headers, cookies and body only for 2xx responses.
 * Cookies are scoped to `url`, the response's effective URL.
 */
export async function captureResponse(
  response: Response,
  url: URL,
  encoding: TextEncoding,
  jar?: CookieJar,
): Promise<CapturedResponse> {
  if (!isSuccessStatus(response.status)) {
    return { statusCode: response.status, headers: null, cookies: null, body: UNASSIGNED_BODY };
  }

  const headers = collectHeaders(response.headers);
  const cookies = collectCookies(response.headers.getSetCookie(), url, jar);
  const body = await readResponseBody(response, encoding);

  return { statusCode: response.status, headers, cookies, body };
}
