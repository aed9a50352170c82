import { Buffer } from "node:buffer";
import type { RequestContent } from "./content.js";
import { type ResponseBody, statusName } from "./response.js";

const CRLF = "\r\n";

/** fetch does not report the negotiated protocol version. */
export const HTTP_VERSION = "1.1";

function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
}

function renderContent(content: RequestContent): string {
  switch (content.kind) {
    case "text":
      return content.text;
    case "bytes":
      return toBase64(content.data);
    case "stream":
      return "<stream>";
  }
}

export function formatRequestLog(
  method: string,
  url: URL,
  headers: ReadonlyArray<readonly [string, string]>,
  content?: RequestContent,
): string {
  let log = `${method} ${url.href}${CRLF}`;

  for (const [key, value] of headers) {
    log += `${key}: ${value}${CRLF}`;
  }

  log += CRLF;

  if (content) {
    log += `${renderContent(content)}${CRLF}`;
  }

  return log;
}

export function formatStatusLine(url: URL, status: number, statusText = ""): string {
  const scheme = url.protocol.replace(/:$/, "").toUpperCase();
  return `${scheme} ${HTTP_VERSION} ${status} ${statusName(status, statusText)}`;
}

export function formatResponseLog(
  url: URL,
  status: number,
  headers: Record<string, string> | null,
  body: ResponseBody,
  statusText = "",
): string {
  let log = `${formatStatusLine(url, status, statusText)}${CRLF}`;

  if (headers) {
    for (const [key, value] of Object.entries(headers)) {
      log += `${key}: ${value}${CRLF}`;
    }
  }

  if (body.isAssigned) {
    const rendered = body.isRaw ? toBase64(body.rawValue) : body.value;
    log += `${CRLF}${rendered}${CRLF}`;
  }

  return log;
}
