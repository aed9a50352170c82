import type { OutgoingRequest } from "./client.js";
import { serializeCookieHeader } from "./cookies.js";
import { createContent, extractContentType } from "./content.js";
import { WirecallError } from "./errors.js";
import { formatRequestLog } from "./logs.js";
import {
  type TransportOptions,
  type TransportOptionsInput,
  TransportOptionsSchema,
} from "./schemas.js";

export function parseTransportOptions(input: TransportOptionsInput): TransportOptions {
  const parsed = TransportOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new WirecallError(
      "CONFIGURATION_ERROR",
      parsed.error.issues
        .map((issue) =>
          issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
        )
        .join("; "),
    );
  }

  return parsed.data;
}

export function resolveRequestUrl(uri: string | undefined, baseAddress: string | undefined): URL {
  if (!uri && !baseAddress) {
    throw new WirecallError(
      "CONFIGURATION_ERROR",
      "Request URI is not set. Provide an absolute uri or a baseAddress.",
    );
  }

  if (!baseAddress) {
    try {
      return new URL(uri ?? "");
    } catch (error) {
      throw new WirecallError(
        "CONFIGURATION_ERROR",
        `Request URI must be absolute when no base address is set: ${uri}`,
        { cause: error },
      );
    }
  }

  try {
    return new URL(uri ?? "", baseAddress);
  } catch (error) {
    throw new WirecallError(
      "CONFIGURATION_ERROR",
      `Cannot resolve request URI '${uri ?? ""}' against base address '${baseAddress}'`,
      { cause: error },
    );
  }
}

export interface BuiltRequest {
  request: OutgoingRequest;
  log: string;
}

/**
 * Builds the outgoing request and its log. The `Cookie` header precedes the configured headers;
 * the content type is carried by the content, not the header list.
 */
export function buildRequest(options: TransportOptions, body?: unknown): BuiltRequest {
  const url = resolveRequestUrl(options.uri, options.baseAddress);
  const { contentType, headers: configuredHeaders } = extractContentType(options.headers);

  const headers: Array<[string, string]> = [];
  if (options.cookies.length > 0) {
    headers.push(["Cookie", serializeCookieHeader(options.cookies)]);
  }
  headers.push(...configuredHeaders);

  const content = createContent(body, options.encoding, contentType);

  const request: OutgoingRequest = { method: options.method, url, headers };
  if (content) {
    request.content = content;
  }

  return {
    request,
    log: formatRequestLog(options.method, url, headers, content),
  };
}
