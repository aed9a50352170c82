import { mergeEnvironment, parseEnvText } from "./env.js";
import { parseHttpRequestText, resolveHttpRequest } from "./http.js";
import type { ParsedHttpRequest, ResolvedHttpRequest, TransportOptionsInput } from "./schemas.js";

export interface RequestFileInput {
  title: string;
  requestText: string;
  /** `.env` texts, later entries override earlier ones. */
  envTexts?: string[];
}

export interface PreparedRequestFile {
  parsedRequest: ParsedHttpRequest;
  resolvedRequest: ResolvedHttpRequest;
  environment: Record<string, string>;
}

export function prepareRequestFile(input: RequestFileInput): PreparedRequestFile {
  const parsedRequest = parseHttpRequestText(input.requestText, input.title);
  const environment = mergeEnvironment(...(input.envTexts ?? []).map(parseEnvText));
  const resolvedRequest = resolveHttpRequest(parsedRequest, environment);

  return { parsedRequest, resolvedRequest, environment };
}

/**
 * Maps a resolved request file onto transport options plus the body to execute with.
 * A relative request URL needs `baseAddress`.
 */
export function toTransportRequest(
  request: ResolvedHttpRequest,
  baseAddress?: string,
): { options: TransportOptionsInput; body: string | undefined } {
  const options: TransportOptionsInput = {
    method: request.method,
    uri: request.url,
    headers: request.headers,
  };

  if (baseAddress) {
    options.baseAddress = baseAddress;
  }

  return { options, body: request.body };
}
