import { MissingEnvVariablesError, WirecallError } from "./errors.js";
import {
  type ParsedHttpRequest,
  ParsedHttpRequestSchema,
  type ResolvedHttpRequest,
  ResolvedHttpRequestSchema,
} from "./schemas.js";

const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z0-9_]+)\s*\}\}/g;

function normalizeText(input: string): string {
  return input.replace(/\r\n/g, "\n").trim();
}

function isSkippable(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === "" || trimmed.startsWith("#");
}

function parseRequestLine(line: string): { method: string; url: string } {
  const match = line.trim().match(/^([A-Za-z]+)\s+(\S+)(?:\s+HTTP\/[\d.]+)?$/);
  const method = match?.[1];
  const url = match?.[2];

  if (!method || !url) {
    throw new WirecallError(
      "REQUEST_PARSE_ERROR",
      `Invalid request line: ${line}. Expected: METHOD <url>`,
    );
  }

  return { method, url };
}

function parseHeaderLine(line: string): [string, string] {
  const separatorIndex = line.indexOf(":");
  if (separatorIndex <= 0) {
    throw new WirecallError(
      "REQUEST_PARSE_ERROR",
      `Invalid header line: ${line}. Expected: Header-Name: value`,
    );
  }

  return [line.slice(0, separatorIndex).trim(), line.slice(separatorIndex + 1).trim()];
}

/**
 * Parses request file text: leading `#` comments, `METHOD <url>`, header lines up to a blank line,
 * then the body. Repeated headers are kept in order.
 */
export function parseHttpRequestText(text: string, title: string): ParsedHttpRequest {
  const normalized = normalizeText(text);
  if (!normalized) {
    throw new WirecallError("REQUEST_PARSE_ERROR", "Request file is empty.");
  }

  const lines = normalized.split("\n");
  const requestLineIndex = lines.findIndex((line) => !isSkippable(line));
  const requestLine = lines[requestLineIndex];
  if (requestLineIndex < 0 || requestLine === undefined) {
    throw new WirecallError("REQUEST_PARSE_ERROR", "No request line found in file.");
  }

  const { method, url } = parseRequestLine(requestLine);

  const headers: Array<[string, string]> = [];
  let index = requestLineIndex + 1;
  for (; index < lines.length; index += 1) {
    const line = lines[index];
    if (line === undefined || line.trim() === "") {
      index += 1;
      break;
    }

    if (line.trim().startsWith("#")) {
      continue;
    }

    headers.push(parseHeaderLine(line));
  }

  const bodyLines = lines.slice(index);
  const body = bodyLines.length > 0 ? bodyLines.join("\n") : undefined;

  const parsed = ParsedHttpRequestSchema.safeParse({ title, method, url, headers, body });
  if (!parsed.success) {
    throw new WirecallError(
      "REQUEST_VALIDATION_ERROR",
      parsed.error.issues.map((issue) => issue.message).join("; "),
    );
  }

  return parsed.data;
}

export function collectMissingPlaceholders(
  template: string,
  environment: Record<string, string>,
): string[] {
  const missing = new Set<string>();

  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    const key = match[1];
    if (key !== undefined && !Object.hasOwn(environment, key)) {
      missing.add(key);
    }
  }

  return [...missing].sort();
}

export function renderTemplate(template: string, environment: Record<string, string>): string {
  return template.replace(PLACEHOLDER_PATTERN, (_full, key: string) => environment[key] ?? "");
}

export function resolveHttpRequest(
  request: ParsedHttpRequest,
  environment: Record<string, string>,
): ResolvedHttpRequest {
  const templates = [request.url, ...request.headers.map(([, value]) => value)];
  if (request.body) {
    templates.push(request.body);
  }

  const missing = new Set(
    templates.flatMap((template) => collectMissingPlaceholders(template, environment)),
  );
  const missingVariables = [...missing].sort();
  if (missingVariables.length > 0) {
    throw new MissingEnvVariablesError(missingVariables);
  }

  return ResolvedHttpRequestSchema.parse({
    ...request,
    url: renderTemplate(request.url, environment),
    headers: request.headers.map(([key, value]) => [key, renderTemplate(value, environment)]),
    body: request.body ? renderTemplate(request.body, environment) : undefined,
    missingVariables: [],
  });
}
