export type WirecallErrorCode =
  | "CONFIGURATION_ERROR"
  | "UNSUPPORTED_BODY"
  | "HTTP_STATUS_ERROR"
  | "RESPONSE_REJECTED"
  | "TRANSPORT_ERROR"
  | "CONCURRENT_EXECUTION"
  | "REQUEST_PARSE_ERROR"
  | "REQUEST_VALIDATION_ERROR"
  | "MISSING_ENV_VARIABLES";

export class WirecallError extends Error {
  readonly code: WirecallErrorCode;

  constructor(code: WirecallErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WirecallError";
    this.code = code;
  }
}

export class HttpStatusError extends WirecallError {
  readonly status: number;

  constructor(status: number, statusName: string) {
    super(
      "HTTP_STATUS_ERROR",
      `Response status code does not indicate success: ${status} (${statusName}).`,
    );
    this.name = "HttpStatusError";
    this.status = status;
  }
}

export class MissingEnvVariablesError extends WirecallError {
  readonly missingVariables: string[];

  constructor(missingVariables: string[]) {
    super("MISSING_ENV_VARIABLES", `Missing environment variables: ${missingVariables.join(", ")}`);
    this.name = "MissingEnvVariablesError";
    this.missingVariables = missingVariables;
  }
}

/**
 * Joins the messages of an error and its `cause` chain, outermost first.
 */
export function getFullMessage(error: unknown): string {
  const messages: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);

    if (current instanceof Error) {
      if (current.message) {
        messages.push(current.message);
      }
      current = current.cause;
      continue;
    }

    messages.push(String(current));
    break;
  }

  return messages.join(": ");
}

export function normalizeError(error: unknown): WirecallError {
  if (error instanceof WirecallError) {
    return error;
  }

  return new WirecallError("TRANSPORT_ERROR", getFullMessage(error) || "Unknown error", {
    cause: error,
  });
}
