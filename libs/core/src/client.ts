import { Buffer } from "node:buffer";
import { Agent, type Dispatcher, fetch, type RequestInit, type Response } from "undici";
import type { RequestContent } from "./content.js";
import { WirecallError } from "./errors.js";

export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_CLIENT_NAME = "default";

export interface OutgoingRequest {
  method: string;
  url: URL;
  headers: Array<[string, string]>;
  content?: RequestContent;
}

export interface HttpClient {
  send(request: OutgoingRequest): Promise<Response>;
}

export interface DisposableHttpClient extends HttpClient {
  close(): Promise<void>;
}

export interface HttpClientFactory {
  createClient(name?: string): HttpClient;
}

export interface ClientCertificate {
  /** PKCS#12 bundle holding the client certificate and its key. */
  pfx: Uint8Array;
  passphrase?: string;
  /** Verify the server certificate chain. Defaults to true. */
  rejectUnauthorized?: boolean;
}

export interface ClientProfile {
  timeoutMs?: number;
  certificate?: ClientCertificate;
  connections?: number;
  keepAliveTimeoutMs?: number;
}

/** Non-positive or missing timeouts fall back to the default. */
export function effectiveTimeout(timeoutMs: number | undefined): number {
  return timeoutMs !== undefined && timeoutMs > 0 ? timeoutMs : DEFAULT_TIMEOUT_MS;
}

export type DispatcherFactory = (profile: ClientProfile) => Dispatcher;

/** Agent settings for a profile; a client certificate verifies the server unless told otherwise. */
export function agentOptions(profile: ClientProfile): Agent.Options {
  const options: Agent.Options = {};

  if (profile.connections !== undefined) {
    options.connections = profile.connections;
  }

  if (profile.keepAliveTimeoutMs !== undefined) {
    options.keepAliveTimeout = profile.keepAliveTimeoutMs;
  }

  const certificate = profile.certificate;
  if (certificate) {
    options.connect = {
      pfx: Buffer.from(certificate.pfx),
      passphrase: certificate.passphrase,
      rejectUnauthorized: certificate.rejectUnauthorized ?? true,
    };
  }

  return options;
}

export function createAgent(profile: ClientProfile): Agent {
  return new Agent(agentOptions(profile));
}

function isTimeoutError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

export class UndiciHttpClient implements HttpClient {
  constructor(
    private readonly dispatcher: Dispatcher,
    private readonly timeoutMs = DEFAULT_TIMEOUT_MS,
  ) {}

  async send(request: OutgoingRequest): Promise<Response> {
    const headers: Array<[string, string]> = [...request.headers];
    const init: RequestInit = {
      method: request.method,
      headers,
      dispatcher: this.dispatcher,
      signal: AbortSignal.timeout(this.timeoutMs),
    };

    const content = request.content;
    if (content) {
      headers.push(["Content-Type", content.contentType]);
      init.body = content.data;
      if (content.kind === "stream") {
        init.duplex = "half";
      }
    }

    try {
      return await fetch(request.url, init);
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new WirecallError(
          "TRANSPORT_ERROR",
          `Request timed out after ${this.timeoutMs} ms: ${request.method} ${request.url.href}`,
          { cause: error },
        );
      }

      throw error;
    }
  }
}

/**
 * A client that owns its dispatcher. Closing it releases the connections it opened.
 */
export function createDedicatedClient(
  profile: ClientProfile = {},
  createDispatcher: DispatcherFactory = createAgent,
): DisposableHttpClient {
  const dispatcher = createDispatcher(profile);
  const client = new UndiciHttpClient(dispatcher, effectiveTimeout(profile.timeoutMs));

  return {
    send: (request) => client.send(request),
    close: () => dispatcher.close(),
  };
}

export interface UndiciClientFactoryOptions {
  profiles?: Record<string, ClientProfile>;
  createDispatcher?: DispatcherFactory;
}

/**
 * Hands out clients that share one pooled dispatcher per profile name.
 * Names without a configured profile get default settings.
 */
export class UndiciClientFactory implements HttpClientFactory {
  private readonly profiles: Record<string, ClientProfile>;
  private readonly createDispatcher: DispatcherFactory;
  private readonly dispatchers = new Map<string, Dispatcher>();

  constructor(options: UndiciClientFactoryOptions = {}) {
    this.profiles = options.profiles ?? {};
    this.createDispatcher = options.createDispatcher ?? createAgent;
  }

  createClient(name: string = DEFAULT_CLIENT_NAME): HttpClient {
    const profile = this.profiles[name] ?? {};

    let dispatcher = this.dispatchers.get(name);
    if (!dispatcher) {
      dispatcher = this.createDispatcher(profile);
      this.dispatchers.set(name, dispatcher);
    }

    return new UndiciHttpClient(dispatcher, effectiveTimeout(profile.timeoutMs));
  }

  get pooledClientCount(): number {
    return this.dispatchers.size;
  }

  async close(): Promise<void> {
    const dispatchers = [...this.dispatchers.values()];
    this.dispatchers.clear();
    await Promise.all(dispatchers.map((dispatcher) => dispatcher.close()));
  }
}
