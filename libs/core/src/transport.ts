import type { Response } from "undici";
import {
  type ClientCertificate,
  createDedicatedClient,
  type DispatcherFactory,
  type DisposableHttpClient,
  type HttpClient,
  type HttpClientFactory,
} from "./client.js";
import type { RequestBody } from "./content.js";
import type { Cookie } from "./cookies.js";
import { HttpStatusError, WirecallError, normalizeError } from "./errors.js";
import { LifecycleEmitter, type Listener, type TransportEventMap } from "./events.js";
import { type Logger, silentLogger } from "./logger.js";
import { formatResponseLog } from "./logs.js";
import { buildRequest, parseTransportOptions } from "./request.js";
import {
  captureResponse,
  effectiveUrl,
  isSuccessStatus,
  type ResponseBody,
  statusName,
  UNASSIGNED_BODY,
} from "./response.js";
import type { TextEncoding, TransportOptionsInput } from "./schemas.js";

export type ClientSource =
  | {
      kind: "factory";
      factory: HttpClientFactory;
      /** Client profile name handed to the factory. */
      clientName?: string;
    }
  | {
      kind: "dedicated";
      timeoutMs?: number;
      certificate?: ClientCertificate;
      createDispatcher?: DispatcherFactory;
    };

export type TransportState = "idle" | "building" | "sent" | "succeeded" | "failed";

export interface Exchange {
  state: TransportState;
  statusCode: number | null;
  requestLog: string | null;
  responseLog: string | null;
  responseBody: ResponseBody;
  responseHeaders: Record<string, string> | null;
  responseCookies: Cookie[] | null;
}

export type ExecutionResult =
  | { ok: true; exchange: Exchange }
  | { ok: false; error: WirecallError; exchange: Exchange };

/** Extra acceptance check run after a 2xx response has been captured. */
export type ResponseProcessor = (exchange: Exchange) => boolean | Promise<boolean>;

export interface HttpTransportConfig extends TransportOptionsInput {
  client?: ClientSource;
  logger?: Logger;
  processResponse?: ResponseProcessor;
}

function emptyExchange(state: TransportState): Exchange {
  return {
    state,
    statusCode: null,
    requestLog: null,
    responseLog: null,
    responseBody: UNASSIGNED_BODY,
    responseHeaders: null,
    responseCookies: null,
  };
}

/**
 * Single-call HTTP wrapper: builds the request, sends it, captures the response and
 * reports the lifecycle as `request`, `response`, then exactly one of `success` or `fail`.
 *
 * `execute` never rejects; failures come back as `{ ok: false, error }`.
 *
 * @example
 * ```typescript
 * const transport = new HttpTransport({ method: "GET", uri: "https://api.example.com/health" });
 * transport.on("fail", ({ message }) => console.error(message));
 *
 * const result = await transport.execute();
 * if (result.ok) {
 *   console.log(result.exchange.responseBody.value);
 * }
 * ```
 */
export class HttpTransport {
  private readonly config: HttpTransportConfig;
  private readonly logger: Logger;
  private readonly events: LifecycleEmitter<TransportEventMap>;
  private current: Exchange = emptyExchange("idle");
  private running = false;

  constructor(config: HttpTransportConfig) {
    this.config = config;
    this.logger = config.logger ?? silentLogger;
    this.events = new LifecycleEmitter<TransportEventMap>(this.logger);
  }

  on<K extends keyof TransportEventMap>(
    event: K,
    listener: Listener<TransportEventMap[K]>,
  ): () => void {
    return this.events.on(event, listener);
  }

  off<K extends keyof TransportEventMap>(event: K, listener: Listener<TransportEventMap[K]>): void {
    this.events.off(event, listener);
  }

  get state(): TransportState {
    return this.current.state;
  }

  /** Snapshot of the most recent execution. */
  get exchange(): Exchange {
    return { ...this.current };
  }

  async execute(body?: RequestBody): Promise<ExecutionResult> {
    if (this.running) {
      return this.rejectConcurrent();
    }

    this.running = true;
    this.current = emptyExchange("building");
    let dedicatedClient: DisposableHttpClient | undefined;

    try {
      const options = parseTransportOptions(this.config);
      const { request, log } = buildRequest(options, body);

      this.current.requestLog = log;
      await this.events.emit("request", { log });

      let client: HttpClient;
      if (this.config.client?.kind === "factory") {
        client = this.config.client.factory.createClient(this.config.client.clientName);
      } else {
        dedicatedClient = this.createDedicated();
        client = dedicatedClient;
      }

      this.current.state = "sent";
      this.logger.debug("Sending request", { method: request.method, url: request.url.href });

      const response = await client.send(request);
      await this.capture(response, effectiveUrl(response, request.url), options.encoding);

      if (!isSuccessStatus(response.status)) {
        throw new HttpStatusError(response.status, statusName(response.status, response.statusText));
      }

      const processResponse = this.config.processResponse;
      if (processResponse && !(await processResponse(this.exchange))) {
        throw new WirecallError("RESPONSE_REJECTED", "Response was rejected by the response processor");
      }

      return await this.complete();
    } catch (error) {
      return await this.complete(normalizeError(error));
    } finally {
      if (dedicatedClient) {
        await dedicatedClient.close().catch((error: unknown) => {
          this.logger.warn("Failed to close dedicated HTTP client", {
            error: error instanceof Error ? error.message : String(error),
          });
        });
      }
      this.running = false;
    }
  }

  private createDedicated(): DisposableHttpClient {
    const source = this.config.client?.kind === "dedicated" ? this.config.client : undefined;
    return createDedicatedClient(
      { timeoutMs: source?.timeoutMs, certificate: source?.certificate },
      source?.createDispatcher,
    );
  }

  private async capture(
    response: Response,
    url: URL,
    encoding: TextEncoding,
  ): Promise<void> {
    const captured = await captureResponse(response, url, encoding);

    if (!isSuccessStatus(response.status) && response.body && !response.bodyUsed) {
      await response.body.cancel();
    }

    this.current.statusCode = captured.statusCode;
    this.current.responseHeaders = captured.headers;
    this.current.responseCookies = captured.cookies;
    this.current.responseBody = captured.body;
    this.current.responseLog = formatResponseLog(
      url,
      captured.statusCode,
      captured.headers,
      captured.body,
      response.statusText,
    );
  }

  private async complete(error?: WirecallError): Promise<ExecutionResult> {
    this.current.state = error ? "failed" : "succeeded";

    if (error) {
      this.current.responseLog ??= error.message;
      this.logger.warn("Request failed", { code: error.code, message: error.message });
      await this.events.emit("response", { message: error.message });
      await this.events.emit("fail", { message: error.message, error });
      return { ok: false, error, exchange: this.exchange };
    }

    this.logger.info("Request succeeded", { statusCode: this.current.statusCode });
    await this.events.emit("response", { message: this.current.responseLog ?? "" });
    await this.events.emit("success", { statusCode: this.current.statusCode });
    return { ok: true, exchange: this.exchange };
  }

  private async rejectConcurrent(): Promise<ExecutionResult> {
    const error = new WirecallError(
      "CONCURRENT_EXECUTION",
      "Transport is already executing a request",
    );

    this.logger.warn("Rejected overlapping execution", { code: error.code });
    await this.events.emit("response", { message: error.message });
    await this.events.emit("fail", { message: error.message, error });
    return {
      ok: false,
      error,
      exchange: { ...emptyExchange("failed"), responseLog: error.message },
    };
  }
}
