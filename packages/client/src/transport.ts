import {
  CancellationToken,
  classifyFailure,
  silentLogger,
  type ClassifiedError,
  type ClassifyContext,
  type HeaderLookup,
  type EnvelopeBody,
  type Logger,
  type RequestEnvelope,
} from "@genstream/core";

// ─── Fetch seam ────────────────────────────────────────────────────────────────
// The structural subset of the Fetch API the transport relies on. The global
// `fetch` satisfies it; tests hand in scripted responses.

export interface ResponseBodyReader {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  cancel(reason?: unknown): Promise<void>;
  releaseLock(): void;
}

export interface HttpResponseLike {
  readonly status: number;
  readonly headers: HeaderLookup;
  readonly body: { getReader(): ResponseBodyReader } | null;
  text(): Promise<string>;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body?: EnvelopeBody;
  signal: AbortSignal;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<HttpResponseLike>;

export interface TransportOptions {
  baseUrl: string;
  apiKey?: string;
  organization?: string;
  project?: string;
  timeoutMs: number;
  userAgent: string;
  /** Base delay reported on retryable failures without a server hint. */
  baseDelayMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

export interface BufferedResponse {
  status: number;
  headers: HeaderLookup;
  body: Uint8Array;
}

// ─── Call scope ────────────────────────────────────────────────────────────────
// Owns the abort controller of one HTTP exchange: caller cancellation and the
// idle timeout both abort it, and `dispose` detaches everything exactly once.

class CallScope {
  private readonly controller = new AbortController();
  private readonly detach: () => void;
  private timer: ReturnType<typeof setTimeout> | undefined;
  private timedOut = false;
  private disposed = false;

  constructor(
    readonly token: CancellationToken,
    private readonly timeoutMs: number,
    private readonly context: ClassifyContext
  ) {
    this.detach = token.onCancel(() => this.controller.abort(token.reason ?? "cancelled"));
    this.arm();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** (Re)starts the timeout window. */
  arm(): void {
    if (this.disposed) return;
    this.pause();
    this.timer = setTimeout(() => {
      this.timedOut = true;
      this.controller.abort("timeout");
    }, this.timeoutMs);
  }

  pause(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  failure(error: unknown): ClassifiedError {
    return classifyFailure(
      {
        source: "transport",
        error,
        timedOut: this.timedOut,
        cancelled: !this.timedOut && this.token.isCancelled,
      },
      this.context
    );
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.pause();
    this.detach();
    if (!this.controller.signal.aborted) {
      this.controller.abort("released");
    }
  }
}

// ─── Streaming response ────────────────────────────────────────────────────────

export class StreamingResponse {
  private reader: ResponseBodyReader | undefined;
  private finished = false;
  private released = false;

  constructor(
    private readonly response: HttpResponseLike,
    private readonly scope: CallScope,
    private readonly logger: Logger
  ) {}

  get status(): number {
    return this.response.status;
  }

  get headers(): HeaderLookup {
    return this.response.headers;
  }

  get contentType(): string {
    return this.response.headers.get("content-type") ?? "";
  }

  /**
   * The body as a forward-only sequence of reads. Every exit path (end of
   * body, read failure, cancellation, consumer stopping early) releases the
   * connection.
   */
  async *chunks(): AsyncGenerator<Uint8Array, void, undefined> {
    if (this.reader || this.released) {
      throw new Error("Response body has already been consumed");
    }
    const body = this.response.body;
    if (!body) {
      await this.release();
      return;
    }

    const reader = body.getReader();
    this.reader = reader;
    try {
      while (true) {
        this.scope.token.throwIfCancelled();
        this.scope.arm();
        let result: { done: boolean; value?: Uint8Array };
        try {
          result = await reader.read();
        } catch (error) {
          throw this.scope.failure(error);
        } finally {
          this.scope.pause();
        }
        if (result.done) {
          this.finished = true;
          return;
        }
        if (result.value && result.value.byteLength > 0) {
          yield result.value;
        }
      }
    } finally {
      await this.release();
    }
  }

  /** Closes the connection. Idempotent. */
  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;

    const reader = this.reader ?? this.response.body?.getReader();
    if (reader) {
      if (!this.finished) {
        try {
          await reader.cancel("released");
        } catch (error) {
          this.logger.debug("Body cancel failed", { error: String(error) });
        }
      }
      reader.releaseLock();
    }
    this.scope.dispose();
  }
}

// ─── Transport ─────────────────────────────────────────────────────────────────

const globalFetch: FetchLike = (url, init) =>
  fetch(url, {
    ...init,
    body: init.body instanceof Uint8Array ? new Blob([init.body]) : init.body,
  });

/** Multipart bodies get no header here: fetch adds one with the boundary. */
function contentTypeFor(body: EnvelopeBody): string | undefined {
  if (typeof body === "string") return "application/json";
  if (body instanceof Uint8Array) return "application/octet-stream";
  return undefined;
}

export class HttpTransport {
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  private readonly context: ClassifyContext;

  constructor(private readonly options: TransportOptions) {
    this.fetchImpl = options.fetch ?? globalFetch;
    this.logger = options.logger ?? silentLogger;
    this.context = { baseDelayMs: options.baseDelayMs };
  }

  /** Performs the request and buffers the whole body. */
  async send(envelope: RequestEnvelope, token: CancellationToken = CancellationToken.none): Promise<BufferedResponse> {
    const url = this.resolveUrl(envelope.path);
    token.throwIfCancelled();

    const scope = new CallScope(token, envelope.timeoutMs ?? this.options.timeoutMs, this.context);
    try {
      const response = await this.dispatch(url, envelope, scope);
      let buffer: ArrayBuffer;
      try {
        buffer = await response.arrayBuffer();
      } catch (error) {
        throw scope.failure(error);
      }
      return { status: response.status, headers: response.headers, body: new Uint8Array(buffer) };
    } finally {
      scope.dispose();
    }
  }

  /** Performs the request and hands back the unread body stream. */
  async open(envelope: RequestEnvelope, token: CancellationToken = CancellationToken.none): Promise<StreamingResponse> {
    const url = this.resolveUrl(envelope.path);
    token.throwIfCancelled();

    const scope = new CallScope(token, envelope.timeoutMs ?? this.options.timeoutMs, this.context);
    try {
      const response = await this.dispatch(url, envelope, scope);
      scope.pause();
      return new StreamingResponse(response, scope, this.logger);
    } catch (error) {
      scope.dispose();
      throw error;
    }
  }

  resolveUrl(path: string): string {
    const base = this.options.baseUrl.replace(/\/+$/, "");
    const full = `${base}${path.startsWith("/") ? path : `/${path}`}`;
    let url: URL;
    try {
      url = new URL(full);
    } catch (error) {
      throw classifyFailure({ source: "request", kind: "invalidRequestURL", detail: `Invalid request URL: ${full}`, cause: error });
    }
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      throw classifyFailure({
        source: "request",
        kind: "invalidRequestURL",
        detail: `Unsupported URL scheme: ${url.protocol}`,
      });
    }
    return url.toString();
  }

  buildHeaders(envelope: RequestEnvelope): Record<string, string> {
    const headers: Record<string, string> = { "User-Agent": this.options.userAgent };
    if (this.options.apiKey) {
      headers["Authorization"] = `Bearer ${this.options.apiKey}`;
    }
    if (this.options.organization) {
      headers["OpenAI-Organization"] = this.options.organization;
    }
    if (this.options.project) {
      headers["OpenAI-Project"] = this.options.project;
    }
    const contentType =
      envelope.body === undefined || envelope.method === "GET" ? undefined : contentTypeFor(envelope.body);
    if (contentType) {
      headers["Content-Type"] = contentType;
    }
    if (envelope.stream) {
      headers["Accept"] = "text/event-stream";
    }
    return { ...headers, ...envelope.headers };
  }

  private async dispatch(url: string, envelope: RequestEnvelope, scope: CallScope): Promise<HttpResponseLike> {
    this.logger.debug(`${envelope.method} ${url}`, { stream: envelope.stream });

    let response: HttpResponseLike;
    try {
      response = await this.fetchImpl(url, {
        method: envelope.method,
        headers: this.buildHeaders(envelope),
        ...(envelope.method !== "GET" && envelope.body !== undefined ? { body: envelope.body } : {}),
        signal: scope.signal,
      });
    } catch (error) {
      throw scope.failure(error);
    }

    if (response.status < 200 || response.status >= 300) {
      const body = await this.readErrorBody(response);
      this.logger.debug(`${envelope.method} ${url} failed`, { status: response.status });
      throw classifyFailure({ source: "http", status: response.status, body, headers: response.headers }, this.context);
    }
    return response;
  }

  private async readErrorBody(response: HttpResponseLike): Promise<string | undefined> {
    try {
      return await response.text();
    } catch (error) {
      this.logger.debug("Could not read error body", { status: response.status, error: String(error) });
      return undefined;
    }
  }
}
