import {
  CancellationToken,
  classifyFailure,
  linkedSource,
  parseJson,
  silentLogger,
  type AccumulatedResult,
  type ClientConfig,
  type JsonValue,
  type Logger,
  type RequestEnvelope,
  type RetryPolicy,
} from "@genstream/core";
import { HttpTransport, type FetchLike, type StreamingResponse } from "./transport.js";
import { decodeFrames } from "./sse.js";
import { reconstructStream, reconstructWhole } from "./reconstructor.js";
import { perform, type PerformOptions, type RetryNotice } from "./retry.js";
import { chatDialect } from "./dialects/chat.js";
import { responsesDialect } from "./dialects/responses.js";
import type { StreamDialect } from "./dialects/types.js";

// ─── Client ────────────────────────────────────────────────────────────────────

export interface ClientOptions {
  fetch?: FetchLike;
  logger?: Logger;
  /** Injected for tests; defaults to Math.random. */
  random?: () => number;
  /** Injected for tests; defaults to a cancellable timer. */
  sleep?: (ms: number, token: CancellationToken) => Promise<void>;
}

export interface CallOptions {
  token?: CancellationToken;
  onRetry?: (notice: RetryNotice) => void;
  onSuccess?: (attempts: number) => void;
  /** Replaces the configured retry policy for this call. */
  retry?: RetryPolicy;
}

export type RequestBody = Record<string, unknown>;

export interface UploadFields {
  purpose: string;
  filename: string;
}

export function isEventStream(contentType: string): boolean {
  return contentType.toLowerCase().includes("text/event-stream");
}

/** Serializes a request body, mapping unserializable values to `invalidPayload`. */
export function encodeJsonBody(body: RequestBody): string {
  try {
    return JSON.stringify(body);
  } catch (error) {
    throw classifyFailure({
      source: "request",
      kind: "invalidPayload",
      detail: `Request body is not serializable: ${error instanceof Error ? error.message : String(error)}`,
      cause: error,
    });
  }
}

export class GenStreamClient {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(
    private readonly config: ClientConfig,
    private readonly options: ClientOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.transport = new HttpTransport({
      baseUrl: config.baseUrl,
      apiKey: config.apiKey,
      organization: config.organization,
      project: config.project,
      timeoutMs: config.timeoutMs,
      userAgent: config.userAgent,
      baseDelayMs: config.retry.baseDelayMs,
      fetch: options.fetch,
      logger: this.logger.child("transport"),
    });
  }

  // ─── Generic calls ───────────────────────────────────────────────────────────

  /** One buffered call, retried per policy, folded into a single result. */
  async send(envelope: RequestEnvelope, dialect: StreamDialect, options: CallOptions = {}): Promise<AccumulatedResult> {
    const body = await this.fetchJson(envelope, options);
    return reconstructWhole(body, dialect, {
      decodeFailurePolicy: this.config.decodeFailurePolicy,
      logger: this.logger.child(dialect.name),
    });
  }

  /** Multipart upload, retried per policy; the server's JSON reply is returned as-is. */
  async upload(path: string, form: FormData, options: CallOptions = {}): Promise<JsonValue> {
    return this.fetchJson({ method: "POST", path, body: form, stream: false }, options);
  }

  /**
   * One streamed call. Opening the stream is retried per policy; once frames
   * flow, failures surface directly from the iteration. The connection is
   * released however the iteration ends.
   */
  async *stream(
    envelope: RequestEnvelope,
    dialect: StreamDialect,
    options: CallOptions = {}
  ): AsyncGenerator<AccumulatedResult, void, undefined> {
    if (!envelope.stream) {
      throw classifyFailure({
        source: "request",
        kind: "streamingUnsupported",
        detail: `${envelope.method} ${envelope.path} is not a streaming request`,
      });
    }

    const source = linkedSource(options.token ?? CancellationToken.none);
    let response: StreamingResponse | undefined;
    try {
      response = await perform(
        async () => {
          const opened = await this.transport.open(envelope, source.token);
          if (!isEventStream(opened.contentType)) {
            await opened.release();
            throw classifyFailure({
              source: "request",
              kind: "streamingUnsupported",
              detail: `Expected text/event-stream, got ${opened.contentType || "no content type"}`,
            });
          }
          return opened;
        },
        options.retry ?? this.config.retry,
        { ...this.retryOptions(options), token: source.token }
      );

      yield* reconstructStream(decodeFrames(response.chunks()), dialect, {
        decodeFailurePolicy: this.config.decodeFailurePolicy,
        token: source.token,
        logger: this.logger.child(dialect.name),
      });
    } finally {
      if (response) await response.release();
      source.dispose();
    }
  }

  // ─── Endpoint helpers ────────────────────────────────────────────────────────

  async createResponse(body: RequestBody, options?: CallOptions): Promise<AccumulatedResult> {
    return this.send(this.envelope(responsesDialect, { ...body, stream: false }, false), responsesDialect, options);
  }

  streamResponse(body: RequestBody, options?: CallOptions): AsyncGenerator<AccumulatedResult, void, undefined> {
    return this.streamJson(responsesDialect, { ...body, stream: true }, options);
  }

  async createChatCompletion(body: RequestBody, options?: CallOptions): Promise<AccumulatedResult> {
    return this.send(this.envelope(chatDialect, { ...body, stream: false }, false), chatDialect, options);
  }

  streamChatCompletion(body: RequestBody, options?: CallOptions): AsyncGenerator<AccumulatedResult, void, undefined> {
    return this.streamJson(chatDialect, { ...body, stream: true, stream_options: { include_usage: true } }, options);
  }

  async uploadFile(file: Blob, fields: UploadFields, options?: CallOptions): Promise<JsonValue> {
    const form = new FormData();
    form.append("purpose", fields.purpose);
    form.append("file", file, fields.filename);
    return this.upload("/files", form, options);
  }

  // ─── Internals ───────────────────────────────────────────────────────────────

  private async fetchJson(envelope: RequestEnvelope, options: CallOptions): Promise<JsonValue> {
    const source = linkedSource(options.token ?? CancellationToken.none);
    try {
      const policy = options.retry ?? this.config.retry;
      const response = await perform(() => this.transport.send(envelope, source.token), policy, {
        ...this.retryOptions(options),
        token: source.token,
      });

      const json = parseJson(new TextDecoder("utf-8").decode(response.body));
      if (!json.ok) {
        throw classifyFailure({
          source: "decode",
          code: "body_decode_failed",
          detail: `Response body is not JSON: ${json.error.message}`,
          cause: json.error,
        });
      }
      return json.value;
    } finally {
      source.dispose();
    }
  }

  private async *streamJson(
    dialect: StreamDialect,
    body: RequestBody,
    options?: CallOptions
  ): AsyncGenerator<AccumulatedResult, void, undefined> {
    yield* this.stream(this.envelope(dialect, body, true), dialect, options);
  }

  private envelope(dialect: StreamDialect, body: RequestBody, stream: boolean): RequestEnvelope {
    return { method: "POST", path: dialect.path, body: encodeJsonBody(body), stream };
  }

  private retryOptions(options: CallOptions): PerformOptions {
    return {
      onRetry: options.onRetry,
      onSuccess: options.onSuccess,
      logger: this.logger.child("retry"),
      random: this.options.random,
      sleep: this.options.sleep,
    };
  }
}
