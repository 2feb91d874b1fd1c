import {
  ApiErrorBodySchema,
  ClassifiedError,
  RetryError,
  type ApiErrorDetail,
  type ErrorKind,
  type Severity,
  type SuggestedAction,
} from "./errors.js";
import { parseJson } from "./json.js";

// ─── Raw failures ──────────────────────────────────────────────────────────────

export interface HeaderLookup {
  get(name: string): string | null;
}

export type RawFailure =
  | { source: "http"; status: number; body?: string; headers?: HeaderLookup }
  | { source: "transport"; error: unknown; timedOut?: boolean; cancelled?: boolean }
  | { source: "decode"; detail: string; code?: string; cause?: unknown }
  | {
      source: "request";
      kind: "invalidRequestURL" | "invalidPayload" | "streamingUnsupported";
      detail: string;
      cause?: unknown;
    }
  | { source: "cancellation"; reason?: string }
  | { source: "stream"; code?: string; type?: string; message?: string };

export interface ClassifyContext {
  /** Suggested delay for retryable failures without a server hint. */
  baseDelayMs?: number;
  now?: () => number;
}

const DEFAULT_BASE_DELAY_MS = 1_000;

// ─── Per-kind profile ──────────────────────────────────────────────────────────

interface KindProfile {
  title: string;
  message: string;
  severity: Severity;
  retryable: boolean;
  requiresUserAction: boolean;
  code?: string;
}

const PROFILES: Record<ErrorKind, KindProfile> = {
  invalidRequestURL: {
    title: "Connection Error",
    message: "The request URL is invalid. Please check the configured base URL.",
    severity: "critical",
    retryable: false,
    requiresUserAction: true,
    code: "invalid_url",
  },
  authenticationFailed: {
    title: "Authentication Error",
    message: "Your API key appears to be invalid. Please check your account settings.",
    severity: "critical",
    retryable: false,
    requiresUserAction: true,
    code: "authentication_failed",
  },
  rateLimitExceeded: {
    title: "Rate Limit Exceeded",
    message: "You've made too many requests. Please wait a moment before trying again.",
    severity: "warning",
    retryable: true,
    requiresUserAction: false,
    code: "rate_limit_exceeded",
  },
  clientError: {
    title: "Request Error",
    message: "The request failed. Please check your input and try again.",
    severity: "warning",
    retryable: false,
    requiresUserAction: false,
  },
  serverError: {
    title: "Server Error",
    message: "The service is experiencing issues. Please try again in a few moments.",
    severity: "critical",
    retryable: true,
    requiresUserAction: false,
  },
  invalidPayload: {
    title: "Invalid Request",
    message: "Unable to encode your request. Please check your input and try again.",
    severity: "warning",
    retryable: false,
    requiresUserAction: true,
    code: "invalid_payload",
  },
  decodingFailed: {
    title: "Data Processing Error",
    message: "Unable to process the response. Please try again or contact support if this persists.",
    severity: "critical",
    retryable: false,
    requiresUserAction: false,
    code: "decoding_failed",
  },
  streamingUnsupported: {
    title: "Feature Not Supported",
    message: "This request doesn't support real-time streaming.",
    severity: "info",
    retryable: false,
    requiresUserAction: false,
    code: "streaming_not_supported",
  },
  timedOut: {
    title: "Connection Error",
    message: "The request did not complete in time. Please check your connection and try again.",
    severity: "warning",
    retryable: true,
    requiresUserAction: false,
    code: "timeout",
  },
  cancelled: {
    title: "Cancelled",
    message: "The request was cancelled.",
    severity: "info",
    retryable: false,
    requiresUserAction: false,
    code: "cancelled",
  },
};

function clientErrorMessage(status: number): string {
  switch (status) {
    case 400:
      return "The request was invalid. Please check your parameters and try again.";
    case 403:
      return "Access forbidden. You don't have permission to access this resource.";
    case 404:
      return "The requested resource was not found.";
    case 413:
      return "The request is too large. Please reduce the size and try again.";
    case 422:
      return "The request couldn't be processed. Please check your input.";
    default:
      return PROFILES.clientError.message;
  }
}

function actionsFor(kind: ErrorKind, status: number | undefined, delayMs: number | undefined): SuggestedAction[] {
  const wait: SuggestedAction[] = delayMs !== undefined ? [{ type: "wait", seconds: delayMs / 1000 }] : [];
  switch (kind) {
    case "invalidRequestURL":
      return [{ type: "checkConnection" }];
    case "authenticationFailed":
      return [{ type: "checkApiKey" }];
    case "rateLimitExceeded":
    case "serverError":
      return [...wait, { type: "retry" }];
    case "clientError":
      switch (status) {
        case 403:
          return [{ type: "checkApiKey" }];
        case 404:
          return [{ type: "checkRequest" }, { type: "contactSupport" }];
        case 413:
          return [{ type: "reduceRequestSize" }];
        default:
          return [{ type: "checkRequest" }];
      }
    case "invalidPayload":
      return [{ type: "checkRequest" }];
    case "decodingFailed":
      return [{ type: "retry" }, { type: "contactSupport" }];
    case "timedOut":
      return [{ type: "checkConnection" }, { type: "retry" }];
    case "streamingUnsupported":
    case "cancelled":
      return [];
  }
}

interface BuildExtra {
  status?: number;
  code?: string;
  detail?: string;
  userMessage?: string;
  retryAfterMs?: number;
  apiError?: ApiErrorDetail;
  cause?: unknown;
}

function build(kind: ErrorKind, context: ClassifyContext, extra: BuildExtra = {}): ClassifiedError {
  const profile = PROFILES[kind];
  const suggestedDelayMs = profile.retryable
    ? extra.retryAfterMs ?? context.baseDelayMs ?? DEFAULT_BASE_DELAY_MS
    : undefined;
  const apiType = extra.apiError?.type;

  return new ClassifiedError({
    kind,
    status: extra.status,
    severity: profile.severity,
    retryable: profile.retryable,
    suggestedDelayMs,
    retryAfterMs: extra.retryAfterMs,
    code: extra.code ?? profile.code,
    title: profile.title,
    userMessage: extra.userMessage ?? profile.message,
    detail: extra.detail,
    suggestedActions: actionsFor(kind, extra.status, suggestedDelayMs),
    requiresUserAction:
      profile.requiresUserAction || apiType === "invalid_request_error" || apiType === "authentication_error",
    apiError: extra.apiError,
    cause: extra.cause,
  });
}

// ─── Header / body helpers ─────────────────────────────────────────────────────

/** Server-mandated delay from `retry-after-ms` or `Retry-After` (seconds or HTTP date). */
export function parseRetryAfter(headers: HeaderLookup, now: number = Date.now()): number | undefined {
  const millis = headers.get("retry-after-ms");
  if (millis !== null && millis.trim() !== "") {
    const value = Number(millis);
    if (Number.isFinite(value) && value >= 0) return value;
  }

  const header = headers.get("retry-after");
  if (header === null || header.trim() === "") return undefined;

  const seconds = Number(header);
  if (Number.isFinite(seconds)) return seconds >= 0 ? seconds * 1000 : undefined;

  const date = Date.parse(header);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

export function parseApiError(body: string | undefined): ApiErrorDetail | undefined {
  if (!body) return undefined;
  const json = parseJson(body);
  if (!json.ok) return undefined;
  const parsed = ApiErrorBodySchema.safeParse(json.value);
  return parsed.success ? parsed.data.error : undefined;
}

function statusKind(status: number): ErrorKind | undefined {
  if (status === 401) return "authenticationFailed";
  if (status === 429) return "rateLimitExceeded";
  if (status >= 400 && status < 500) return "clientError";
  if (status >= 500 && status < 600) return "serverError";
  return undefined;
}

function systemErrorCode(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null) return undefined;
  if ("code" in value && typeof value.code === "string") return value.code;
  if ("cause" in value) return systemErrorCode(value.cause);
  return undefined;
}

function isNamedError(value: unknown, name: string): boolean {
  return value instanceof Error && value.name === name;
}

function describe(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}

// ─── Classifier ────────────────────────────────────────────────────────────────

export function classifyFailure(failure: RawFailure, context: ClassifyContext = {}): ClassifiedError {
  switch (failure.source) {
    case "http": {
      const apiError = parseApiError(failure.body);
      const now = context.now ? context.now() : Date.now();
      const retryAfterMs = failure.headers ? parseRetryAfter(failure.headers, now) : undefined;
      const kind = statusKind(failure.status);
      const detail = apiError?.message ?? `HTTP ${failure.status}`;
      const code = apiError?.code != null ? String(apiError.code) : undefined;

      if (!kind) {
        return build("decodingFailed", context, {
          status: failure.status,
          code: "unexpected_status",
          detail: `Unexpected HTTP status ${failure.status}`,
        });
      }

      return build(kind, context, {
        status: failure.status,
        code: code ?? (kind === "clientError" || kind === "serverError" ? `http_${failure.status}` : undefined),
        detail,
        userMessage: kind === "clientError" ? apiError?.message ?? clientErrorMessage(failure.status) : undefined,
        retryAfterMs,
        apiError,
      });
    }

    case "transport": {
      if (failure.cancelled || (isNamedError(failure.error, "AbortError") && !failure.timedOut)) {
        return build("cancelled", context, { detail: "Request aborted", cause: failure.error });
      }
      if (failure.timedOut || isNamedError(failure.error, "TimeoutError")) {
        return build("timedOut", context, { detail: "Request timed out", cause: failure.error });
      }
      return build("timedOut", context, {
        code: systemErrorCode(failure.error) ?? "network_error",
        detail: describe(failure.error),
        cause: failure.error,
      });
    }

    case "decode":
      return build("decodingFailed", context, {
        code: failure.code,
        detail: failure.detail,
        cause: failure.cause,
      });

    case "request":
      return build(failure.kind, context, { detail: failure.detail, cause: failure.cause });

    case "cancellation":
      return build("cancelled", context, { detail: failure.reason ? `Cancelled: ${failure.reason}` : undefined });

    case "stream": {
      const code = failure.code ?? failure.type;
      const apiError: ApiErrorDetail = {
        message: failure.message ?? "Stream reported an error",
        type: failure.type,
        code: failure.code,
      };
      if (code && code.includes("rate_limit")) {
        return build("rateLimitExceeded", context, { status: 429, code, detail: apiError.message, apiError });
      }
      if (code === "invalid_request_error" || code === "invalid_prompt") {
        return build("clientError", context, {
          status: 400,
          code,
          detail: apiError.message,
          userMessage: apiError.message,
          apiError,
        });
      }
      return build("serverError", context, { status: 500, code: code ?? "server_error", detail: apiError.message, apiError });
    }
  }
}

/**
 * Classification of an arbitrary thrown value, or undefined when it is not a
 * failure of the call (a programming error inside the operation).
 */
export function classifyUnknown(error: unknown, context: ClassifyContext = {}): ClassifiedError | undefined {
  if (error instanceof ClassifiedError) return error;
  if (error instanceof RetryError) return error.lastError;
  if (isNamedError(error, "AbortError")) return classifyFailure({ source: "transport", error, cancelled: true }, context);
  if (isNamedError(error, "TimeoutError")) return classifyFailure({ source: "transport", error, timedOut: true }, context);
  return undefined;
}
