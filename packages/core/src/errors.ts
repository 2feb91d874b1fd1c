import { z } from "zod";

// ─── Error taxonomy ────────────────────────────────────────────────────────────

export const ErrorKindSchema = z.enum([
  "invalidRequestURL",
  "authenticationFailed",
  "rateLimitExceeded",
  "clientError",
  "serverError",
  "invalidPayload",
  "decodingFailed",
  "streamingUnsupported",
  "timedOut",
  "cancelled",
]);

export type ErrorKind = z.infer<typeof ErrorKindSchema>;

export type Severity = "info" | "warning" | "critical";

export type SuggestedAction =
  | { type: "retry" }
  | { type: "checkApiKey" }
  | { type: "checkConnection" }
  | { type: "reduceRequestSize" }
  | { type: "contactSupport" }
  | { type: "checkRequest" }
  | { type: "wait"; seconds: number };

// ─── Server error body ─────────────────────────────────────────────────────────

export const ApiErrorDetailSchema = z.object({
  message: z.string(),
  type: z.string().nullish(),
  param: z.string().nullish(),
  code: z.union([z.string(), z.number()]).nullish(),
});

export const ApiErrorBodySchema = z.object({
  error: ApiErrorDetailSchema,
});

export type ApiErrorDetail = z.infer<typeof ApiErrorDetailSchema>;

// ─── Classified error ──────────────────────────────────────────────────────────

export interface ClassifiedErrorInit {
  kind: ErrorKind;
  status?: number;
  severity: Severity;
  retryable: boolean;
  suggestedDelayMs?: number;
  retryAfterMs?: number;
  code?: string;
  title: string;
  userMessage: string;
  /** Technical detail for logs; defaults to the user message. */
  detail?: string;
  suggestedActions: readonly SuggestedAction[];
  requiresUserAction: boolean;
  apiError?: ApiErrorDetail;
  cause?: unknown;
}

/**
 * A failure of one call, mapped onto the closed taxonomy. Constructed once per
 * failure by the classifier and never mutated.
 */
export class ClassifiedError extends Error {
  readonly kind: ErrorKind;
  readonly status: number | undefined;
  readonly severity: Severity;
  readonly retryable: boolean;
  /** Minimum wait before a retry: the server's hint, else the policy base delay. */
  readonly suggestedDelayMs: number | undefined;
  /** Server-mandated wait from `Retry-After` / `retry-after-ms`. */
  readonly retryAfterMs: number | undefined;
  readonly code: string | undefined;
  readonly title: string;
  readonly userMessage: string;
  readonly suggestedActions: readonly SuggestedAction[];
  readonly requiresUserAction: boolean;
  readonly apiError: ApiErrorDetail | undefined;
  override readonly cause: unknown;

  constructor(init: ClassifiedErrorInit) {
    super(init.detail ?? init.userMessage);
    this.name = "ClassifiedError";
    this.kind = init.kind;
    this.status = init.status;
    this.severity = init.severity;
    this.retryable = init.retryable;
    this.suggestedDelayMs = init.suggestedDelayMs;
    this.retryAfterMs = init.retryAfterMs;
    this.code = init.code;
    this.title = init.title;
    this.userMessage = init.userMessage;
    this.suggestedActions = Object.freeze([...init.suggestedActions]);
    this.requiresUserAction = init.requiresUserAction;
    this.apiError = init.apiError;
    this.cause = init.cause;
  }

  /** `clientError(404)`, `rateLimitExceeded`, ... */
  get label(): string {
    return (this.kind === "clientError" || this.kind === "serverError") && this.status !== undefined
      ? `${this.kind}(${this.status})`
      : this.kind;
  }
}

// ─── Retry outcome ─────────────────────────────────────────────────────────────

/** Final failure of a retried operation. */
export class RetryError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: ClassifiedError,
    readonly history: readonly ClassifiedError[]
  ) {
    super(`${lastError.label} after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${lastError.message}`);
    this.name = "RetryError";
  }

  get kind(): ErrorKind {
    return this.lastError.kind;
  }
}

/** The classification behind a thrown value, if it came from this runtime. */
export function unwrapFailure(error: unknown): ClassifiedError | undefined {
  if (error instanceof ClassifiedError) return error;
  if (error instanceof RetryError) return error.lastError;
  return undefined;
}

// ─── Suggested actions ─────────────────────────────────────────────────────────

export function actionLabel(action: SuggestedAction): string {
  switch (action.type) {
    case "retry":
      return "Try Again";
    case "checkApiKey":
      return "Check API Key";
    case "checkConnection":
      return "Check Connection";
    case "reduceRequestSize":
      return "Reduce Size";
    case "contactSupport":
      return "Contact Support";
    case "checkRequest":
      return "Check Request";
    case "wait":
      return `Wait ${Math.ceil(action.seconds)}s`;
  }
}

export function actionDescription(action: SuggestedAction): string {
  switch (action.type) {
    case "retry":
      return "Retry the request";
    case "checkApiKey":
      return "Verify the API key in your configuration";
    case "checkConnection":
      return "Check your network connection and the configured base URL";
    case "reduceRequestSize":
      return "Reduce the size of your request";
    case "contactSupport":
      return "Contact support for assistance";
    case "checkRequest":
      return "Check the request parameters";
    case "wait":
      return `Wait ${Math.ceil(action.seconds)} seconds before retrying`;
  }
}
