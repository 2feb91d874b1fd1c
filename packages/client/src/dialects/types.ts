import {
  classifyFailure,
  type ClassifiedError,
  type Frame,
  type JsonValue,
  type Logger,
  type Result,
  type StreamDelta,
  type Usage,
} from "@genstream/core";
import type { ZodError } from "zod";

// ─── Stream dialect ────────────────────────────────────────────────────────────
// A dialect turns one endpoint family's wire frames into the shared delta
// vocabulary. Interpreters hold per-stream state, so one is created per call.

export type DecodeOutcome = Result<StreamDelta[], ClassifiedError>;

export interface FrameInterpreter {
  interpret(frame: Frame): DecodeOutcome;
  /** Deltas implied by the end of the byte stream. */
  finish(): StreamDelta[];
}

export interface StreamDialect {
  name: string;
  /** Endpoint path relative to the base URL. */
  path: string;
  createInterpreter(logger: Logger): FrameInterpreter;
  /** Deltas equivalent to a complete, non-streamed response body. */
  fromWhole(body: JsonValue): DecodeOutcome;
}

export function shapeFailure(what: string, error: ZodError): ClassifiedError {
  const issue = error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
  return classifyFailure({
    source: "decode",
    code: "unexpected_shape",
    detail: `Unexpected ${what} payload${where}: ${issue?.message ?? error.message}`,
    cause: error,
  });
}

export function buildUsage(
  inputTokens: number,
  outputTokens: number,
  totalTokens: number | undefined,
  cachedTokens: number | undefined,
  reasoningTokens: number | undefined
): Usage {
  const usage: Usage = {
    inputTokens,
    outputTokens,
    totalTokens: totalTokens ?? inputTokens + outputTokens,
  };
  if (cachedTokens !== undefined) usage.inputTokensDetails = { cachedTokens };
  if (reasoningTokens !== undefined) usage.outputTokensDetails = { reasoningTokens };
  return usage;
}
