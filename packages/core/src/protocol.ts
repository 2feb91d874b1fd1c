import { z } from "zod";
import type { ClassifiedError } from "./errors.js";
import type { JsonValue } from "./json.js";

// ─── Request envelope ──────────────────────────────────────────────────────────

export const HttpMethodSchema = z.enum(["GET", "POST", "DELETE"]);
export type HttpMethod = z.infer<typeof HttpMethodSchema>;

/** JSON text, raw bytes, or multipart form data (fetch writes its boundary). */
export type EnvelopeBody = string | Uint8Array | FormData;

export interface RequestEnvelope {
  method: HttpMethod;
  /** Path relative to the configured base URL, e.g. `/responses`. */
  path: string;
  headers?: Record<string, string>;
  /** Serialized body; omitted for GET. */
  body?: EnvelopeBody;
  /** Overrides the client timeout for this call. */
  timeoutMs?: number;
  stream: boolean;
}

// ─── Frames ────────────────────────────────────────────────────────────────────

export interface Frame {
  /** `event:` field, else the payload's `type`, else "message". */
  kind: string;
  data: JsonValue;
  id?: string;
  raw: string;
}

// ─── Deltas ────────────────────────────────────────────────────────────────────

export const OutputItemTypeSchema = z.enum(["message", "tool_call", "reasoning", "other"]);
export type OutputItemType = z.infer<typeof OutputItemTypeSchema>;

export type OutputItemState = "pending" | "streaming" | "done";

export type ResponseStatus = "in_progress" | "completed" | "incomplete" | "failed";

export interface Usage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  inputTokensDetails?: { cachedTokens?: number };
  outputTokensDetails?: { reasoningTokens?: number };
}

export type StreamDelta =
  | { type: "response.started"; responseId?: string; model?: string }
  | {
      type: "item.added";
      itemId: string;
      itemType: OutputItemType;
      rawType: string;
      name?: string;
      callId?: string;
    }
  | { type: "item.text"; itemId: string; text: string }
  | { type: "item.summary"; itemId: string; text: string }
  | { type: "item.arguments"; itemId: string; fragment: string }
  | { type: "item.done"; itemId: string; advisory?: { text?: string; arguments?: string } }
  | { type: "usage"; usage: Usage }
  | { type: "response.done"; status: ResponseStatus; usage?: Usage }
  | { type: "response.error"; error: ClassifiedError };

// ─── Accumulated result ────────────────────────────────────────────────────────

export interface OutputItem {
  id: string;
  type: OutputItemType;
  rawType: string;
  state: OutputItemState;
  text: string;
  arguments: string;
  /** Reasoning summary, kept apart from the reasoning text. */
  summary?: string;
  name?: string;
  callId?: string;
}

export type StreamIssue =
  | { type: "decode_failure"; error: ClassifiedError }
  | { type: "protocol_violation"; error: ClassifiedError }
  | { type: "advisory_mismatch"; itemId: string; field: "text" | "arguments" };

export interface AccumulatedResult {
  responseId?: string;
  model?: string;
  status: ResponseStatus;
  items: readonly Readonly<OutputItem>[];
  usage?: Usage;
  issues: readonly StreamIssue[];
  /** True once the terminal delta has been folded. */
  done: boolean;
}
