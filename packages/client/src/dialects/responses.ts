import { z } from "zod";
import {
  classifyFailure,
  err,
  ok,
  silentLogger,
  type Frame,
  type JsonValue,
  type Logger,
  type OutputItemType,
  type ResponseStatus,
  type StreamDelta,
  type Usage,
} from "@genstream/core";
import { buildUsage, shapeFailure, type DecodeOutcome, type FrameInterpreter, type StreamDialect } from "./types.js";

// ─── Responses API dialect ─────────────────────────────────────────────────────
// Event reference: https://platform.openai.com/docs/api-reference/responses-streaming

export const ResponseEventKindSchema = z.enum([
  "response.created",
  "response.in_progress",
  "response.queued",
  "response.output_item.added",
  "response.output_item.done",
  "response.content_part.added",
  "response.content_part.done",
  "response.output_text.delta",
  "response.output_text.done",
  "response.output_text.annotation.added",
  "response.refusal.delta",
  "response.refusal.done",
  "response.function_call_arguments.delta",
  "response.function_call_arguments.done",
  "response.mcp_call_arguments.delta",
  "response.mcp_call_arguments.done",
  "response.reasoning_text.delta",
  "response.reasoning_text.done",
  "response.reasoning_summary_part.added",
  "response.reasoning_summary_part.done",
  "response.reasoning_summary_text.delta",
  "response.reasoning_summary_text.done",
  "response.completed",
  "response.incomplete",
  "response.failed",
  "error",
]);

export type ResponseEventKind = z.infer<typeof ResponseEventKindSchema> | "unknown";

/** Event tags outside the known set map to "unknown" and are skipped. */
export function parseResponseEventKind(tag: string): ResponseEventKind {
  const parsed = ResponseEventKindSchema.safeParse(tag);
  return parsed.success ? parsed.data : "unknown";
}

// ─── Wire schemas ──────────────────────────────────────────────────────────────

const UsageWireSchema = z.object({
  input_tokens: z.number().default(0),
  output_tokens: z.number().default(0),
  total_tokens: z.number().optional(),
  input_tokens_details: z.object({ cached_tokens: z.number().optional() }).nullish(),
  output_tokens_details: z.object({ reasoning_tokens: z.number().optional() }).nullish(),
});

const ContentPartWireSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
  refusal: z.string().optional(),
});

const OutputItemWireSchema = z.object({
  id: z.string(),
  type: z.string(),
  name: z.string().optional(),
  call_id: z.string().optional(),
  arguments: z.string().optional(),
  content: z.array(ContentPartWireSchema).nullish(),
  summary: z.array(ContentPartWireSchema).nullish(),
});

const ResponseObjectWireSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  status: z.string().nullish(),
  output: z.array(OutputItemWireSchema).default([]),
  usage: UsageWireSchema.nullish(),
  error: z
    .object({
      code: z.string().nullish(),
      message: z.string().nullish(),
    })
    .nullish(),
});

const ResponseEventSchema = z.object({ response: ResponseObjectWireSchema });
const ItemEventSchema = z.object({ item: OutputItemWireSchema });
const DeltaEventSchema = z.object({ item_id: z.string(), delta: z.string() });
const ErrorEventSchema = z.object({
  code: z.string().nullish(),
  message: z.string().nullish(),
});

type UsageWire = z.infer<typeof UsageWireSchema>;
type OutputItemWire = z.infer<typeof OutputItemWireSchema>;
type ResponseObjectWire = z.infer<typeof ResponseObjectWireSchema>;

// ─── Mapping helpers ───────────────────────────────────────────────────────────

export function mapItemType(rawType: string): OutputItemType {
  switch (rawType) {
    case "message":
      return "message";
    case "function_call":
    case "mcp_call":
      return "tool_call";
    case "reasoning":
      return "reasoning";
    default:
      return "other";
  }
}

function toUsage(wire: UsageWire): Usage {
  return buildUsage(
    wire.input_tokens,
    wire.output_tokens,
    wire.total_tokens,
    wire.input_tokens_details?.cached_tokens,
    wire.output_tokens_details?.reasoning_tokens
  );
}

function toStatus(status: string | null | undefined): ResponseStatus {
  switch (status) {
    case "incomplete":
      return "incomplete";
    case "failed":
    case "cancelled":
      return "failed";
    case "in_progress":
    case "queued":
      return "in_progress";
    default:
      return "completed";
  }
}

function partsText(parts: OutputItemWire["content"]): string {
  return (parts ?? []).map((p) => p.text ?? p.refusal ?? "").join("");
}

function emit(...deltas: StreamDelta[]): DecodeOutcome {
  return ok(deltas);
}

function addedDelta(item: OutputItemWire): StreamDelta {
  return {
    type: "item.added",
    itemId: item.id,
    itemType: mapItemType(item.type),
    rawType: item.type,
    ...(item.name !== undefined ? { name: item.name } : {}),
    ...(item.call_id !== undefined ? { callId: item.call_id } : {}),
  };
}

/** The item's final content as reported by the server, for cross-checking. */
function advisoryFor(item: OutputItemWire): { text?: string; arguments?: string } | undefined {
  switch (mapItemType(item.type)) {
    case "message":
      return item.content ? { text: partsText(item.content) } : undefined;
    case "tool_call":
      return item.arguments !== undefined ? { arguments: item.arguments } : undefined;
    default:
      return undefined;
  }
}

function startedDelta(response: ResponseObjectWire): StreamDelta {
  return { type: "response.started", responseId: response.id, model: response.model };
}

function doneDelta(status: ResponseStatus, usage: UsageWire | null | undefined): StreamDelta {
  return usage ? { type: "response.done", status, usage: toUsage(usage) } : { type: "response.done", status };
}

// ─── Interpreter ───────────────────────────────────────────────────────────────

class ResponsesInterpreter implements FrameInterpreter {
  constructor(private readonly logger: Logger) {}

  interpret(frame: Frame): DecodeOutcome {
    const kind = parseResponseEventKind(frame.kind);

    switch (kind) {
      case "response.created":
      case "response.in_progress":
      case "response.queued": {
        const parsed = ResponseEventSchema.safeParse(frame.data);
        if (!parsed.success) return err(shapeFailure(kind, parsed.error));
        return emit(startedDelta(parsed.data.response));
      }

      case "response.output_item.added": {
        const parsed = ItemEventSchema.safeParse(frame.data);
        if (!parsed.success) return err(shapeFailure(kind, parsed.error));
        return emit(addedDelta(parsed.data.item));
      }

      case "response.output_text.delta":
      case "response.refusal.delta":
      case "response.reasoning_text.delta": {
        const parsed = DeltaEventSchema.safeParse(frame.data);
        if (!parsed.success) return err(shapeFailure(kind, parsed.error));
        return emit({ type: "item.text", itemId: parsed.data.item_id, text: parsed.data.delta });
      }

      case "response.reasoning_summary_text.delta": {
        const parsed = DeltaEventSchema.safeParse(frame.data);
        if (!parsed.success) return err(shapeFailure(kind, parsed.error));
        return emit({ type: "item.summary", itemId: parsed.data.item_id, text: parsed.data.delta });
      }

      case "response.function_call_arguments.delta":
      case "response.mcp_call_arguments.delta": {
        const parsed = DeltaEventSchema.safeParse(frame.data);
        if (!parsed.success) return err(shapeFailure(kind, parsed.error));
        return emit({ type: "item.arguments", itemId: parsed.data.item_id, fragment: parsed.data.delta });
      }

      case "response.output_item.done": {
        const parsed = ItemEventSchema.safeParse(frame.data);
        if (!parsed.success) return err(shapeFailure(kind, parsed.error));
        const item = parsed.data.item;
        const advisory = advisoryFor(item);
        return emit(advisory ? { type: "item.done", itemId: item.id, advisory } : { type: "item.done", itemId: item.id });
      }

      case "response.completed":
      case "response.incomplete": {
        const parsed = ResponseEventSchema.safeParse(frame.data);
        if (!parsed.success) return err(shapeFailure(kind, parsed.error));
        const status: ResponseStatus = kind === "response.completed" ? "completed" : "incomplete";
        return emit(doneDelta(status, parsed.data.response.usage));
      }

      case "response.failed": {
        const parsed = ResponseEventSchema.safeParse(frame.data);
        if (!parsed.success) return err(shapeFailure(kind, parsed.error));
        const failure = parsed.data.response.error;
        return emit({
          type: "response.error",
          error: classifyFailure({
            source: "stream",
            code: failure?.code ?? undefined,
            message: failure?.message ?? undefined,
          }),
        });
      }

      case "error": {
        const parsed = ErrorEventSchema.safeParse(frame.data);
        if (!parsed.success) return err(shapeFailure(kind, parsed.error));
        return emit({
          type: "response.error",
          error: classifyFailure({
            source: "stream",
            code: parsed.data.code ?? undefined,
            message: parsed.data.message ?? undefined,
          }),
        });
      }

      // Content-part bookkeeping and the `.done` summaries of text and
      // arguments carry nothing the deltas and `output_item.done` do not.
      case "response.content_part.added":
      case "response.content_part.done":
      case "response.output_text.done":
      case "response.output_text.annotation.added":
      case "response.refusal.done":
      case "response.function_call_arguments.done":
      case "response.mcp_call_arguments.done":
      case "response.reasoning_text.done":
      case "response.reasoning_summary_part.added":
      case "response.reasoning_summary_part.done":
      case "response.reasoning_summary_text.done":
        return emit();

      case "unknown":
        this.logger.debug("Skipping unknown event", { kind: frame.kind });
        return emit();
    }
  }

  finish(): StreamDelta[] {
    return [];
  }
}

// ─── Whole-body decoding ───────────────────────────────────────────────────────

function wholeDeltas(response: ResponseObjectWire): StreamDelta[] {
  const deltas: StreamDelta[] = [startedDelta(response)];

  for (const item of response.output) {
    deltas.push(addedDelta(item));
    const type = mapItemType(item.type);
    if (type === "tool_call") {
      if (item.arguments) deltas.push({ type: "item.arguments", itemId: item.id, fragment: item.arguments });
    } else {
      const text = partsText(item.content);
      if (text) deltas.push({ type: "item.text", itemId: item.id, text });
      const summary = type === "reasoning" ? partsText(item.summary) : "";
      if (summary) deltas.push({ type: "item.summary", itemId: item.id, text: summary });
    }
    deltas.push({ type: "item.done", itemId: item.id });
  }

  const status = toStatus(response.status);
  if (status === "failed") {
    deltas.push({
      type: "response.error",
      error: classifyFailure({
        source: "stream",
        code: response.error?.code ?? undefined,
        message: response.error?.message ?? undefined,
      }),
    });
  } else {
    deltas.push(doneDelta(status, response.usage));
  }
  return deltas;
}

export const responsesDialect: StreamDialect = {
  name: "responses",
  path: "/responses",

  createInterpreter(logger: Logger = silentLogger): FrameInterpreter {
    return new ResponsesInterpreter(logger);
  },

  fromWhole(body: JsonValue): DecodeOutcome {
    const parsed = ResponseObjectWireSchema.safeParse(body);
    if (!parsed.success) return err(shapeFailure("response", parsed.error));
    return ok(wholeDeltas(parsed.data));
  },
};
