import { z } from "zod";
import {
  classifyFailure,
  err,
  ok,
  silentLogger,
  type Frame,
  type JsonValue,
  type Logger,
  type ResponseStatus,
  type StreamDelta,
  type Usage,
} from "@genstream/core";
import { buildUsage, shapeFailure, type DecodeOutcome, type FrameInterpreter, type StreamDialect } from "./types.js";

// ─── Chat Completions dialect ──────────────────────────────────────────────────
// Chunks carry no item ids, so items are keyed by choice index (and tool call
// index within the choice) and closed on `finish_reason` or end of stream.

const ChatUsageWireSchema = z.object({
  prompt_tokens: z.number().default(0),
  completion_tokens: z.number().default(0),
  total_tokens: z.number().optional(),
  prompt_tokens_details: z.object({ cached_tokens: z.number().optional() }).nullish(),
  completion_tokens_details: z.object({ reasoning_tokens: z.number().optional() }).nullish(),
});

const ToolCallDeltaWireSchema = z.object({
  index: z.number().int().default(0),
  id: z.string().nullish(),
  type: z.string().nullish(),
  function: z
    .object({
      name: z.string().nullish(),
      arguments: z.string().nullish(),
    })
    .nullish(),
});

const ChatErrorWireSchema = z.object({
  message: z.string().nullish(),
  type: z.string().nullish(),
  code: z.union([z.string(), z.number()]).nullish(),
});

const ChatChunkWireSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        index: z.number().int().default(0),
        delta: z
          .object({
            content: z.string().nullish(),
            refusal: z.string().nullish(),
            reasoning_content: z.string().nullish(),
            tool_calls: z.array(ToolCallDeltaWireSchema).nullish(),
          })
          .default({}),
        finish_reason: z.string().nullish(),
      })
    )
    .default([]),
  usage: ChatUsageWireSchema.nullish(),
  error: ChatErrorWireSchema.nullish(),
});

const ChatCompletionWireSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        index: z.number().int().default(0),
        message: z
          .object({
            content: z.string().nullish(),
            refusal: z.string().nullish(),
            reasoning_content: z.string().nullish(),
            tool_calls: z
              .array(
                z.object({
                  id: z.string(),
                  type: z.string().nullish(),
                  function: z.object({ name: z.string(), arguments: z.string().default("") }),
                })
              )
              .nullish(),
          })
          .default({}),
        finish_reason: z.string().nullish(),
      })
    )
    .default([]),
  usage: ChatUsageWireSchema.nullish(),
});

type ChatUsageWire = z.infer<typeof ChatUsageWireSchema>;
type ChatErrorWire = z.infer<typeof ChatErrorWireSchema>;

function toUsage(wire: ChatUsageWire): Usage {
  return buildUsage(
    wire.prompt_tokens,
    wire.completion_tokens,
    wire.total_tokens,
    wire.prompt_tokens_details?.cached_tokens,
    wire.completion_tokens_details?.reasoning_tokens
  );
}

function errorDelta(error: ChatErrorWire): StreamDelta {
  return {
    type: "response.error",
    error: classifyFailure({
      source: "stream",
      code: error.code != null ? String(error.code) : undefined,
      type: error.type ?? undefined,
      message: error.message ?? undefined,
    }),
  };
}

/** Finish reasons that mean the output was cut short. */
function isTruncation(reason: string): boolean {
  return reason === "length" || reason === "content_filter";
}

export function messageItemId(choice: number): string {
  return `choice-${choice}`;
}

export function reasoningItemId(choice: number): string {
  return `choice-${choice}-reasoning`;
}

export function toolItemId(choice: number, index: number): string {
  return `choice-${choice}-tool-${index}`;
}

// ─── Interpreter ───────────────────────────────────────────────────────────────

interface ChoiceState {
  /** Item ids in creation order, until the choice finishes. */
  open: string[];
  message?: string;
  reasoning?: string;
  tools: Map<number, string>;
}

class ChatInterpreter implements FrameInterpreter {
  private started = false;
  private truncated = false;
  private readonly choices = new Map<number, ChoiceState>();

  constructor(private readonly logger: Logger) {}

  interpret(frame: Frame): DecodeOutcome {
    const parsed = ChatChunkWireSchema.safeParse(frame.data);
    if (!parsed.success) return err(shapeFailure("chat completion chunk", parsed.error));
    const chunk = parsed.data;

    if (chunk.error) return ok([errorDelta(chunk.error)]);

    const deltas: StreamDelta[] = [];
    if (!this.started) {
      this.started = true;
      deltas.push({ type: "response.started", responseId: chunk.id, model: chunk.model });
    }

    for (const choice of chunk.choices) {
      const state = this.choice(choice.index);
      const { content, refusal, reasoning_content: reasoning, tool_calls: toolCalls } = choice.delta;

      if (reasoning) {
        if (state.reasoning === undefined) {
          state.reasoning = reasoningItemId(choice.index);
          deltas.push(this.open(state, state.reasoning, "reasoning", "reasoning"));
        }
        deltas.push({ type: "item.text", itemId: state.reasoning, text: reasoning });
      }

      const text = (content ?? "") + (refusal ?? "");
      if (text) {
        if (state.message === undefined) {
          state.message = messageItemId(choice.index);
          deltas.push(this.open(state, state.message, "message", "message"));
        }
        deltas.push({ type: "item.text", itemId: state.message, text });
      }

      for (const call of toolCalls ?? []) {
        let itemId = state.tools.get(call.index);
        if (itemId === undefined) {
          itemId = call.id ?? toolItemId(choice.index, call.index);
          state.tools.set(call.index, itemId);
          deltas.push({
            ...this.open(state, itemId, "tool_call", call.type ?? "function"),
            ...(call.function?.name ? { name: call.function.name } : {}),
            ...(call.id ? { callId: call.id } : {}),
          });
        }
        if (call.function?.arguments) {
          deltas.push({ type: "item.arguments", itemId, fragment: call.function.arguments });
        }
      }

      if (choice.finish_reason) {
        if (isTruncation(choice.finish_reason)) this.truncated = true;
        deltas.push(...this.close(state));
      }
    }

    if (chunk.usage) {
      deltas.push({ type: "usage", usage: toUsage(chunk.usage) });
    }
    return ok(deltas);
  }

  finish(): StreamDelta[] {
    const deltas: StreamDelta[] = [];
    for (const state of this.choices.values()) {
      if (state.open.length > 0) {
        this.logger.debug("Closing items left open at end of stream", { items: state.open.length });
      }
      deltas.push(...this.close(state));
    }
    const status: ResponseStatus = this.truncated ? "incomplete" : "completed";
    deltas.push({ type: "response.done", status });
    return deltas;
  }

  private choice(index: number): ChoiceState {
    let state = this.choices.get(index);
    if (!state) {
      state = { open: [], tools: new Map() };
      this.choices.set(index, state);
    }
    return state;
  }

  private open(
    state: ChoiceState,
    itemId: string,
    itemType: "message" | "reasoning" | "tool_call",
    rawType: string
  ): Extract<StreamDelta, { type: "item.added" }> {
    state.open.push(itemId);
    return { type: "item.added", itemId, itemType, rawType };
  }

  private close(state: ChoiceState): StreamDelta[] {
    const deltas = state.open.map((itemId): StreamDelta => ({ type: "item.done", itemId }));
    state.open = [];
    return deltas;
  }
}

// ─── Whole-body decoding ───────────────────────────────────────────────────────

function wholeDeltas(completion: z.infer<typeof ChatCompletionWireSchema>): StreamDelta[] {
  const deltas: StreamDelta[] = [{ type: "response.started", responseId: completion.id, model: completion.model }];
  let truncated = false;

  for (const choice of completion.choices) {
    const { content, refusal, reasoning_content: reasoning, tool_calls: toolCalls } = choice.message;

    if (reasoning) {
      const itemId = reasoningItemId(choice.index);
      deltas.push(
        { type: "item.added", itemId, itemType: "reasoning", rawType: "reasoning" },
        { type: "item.text", itemId, text: reasoning },
        { type: "item.done", itemId }
      );
    }

    const text = (content ?? "") + (refusal ?? "");
    if (text) {
      const itemId = messageItemId(choice.index);
      deltas.push(
        { type: "item.added", itemId, itemType: "message", rawType: "message" },
        { type: "item.text", itemId, text },
        { type: "item.done", itemId }
      );
    }

    for (const call of toolCalls ?? []) {
      deltas.push({
        type: "item.added",
        itemId: call.id,
        itemType: "tool_call",
        rawType: call.type ?? "function",
        name: call.function.name,
        callId: call.id,
      });
      if (call.function.arguments) {
        deltas.push({ type: "item.arguments", itemId: call.id, fragment: call.function.arguments });
      }
      deltas.push({ type: "item.done", itemId: call.id });
    }

    if (choice.finish_reason && isTruncation(choice.finish_reason)) truncated = true;
  }

  const usage = completion.usage ? toUsage(completion.usage) : undefined;
  deltas.push(
    usage
      ? { type: "response.done", status: truncated ? "incomplete" : "completed", usage }
      : { type: "response.done", status: truncated ? "incomplete" : "completed" }
  );
  return deltas;
}

export const chatDialect: StreamDialect = {
  name: "chat",
  path: "/chat/completions",

  createInterpreter(logger: Logger = silentLogger): FrameInterpreter {
    return new ChatInterpreter(logger);
  },

  fromWhole(body: JsonValue): DecodeOutcome {
    const error = z.object({ error: ChatErrorWireSchema }).safeParse(body);
    if (error.success) return ok([errorDelta(error.data.error)]);

    const parsed = ChatCompletionWireSchema.safeParse(body);
    if (!parsed.success) return err(shapeFailure("chat completion", parsed.error));
    return ok(wholeDeltas(parsed.data));
  },
};
