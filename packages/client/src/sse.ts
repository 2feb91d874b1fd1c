import {
  classifyFailure,
  err,
  getString,
  ok,
  parseJson,
  type ClassifiedError,
  type Frame,
  type Result,
} from "@genstream/core";

// ─── SSE event parser ──────────────────────────────────────────────────────────
// Line-level Server-Sent Events parsing. Text may be pushed in arbitrary
// slices; the events produced do not depend on where the slices were cut.

export interface SseEvent {
  event?: string;
  id?: string;
  data: string;
}

export class SseEventParser {
  private buffer = "";
  private dataLines: string[] = [];
  private eventName: string | undefined;
  private lastId: string | undefined;

  /** Feeds decoded text and returns the events it completed. */
  push(text: string): SseEvent[] {
    this.buffer += text;
    const events: SseEvent[] = [];
    let start = 0;

    for (let i = 0; i < this.buffer.length; i++) {
      const ch = this.buffer[i];
      if (ch !== "\n" && ch !== "\r") continue;
      // A trailing CR may be the first half of a CRLF split across pushes.
      if (ch === "\r" && i === this.buffer.length - 1) break;

      const line = this.buffer.slice(start, i);
      if (ch === "\r" && this.buffer[i + 1] === "\n") i++;
      start = i + 1;

      const event = this.processLine(line);
      if (event) events.push(event);
    }

    this.buffer = this.buffer.slice(start);
    return events;
  }

  /** Flushes the unterminated tail at end of input. */
  end(): SseEvent[] {
    const events: SseEvent[] = [];
    if (this.buffer.length > 0) {
      const line = this.buffer.endsWith("\r") ? this.buffer.slice(0, -1) : this.buffer;
      this.buffer = "";
      const event = this.processLine(line);
      if (event) events.push(event);
    }
    const pending = this.dispatch();
    if (pending) events.push(pending);
    return events;
  }

  private processLine(line: string): SseEvent | undefined {
    if (line === "") return this.dispatch();
    if (line.startsWith(":")) return undefined;

    const colon = line.indexOf(":");
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? "" : line.slice(colon + 1);
    if (value.startsWith(" ")) value = value.slice(1);

    switch (field) {
      case "data":
        this.dataLines.push(value);
        break;
      case "event":
        this.eventName = value;
        break;
      case "id":
        if (!value.includes("\0")) this.lastId = value;
        break;
      default:
        // `retry` and unknown fields
        break;
    }
    return undefined;
  }

  private dispatch(): SseEvent | undefined {
    const eventName = this.eventName;
    this.eventName = undefined;
    if (this.dataLines.length === 0) return undefined;

    const data = this.dataLines.join("\n");
    this.dataLines = [];
    const event: SseEvent = { data };
    if (eventName) event.event = eventName;
    if (this.lastId !== undefined) event.id = this.lastId;
    return event;
  }
}

// ─── Frame decoding ────────────────────────────────────────────────────────────

export type FrameOutcome = Result<Frame, ClassifiedError>;

export interface DecodeFramesOptions {
  /** Payload that ends the stream; defaults to `[DONE]`. */
  sentinel?: string;
}

export function toFrame(event: SseEvent): FrameOutcome {
  const parsed = parseJson(event.data);
  if (!parsed.ok) {
    return err(
      classifyFailure({
        source: "decode",
        code: "frame_decode_failed",
        detail: `Malformed frame payload: ${parsed.error.message}`,
        cause: parsed.error,
      })
    );
  }
  const frame: Frame = {
    kind: event.event ?? getString(parsed.value, "type") ?? "message",
    data: parsed.value,
    raw: event.data,
  };
  if (event.id !== undefined) frame.id = event.id;
  return ok(frame);
}

/**
 * Decodes a byte stream into frames. A payload that is not JSON yields a
 * failed outcome and decoding carries on with the next frame. The sentinel
 * ends the sequence and stops reading from `chunks`.
 */
export async function* decodeFrames(
  chunks: AsyncIterable<Uint8Array>,
  options: DecodeFramesOptions = {}
): AsyncGenerator<FrameOutcome, void, undefined> {
  const sentinel = options.sentinel ?? "[DONE]";
  const decoder = new TextDecoder("utf-8");
  const parser = new SseEventParser();

  for await (const chunk of chunks) {
    for (const event of parser.push(decoder.decode(chunk, { stream: true }))) {
      if (event.data.trim() === sentinel) return;
      yield toFrame(event);
    }
  }

  for (const event of [...parser.push(decoder.decode()), ...parser.end()]) {
    if (event.data.trim() === sentinel) return;
    yield toFrame(event);
  }
}
