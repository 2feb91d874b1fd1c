import {
  CancellationToken,
  classifyFailure,
  err,
  ok,
  silentLogger,
  type AccumulatedResult,
  type ClassifiedError,
  type DecodeFailurePolicy,
  type JsonValue,
  type Logger,
  type OutputItem,
  type ResponseStatus,
  type Result,
  type StreamDelta,
  type StreamIssue,
  type Usage,
} from "@genstream/core";
import type { FrameOutcome } from "./sse.js";
import type { StreamDialect } from "./dialects/types.js";

// ─── Accumulated state ─────────────────────────────────────────────────────────

export interface FoldFailure {
  error: ClassifiedError;
  /** True for a delta that contradicts the state; false for a server-reported error. */
  violation: boolean;
}

/** Ok(true) when the delta changed the state. */
export type FoldOutcome = Result<boolean, FoldFailure>;

function violation(detail: string): FoldOutcome {
  return err({
    error: classifyFailure({ source: "decode", code: "protocol_violation", detail }),
    violation: true,
  });
}

/**
 * Folds deltas into the accumulated result. Items keep first-seen order and
 * only ever grow; a delta that would break that is rejected and leaves the
 * state exactly as it was.
 */
export class Reconstructor {
  private readonly items = new Map<string, OutputItem>();
  private readonly order: OutputItem[] = [];
  private readonly issues: StreamIssue[] = [];
  private responseId: string | undefined;
  private model: string | undefined;
  private status: ResponseStatus = "in_progress";
  private usage: Usage | undefined;
  private done = false;

  get isDone(): boolean {
    return this.done;
  }

  apply(delta: StreamDelta): FoldOutcome {
    if (this.done) {
      return violation(`Received ${delta.type} after the response completed`);
    }
    if (delta.type === "response.error") {
      this.status = "failed";
      return err({ error: delta.error, violation: false });
    }

    switch (delta.type) {
      case "response.started": {
        let changed = false;
        if (delta.responseId !== undefined && delta.responseId !== this.responseId) {
          this.responseId = delta.responseId;
          changed = true;
        }
        if (delta.model !== undefined && delta.model !== this.model) {
          this.model = delta.model;
          changed = true;
        }
        return ok(changed);
      }

      case "item.added": {
        if (this.items.has(delta.itemId)) {
          return violation(`Duplicate output item ${delta.itemId}`);
        }
        const item: OutputItem = {
          id: delta.itemId,
          type: delta.itemType,
          rawType: delta.rawType,
          state: "pending",
          text: "",
          arguments: "",
        };
        if (delta.name !== undefined) item.name = delta.name;
        if (delta.callId !== undefined) item.callId = delta.callId;
        this.items.set(item.id, item);
        this.order.push(item);
        return ok(true);
      }

      case "item.text": {
        const target = this.open(delta.itemId, "Text");
        if (!target.ok) return target;
        if (target.value.type === "tool_call") {
          return violation(`Text for tool call ${delta.itemId}`);
        }
        target.value.text += delta.text;
        target.value.state = "streaming";
        return ok(true);
      }

      case "item.summary": {
        const target = this.open(delta.itemId, "Summary");
        if (!target.ok) return target;
        if (target.value.type !== "reasoning") {
          return violation(`Summary for ${target.value.type} item ${delta.itemId}`);
        }
        target.value.summary = (target.value.summary ?? "") + delta.text;
        target.value.state = "streaming";
        return ok(true);
      }

      case "item.arguments": {
        const target = this.open(delta.itemId, "Arguments");
        if (!target.ok) return target;
        if (target.value.type !== "tool_call") {
          return violation(`Arguments for ${target.value.type} item ${delta.itemId}`);
        }
        target.value.arguments += delta.fragment;
        target.value.state = "streaming";
        return ok(true);
      }

      case "item.done": {
        const target = this.open(delta.itemId, "Completion");
        if (!target.ok) return target;
        const item = target.value;
        item.state = "done";
        if (delta.advisory?.text !== undefined && delta.advisory.text !== item.text) {
          this.issues.push({ type: "advisory_mismatch", itemId: item.id, field: "text" });
        }
        if (delta.advisory?.arguments !== undefined && delta.advisory.arguments !== item.arguments) {
          this.issues.push({ type: "advisory_mismatch", itemId: item.id, field: "arguments" });
        }
        return ok(true);
      }

      case "usage":
        this.usage = delta.usage;
        return ok(true);

      case "response.done":
        this.status = delta.status;
        if (delta.usage) this.usage = delta.usage;
        this.done = true;
        return ok(true);
    }
  }

  note(issue: StreamIssue): void {
    this.issues.push(issue);
  }

  /** A deep copy; later deltas never show through it. */
  snapshot(): AccumulatedResult {
    const result: AccumulatedResult = {
      status: this.status,
      items: this.order.map((item) => ({ ...item })),
      issues: [...this.issues],
      done: this.done,
    };
    if (this.responseId !== undefined) result.responseId = this.responseId;
    if (this.model !== undefined) result.model = this.model;
    if (this.usage) result.usage = structuredClone(this.usage);
    return result;
  }

  private open(itemId: string, what: string): Result<OutputItem, FoldFailure> {
    const item = this.items.get(itemId);
    if (!item) {
      return err({
        error: classifyFailure({ source: "decode", code: "protocol_violation", detail: `${what} for unknown output item ${itemId}` }),
        violation: true,
      });
    }
    if (item.state === "done") {
      return err({
        error: classifyFailure({ source: "decode", code: "protocol_violation", detail: `${what} for completed output item ${itemId}` }),
        violation: true,
      });
    }
    return ok(item);
  }
}

// ─── Fold session ──────────────────────────────────────────────────────────────

export interface ReconstructOptions {
  decodeFailurePolicy?: DecodeFailurePolicy;
  token?: CancellationToken;
  logger?: Logger;
}

/** Applies deltas under a decode-failure policy and tracks unseen changes. */
class FoldSession {
  readonly state = new Reconstructor();
  private dirty = false;

  constructor(
    private readonly policy: DecodeFailurePolicy,
    private readonly logger: Logger
  ) {}

  applyAll(deltas: readonly StreamDelta[]): void {
    for (const delta of deltas) {
      const outcome = this.state.apply(delta);
      if (outcome.ok) {
        if (outcome.value) this.dirty = true;
      } else if (!outcome.error.violation) {
        throw outcome.error.error;
      } else {
        this.report({ type: "protocol_violation", error: outcome.error.error });
      }
    }
  }

  report(issue: Extract<StreamIssue, { error: ClassifiedError }>): void {
    if (this.policy === "fatal") throw issue.error;
    this.logger.warn(`Skipping ${issue.type.replace("_", " ")}`, { detail: issue.error.message });
    this.state.note(issue);
    this.dirty = true;
  }

  /** The snapshot if anything changed since the last call. */
  take(): AccumulatedResult | undefined {
    if (!this.dirty) return undefined;
    this.dirty = false;
    return this.state.snapshot();
  }
}

/**
 * Drives a dialect over a frame stream and yields a snapshot after every
 * frame that changed the state. The last snapshot yielded is the final state.
 * Server-reported errors are thrown; decode failures and protocol violations
 * are thrown or recorded according to the policy.
 */
export async function* reconstructStream(
  frames: AsyncIterable<FrameOutcome>,
  dialect: StreamDialect,
  options: ReconstructOptions = {}
): AsyncGenerator<AccumulatedResult, void, undefined> {
  const token = options.token ?? CancellationToken.none;
  const logger = options.logger ?? silentLogger;
  const session = new FoldSession(options.decodeFailurePolicy ?? "fatal", logger);
  const interpreter = dialect.createInterpreter(logger);
  let yielded = false;

  token.throwIfCancelled();
  for await (const outcome of frames) {
    token.throwIfCancelled();
    if (!outcome.ok) {
      session.report({ type: "decode_failure", error: outcome.error });
    } else {
      const decoded = interpreter.interpret(outcome.value);
      if (decoded.ok) {
        session.applyAll(decoded.value);
      } else {
        session.report({ type: "decode_failure", error: decoded.error });
      }
    }

    const snapshot = session.take();
    if (snapshot) {
      yielded = true;
      yield snapshot;
    }
  }
  token.throwIfCancelled();

  if (!session.state.isDone) {
    session.applyAll(interpreter.finish());
  }
  const last = session.take();
  if (last) {
    yield last;
  } else if (!yielded) {
    yield session.state.snapshot();
  }
}

/** Folds a complete response body into a single result. */
export function reconstructWhole(
  body: JsonValue,
  dialect: StreamDialect,
  options: Omit<ReconstructOptions, "token"> = {}
): AccumulatedResult {
  const session = new FoldSession(options.decodeFailurePolicy ?? "fatal", options.logger ?? silentLogger);
  const decoded = dialect.fromWhole(body);
  if (!decoded.ok) throw decoded.error;
  session.applyAll(decoded.value);
  return session.state.snapshot();
}
