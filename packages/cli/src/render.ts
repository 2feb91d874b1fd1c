import {
  ConfigError,
  RetryError,
  actionDescription,
  actionLabel,
  unwrapFailure,
  type AccumulatedResult,
  type OutputItem,
  type StreamIssue,
} from "@genstream/core";

// ─── Output ────────────────────────────────────────────────────────────────────
// Message text goes to `out` as it arrives; everything about the call (tool
// calls, usage, issues) goes to `err` so piped output stays clean.

export interface TextSink {
  write(chunk: string): unknown;
}

export class SnapshotPrinter {
  private readonly printed = new Map<string, number>();
  private readonly announced = new Set<string>();
  private lastMessage: string | undefined;

  constructor(
    private readonly out: TextSink,
    private readonly err: TextSink
  ) {}

  /** Prints whatever `snapshot` adds over the previous ones. */
  update(snapshot: AccumulatedResult): void {
    for (const item of snapshot.items) {
      if (item.type === "message") {
        this.printText(item);
      } else if (item.type === "tool_call" && item.state === "done" && !this.announced.has(item.id)) {
        this.announced.add(item.id);
        this.err.write(`[tool] ${item.name ?? item.rawType}(${item.arguments})\n`);
      }
    }
  }

  finish(snapshot: AccumulatedResult): void {
    this.update(snapshot);
    if (this.lastMessage !== undefined) this.out.write("\n");
    if (snapshot.status === "incomplete") this.err.write("[status] incomplete\n");
    for (const issue of snapshot.issues) {
      this.err.write(`[issue] ${describeIssue(issue)}\n`);
    }
    if (snapshot.usage) {
      this.err.write(`[usage] ${snapshot.usage.inputTokens} input, ${snapshot.usage.outputTokens} output tokens\n`);
    }
  }

  private printText(item: Readonly<OutputItem>): void {
    const offset = this.printed.get(item.id) ?? 0;
    if (item.text.length <= offset) return;
    if (this.lastMessage !== undefined && this.lastMessage !== item.id) this.out.write("\n\n");
    this.out.write(item.text.slice(offset));
    this.printed.set(item.id, item.text.length);
    this.lastMessage = item.id;
  }
}

export function describeIssue(issue: StreamIssue): string {
  switch (issue.type) {
    case "advisory_mismatch":
      return `final ${issue.field} of ${issue.itemId} differs from the streamed one`;
    case "decode_failure":
    case "protocol_violation":
      return `${issue.type.replace("_", " ")}: ${issue.error.message}`;
  }
}

// ─── Errors ────────────────────────────────────────────────────────────────────

export function renderError(error: unknown): string {
  const failure = unwrapFailure(error);
  if (!failure) {
    if (error instanceof ConfigError) return `Configuration error: ${error.message}`;
    return `Error: ${error instanceof Error ? error.message : String(error)}`;
  }

  const lines = [`${failure.title}: ${failure.userMessage}`, `  kind: ${failure.label} (${failure.severity})`];
  if (failure.code) lines.push(`  code: ${failure.code}`);
  if (failure.message !== failure.userMessage) lines.push(`  detail: ${failure.message}`);
  if (error instanceof RetryError) lines.push(`  attempts: ${error.attempts}`);

  const after = failure.suggestedDelayMs !== undefined ? `, after ${(failure.suggestedDelayMs / 1000).toFixed(1)}s` : "";
  lines.push(`  retryable: ${failure.retryable ? `yes${after}` : "no"}`);

  for (const action of failure.suggestedActions) {
    lines.push(`  - ${actionLabel(action)}: ${actionDescription(action)}`);
  }
  return lines.join("\n");
}
