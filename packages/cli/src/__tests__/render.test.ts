import { describe, it, expect } from "vitest";
import {
  ConfigError,
  RetryError,
  classifyFailure,
  type AccumulatedResult,
  type OutputItem,
} from "@genstream/core";
import { SnapshotPrinter, describeIssue, renderError } from "../render.js";
import { explainStatus, parseStatus } from "../commands/explain.js";

function sinks() {
  const out: string[] = [];
  const err: string[] = [];
  const printer = new SnapshotPrinter({ write: (s) => out.push(s) }, { write: (s) => err.push(s) });
  return { out, err, printer };
}

function message(id: string, text: string, state: OutputItem["state"] = "streaming"): OutputItem {
  return { id, type: "message", rawType: "message", state, text, arguments: "" };
}

function snapshot(items: OutputItem[], extra: Partial<AccumulatedResult> = {}): AccumulatedResult {
  return { status: "in_progress", items, issues: [], done: false, ...extra };
}

describe("SnapshotPrinter", () => {
  it("prints only the text each snapshot adds", () => {
    const { out, err, printer } = sinks();

    printer.update(snapshot([message("msg_1", "Hel")]));
    printer.update(snapshot([message("msg_1", "Hel")]));
    printer.update(snapshot([message("msg_1", "Hello")]));
    printer.finish(
      snapshot([message("msg_1", "Hello", "done")], {
        status: "completed",
        done: true,
        usage: { inputTokens: 5, outputTokens: 2, totalTokens: 7 },
      })
    );

    expect(out).toEqual(["Hel", "lo", "\n"]);
    expect(err).toEqual(["[usage] 5 input, 2 output tokens\n"]);
  });

  it("separates consecutive messages", () => {
    const { out, printer } = sinks();

    printer.update(snapshot([message("a", "One")]));
    printer.finish(snapshot([message("a", "One", "done"), message("b", "Two", "done")], { done: true }));

    expect(out).toEqual(["One", "\n\n", "Two", "\n"]);
  });

  it("announces a finished tool call once", () => {
    const { out, err, printer } = sinks();
    const call: OutputItem = {
      id: "call_1",
      type: "tool_call",
      rawType: "function_call",
      state: "streaming",
      text: "",
      arguments: '{"q":',
      name: "lookup",
    };

    printer.update(snapshot([call]));
    printer.update(snapshot([{ ...call, state: "done", arguments: '{"q":"x"}' }]));
    printer.finish(snapshot([{ ...call, state: "done", arguments: '{"q":"x"}' }], { done: true }));

    expect(out).toEqual([]);
    expect(err).toEqual(['[tool] lookup({"q":"x"})\n']);
  });

  it("reports an incomplete response and its issues", () => {
    const { err, printer } = sinks();

    printer.finish(
      snapshot([], {
        status: "incomplete",
        done: true,
        issues: [{ type: "advisory_mismatch", itemId: "msg_1", field: "text" }],
      })
    );

    expect(err).toEqual([
      "[status] incomplete\n",
      "[issue] final text of msg_1 differs from the streamed one\n",
    ]);
  });
});

describe("describeIssue", () => {
  it("names decode failures with their detail", () => {
    const error = classifyFailure({ source: "decode", detail: "Unexpected token" });
    expect(describeIssue({ type: "decode_failure", error })).toBe("decode failure: Unexpected token");
  });
});

describe("renderError", () => {
  it("renders a retried failure with its actions", () => {
    const failure = classifyFailure({
      source: "http",
      status: 429,
      headers: { get: (name) => (name === "retry-after" ? "20" : null) },
    });

    expect(renderError(new RetryError(3, failure, [failure, failure, failure]))).toBe(
      [
        "Rate Limit Exceeded: You've made too many requests. Please wait a moment before trying again.",
        "  kind: rateLimitExceeded (warning)",
        "  code: rate_limit_exceeded",
        "  detail: HTTP 429",
        "  attempts: 3",
        "  retryable: yes, after 20.0s",
        "  - Wait 20s: Wait 20 seconds before retrying",
        "  - Try Again: Retry the request",
      ].join("\n")
    );
  });

  it("renders a non-retryable failure without a delay", () => {
    const failure = classifyFailure({ source: "http", status: 401 });

    expect(renderError(failure)).toBe(
      [
        "Authentication Error: Your API key appears to be invalid. Please check your account settings.",
        "  kind: authenticationFailed (critical)",
        "  code: authentication_failed",
        "  detail: HTTP 401",
        "  retryable: no",
        "  - Check API Key: Verify the API key in your configuration",
      ].join("\n")
    );
  });

  it("renders errors outside the taxonomy", () => {
    expect(renderError(new ConfigError("Invalid configuration: logLevel: bad"))).toBe(
      "Configuration error: Invalid configuration: logLevel: bad"
    );
    expect(renderError(new Error("boom"))).toBe("Error: boom");
    expect(renderError("boom")).toBe("Error: boom");
  });
});

describe("explain", () => {
  it("classifies a status with the given body and Retry-After", () => {
    const body = JSON.stringify({ error: { message: "No such model", type: "invalid_request_error", code: "model_not_found" } });

    const notFound = explainStatus(404, { body });
    const limited = explainStatus(429, { retryAfter: "7" });

    expect(notFound.label).toBe("clientError(404)");
    expect(notFound.code).toBe("model_not_found");
    expect(notFound.userMessage).toBe("No such model");
    expect(limited.retryAfterMs).toBe(7_000);
  });

  it("accepts only HTTP status codes", () => {
    expect(parseStatus("503")).toBe(503);
    expect(() => parseStatus("abc")).toThrow("Expected an HTTP status code between 100 and 599.");
    expect(() => parseStatus("42")).toThrow("Expected an HTTP status code between 100 and 599.");
  });
});
