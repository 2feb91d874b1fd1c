import { describe, it, expect } from "vitest";
import {
  CancellationSource,
  ClassifiedError,
  ClientConfigSchema,
  RetryError,
  RetryPolicySchema,
  unwrapFailure,
  type ClientConfig,
} from "@genstream/core";
import { GenStreamClient, encodeJsonBody } from "../client.js";
import { responsesDialect } from "../dialects/responses.js";
import type { RetryNotice } from "../retry.js";
import { FakeFetch, captureError, collect, responsesStream, split, sse, type ResponseScript } from "./fakes.js";

function setup(scripts: Array<ResponseScript | Error>, overrides: Record<string, unknown> = {}) {
  const config: ClientConfig = ClientConfigSchema.parse({
    apiKey: "test-secret",
    baseUrl: "https://api.example.test/v1",
    retry: { baseDelayMs: 10, maxDelayMs: 100 },
    ...overrides,
  });
  const fake = new FakeFetch(scripts);
  const sleeps: number[] = [];
  const client = new GenStreamClient(config, {
    fetch: fake.fetch,
    random: () => 0.5,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
  return { client, fake, sleeps };
}

const helloStream = sse(...responsesStream(["Hel", "lo"]), "[DONE]");

describe("GenStreamClient.streamResponse", () => {
  it("streams snapshots and ends with the complete response", async () => {
    const { client, fake } = setup([{ chunks: split(helloStream, 17) }]);

    const snapshots = await collect(client.streamResponse({ model: "test-model", input: "Say hello" }));
    const final = snapshots[snapshots.length - 1];

    expect(final?.done).toBe(true);
    expect(final?.items[0]?.text).toBe("Hello");
    expect(final?.usage?.totalTokens).toBe(7);
    expect(fake.body(0)).toEqual({ model: "test-model", input: "Say hello", stream: true });
    expect(fake.calls[0]?.url).toBe("https://api.example.test/v1/responses");
    expect(fake.reader(0).released).toBe(true);
  });

  it("retries a rate-limited open and then streams", async () => {
    const rateLimited = JSON.stringify({
      error: { message: "Rate limit reached", type: "requests", code: "rate_limit_exceeded" },
    });
    const { client, fake, sleeps } = setup([
      { status: 429, headers: { "content-type": "application/json" }, chunks: [rateLimited] },
      { chunks: [helloStream] },
    ]);
    const notices: RetryNotice[] = [];

    const snapshots = await collect(client.streamResponse({ input: "hi" }, { onRetry: (n) => notices.push(n) }));

    expect(snapshots[snapshots.length - 1]?.items[0]?.text).toBe("Hello");
    expect(fake.calls).toHaveLength(2);
    expect(notices).toHaveLength(1);
    expect(notices[0]?.error.code).toBe("rate_limit_exceeded");
    expect(sleeps).toHaveLength(1);
    expect(sleeps[0]).toBeCloseTo(10);
  });

  it("fails with streamingUnsupported when the server does not stream", async () => {
    const { client, fake } = setup([{ headers: { "content-type": "application/json" }, chunks: ['{"id":"resp_1"}'] }]);

    const error = await captureError(collect(client.streamResponse({ input: "hi" })));

    expect(error).toBeInstanceOf(RetryError);
    expect(unwrapFailure(error)?.kind).toBe("streamingUnsupported");
    expect(fake.calls).toHaveLength(1);
    expect(fake.reader(0).cancelled).toBe(true);
    expect(fake.reader(0).released).toBe(true);
  });

  it("releases the connection when the consumer stops early", async () => {
    const first = sse(responsesStream(["a"])[0] ?? {});
    const { client, fake } = setup([{ chunks: [first], hang: true }]);

    for await (const snapshot of client.streamResponse({ input: "hi" })) {
      expect(snapshot.responseId).toBe("resp_1");
      break;
    }

    expect(fake.reader(0).cancelled).toBe(true);
    expect(fake.reader(0).released).toBe(true);
  });

  it("reports cancellation mid-stream as cancelled", async () => {
    const source = new CancellationSource();
    const first = sse(responsesStream(["a"])[0] ?? {});
    const { client, fake } = setup([{ chunks: [first], hang: true }]);

    const stream = client.streamResponse({ input: "hi" }, { token: source.token });
    await stream.next();
    const pending = stream.next();
    source.cancel("user");
    const error = await captureError(pending);

    expect(error).toBeInstanceOf(ClassifiedError);
    expect(unwrapFailure(error)?.kind).toBe("cancelled");
    expect(fake.reader(0).released).toBe(true);
  });

  it("surfaces an in-stream error event", async () => {
    const body = sse(responsesStream(["a"])[0] ?? {}, { type: "error", code: "server_error", message: "boom" });
    const { client } = setup([{ chunks: [body] }]);

    const error = await captureError(collect(client.streamResponse({ input: "hi" })));

    expect(unwrapFailure(error)?.label).toBe("serverError(500)");
    expect(unwrapFailure(error)?.message).toBe("boom");
  });

  it("records malformed frames under the skip policy", async () => {
    const body = sse(...responsesStream(["ok"]).slice(0, 2), "{broken", ...responsesStream(["ok"]).slice(2));
    const { client } = setup([{ chunks: [body] }], { decodeFailurePolicy: "skip" });

    const snapshots = await collect(client.streamResponse({ input: "hi" }));
    const final = snapshots[snapshots.length - 1];

    expect(final?.items[0]?.text).toBe("ok");
    expect(final?.issues.map((i) => i.type)).toEqual(["decode_failure"]);
  });
});

describe("GenStreamClient.stream", () => {
  it("refuses an envelope that is not a streaming request", async () => {
    const { client, fake } = setup([]);

    const error = await captureError(
      collect(client.stream({ method: "POST", path: "/responses", stream: false }, responsesDialect))
    );

    expect(error).toBeInstanceOf(ClassifiedError);
    expect(unwrapFailure(error)?.kind).toBe("streamingUnsupported");
    expect(fake.calls).toHaveLength(0);
  });
});

describe("GenStreamClient buffered calls", () => {
  it("folds a chat completion body", async () => {
    const completion = JSON.stringify({
      id: "chatcmpl-1",
      model: "test-model",
      choices: [{ index: 0, message: { role: "assistant", content: "Hi there" }, finish_reason: "stop" }],
      usage: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 },
    });
    const { client, fake } = setup([{ headers: { "content-type": "application/json" }, chunks: [completion] }]);

    const result = await client.createChatCompletion({ model: "test-model", messages: [{ role: "user", content: "Hi" }] });

    expect(result.items.map((i) => i.text)).toEqual(["Hi there"]);
    expect(result.usage).toEqual({ inputTokens: 3, outputTokens: 2, totalTokens: 5 });
    expect(fake.calls[0]?.url).toBe("https://api.example.test/v1/chat/completions");
    expect(fake.body(0)).toEqual({ model: "test-model", messages: [{ role: "user", content: "Hi" }], stream: false });
    expect(fake.calls[0]?.init.headers["Accept"]).toBeUndefined();
  });

  it("fails with decodingFailed when the body is not JSON", async () => {
    const { client } = setup([{ headers: { "content-type": "text/html" }, chunks: ["<html>"] }]);

    const error = await captureError(client.createResponse({ input: "hi" }));

    expect(unwrapFailure(error)?.kind).toBe("decodingFailed");
    expect(unwrapFailure(error)?.code).toBe("body_decode_failed");
  });

  it("does not retry a client error", async () => {
    const { client, fake } = setup([{ status: 404, chunks: [] }]);

    const error = await captureError(client.createResponse({ input: "hi" }));

    expect(error).toBeInstanceOf(RetryError);
    expect(unwrapFailure(error)?.label).toBe("clientError(404)");
    expect(unwrapFailure(error)?.userMessage).toBe("The requested resource was not found.");
    expect(fake.calls).toHaveLength(1);
  });

  it("retries a server error up to the attempt budget", async () => {
    const { client, fake } = setup([
      { status: 502, chunks: [] },
      { status: 502, chunks: [] },
      { status: 502, chunks: [] },
    ]);

    const error = await captureError(client.createResponse({ input: "hi" }));

    expect(error).toBeInstanceOf(RetryError);
    if (error instanceof RetryError) expect(error.attempts).toBe(3);
    expect(fake.calls).toHaveLength(3);
  });

  it("takes a per-call retry policy over the configured one", async () => {
    const { client, fake, sleeps } = setup([
      { status: 500, chunks: [] },
      { status: 500, chunks: [] },
    ]);

    const error = await captureError(
      client.createResponse({ input: "hi" }, { retry: RetryPolicySchema.parse({ maxAttempts: 1 }) })
    );

    expect(error).toBeInstanceOf(RetryError);
    if (error instanceof RetryError) expect(error.attempts).toBe(1);
    expect(fake.calls).toHaveLength(1);
    expect(sleeps).toEqual([]);
  });

  it("rejects a body that cannot be serialized", async () => {
    const { client, fake } = setup([]);

    const error = await captureError(client.createResponse({ input: "hi", seed: 1n }));

    expect(unwrapFailure(error)?.kind).toBe("invalidPayload");
    expect(fake.calls).toHaveLength(0);
  });
});

describe("GenStreamClient uploads", () => {
  const reply = JSON.stringify({ id: "file-1", object: "file", filename: "notes.txt", purpose: "assistants" });

  it("posts a file as multipart form data", async () => {
    const { client, fake } = setup([{ headers: { "content-type": "application/json" }, chunks: [reply] }]);

    const result = await client.uploadFile(new Blob(["hello"]), { purpose: "assistants", filename: "notes.txt" });

    expect(result).toEqual({ id: "file-1", object: "file", filename: "notes.txt", purpose: "assistants" });
    const call = fake.calls[0];
    expect(call?.url).toBe("https://api.example.test/v1/files");
    expect(call?.init.method).toBe("POST");
    expect(call?.init.headers).toEqual({ "User-Agent": "genstream/0.1.0", Authorization: "Bearer test-secret" });

    const form = call?.init.body;
    if (!(form instanceof FormData)) throw new Error("expected a multipart body");
    expect(form.get("purpose")).toBe("assistants");
    const file = form.get("file");
    if (file === null || typeof file === "string") throw new Error("expected a file part");
    expect(file.name).toBe("notes.txt");
    expect(await file.text()).toBe("hello");
  });

  it("resends the same form after a server error", async () => {
    const { client, fake, sleeps } = setup([
      { status: 503, chunks: [] },
      { headers: { "content-type": "application/json" }, chunks: [reply] },
    ]);
    const form = new FormData();
    form.append("purpose", "batch");

    await client.upload("/files", form);

    expect(fake.calls).toHaveLength(2);
    expect(fake.calls[0]?.init.body).toBe(form);
    expect(fake.calls[1]?.init.body).toBe(form);
    expect(sleeps).toHaveLength(1);
  });
});

describe("encodeJsonBody", () => {
  it("serializes plain objects", () => {
    expect(encodeJsonBody({ a: [1, "b"] })).toBe('{"a":[1,"b"]}');
  });

  it("maps cyclic values to invalidPayload", () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;
    expect(() => encodeJsonBody(cyclic)).toThrow(ClassifiedError);
  });
});
