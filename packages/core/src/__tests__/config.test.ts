import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  ConfigError,
  ClientConfigSchema,
  RATE_LIMIT_RETRY_POLICY,
  RetryPolicySchema,
  deepMerge,
  loadConfig,
  saveConfig,
} from "../config.js";

let dir: string;
let path: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "genstream-config-"));
  path = join(dir, "config.json");
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("loadConfig", () => {
  it("returns defaults without a file or environment", () => {
    const config = loadConfig({ path, env: {} });

    expect(config.model).toBe("gpt-4.1-mini");
    expect(config.logLevel).toBe("info");
    expect(config.client.baseUrl).toBe("https://api.openai.com/v1");
    expect(config.client.apiKey).toBeUndefined();
    expect(config.client.decodeFailurePolicy).toBe("fatal");
    expect(config.client.retry).toEqual({
      maxAttempts: 3,
      baseDelayMs: 1_000,
      maxDelayMs: 60_000,
      multiplier: 2,
      jitter: { min: 0.8, max: 1.2 },
    });
  });

  it("overlays the environment on the file", () => {
    writeFileSync(path, JSON.stringify({ model: "file-model", client: { retry: { baseDelayMs: 200 } } }));

    const config = loadConfig({
      path,
      env: { GENSTREAM_API_KEY: "test-secret", GENSTREAM_MAX_ATTEMPTS: "5", GENSTREAM_MODEL: "" },
    });

    expect(config.model).toBe("file-model");
    expect(config.client.apiKey).toBe("test-secret");
    expect(config.client.retry.maxAttempts).toBe(5);
    expect(config.client.retry.baseDelayMs).toBe(200);
  });

  it("falls back to the OpenAI variable names", () => {
    const config = loadConfig({ path, env: { OPENAI_API_KEY: "test-key", OPENAI_PROJECT_ID: "proj-test" } });

    expect(config.client.apiKey).toBe("test-key");
    expect(config.client.project).toBe("proj-test");
  });

  it("reports invalid values with their path", () => {
    expect(() => loadConfig({ path, env: { GENSTREAM_LOG_LEVEL: "loud" } })).toThrow(ConfigError);
    expect(() => loadConfig({ path, env: { GENSTREAM_TIMEOUT_MS: "-1" } })).toThrow(/client\.timeoutMs/);
  });

  it("rejects a file that is not a JSON object", () => {
    writeFileSync(path, "[1, 2]");
    expect(() => loadConfig({ path, env: {} })).toThrow(`${path} must contain a JSON object`);

    writeFileSync(path, "{ not json");
    expect(() => loadConfig({ path, env: {} })).toThrow(/^Cannot read/);
  });

  it("reads back what saveConfig wrote", () => {
    const nested = join(dir, "nested", "config.json");
    const saved = loadConfig({ path, env: { GENSTREAM_MODEL: "saved-model" } });

    saveConfig(saved, nested);

    expect(loadConfig({ path: nested, env: {} })).toEqual(saved);
  });
});

describe("RetryPolicySchema", () => {
  it("rejects a maximum delay below the base delay", () => {
    expect(RetryPolicySchema.safeParse({ baseDelayMs: 500, maxDelayMs: 100 }).success).toBe(false);
  });

  it("rejects an inverted jitter range", () => {
    expect(RetryPolicySchema.safeParse({ jitter: { min: 1.5, max: 1.1 } }).success).toBe(false);
  });

  it("ships a preset for rate-limited workloads", () => {
    expect(RATE_LIMIT_RETRY_POLICY).toEqual({
      maxAttempts: 5,
      baseDelayMs: 2_000,
      maxDelayMs: 120_000,
      multiplier: 2,
      jitter: { min: 0.8, max: 1.2 },
    });
  });

  it("is applied inside the client config", () => {
    expect(ClientConfigSchema.parse({ retry: { maxAttempts: 1 } }).retry.maxAttempts).toBe(1);
  });
});

describe("deepMerge", () => {
  it("merges nested objects and skips empty values", () => {
    expect(deepMerge({ a: { b: 1, c: 2 }, d: "x" }, { a: { c: 3 }, d: "", e: undefined, f: {} })).toEqual({
      a: { b: 1, c: 3 },
      d: "x",
    });
  });
});
