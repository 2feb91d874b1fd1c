import { z } from "zod";
import { existsSync, readFileSync, mkdirSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { homedir } from "os";

// ─── Config schema ─────────────────────────────────────────────────────────────

export const RetryPolicySchema = z
  .object({
    maxAttempts: z.number().int().min(1).default(3),
    baseDelayMs: z.number().positive().default(1_000),
    maxDelayMs: z.number().positive().default(60_000),
    multiplier: z.number().min(1).default(2),
    jitter: z
      .object({
        min: z.number().positive().default(0.8),
        max: z.number().positive().default(1.2),
      })
      .refine((j) => j.min <= j.max, { message: "jitter.min must not exceed jitter.max" })
      .default({}),
  })
  .refine((p) => p.maxDelayMs >= p.baseDelayMs, {
    message: "maxDelayMs must be at least baseDelayMs",
    path: ["maxDelayMs"],
  });

export const DecodeFailurePolicySchema = z.enum(["fatal", "skip"]);

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export const ClientConfigSchema = z.object({
  apiKey: z.string().optional(),
  organization: z.string().optional(),
  project: z.string().optional(),
  baseUrl: z.string().default("https://api.openai.com/v1"),
  timeoutMs: z.number().int().positive().default(60_000),
  userAgent: z.string().default("genstream/0.1.0"),
  decodeFailurePolicy: DecodeFailurePolicySchema.default("fatal"),
  retry: RetryPolicySchema.default({}),
});

export const ConfigSchema = z.object({
  client: ClientConfigSchema.default({}),
  model: z.string().default("gpt-4.1-mini"),
  logLevel: LogLevelSchema.default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type RetryPolicy = z.infer<typeof RetryPolicySchema>;
export type DecodeFailurePolicy = z.infer<typeof DecodeFailurePolicySchema>;

/** For workloads that mostly fail on rate limits: more attempts, longer waits. */
export const RATE_LIMIT_RETRY_POLICY: RetryPolicy = RetryPolicySchema.parse({
  maxAttempts: 5,
  baseDelayMs: 2_000,
  maxDelayMs: 120_000,
});

export class ConfigError extends Error {
  constructor(message: string, readonly cause?: unknown) {
    super(message);
    this.name = "ConfigError";
  }
}

// ─── Config file path ──────────────────────────────────────────────────────────

export function getConfigDir(): string {
  return join(homedir(), ".genstream");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

// ─── Load config ───────────────────────────────────────────────────────────────

export interface LoadConfigOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  const configPath = options.path ?? getConfigPath();
  const env = options.env ?? process.env;
  let raw: Record<string, unknown> = {};

  if (existsSync(configPath)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(configPath, "utf8"));
    } catch (e) {
      throw new ConfigError(`Cannot read ${configPath}: ${e instanceof Error ? e.message : String(e)}`, e);
    }
    const object = z.record(z.unknown()).safeParse(parsed);
    if (!object.success) {
      throw new ConfigError(`${configPath} must contain a JSON object`);
    }
    raw = object.data;
  }

  // Overlay environment variables
  const merged = deepMerge(raw, {
    client: {
      apiKey: env.GENSTREAM_API_KEY ?? env.OPENAI_API_KEY,
      organization: env.GENSTREAM_ORGANIZATION ?? env.OPENAI_ORG_ID,
      project: env.GENSTREAM_PROJECT ?? env.OPENAI_PROJECT_ID,
      baseUrl: env.GENSTREAM_BASE_URL,
      ...(env.GENSTREAM_TIMEOUT_MS ? { timeoutMs: Number(env.GENSTREAM_TIMEOUT_MS) } : {}),
      ...(env.GENSTREAM_MAX_ATTEMPTS ? { retry: { maxAttempts: Number(env.GENSTREAM_MAX_ATTEMPTS) } } : {}),
    },
    model: env.GENSTREAM_MODEL,
    logLevel: env.GENSTREAM_LOG_LEVEL,
  });

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, result.error);
  }
  return result.data;
}

// ─── Save config ───────────────────────────────────────────────────────────────

export function saveConfig(config: Config, path: string = getConfigPath()): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(path, JSON.stringify(config, null, 2), "utf8");
}

// ─── Deep merge helper ─────────────────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sv = source[key];
    const tv = target[key];
    if (isPlainObject(sv) && isPlainObject(tv)) {
      result[key] = deepMerge(tv, sv);
    } else if (isPlainObject(sv)) {
      const nested = deepMerge({}, sv);
      if (Object.keys(nested).length > 0) result[key] = nested;
    } else if (sv !== undefined && sv !== null && sv !== "") {
      result[key] = sv;
    }
  }
  return result;
}
