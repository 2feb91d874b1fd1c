import { z } from "zod";
import { err, ok, type Result } from "./result.js";

// ─── JSON value ────────────────────────────────────────────────────────────────

export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

// ─── Parsing ───────────────────────────────────────────────────────────────────

export function parseJson(text: string): Result<JsonValue, Error> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    return err(e instanceof Error ? e : new Error(String(e)));
  }
  const checked = JsonValueSchema.safeParse(parsed);
  if (!checked.success) {
    return err(new Error(checked.error.message));
  }
  return ok(checked.data);
}

// ─── Accessors ─────────────────────────────────────────────────────────────────

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function getString(value: JsonValue | undefined, key: string): string | undefined {
  if (!isJsonObject(value)) return undefined;
  const field = value[key];
  return typeof field === "string" ? field : undefined;
}
