import { describe, it, expect } from "vitest";
import { getString, isJsonObject, parseJson } from "../json.js";

describe("parseJson", () => {
  it("returns the checked value", () => {
    const result = parseJson('{"id":"resp_1","output":[1,true,null]}');

    expect(result).toEqual({ ok: true, value: { id: "resp_1", output: [1, true, null] } });
  });

  it("reports malformed text as an error value", () => {
    const result = parseJson("{not json");

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(SyntaxError);
  });
});

describe("accessors", () => {
  it("reads string fields of objects only", () => {
    expect(getString({ type: "response.created" }, "type")).toBe("response.created");
    expect(getString({ type: 3 }, "type")).toBeUndefined();
    expect(getString(["type"], "type")).toBeUndefined();
    expect(getString(undefined, "type")).toBeUndefined();
  });

  it("treats arrays and null as non-objects", () => {
    expect(isJsonObject({})).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
  });
});
