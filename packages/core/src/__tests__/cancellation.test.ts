import { describe, it, expect, vi } from "vitest";
import { CancellationSource, CancellationToken, delay, linkedSource } from "../cancellation.js";

describe("CancellationSource", () => {
  it("fires listeners once with the given reason", () => {
    const source = new CancellationSource();
    const listener = vi.fn();
    source.token.onCancel(listener);

    source.cancel("user");
    source.cancel("again");

    expect(listener).toHaveBeenCalledTimes(1);
    expect(source.token.isCancelled).toBe(true);
    expect(source.token.reason).toBe("user");
  });

  it("runs a late listener immediately", () => {
    const source = new CancellationSource();
    source.cancel();
    const listener = vi.fn();

    source.token.onCancel(listener);

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it("does not call an unsubscribed listener", () => {
    const source = new CancellationSource();
    const listener = vi.fn();
    const unsubscribe = source.token.onCancel(listener);

    unsubscribe();
    source.cancel();

    expect(listener).not.toHaveBeenCalled();
  });

  it("throws a cancelled error carrying the reason", () => {
    const source = new CancellationSource();
    source.token.throwIfCancelled();
    source.cancel("shutdown");

    expect(() => source.token.throwIfCancelled()).toThrow("Cancelled: shutdown");
    expect(source.token.toError().kind).toBe("cancelled");
    expect(source.token.toError().retryable).toBe(false);
  });

  it("never cancels the none token", () => {
    expect(CancellationToken.none.isCancelled).toBe(false);
    expect(CancellationToken.none.reason).toBeUndefined();
  });
});

describe("linkedSource", () => {
  it("follows the parent but not the other way round", () => {
    const parent = new CancellationSource();
    const first = linkedSource(parent.token);
    const second = linkedSource(parent.token);

    first.cancel("child");
    expect(parent.isCancelled).toBe(false);
    expect(second.isCancelled).toBe(false);

    parent.cancel("parent");
    expect(second.token.reason).toBe("parent");
  });

  it("stops following once disposed", () => {
    const parent = new CancellationSource();
    const child = linkedSource(parent.token);

    child.dispose();
    parent.cancel();

    expect(child.isCancelled).toBe(false);
  });
});

describe("delay", () => {
  it("resolves after the timeout", async () => {
    await expect(delay(1)).resolves.toBeUndefined();
  });

  it("rejects as soon as the token fires", async () => {
    const source = new CancellationSource();
    const pending = delay(60_000, source.token);

    source.cancel("stop");

    await expect(pending).rejects.toMatchObject({ kind: "cancelled", message: "Cancelled: stop" });
  });

  it("rejects immediately for a cancelled token", async () => {
    const source = new CancellationSource();
    source.cancel();

    await expect(delay(60_000, source.token)).rejects.toMatchObject({ kind: "cancelled" });
  });
});
