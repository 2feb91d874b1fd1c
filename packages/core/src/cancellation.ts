import { classifyFailure } from "./classify.js";
import type { ClassifiedError } from "./errors.js";

// ─── Cancellation ──────────────────────────────────────────────────────────────
// One source per external call. The source is the only writer; tokens are
// handed to every suspended operation of the call. Cancellation is one-way, so
// a cancelled call needs a fresh source to be re-invoked.

export class CancellationToken {
  private static readonly neverSignal = new AbortController().signal;

  /** A token that is never cancelled. */
  static readonly none = new CancellationToken(CancellationToken.neverSignal);

  constructor(readonly signal: AbortSignal) {}

  get isCancelled(): boolean {
    return this.signal.aborted;
  }

  get reason(): string | undefined {
    if (!this.signal.aborted) return undefined;
    const reason: unknown = this.signal.reason;
    return typeof reason === "string" ? reason : undefined;
  }

  /** Throws a `cancelled` classified error once the token has fired. */
  throwIfCancelled(): void {
    if (this.isCancelled) throw this.toError();
  }

  toError(): ClassifiedError {
    return classifyFailure({ source: "cancellation", reason: this.reason });
  }

  /**
   * Runs `listener` once on cancellation (immediately if already cancelled).
   * Returns the unsubscribe function.
   */
  onCancel(listener: () => void): () => void {
    if (this.isCancelled) {
      listener();
      return () => undefined;
    }
    const handler = () => listener();
    this.signal.addEventListener("abort", handler, { once: true });
    return () => this.signal.removeEventListener("abort", handler);
  }
}

export class CancellationSource {
  private readonly controller = new AbortController();
  readonly token = new CancellationToken(this.controller.signal);

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  cancel(reason = "cancelled"): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason);
    }
  }
}

/**
 * A source for a sub-operation of `parent`'s call: cancelling the parent
 * cancels it, cancelling it leaves the parent untouched. `dispose` detaches it
 * from the parent once the sub-operation is over.
 */
export function linkedSource(parent: CancellationToken): CancellationSource & { dispose(): void } {
  const source = new CancellationSource();
  const detach = parent.onCancel(() => source.cancel(parent.reason));
  return Object.assign(source, { dispose: detach });
}

/** Sleeps for `ms`, rejecting with a `cancelled` error as soon as `token` fires. */
export function delay(ms: number, token: CancellationToken = CancellationToken.none): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (token.isCancelled) {
      reject(token.toError());
      return;
    }
    const timer = setTimeout(() => {
      unsubscribe();
      resolve();
    }, ms);
    const unsubscribe = token.onCancel(() => {
      clearTimeout(timer);
      reject(token.toError());
    });
  });
}
