import {
  CancellationToken,
  RetryError,
  classifyUnknown,
  delay,
  silentLogger,
  type ClassifiedError,
  type Logger,
  type RetryPolicy,
} from "@genstream/core";

// ─── Retry controller ──────────────────────────────────────────────────────────

export interface RetryNotice {
  /** The attempt that just failed (1-based). */
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: ClassifiedError;
}

export interface PerformOptions {
  token?: CancellationToken;
  onRetry?: (notice: RetryNotice) => void;
  /** Called when an attempt after the first succeeds. */
  onSuccess?: (attempts: number) => void;
  logger?: Logger;
  random?: () => number;
  sleep?: (ms: number, token: CancellationToken) => Promise<void>;
}

/** Exponential backoff with multiplicative jitter, capped at `maxDelayMs`. */
export function computeBackoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const { min, max } = policy.jitter;
  const jitter = min + (max - min) * random();
  const raw = policy.baseDelayMs * Math.pow(policy.multiplier, attempt - 1) * jitter;
  return Math.min(raw, policy.maxDelayMs);
}

/** The wait before the next attempt: never below the server's Retry-After, never above the cap. */
export function retryDelay(
  policy: RetryPolicy,
  attempt: number,
  error: ClassifiedError,
  random: () => number = Math.random
): number {
  const backoff = computeBackoffDelay(policy, attempt, random);
  return Math.min(Math.max(backoff, error.retryAfterMs ?? 0), policy.maxDelayMs);
}

export function describeRetry(notice: RetryNotice): string {
  const seconds = (notice.delayMs / 1000).toFixed(1);
  return `${notice.error.label} on attempt ${notice.attempt}/${notice.maxAttempts}, retrying in ${seconds}s`;
}

/**
 * Runs `operation` until it succeeds, fails with a non-retryable error, or
 * the attempt budget is spent. Classified failures end in a `RetryError`;
 * anything the classifier does not recognise is rethrown untouched.
 */
export async function perform<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: PerformOptions = {}
): Promise<T> {
  const token = options.token ?? CancellationToken.none;
  const logger = options.logger ?? silentLogger;
  const random = options.random ?? Math.random;
  const sleep = options.sleep ?? delay;
  const context = { baseDelayMs: policy.baseDelayMs };
  const history: ClassifiedError[] = [];

  for (let attempt = 1; ; attempt++) {
    if (token.isCancelled) {
      const cancelled = token.toError();
      history.push(cancelled);
      throw new RetryError(attempt - 1, cancelled, [...history]);
    }

    try {
      const value = await operation(attempt);
      if (attempt > 1) {
        logger.debug(`Succeeded on attempt ${attempt}`);
        options.onSuccess?.(attempt);
      }
      return value;
    } catch (error) {
      const classified = classifyUnknown(error, context);
      if (!classified) throw error;
      history.push(classified);

      if (!classified.retryable || attempt >= policy.maxAttempts) {
        throw new RetryError(attempt, classified, [...history]);
      }

      const notice: RetryNotice = {
        attempt,
        maxAttempts: policy.maxAttempts,
        delayMs: retryDelay(policy, attempt, classified, random),
        error: classified,
      };
      logger.warn(describeRetry(notice), { code: classified.code });
      options.onRetry?.(notice);

      try {
        await sleep(notice.delayMs, token);
      } catch (sleepError) {
        const interrupted = classifyUnknown(sleepError, context) ?? token.toError();
        history.push(interrupted);
        throw new RetryError(attempt, interrupted, [...history]);
      }
    }
  }
}
