import { logger } from "../logger.js";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * States of one retried call. `attempting` and `backing-off` alternate until
 * the call either `succeeded` or is `exhausted`; `exhausted` covers both a
 * fatal failure and running out of attempts.
 */
export type RetryState<T> =
  | { kind: "attempting"; attempt: number }
  | { kind: "backing-off"; attempt: number; delayMs: number; error: unknown }
  | { kind: "succeeded"; attempt: number; value: T }
  | {
      kind: "exhausted";
      attempt: number;
      error: unknown;
      reason: "fatal" | "max-attempts";
    };

export interface RetryOptions<T> {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: Sleep;
  signal?: AbortSignal;
  onStateChange?: (state: RetryState<T>) => void;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error
    ? signal.reason
    : new Error("The operation was aborted");
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function backoffDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number
): number {
  return Math.min(initialDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions<T> = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelayMs = 1000,
    maxDelayMs = 10000,
    shouldRetry = () => true,
    sleep: wait = sleep,
    signal,
    onStateChange,
  } = options;

  let state: RetryState<T> = { kind: "attempting", attempt: 1 };

  for (;;) {
    onStateChange?.(state);

    switch (state.kind) {
      case "attempting": {
        const attempt: number = state.attempt;
        try {
          const value = await fn(attempt);
          state = { kind: "succeeded", attempt, value };
        } catch (err) {
          if (signal?.aborted || !shouldRetry(err)) {
            state = { kind: "exhausted", attempt, error: err, reason: "fatal" };
          } else if (attempt >= maxAttempts) {
            state = {
              kind: "exhausted",
              attempt,
              error: err,
              reason: "max-attempts",
            };
          } else {
            const delayMs = backoffDelay(attempt, initialDelayMs, maxDelayMs);
            logger.warn(`Attempt ${attempt} failed, retrying in ${delayMs}ms`, {
              attempt,
              delayMs,
              error: String(err),
            });
            state = { kind: "backing-off", attempt, delayMs, error: err };
          }
        }
        break;
      }

      case "backing-off":
        await wait(state.delayMs, signal);
        state = { kind: "attempting", attempt: state.attempt + 1 };
        break;

      case "succeeded":
        return state.value;

      case "exhausted":
        throw state.error;
    }
  }
}

function statusOf(error: Error): number | undefined {
  const status: unknown = Reflect.get(error, "status");
  return typeof status === "number" ? status : undefined;
}

export function isRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  const status = statusOf(error);
  if (status !== undefined) {
    return status === 429 || status >= 500;
  }

  const message = error.message.toLowerCase();
  const retryablePatterns = [
    "rate limit",
    "timeout",
    "timed out",
    "econnreset",
    "econnrefused",
    "etimedout",
    "socket hang up",
    "fetch failed",
    "503",
    "502",
    "429",
  ];

  return retryablePatterns.some((pattern) => message.includes(pattern));
}
