import { randomInt } from "node:crypto";
import { sleep } from "./sleep";

export type CallKind = "read" | "write";

export interface RetryInfo {
  attempt: number;
  delayMs: number;
  err: unknown;
}

export interface RetryOptions {
  /**
   * Number of retries after the first attempt.
   */
  retries: number;

  /**
   * Base delay for exponential backoff.
   */
  baseDelayMs: number;

  /**
   * Max delay cap for exponential backoff.
   */
  maxDelayMs: number;

  /**
   * Whether to apply jitter to delays.
   */
  jitter: boolean;

  /**
   * Invoked before sleeping between attempts.
   */
  onRetry?: (info: RetryInfo) => void;

  /**
   * Controls which errors should be retried.
   */
  shouldRetry: (err: unknown) => boolean;

  /**
   * Stops retrying once aborted; the last error is rethrown.
   */
  signal?: AbortSignal;
}

/**
 * Thrown by {@link withRetry} wrappers that need the attempt count alongside the cause.
 */
export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(cause: unknown, attempts: number) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
  }
}

function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

function randomJitterFactor(): number {
  const thousandths = randomInt(0, 1001); // [0, 1000]
  return 0.5 + thousandths / 1000;
}

/**
 * Computes the delay before retry number `attempt` (0-based).
 */
export function backoffDelayMs(attempt: number, options: Pick<RetryOptions, "baseDelayMs" | "maxDelayMs" | "jitter">): number {
  const rawDelay = options.baseDelayMs * Math.pow(2, attempt);
  const capped = clamp(rawDelay, 0, options.maxDelayMs);
  const jitterFactor = options.jitter ? randomJitterFactor() : 1;
  return Math.floor(capped * jitterFactor);
}

/**
 * Applies exponential backoff (with optional jitter) around an async function.
 *
 * Total attempts = 1 + `retries`.
 *
 * @throws The last error once retries are exhausted or the error is not retryable.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err: unknown) {
      if (attempt >= options.retries || !options.shouldRetry(err) || options.signal?.aborted) {
        throw err;
      }

      const delayMs = backoffDelayMs(attempt, options);
      options.onRetry?.({ attempt, delayMs, err });
      await sleep(delayMs, options.signal);
    }
  }
}

/**
 * Same as {@link withRetry}, but failures are wrapped in {@link RetryExhaustedError}
 * so callers can report how many attempts were made.
 */
export async function withCountedRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<{ value: T; attempts: number }> {
  let attempts = 0;
  try {
    const value = await withRetry(async () => {
      attempts += 1;
      return await fn();
    }, options);
    return { value, attempts };
  } catch (err: unknown) {
    throw new RetryExhaustedError(err, attempts);
  }
}

function asNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function asString(value: unknown): string | undefined {
  return typeof value === "string" && value.length ? value : undefined;
}

const TRANSIENT_NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ECONNABORTED", "EAI_AGAIN", "ENOTFOUND", "ECONNREFUSED", "EPIPE"];

/**
 * Heuristic over raw transport errors (axios-like shape):
 * - HTTP status 429/5xx
 * - transient network error codes
 */
export function isRetryableHttpError(err: unknown): boolean {
  if (!err || typeof err !== "object") {
    return false;
  }

  const response: unknown = Reflect.get(err, "response");
  const status = response && typeof response === "object" ? asNumber(Reflect.get(response, "status")) : undefined;
  if (status !== undefined && (status === 429 || status >= 500)) {
    return true;
  }

  const code = asString(Reflect.get(err, "code"));
  return code !== undefined && TRANSIENT_NETWORK_CODES.includes(code);
}
