import assert from "node:assert/strict";
import test from "node:test";
import { backoffDelayMs, isRetryableHttpError, RetryExhaustedError, withCountedRetry, withRetry } from "../lib/retry";

const NO_DELAY = { baseDelayMs: 0, maxDelayMs: 0, jitter: false };

test("withRetry: retries then succeeds", async () => {
  let calls = 0;
  const result = await withRetry(
    async () => {
      calls += 1;
      if (calls < 3) {
        throw new Error("transient");
      }
      return "ok";
    },
    { retries: 5, ...NO_DELAY, shouldRetry: () => true }
  );

  assert.equal(result, "ok");
  assert.equal(calls, 3);
});

test("withRetry: stops at the first non-retryable error", async () => {
  let calls = 0;
  await assert.rejects(
    withRetry(
      async () => {
        calls += 1;
        throw new Error("terminal");
      },
      { retries: 5, ...NO_DELAY, shouldRetry: () => false }
    ),
    /terminal/
  );
  assert.equal(calls, 1);
});

test("withRetry: an aborted signal stops further attempts", async () => {
  const controller = new AbortController();
  controller.abort();
  let calls = 0;
  await assert.rejects(
    withRetry(
      async () => {
        calls += 1;
        throw new Error("transient");
      },
      { retries: 5, ...NO_DELAY, shouldRetry: () => true, signal: controller.signal }
    ),
    /transient/
  );
  assert.equal(calls, 1);
});

test("withCountedRetry: reports attempts on success and exhaustion", async () => {
  let calls = 0;
  const ok = await withCountedRetry(
    async () => {
      calls += 1;
      if (calls < 2) throw new Error("transient");
      return calls;
    },
    { retries: 2, ...NO_DELAY, shouldRetry: () => true }
  );
  assert.deepEqual(ok, { value: 2, attempts: 2 });

  const retries: number[] = [];
  await assert.rejects(
    withCountedRetry(
      async () => {
        throw new Error("still down");
      },
      { retries: 2, ...NO_DELAY, shouldRetry: () => true, onRetry: ({ attempt }) => retries.push(attempt) }
    ),
    (err: unknown) => {
      assert.ok(err instanceof RetryExhaustedError);
      assert.equal(err.attempts, 3);
      assert.equal(err.message, "still down");
      return true;
    }
  );
  assert.deepEqual(retries, [0, 1]);
});

test("backoffDelayMs: doubles per attempt up to the cap", () => {
  const opts = { baseDelayMs: 250, maxDelayMs: 1_000, jitter: false };
  assert.deepEqual(
    [0, 1, 2, 3].map((a) => backoffDelayMs(a, opts)),
    [250, 500, 1_000, 1_000]
  );
});

test("backoffDelayMs: jitter stays within half to one and a half times the delay", () => {
  for (let i = 0; i < 20; i += 1) {
    const d = backoffDelayMs(1, { baseDelayMs: 100, maxDelayMs: 10_000, jitter: true });
    assert.ok(d >= 100 && d <= 300, `delay ${d} out of range`);
  }
});

test("isRetryableHttpError: true for 429 and 5xx", () => {
  assert.equal(isRetryableHttpError({ response: { status: 429 } }), true);
  assert.equal(isRetryableHttpError({ response: { status: 503 } }), true);
});

test("isRetryableHttpError: true for transient network codes", () => {
  assert.equal(isRetryableHttpError({ code: "ECONNRESET" }), true);
});

test("isRetryableHttpError: false for non-transient 400", () => {
  assert.equal(isRetryableHttpError({ response: { status: 400 } }), false);
  assert.equal(isRetryableHttpError(undefined), false);
});
