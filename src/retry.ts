/**
 * Timeout + bounded exponential-backoff retry for calls to external services
 * (embedding API, LLM API).
 *
 * Transient failures (timeouts, HTTP 408/429/5xx, dropped connections) are
 * retried; everything else (authentication, invalid input) propagates on the
 * first attempt. An abort coming from the caller's own signal is never retried.
 */
import { setTimeout as sleep } from "node:timers/promises";

export interface RetryOptions {
  /** Total attempts including the first one. */
  attempts: number;
  /** Delay before the 2nd attempt; doubles for each further attempt. */
  baseDelayMs: number;
  /** Per-attempt timeout. */
  timeoutMs: number;
  /** Caller cancellation (client disconnect, shutdown). */
  signal?: AbortSignal;
  /** Short label for log lines, e.g. "embed" or "generate". */
  label: string;
  verbose?: boolean;
}

/** Marks an attempt that ran past its per-attempt timeout. */
export class TimeoutError extends Error {
  public constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

const TRANSIENT_STATUS = new Set([408, 425, 429, 500, 502, 503, 504]);
const TRANSIENT_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EAI_AGAIN", "EPIPE", "UND_ERR_SOCKET"]);

function numericField(value: unknown, key: string): number | undefined {
  if (typeof value !== "object" || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "number" ? field : undefined;
}

function stringField(value: unknown, key: string): string | undefined {
  if (typeof value !== "object" || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : undefined;
}

/** HTTP status carried by a client-library error (`status` or `statusCode`), if any. */
export function errorStatus(err: unknown): number | undefined {
  return numericField(err, "status") ?? numericField(err, "statusCode");
}

/**
 * Classify an error thrown by an external call.
 * Unknown errors without a status are treated as non-transient.
 */
export function isTransientError(err: unknown): boolean {
  if (err instanceof TimeoutError) return true;
  const status = errorStatus(err);
  if (status !== undefined) return TRANSIENT_STATUS.has(status);
  const cause: unknown = typeof err === "object" && err !== null ? Reflect.get(err, "cause") : undefined;
  const code = stringField(err, "code") ?? stringField(cause, "code");
  if (code && TRANSIENT_CODES.has(code)) return true;
  const message = err instanceof Error ? err.message : "";
  return /fetch failed|socket hang up|network|\b(429|500|502|503|504)\b/i.test(message);
}

/**
 * Run `fn` with a per-attempt timeout, retrying transient failures.
 *
 * `fn` receives a signal that fires on the per-attempt timeout or on the
 * caller's own abort, whichever comes first.
 */
export async function withRetry<T>(
  fn: (signal: AbortSignal, attempt: number) => Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  const attempts = Math.max(1, opts.attempts);
  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    opts.signal?.throwIfAborted();
    const timeout = AbortSignal.timeout(opts.timeoutMs);
    const signal = opts.signal ? AbortSignal.any([opts.signal, timeout]) : timeout;
    try {
      return await raceAbort(fn(signal, attempt), signal, opts);
    } catch (err) {
      // Caller abort wins over any classification.
      if (opts.signal?.aborted) throw err;
      const e = timeout.aborted ? new TimeoutError(opts.label, opts.timeoutMs) : err;
      lastError = e;
      if (!isTransientError(e) || attempt === attempts) throw e;
      const delay = opts.baseDelayMs * 2 ** (attempt - 1);
      console.error(
        `[RAG] ${opts.label} attempt ${attempt}/${attempts} failed (${describeError(e)}); retrying in ${delay}ms`,
      );
      await sleep(delay, undefined, opts.signal ? { signal: opts.signal } : undefined);
    }
  }
  throw lastError;
}

/** Reject as soon as `signal` fires even if the underlying promise ignores it. */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal, opts: RetryOptions): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      if (opts.verbose) console.error(`[RAG][verbose] ${opts.label} abandoned: ${describeError(signal.reason)}`);
      reject(signal.reason);
    };
    promise.then(
      (v) => {
        signal.removeEventListener("abort", onAbort);
        resolve(v);
      },
      (e: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(e);
      },
    );
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });
  });
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
