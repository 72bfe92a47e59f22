import { InvalidArgumentError, UpstreamError } from "./errors.js";
import { isRecord } from "./validation.js";

export interface RetryOptions {
  /** Total attempts, including the first. */
  maxAttempts?: number;
  /** Delay before the second attempt; doubles for each one after. */
  baseDelayMs?: number;
  /** Per-attempt deadline; expiry counts as a network error. */
  timeoutMs?: number;
  /** Log tag. */
  label?: string;
}

const NETWORK_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "EPIPE",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
]);

function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

/**
 * Runs one upstream HTTP call with bounded retries.
 *
 * Network errors, timeouts and 5xx back off exponentially; 429 waits for
 * `Retry-After` when the upstream sends one. Other non-2xx responses fail
 * on the spot.
 */
export class RetryExecutor {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly timeoutMs: number;
  private readonly label: string;

  constructor(options: RetryOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? 4;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.timeoutMs = options.timeoutMs ?? 20_000;
    this.label = options.label ?? "upstream";

    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new InvalidArgumentError(`maxAttempts must be an integer >= 1, got ${this.maxAttempts}`);
    }
    if (!Number.isFinite(this.baseDelayMs) || this.baseDelayMs < 0) {
      throw new InvalidArgumentError(`baseDelayMs must be >= 0, got ${this.baseDelayMs}`);
    }
    if (!Number.isFinite(this.timeoutMs) || this.timeoutMs <= 0) {
      throw new InvalidArgumentError(`timeoutMs must be > 0, got ${this.timeoutMs}`);
    }
  }

  /** Backoff before attempt `attempt + 1`, where `attempt` starts at 1. */
  backoffFor(attempt: number): number {
    return this.baseDelayMs * 2 ** (attempt - 1);
  }

  /**
   * With `read`, a 2xx body is consumed inside the same attempt: the
   * deadline still covers it, and a body that stalls or drops counts as a
   * network error.
   */
  execute(call: (signal: AbortSignal) => Promise<Response>): Promise<Response>;
  execute<T>(call: (signal: AbortSignal) => Promise<Response>, read: (res: Response) => Promise<T>): Promise<T>;
  async execute<T>(
    call: (signal: AbortSignal) => Promise<Response>,
    read?: (res: Response) => Promise<T>,
  ): Promise<T | Response> {
    let lastErr: UpstreamError | undefined;
    let waitMs = 0;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (attempt > 1) await sleep(waitMs);

      const isLast = attempt === this.maxAttempts;
      waitMs = this.backoffFor(attempt);

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(new TimeoutSignalError(this.timeoutMs)), this.timeoutMs);

      try {
        const res = await call(controller.signal);
        if (res.ok) return read ? await untilAborted(read(res), controller.signal) : res;

        const detail = await untilAborted(readBody(res), controller.signal);
        const message = `${this.label} ${res.status}: ${describeUpstreamError(detail) ?? (res.statusText || "no reason given")}`;

        if (res.status === 429) {
          lastErr = new UpstreamError(message, { status: 429, detail, retryable: true });
          if (isLast) break;
          const retryAfter = parseRetryAfter(res.headers.get("retry-after"));
          if (retryAfter !== null) waitMs = retryAfter;
          console.warn(`[${this.label}] rate limited (429) on attempt ${attempt}/${this.maxAttempts}; waiting ${waitMs}ms`);
          continue;
        }

        if (res.status >= 500) {
          lastErr = new UpstreamError(message, { status: res.status, detail, retryable: true });
          if (isLast) break;
          console.warn(
            `[${this.label}] server error ${res.status} on attempt ${attempt}/${this.maxAttempts}; retrying after ${waitMs}ms`,
          );
          continue;
        }

        // Remaining 4xx are not transient.
        throw new UpstreamError(message, { status: res.status, detail, retryable: false });
      } catch (err) {
        if (!isNetworkError(err)) throw err;
        const reason = describeNetworkError(err);
        lastErr = new UpstreamError(`${this.label} network error: ${reason}`, { retryable: true, cause: err });
        if (isLast) break;
        console.warn(
          `[${this.label}] network error on attempt ${attempt}/${this.maxAttempts} (${reason}); retrying after ${waitMs}ms`,
        );
      } finally {
        clearTimeout(timer);
      }
    }

    console.error(`[${this.label}] giving up after ${this.maxAttempts} attempts: ${lastErr?.message}`);
    throw lastErr ?? new UpstreamError(`${this.label} request failed`, { retryable: true });
  }

  /** Longest a call can take when every attempt times out and no 429 stretches the waits. */
  worstCaseMs(): number {
    let total = this.maxAttempts * this.timeoutMs;
    for (let attempt = 1; attempt < this.maxAttempts; attempt++) total += this.backoffFor(attempt);
    return total;
  }
}

/** Settles with `work`, or rejects with the abort reason once `signal` fires. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    void work.then(resolve, reject).finally(() => signal.removeEventListener("abort", onAbort));
  });
}

class TimeoutSignalError extends Error {
  constructor(ms: number) {
    super(`Request timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

/** `Retry-After` in seconds, as milliseconds; null when absent or unusable. */
export function parseRetryAfter(header: string | null): number | null {
  if (header === null) return null;
  const trimmed = header.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) return null;
  return Math.round(Number(trimmed) * 1000);
}

export function isNetworkError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name === "TimeoutError" || err.name === "AbortError") return true;
  // fetch reports connection failures as TypeError("fetch failed") with the
  // socket error as its cause.
  if (err.name === "TypeError" && err.message === "fetch failed") return true;
  const code = errorCode(err) ?? errorCode(err.cause);
  return code !== undefined && NETWORK_ERROR_CODES.has(code);
}

function errorCode(value: unknown): string | undefined {
  if (!isRecord(value) && !(value instanceof Error)) return undefined;
  const code: unknown = Reflect.get(value, "code");
  return typeof code === "string" ? code : undefined;
}

function describeNetworkError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const code = errorCode(err.cause) ?? errorCode(err);
  return code ? `${err.message} (${code})` : err.message;
}

async function readBody(res: Response): Promise<unknown> {
  const text = await res.text().catch(() => "");
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text.slice(0, 500);
  }
}

/** Pulls the first `errors[].detail`/`title` out of an upstream error body. */
export function describeUpstreamError(body: unknown): string | undefined {
  if (typeof body === "string") return body || undefined;
  if (!isRecord(body)) return undefined;
  const errors = body.errors;
  if (Array.isArray(errors) && errors.length > 0) {
    const first: unknown = errors[0];
    if (isRecord(first)) {
      const text = first.detail ?? first.title;
      if (typeof text === "string" && text) return text;
    }
  }
  for (const field of ["error_description", "message", "error"]) {
    const value = body[field];
    if (typeof value === "string" && value) return value;
  }
  return undefined;
}
