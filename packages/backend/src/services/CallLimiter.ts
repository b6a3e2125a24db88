import type { CallLimitConfig } from "./llmTypes.js";

type QueuedCall = () => Promise<void>;

export class CallTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Upstream call timed out after ${timeoutMs}ms`);
    this.name = "CallTimeoutError";
  }
}

/**
 * Bounds concurrent upstream calls, spaces them to a per-minute budget, and retries
 * transient failures with exponential backoff. Each attempt gets its own timeout.
 * A slot stays taken until the caller releases it, so streams count for their whole
 * lifetime.
 */
export class CallLimiter {
  private readonly config: CallLimitConfig;
  private activeCount = 0;
  private readonly queue: QueuedCall[] = [];
  private readonly requestTimestamps: number[] = [];
  private waitTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(config: Partial<CallLimitConfig> = {}) {
    this.config = {
      maxConcurrent: config.maxConcurrent ?? 5,
      maxRetries: config.maxRetries ?? 2,
      retryDelayMs: config.retryDelayMs ?? 1000,
      requestsPerMinute: config.requestsPerMinute ?? 60,
      timeoutMs: config.timeoutMs ?? 30_000
    };
  }

  get pending(): number {
    return this.queue.length;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await this.execute(task);
    } finally {
      release();
    }
  }

  /**
   * Opens a stream and yields its items while holding one slot. Every read gets the
   * call timeout; on expiry or early exit the signal passed to `open` is aborted.
   */
  async *stream<T>(open: (signal: AbortSignal) => Promise<AsyncIterable<T>>): AsyncGenerator<T> {
    const release = await this.acquire();
    const controller = new AbortController();
    let finished = false;

    try {
      const iterable = await this.execute(() => open(controller.signal));
      const iterator = iterable[Symbol.asyncIterator]();
      while (true) {
        const next = await this.withTimeout(iterator.next(), this.config.timeoutMs);
        if (next.done) {
          finished = true;
          return;
        }
        yield next.value;
      }
    } finally {
      if (!finished) {
        controller.abort();
      }
      release();
    }
  }

  private acquire(): Promise<() => void> {
    return new Promise((grant) => {
      this.queue.push(
        () =>
          new Promise<void>((release) => {
            grant(() => release());
          })
      );
      this.drainQueue();
    });
  }

  private drainQueue(): void {
    this.clearWaitTimer();
    this.pruneRequestWindow();

    while (this.activeCount < this.config.maxConcurrent && this.queue.length > 0) {
      const waitMs = this.getWaitMsForRateLimit();
      if (waitMs > 0) {
        this.waitTimer = setTimeout(() => {
          this.waitTimer = null;
          this.drainQueue();
        }, waitMs);
        return;
      }

      const call = this.queue.shift();
      if (!call) {
        return;
      }

      this.activeCount += 1;
      this.requestTimestamps.push(Date.now());
      void call().finally(() => {
        this.activeCount -= 1;
        this.drainQueue();
      });
    }
  }

  private async execute<T>(task: () => Promise<T>): Promise<T> {
    let attempt = 0;

    while (true) {
      try {
        return await this.withTimeout(task(), this.config.timeoutMs);
      } catch (error) {
        if (!isRetryableError(error) || attempt >= this.config.maxRetries) {
          throw error;
        }

        attempt += 1;
        await sleep(this.config.retryDelayMs * 2 ** (attempt - 1));
      }
    }
  }

  private withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
    if (timeoutMs <= 0) {
      return promise;
    }

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new CallTimeoutError(timeoutMs));
      }, timeoutMs);

      promise.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }

  private pruneRequestWindow(): void {
    const cutoff = Date.now() - 60_000;
    while (this.requestTimestamps.length > 0) {
      const first = this.requestTimestamps[0];
      if (first === undefined || first >= cutoff) {
        break;
      }
      this.requestTimestamps.shift();
    }
  }

  private getWaitMsForRateLimit(): number {
    if (this.config.requestsPerMinute <= 0 || this.requestTimestamps.length < this.config.requestsPerMinute) {
      return 0;
    }

    const firstInWindow = this.requestTimestamps[0];
    if (firstInWindow === undefined) {
      return 0;
    }

    return Math.max(0, 60_000 - (Date.now() - firstInWindow));
  }

  private clearWaitTimer(): void {
    if (this.waitTimer) {
      clearTimeout(this.waitTimer);
      this.waitTimer = null;
    }
  }
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof CallTimeoutError) {
    return true;
  }
  if (typeof error !== "object" || error === null) {
    return false;
  }
  if ("status" in error && typeof error.status === "number") {
    return error.status === 429 || error.status >= 500;
  }
  if ("code" in error && typeof error.code === "string") {
    return ["ETIMEDOUT", "ECONNRESET", "ECONNABORTED"].includes(error.code);
  }
  if ("message" in error && typeof error.message === "string") {
    return /timeout|timed out|temporarily unavailable/i.test(error.message);
  }
  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
