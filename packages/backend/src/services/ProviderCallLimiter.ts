import { BackendError, classifyBackendError, type BackendErrorKind } from "../errors.js";
import { logger } from "../utils/logger.js";

export interface ProviderCallLimits {
  maxConcurrent: number;
  requestsPerMinute: number;
  /** Per attempt; the request is aborted when it runs out. */
  timeoutMs: number;
  /** Extra attempts after a transient failure. Model calls keep this at 0. */
  retries: number;
  retryDelayMs: number;
}

export type ProviderCall<T> = (signal: AbortSignal) => Promise<T>;

type AttemptOutcome<T> = { ok: true; value: T } | { ok: false; error: BackendError };

const WINDOW_MS = 60_000;

const transientKinds: ReadonlySet<BackendErrorKind> = new Set<BackendErrorKind>([
  "rate_limited",
  "timeout",
  "server_error",
  "unavailable"
]);

/**
 * Admission control for one provider's API. Every attempt, retries included,
 * takes a concurrency slot and a place in the sliding one-minute budget.
 * Failures are rejected as BackendError.
 */
export class ProviderCallLimiter {
  private readonly limits: ProviderCallLimits;
  private active = 0;
  private readonly waiting: Array<() => void> = [];
  private readonly startedAt: number[] = [];
  private wakeTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    readonly provider: string,
    limits: Partial<ProviderCallLimits> = {}
  ) {
    this.limits = {
      maxConcurrent: 5,
      requestsPerMinute: 60,
      timeoutMs: 60_000,
      retries: 0,
      retryDelayMs: 1000,
      ...limits
    };
  }

  /** Calls admitted but not yet finished. */
  get inFlight(): number {
    return this.active;
  }

  /** Calls waiting for a slot or for the per-minute budget. */
  get queued(): number {
    return this.waiting.length;
  }

  async run<T>(call: ProviderCall<T>): Promise<T> {
    for (let attempt = 0; ; attempt += 1) {
      const outcome = await this.attemptOnce(call);
      if (outcome.ok) {
        return outcome.value;
      }

      const { error } = outcome;
      if (attempt >= this.limits.retries || !transientKinds.has(error.kind)) {
        throw error;
      }

      const delayMs = this.limits.retryDelayMs * 2 ** attempt;
      logger.warn(
        { provider: this.provider, kind: error.kind, attempt: attempt + 1, delayMs },
        "Retrying provider call"
      );
      await sleep(delayMs);
    }
  }

  private async attemptOnce<T>(call: ProviderCall<T>): Promise<AttemptOutcome<T>> {
    await this.acquire();
    try {
      return { ok: true, value: await this.withTimeout(call) };
    } catch (error) {
      return { ok: false, error: classifyBackendError(this.provider, error) };
    } finally {
      this.release();
    }
  }

  private async withTimeout<T>(call: ProviderCall<T>): Promise<T> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new BackendError({
            kind: "timeout",
            provider: this.provider,
            detail: `no response within ${this.limits.timeoutMs}ms`
          })
        );
      }, this.limits.timeoutMs);
    });

    try {
      return await Promise.race([call(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private acquire(): Promise<void> {
    return new Promise((resolve) => {
      this.waiting.push(resolve);
      this.admit();
    });
  }

  private release(): void {
    this.active -= 1;
    this.admit();
  }

  private admit(): void {
    while (this.waiting.length > 0 && this.active < this.limits.maxConcurrent) {
      const now = Date.now();
      const waitMs = this.budgetWaitMs(now);
      if (waitMs > 0) {
        this.wakeAfter(waitMs);
        return;
      }

      const next = this.waiting.shift();
      if (!next) {
        return;
      }
      this.active += 1;
      this.startedAt.push(now);
      next();
    }
  }

  private budgetWaitMs(now: number): number {
    while (this.startedAt.length > 0) {
      const oldest = this.startedAt[0];
      if (oldest === undefined || oldest > now - WINDOW_MS) {
        break;
      }
      this.startedAt.shift();
    }

    const oldest = this.startedAt[0];
    if (oldest === undefined || this.startedAt.length < this.limits.requestsPerMinute) {
      return 0;
    }
    return oldest + WINDOW_MS - now;
  }

  private wakeAfter(delayMs: number): void {
    if (this.wakeTimer) {
      return;
    }
    this.wakeTimer = setTimeout(() => {
      this.wakeTimer = null;
      this.admit();
    }, delayMs);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
