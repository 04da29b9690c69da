import {
  RetryExhaustedError,
  TransientError,
  classifyError,
  describeError,
  type ErrorClass
} from "./errors.js";
import { sleep, type Sleep } from "./throttle.js";

export interface RetryPolicy {
  /** Total attempts, the first one included. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  attemptTimeoutMs?: number;
}

export type Classifier = (err: unknown) => ErrorClass;

export class RetryController {
  private readonly sleep: Sleep;
  private readonly random: () => number;

  constructor(
    private readonly policy: RetryPolicy,
    { sleep: sleepFn = sleep, random = Math.random }: { sleep?: Sleep; random?: () => number } = {}
  ) {
    this.sleep = sleepFn;
    this.random = random;
  }

  /**
   * Runs `operation` until it succeeds or attempts run out. Each attempt gets its
   * own signal, aborted when that attempt times out so it can stop its work.
   */
  async execute<T>(
    operation: (attempt: number, signal: AbortSignal) => Promise<T>,
    classify: Classifier = classifyError,
    label = "operation"
  ): Promise<T> {
    const { maxAttempts } = this.policy;
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const attemptController = new AbortController();
      try {
        return await this.withAttemptTimeout(operation(attempt, attemptController.signal), attemptController, label);
      } catch (err) {
        if (classify(err) === "fatal") throw err;
        lastError = err;
        if (attempt === maxAttempts) break;

        const delay = this.delayFor(attempt - 1);
        console.warn(`⚠️  ${label}: attempt ${attempt}/${maxAttempts} failed (${describeError(err)}); retrying in ${delay}ms`);
        await this.sleep(delay);
      }
    }

    throw new RetryExhaustedError(label, maxAttempts, lastError);
  }

  /** Backoff before retry number `retry` (0-based): base * 2^retry plus jitter, capped. */
  delayFor(retry: number): number {
    const { baseDelayMs, maxDelayMs } = this.policy;
    const exponential = baseDelayMs * 2 ** retry;
    const jitter = this.random() * baseDelayMs;
    return Math.round(Math.min(maxDelayMs, exponential + jitter));
  }

  private async withAttemptTimeout<T>(pending: Promise<T>, controller: AbortController, label: string): Promise<T> {
    const timeoutMs = this.policy.attemptTimeoutMs;
    if (!timeoutMs) return pending;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        pending.then(undefined, (err) => {
          console.warn(`⚠️  ${label}: abandoned attempt failed late (${describeError(err)})`);
        });
        reject(new TransientError(`${label} timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });
    try {
      return await Promise.race([pending, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
