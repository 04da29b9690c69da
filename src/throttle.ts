export type Sleep = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RequestGateOptions {
  minDelayMs: number;
  maxDelayMs: number;
  sleep?: Sleep;
  random?: () => number;
  now?: () => number;
}

/**
 * Process-wide spacing between page requests. Callers are served in arrival
 * order, so bounded concurrency still shares one request rate.
 */
export class RequestGate {
  private lastRelease: number | null = null;
  private queue: Promise<void> = Promise.resolve();
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(private readonly options: RequestGateOptions) {
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  wait(): Promise<void> {
    const turn = this.queue.then(() => this.take());
    this.queue = turn;
    return turn;
  }

  nextDelay(): number {
    const { minDelayMs, maxDelayMs } = this.options;
    return Math.round(minDelayMs + this.random() * (maxDelayMs - minDelayMs));
  }

  private async take(): Promise<void> {
    if (this.lastRelease != null) {
      const remaining = this.nextDelay() - (this.now() - this.lastRelease);
      if (remaining > 0) await this.sleep(remaining);
    }
    this.lastRelease = this.now();
  }
}
