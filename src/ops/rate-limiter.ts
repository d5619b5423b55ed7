export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = async (ms) => {
  await new Promise((resolve) => setTimeout(resolve, ms));
};

/**
 * Serializes tasks and keeps at least `minIntervalMs` between the end of one
 * task and the start of the next. Used both for backend calls and for pacing
 * chunked chat replies.
 */
export class RateLimiter {
  private queue: Promise<void> = Promise.resolve();
  private lastRunAt = 0;

  constructor(
    private readonly minIntervalMs: number,
    private readonly wait: Sleeper = sleep
  ) {}

  async run<T>(task: () => Promise<T>): Promise<T> {
    let release: (() => void) | undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.queue;
    this.queue = previous.then(() => gate);
    await previous;

    try {
      const waitMs = this.lastRunAt === 0
        ? 0
        : Math.max(0, this.minIntervalMs - (Date.now() - this.lastRunAt));

      if (waitMs > 0) {
        await this.wait(waitMs);
      }

      return await task();
    } finally {
      this.lastRunAt = Date.now();
      if (release) release();
    }
  }
}
