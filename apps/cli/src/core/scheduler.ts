import { setTimeout as sleep } from "timers/promises";

/** Yields tick numbers (1, 2, ...) whenever the monitor should poll. */
export type TickSource = AsyncIterable<number>;

/**
 * Ticks once every `intervalMs`, the first tick one interval after
 * iteration starts. Ends quietly when the signal aborts.
 */
export class IntervalTicker implements TickSource {
  constructor(
    private readonly intervalMs: number,
    private readonly signal?: AbortSignal,
  ) {}

  async *[Symbol.asyncIterator](): AsyncIterator<number> {
    let tick = 0;
    while (!this.signal?.aborted) {
      try {
        await sleep(this.intervalMs, undefined, { signal: this.signal });
      } catch (error) {
        if (this.signal?.aborted) return;
        throw error;
      }
      yield ++tick;
    }
  }
}
