/**
 * A never-ending delay schedule for pacing reconnect attempts.
 *
 * `next()` walks the delays in order and then keeps returning the last
 * one; `reset()` starts the ramp over.
 */
export class Backoff {
  private readonly delays: readonly number[];
  private cursor = 0;

  constructor(delays: readonly number[]) {
    if (delays.length === 0) {
      throw new RangeError("Backoff requires at least one delay");
    }
    for (const delay of delays) {
      if (!Number.isFinite(delay) || delay < 0) {
        throw new RangeError(`Invalid backoff delay: ${delay}`);
      }
    }
    this.delays = [...delays];
  }

  /** Delay in seconds for the current attempt. */
  next(): number {
    const delay = this.delays[this.cursor];
    this.cursor = Math.min(this.cursor + 1, this.delays.length - 1);
    return delay;
  }

  reset(): void {
    this.cursor = 0;
  }
}
