export type Milliseconds = number

export const INITIAL_RECONNECT_DELAY: Milliseconds = 1000
export const MAX_RECONNECT_DELAY: Milliseconds = 60 * 1000

/**
 * Exponential backoff between broker reconnect attempts. The delay before attempt k of a
 * failure streak is min(2^(k-1), 60) seconds, and returns to 1 second after a successful connect.
 */
export class ReconnectBackoff {
  private currentDelay: Milliseconds

  constructor(
    private readonly initialDelay: Milliseconds = INITIAL_RECONNECT_DELAY,
    private readonly maxDelay: Milliseconds = MAX_RECONNECT_DELAY
  ) {
    this.currentDelay = initialDelay
  }

  /**
   * The delay that the next call to `next()` will return
   */
  get delay(): Milliseconds {
    return this.currentDelay
  }

  /**
   * Returns how long to wait before the next reconnect attempt, and doubles the delay for the one after
   */
  next(): Milliseconds {
    const delay = this.currentDelay
    this.currentDelay = Math.min(delay * 2, this.maxDelay)
    return delay
  }

  reset(): void {
    this.currentDelay = this.initialDelay
  }
}
