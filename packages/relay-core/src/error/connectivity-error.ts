/**
 * Raised when the broker connection or channel is unavailable. The stage loop
 * recovers from this by tearing down the connection and reconnecting with backoff.
 */
export class ConnectivityError extends Error {
  constructor(message: string, readonly cause?: unknown) {
    super(message)

    Object.setPrototypeOf(this, new.target.prototype)
  }
}
