export type Listener<T> = (event: T) => void

export type Unsubscribe = () => void

/**
 * A synchronous, single-event hook. Listeners run in subscription order and a listener
 * that throws stops the remaining ones, so hooks must not throw.
 */
export class TypedEmitter<T> {
  private readonly listeners = new Set<Listener<T>>()

  /**
   * @returns a callback that removes the listener
   */
  on(listener: Listener<T>): Unsubscribe {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  emit(event: T): void {
    Array.from(this.listeners).forEach(listener => listener(event))
  }

  get listenerCount(): number {
    return this.listeners.size
  }
}
