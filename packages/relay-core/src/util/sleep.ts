/**
 * Returns a promise that resolves when the timeout expires
 * @param timeoutMs How long to wait until the promise resolves
 */
export const sleep = async (timeoutMs: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, timeoutMs))

export interface InterruptibleSleep {
  /**
   * Resolves when the timeout expires or when interrupted, whichever is first
   */
  completion: Promise<void>
  interrupt (): void
}

/**
 * A sleep that can be cut short, so that long reconnect delays don't hold up a stage shutdown
 */
export const interruptibleSleep = (timeoutMs: number): InterruptibleSleep => {
  let interrupt = () => {}
  const completion = new Promise<void>(resolve => {
    const timeoutToken = setTimeout(resolve, timeoutMs)
    interrupt = () => {
      clearTimeout(timeoutToken)
      resolve()
    }
  })
  return { completion, interrupt }
}
