/**
 * Raised when building a stage whose inference service has no endpoint for the selected
 * language or translation direction
 */
export class InferenceEndpointNotConfigured extends Error {
  constructor(
    readonly service: string,
    readonly key: string,
    readonly availableKeys: string[]
  ) {
    super(
      `No ${service} endpoint is configured for '${key}'` +
        (availableKeys.length ? `, available: ${availableKeys.join(', ')}` : '')
    )

    Object.setPrototypeOf(this, new.target.prototype)
  }
}
