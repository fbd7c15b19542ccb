export interface Success<TValue> {
  kind: 'success'
  value: TValue
}

/**
 * The call to the external service didn't complete: a timeout (`timeout`), an HTTP
 * error status (`http:<code>`) or any other network error (`network`)
 */
export interface ApiFailure {
  kind: 'api-failure'
  reason: string
}

/**
 * The external service answered, but reported that it did not succeed
 */
export interface DomainFailure {
  kind: 'domain-failure'
  reason: string
}

export type TransformFailure = ApiFailure | DomainFailure

export type TransformResult<TValue> = Success<TValue> | TransformFailure

export const success = <TValue>(value: TValue): Success<TValue> => ({
  kind: 'success',
  value
})

export const apiFailure = (reason: string): ApiFailure => ({
  kind: 'api-failure',
  reason
})

export const domainFailure = (reason: string): DomainFailure => ({
  kind: 'domain-failure',
  reason
})

export const describeFailure = (failure: TransformFailure): string => {
  switch (failure.kind) {
    case 'api-failure':
      return `API call failed (${failure.reason})`
    case 'domain-failure':
      return `Service reported a non-success status: ${failure.reason}`
  }
}
