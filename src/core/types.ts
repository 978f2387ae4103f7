export type THttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

/** A request on its way out, after default headers are applied and before it is sent. */
export type TOutgoingRequest = {
  method: THttpMethod
  url: URL
  headers: Headers
}

/** A per-request option applied after authentication, in the order given. */
export type TRequestOption = (request: TOutgoingRequest) => void

export type TAuthProvider = {
  /** Adds credentials to the outgoing request. */
  apply(request: TOutgoingRequest, signal?: AbortSignal): void | Promise<void>
  /** Drops cached credentials after the server rejected them. */
  onAuthFailure?(): void
}

export type TRequestBody = string | Blob | Record<string, unknown> | unknown[]

export type TRequestOptions = {
  /** JSON payload; strings and blobs are sent unchanged. */
  body?: TRequestBody
  signal?: AbortSignal
  timeoutInMilliseconds?: number
  requestOptions?: TRequestOption[]
  /** Overrides the client-wide async mode for this request. */
  async?: boolean
}

/** Resolves the server version, connecting first when needed. */
export type TVersionProvider = (signal?: AbortSignal) => Promise<string>
