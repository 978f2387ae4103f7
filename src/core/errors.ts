/** Base class for every error raised by the client. */
export class TM1Error extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TM1Error'
  }
}

/** Indicates a configuration problem detected at construction time or during method validation. */
export class ConfigurationError extends TM1Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/** Indicates that credentials could not be acquired or applied to a request. */
export class AuthError extends TM1Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'AuthError'
  }
}

export const MAX_ERROR_BODY_BYTES = 64 * 1024

export type THTTPErrorDetails = {
  method: string
  url: string
  status: number
  body?: string
}

/** Indicates the server answered with a status >= 400. */
export class HTTPError extends TM1Error {
  readonly method: string
  readonly url: string
  readonly status: number
  readonly body: string

  constructor(details: THTTPErrorDetails, message?: string) {
    const body = details.body ?? ''
    const base = `tm1 api ${details.method} ${details.url} returned status ${details.status}`
    super(message ?? (body ? `${base}: ${body}` : base))
    this.name = 'HTTPError'
    this.method = details.method
    this.url = details.url
    this.status = details.status
    this.body = body
  }
}

/** Indicates a network level failure or a malformed response. */
export class TransportError extends TM1Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TransportError'
  }
}

/** Indicates the request or the async polling deadline elapsed. */
export class TimeoutError extends TM1Error {
  constructor(message = 'Operation timed out') {
    super(message)
    this.name = 'TimeoutError'
  }
}

/** Indicates an operation was aborted via AbortSignal. */
export class AbortOperationError extends TM1Error {
  constructor(message = 'Operation aborted') {
    super(message)
    this.name = 'AbortOperationError'
  }
}

/** Indicates the operation is not available on the connected server version. */
export class VersionUnsupportedError extends TM1Error {
  readonly version: string

  constructor(message: string, version: string) {
    super(message)
    this.name = 'VersionUnsupportedError'
    this.version = version
  }
}

/** Indicates the signed-in user lacks the role the operation needs. */
export class PrivilegeRequiredError extends TM1Error {
  constructor(message: string) {
    super(message)
    this.name = 'PrivilegeRequiredError'
  }
}

/** Indicates a client-side precondition was violated before any request was sent. */
export class ValidationError extends TM1Error {
  constructor(message: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

export class NotImplementedError extends TM1Error {
  constructor(message: string) {
    super(message)
    this.name = 'NotImplementedError'
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof HTTPError && error.status === 404
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Prefixes an HTTP or foreign error message with context. HTTP errors keep their
 * class and fields so callers can still match on status; other client errors pass through.
 */
export function withContext(context: string, error: unknown): Error {
  if (error instanceof HTTPError) {
    return new HTTPError(
      { method: error.method, url: error.url, status: error.status, body: error.body },
      `${context}: ${error.message}`,
    )
  }
  if (error instanceof TM1Error) return error
  return new TM1Error(`${context}: ${describe(error)}`, { cause: error })
}

/** Joins a failed operation with a failed cleanup step into a single error. */
export function mergeErrors(primary: unknown, secondary: unknown, label: string): Error {
  const message = `${describe(primary)} (${label}: ${describe(secondary)})`
  if (primary instanceof HTTPError) {
    return new HTTPError(
      { method: primary.method, url: primary.url, status: primary.status, body: primary.body },
      message,
    )
  }
  return new TM1Error(message, { cause: primary })
}
