import { ConfigurationError } from './errors.ts'

export function resolveFetch(override?: typeof fetch): typeof fetch {
  const resolved = override ?? globalThis.fetch
  if (typeof resolved !== 'function') {
    throw new ConfigurationError(
      'No fetch implementation available. Provide a fetchImplementation option or use Node.js >= 20.',
    )
  }
  return resolved
}

export function createTimeoutSignal(
  timeoutMs: number,
  outerSignal?: AbortSignal,
): { signal: AbortSignal; timedOut: () => boolean; cleanup: () => void } {
  const controller = new AbortController()
  let expired = false
  const timeoutId = setTimeout(() => {
    expired = true
    controller.abort()
  }, timeoutMs)
  timeoutId.unref()
  const signal = outerSignal ? AbortSignal.any([controller.signal, outerSignal]) : controller.signal
  return { signal, timedOut: () => expired, cleanup: () => clearTimeout(timeoutId) }
}

export function validateRequiredStrings<T extends Record<string, unknown>>(
  options: T,
  keys: Array<keyof T & string>,
): void {
  for (const key of keys) {
    if (!options[key] || typeof options[key] !== 'string') {
      throw new ConfigurationError(`${key} must be a non-empty string`)
    }
  }
}

/** Form-encodes a query value, keeping spaces as %20 so OData expressions stay readable. */
export function encodeODataQuery(value: string): string {
  return new URLSearchParams({ v: value }).toString().slice(2).replace(/\+/g, '%20')
}

/** Quotes a value for use inside an OData key segment such as Cubes('...'). */
export function odataKey(value: string): string {
  return encodeURIComponent(value.replace(/'/g, "''"))
}

/** Escapes a string literal for use inside an OData $filter expression. */
export function odataString(value: string): string {
  return value.replace(/'/g, "''")
}

/** TM1 object names compare without regard to case or spaces. */
export function sameObjectName(left: string, right: string): boolean {
  return left.replace(/ /g, '').toLowerCase() === right.replace(/ /g, '').toLowerCase()
}

export function appendSandboxParam(endpoint: string, sandbox?: string): string {
  if (!sandbox) return endpoint
  const separator = endpoint.includes('?') ? '&' : '?'
  return `${endpoint}${separator}!sandbox=${encodeURIComponent(sandbox)}`
}

/**
 * Resolves an endpoint against a base URL ending in '/'. Absolute URLs pass through,
 * relative ones lose their leading '/' so the base path is kept.
 */
export function resolveEndpoint(baseUrl: string, endpoint: string): URL {
  if (!endpoint) return new URL(baseUrl)
  if (/^https?:\/\//i.test(endpoint)) return new URL(endpoint)
  return new URL(endpoint.replace(/^\/+/, ''), baseUrl)
}

export function trimQuotes(value: string): string {
  return value.trim().replace(/^"+|"+$/g, '')
}

export function encodeBase64(value: string): string {
  return Buffer.from(value, 'utf8').toString('base64')
}

export function decodeBase64(value: string): string {
  return Buffer.from(value, 'base64').toString('utf8')
}
