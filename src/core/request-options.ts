import type { TRequestOption } from './types.ts'

export function withHeader(name: string, value: string): TRequestOption {
  return (request) => {
    request.headers.set(name, value)
  }
}

/** Sets a single query parameter, replacing any previous value. */
export function withQueryValue(name: string, value: string): TRequestOption {
  return (request) => {
    request.url.searchParams.set(name, value)
  }
}

/** Appends query parameters, keeping values already on the URL. */
export function withQueryValues(values: Record<string, string | string[]>): TRequestOption {
  return (request) => {
    for (const [name, value] of Object.entries(values)) {
      for (const item of Array.isArray(value) ? value : [value]) {
        request.url.searchParams.append(name, item)
      }
    }
  }
}
