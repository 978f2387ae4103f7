import { afterEach, describe, expect, it, vi } from 'vitest'
import { ConfigurationError } from '../../../src/core/errors.ts'
import {
  appendSandboxParam,
  createTimeoutSignal,
  decodeBase64,
  encodeBase64,
  encodeODataQuery,
  odataKey,
  odataString,
  resolveEndpoint,
  resolveFetch,
  sameObjectName,
  trimQuotes,
  validateRequiredStrings,
} from '../../../src/core/utils.ts'

describe('appendSandboxParam', () => {
  it('leaves the endpoint alone without a sandbox', () => {
    expect(appendSandboxParam('Cellsets', undefined)).toBe('Cellsets')
    expect(appendSandboxParam('Cellsets', '')).toBe('Cellsets')
  })

  it('starts a query when there is none', () => {
    expect(appendSandboxParam('ExecuteMDX', 'Plan A')).toBe('ExecuteMDX?!sandbox=Plan%20A')
  })

  it('keeps existing query parameters and adds exactly one sandbox', () => {
    const endpoint = appendSandboxParam("Cellsets('x')?$expand=Cells", 'Q1')
    const url = resolveEndpoint('http://localhost:8010/api/v1/', endpoint)
    expect(url.searchParams.getAll('!sandbox')).toEqual(['Q1'])
    expect(url.searchParams.get('$expand')).toBe('Cells')
  })
})

describe('OData escaping', () => {
  it('doubles single quotes in literals', () => {
    expect(odataString("O'Brien")).toBe("O''Brien")
  })

  it('escapes and percent-encodes key segments', () => {
    expect(odataKey("Plan & O'Brien")).toBe("Plan%20%26%20O''Brien")
  })

  it('encodes query values with %20 for spaces', () => {
    expect(encodeODataQuery("Name eq 'a+b'")).toBe('Name%20eq%20%27a%2Bb%27')
  })
})

describe('sameObjectName', () => {
  it('ignores case and spaces', () => {
    expect(sameObjectName('Sales Plan', 'salesplan')).toBe(true)
    expect(sameObjectName('Sales', 'Sale')).toBe(false)
  })
})

describe('resolveEndpoint', () => {
  const base = 'http://localhost:8010/api/v1/'

  it('keeps the base path for relative endpoints', () => {
    expect(resolveEndpoint(base, "/Cubes('Sales')").toString()).toBe(
      "http://localhost:8010/api/v1/Cubes('Sales')",
    )
  })

  it('passes absolute URLs through', () => {
    expect(resolveEndpoint(base, 'https://other.test/login').toString()).toBe(
      'https://other.test/login',
    )
  })

  it('returns the base for an empty endpoint', () => {
    expect(resolveEndpoint(base, '').toString()).toBe(base)
  })
})

describe('small helpers', () => {
  it('strips surrounding quotes and whitespace', () => {
    expect(trimQuotes(' "11.8.0"\n')).toBe('11.8.0')
  })

  it('round-trips base64', () => {
    expect(encodeBase64('admin:test-secret')).toBe('YWRtaW46dGVzdC1zZWNyZXQ=')
    expect(decodeBase64('dGVzdC1zZWNyZXQ=')).toBe('test-secret')
  })

  it('prefers the fetch override', () => {
    const override: typeof fetch = async () => new Response(null)
    expect(resolveFetch(override)).toBe(override)
  })

  it('rejects empty required strings', () => {
    expect(() => validateRequiredStrings({ user: '' }, ['user'])).toThrow(ConfigurationError)
    expect(() => validateRequiredStrings({ user: 'admin' }, ['user'])).not.toThrow()
  })
})

describe('createTimeoutSignal', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('aborts and reports the timeout when it fires', () => {
    vi.useFakeTimers()
    const { signal, timedOut, cleanup } = createTimeoutSignal(100)
    vi.advanceTimersByTime(100)
    expect(signal.aborted).toBe(true)
    expect(timedOut()).toBe(true)
    cleanup()
  })

  it('follows the outer signal', () => {
    const outer = new AbortController()
    const { signal, timedOut, cleanup } = createTimeoutSignal(10_000, outer.signal)
    outer.abort()
    expect(signal.aborted).toBe(true)
    expect(timedOut()).toBe(false)
    cleanup()
  })
})
