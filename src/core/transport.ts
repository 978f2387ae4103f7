import type { TAuthMode } from '../providers/auth/auth-mode.ts'
import { usesV12Auth } from '../providers/auth/auth-mode.ts'
import type { TServiceRoot } from '../providers/endpoint/service-root.ts'
import type { Agent } from 'undici'
import type { TResolvedConfig } from './config.ts'
import { createConnectionPool, type TDispatchInit } from './connection-pool.ts'
import { CookieJar } from './cookies.ts'
import {
  AbortOperationError,
  AuthError,
  ConfigurationError,
  HTTPError,
  isNotFound,
  MAX_ERROR_BODY_BYTES,
  TimeoutError,
  TransportError,
} from './errors.ts'
import { logger as defaultLogger, type TLogger } from './logger.ts'
import { asyncWaitTimes, sleep } from './retry.ts'
import { USER_AGENT } from './sdk-info.ts'
import type {
  TAuthProvider,
  THttpMethod,
  TOutgoingRequest,
  TRequestBody,
  TRequestOptions,
} from './types.ts'
import { createTimeoutSignal, resolveEndpoint, resolveFetch, trimQuotes } from './utils.ts'

export const SESSION_COOKIE_NAMES = ['TM1SessionId', 'paSession']
const PRODUCT_VERSION_ENDPOINT = 'Configuration/ProductVersion/$value'
const LOGOUT_ENDPOINT = 'ActiveSession/tm1.Close'
const PROXY_CSRF_COOKIE = 'ba-sso-authenticity'
const PROXY_CSRF_HEADER = 'ba-sso-csrf'
const ASYNC_ID_PATTERN = /'([^']+)'/

export type TTransportOptions = {
  config: TResolvedConfig
  serviceRoot: TServiceRoot
  authMode: TAuthMode
  authProvider?: TAuthProvider
  logger?: TLogger
  fetchImplementation?: typeof fetch
  /** Connection pool shared with the auth provider. Built from the config when omitted. */
  connectionPool?: Agent
}

function serializeBody(body?: TRequestBody): string | Blob | undefined {
  if (body === undefined) return undefined
  if (typeof body === 'string' || body instanceof Blob) return body
  return JSON.stringify(body)
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/** Reads at most `limit` bytes of a body as text and releases the rest. */
async function readBodyLimited(response: Response, limit: number): Promise<string> {
  if (!response.body) return ''
  const reader = response.body.getReader()
  const decoder = new TextDecoder()
  let received = 0
  let text = ''
  try {
    while (received < limit) {
      const { done, value } = await reader.read()
      if (done) break
      const chunk = value.subarray(0, limit - received)
      received += chunk.byteLength
      text += decoder.decode(chunk, { stream: true })
    }
    text += decoder.decode()
  } finally {
    await reader.cancel().catch(() => undefined)
  }
  return text.trim()
}

async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) await response.body.cancel()
}

export function extractAsyncId(location: string): string | undefined {
  return ASYNC_ID_PATTERN.exec(location)?.[1]
}

/**
 * HTTP pipeline for the TM1 REST API: session handling, default headers,
 * authentication, error decoding and the async request protocol.
 */
export class Transport {
  private readonly config: TResolvedConfig
  private readonly serviceRoot: TServiceRoot
  private readonly authMode: TAuthMode
  private readonly authProvider?: TAuthProvider
  private readonly logger: TLogger
  private readonly fetchImplementation?: typeof fetch
  private readonly defaultHeaders: Headers
  private readonly cookies = new CookieJar()
  private readonly connectionPool: Agent

  private version = ''
  private connected = false
  private connecting: Promise<void> | null = null

  constructor(options: TTransportOptions) {
    this.config = options.config
    this.serviceRoot = options.serviceRoot
    this.authMode = options.authMode
    this.authProvider = options.authProvider
    this.logger = options.logger ?? defaultLogger
    this.fetchImplementation = options.fetchImplementation
    this.connectionPool = options.connectionPool ?? createConnectionPool(this.config)
    this.defaultHeaders = this.buildDefaultHeaders()
  }

  get baseUrl(): string {
    return this.serviceRoot.baseUrl
  }

  get isConnected(): boolean {
    return this.connected
  }

  // ── Session ───────────────────────────────────────────────

  /** Establishes the server session once and returns the server version. */
  async connect(signal?: AbortSignal): Promise<string> {
    if (this.connected) return this.version
    if (!this.connecting) {
      this.connecting = this.establishSession(signal).finally(() => {
        this.connecting = null
      })
    }
    await this.connecting
    return this.version
  }

  /** Server version, connecting first when needed. */
  async getVersion(signal?: AbortSignal): Promise<string> {
    return this.connect(signal)
  }

  /** Value of the session cookie for the base URL, or an empty string. */
  sessionId(): string {
    const cookie = this.cookies
      .get(new URL(this.baseUrl))
      .find(({ name }) => SESSION_COOKIE_NAMES.includes(name))
    return cookie?.value ?? ''
  }

  /** Closes the server session unless keep-alive is configured. 404 means it is already gone. */
  async logout(signal?: AbortSignal): Promise<void> {
    if (this.config.keepAlive || !this.connected) return
    try {
      const response = await this.execute('POST', LOGOUT_ENDPOINT, { signal })
      await discardBody(response)
    } catch (error) {
      if (!isNotFound(error)) throw error
    } finally {
      this.cookies.remove(SESSION_COOKIE_NAMES)
      this.connected = false
    }
  }

  /**
   * Logs out, forgets every cookie and closes the pooled connections. Logout
   * failures are logged, not thrown. A closed transport sends no further requests.
   */
  async close(): Promise<void> {
    try {
      await this.logout()
    } catch (error) {
      this.logger.warn('logout failed while closing the connection', errorMessage(error))
    }
    this.cookies.clear()
    this.connected = false
    await this.connectionPool.close()
  }

  // ── Requests ──────────────────────────────────────────────

  /**
   * Sends a request and returns the response for statuses below 400.
   * Goes through the async protocol when enabled client-wide or per request.
   */
  async request(
    method: THttpMethod,
    endpoint: string,
    options: TRequestOptions = {},
  ): Promise<Response> {
    await this.connect(options.signal)
    if (options.async ?? this.config.asyncRequestsMode) {
      const asyncId = await this.startAsync(method, endpoint, options)
      return this.pollAsync(asyncId, method, endpoint, options)
    }
    return this.executeWithRecovery(method, endpoint, options)
  }

  /** Sends a request and decodes the JSON response body. */
  async requestJson<TResponse>(
    method: THttpMethod,
    endpoint: string,
    options: TRequestOptions = {},
  ): Promise<TResponse> {
    const response = await this.request(method, endpoint, options)
    const text = await response.text()
    if (!text) {
      throw new TransportError(`empty response body for ${method} ${endpoint}`)
    }
    try {
      const parsed: TResponse = JSON.parse(text)
      return parsed
    } catch (error) {
      throw new TransportError(`failed to decode response of ${method} ${endpoint}`, {
        cause: error,
      })
    }
  }

  async requestText(
    method: THttpMethod,
    endpoint: string,
    options: TRequestOptions = {},
  ): Promise<string> {
    const response = await this.request(method, endpoint, options)
    return response.text()
  }

  /** Sends a request and discards the response body. */
  async send(method: THttpMethod, endpoint: string, options: TRequestOptions = {}): Promise<void> {
    const response = await this.request(method, endpoint, options)
    await discardBody(response)
  }

  // ── Async protocol ────────────────────────────────────────

  /** Starts an async operation and returns its ID without waiting for the result. */
  async requestAsyncId(
    method: THttpMethod,
    endpoint: string,
    options: TRequestOptions = {},
  ): Promise<string> {
    await this.connect(options.signal)
    return this.startAsync(method, endpoint, options)
  }

  /** Fetches the current state of an async operation. A 202 means it is still running. */
  async retrieveAsyncResponse(asyncId: string, signal?: AbortSignal): Promise<Response> {
    await this.connect(signal)
    return this.execute('GET', `_async('${asyncId}')`, { signal })
  }

  async cancelAsyncOperation(asyncId: string, signal?: AbortSignal): Promise<void> {
    await this.connect(signal)
    const response = await this.execute('DELETE', `_async('${asyncId}')`, { signal })
    await discardBody(response)
  }

  /** Polls an async operation until it completes, fails, or the timeout elapses. */
  async waitForAsyncResponse(
    asyncId: string,
    options: Pick<TRequestOptions, 'signal' | 'timeoutInMilliseconds'> = {},
  ): Promise<Response> {
    await this.connect(options.signal)
    return this.pollAsync(asyncId, 'GET', `_async('${asyncId}')`, options)
  }

  private async startAsync(
    method: THttpMethod,
    endpoint: string,
    options: TRequestOptions,
  ): Promise<string> {
    const response = await this.execute(method, endpoint, options, (request) => {
      request.headers.set('Prefer', 'respond-async')
    })
    const location = response.headers.get('Location')
    await discardBody(response)
    const asyncId = location ? extractAsyncId(location) : undefined
    if (!asyncId) {
      throw new TransportError(`failed to retrieve async id from response to ${method} ${endpoint}`)
    }
    this.logger.debug(`started async operation ${asyncId} for ${method} ${endpoint}`)
    return asyncId
  }

  private async pollAsync(
    asyncId: string,
    method: THttpMethod,
    endpoint: string,
    options: Pick<TRequestOptions, 'signal' | 'timeoutInMilliseconds'>,
  ): Promise<Response> {
    const timeoutMs = options.timeoutInMilliseconds ?? this.config.timeoutInMilliseconds
    const deadline = Date.now() + timeoutMs
    const waits = asyncWaitTimes()
    const url = resolveEndpoint(this.baseUrl, endpoint).toString()

    try {
      while (true) {
        const response = await this.execute('GET', `_async('${asyncId}')`, {
          signal: options.signal,
        })
        if (response.status === 200 || response.status === 201) {
          return await this.transformAsyncResponse(response, method, url)
        }
        if (response.status !== 202) {
          const body = await readBodyLimited(response, MAX_ERROR_BODY_BYTES)
          throw new HTTPError({ method, url, status: response.status, body })
        }
        await discardBody(response)

        const remaining = deadline - Date.now()
        if (remaining <= 0) {
          throw new TimeoutError(`async operation ${asyncId} did not complete within ${timeoutMs}ms`)
        }
        const wait = Math.min(waits.next().value, remaining)
        this.logger.debug(`async operation ${asyncId} still running, next poll in ${wait}ms`)
        await sleep(wait, options.signal)
      }
    } catch (error) {
      const interrupted = error instanceof TimeoutError || error instanceof AbortOperationError
      if (interrupted && this.config.cancelAtTimeout) {
        await this.cancelAfterInterrupt(asyncId)
      }
      throw error
    }
  }

  private async cancelAfterInterrupt(asyncId: string): Promise<void> {
    try {
      const response = await this.execute('DELETE', `_async('${asyncId}')`, {})
      await discardBody(response)
    } catch (error) {
      this.logger.warn(`failed to cancel async operation ${asyncId}`, errorMessage(error))
    }
  }

  private async transformAsyncResponse(
    response: Response,
    method: THttpMethod,
    url: string,
  ): Promise<Response> {
    const text = await response.text()

    if (text.startsWith('HTTP/')) {
      this.logger.warn('async result carries a raw HTTP response; returning it unparsed')
      return new Response(text, { status: 200, headers: response.headers })
    }

    let status = response.status
    const asyncResult = response.headers.get('asyncresult')
    if (asyncResult) {
      const parsed = Number.parseInt(asyncResult.trim().slice(0, 3), 10)
      if (Number.isNaN(parsed) || parsed < 200 || parsed > 599) {
        throw new TransportError(`invalid asyncresult header: ${asyncResult}`)
      }
      status = parsed
    }

    if (status >= 400) {
      throw new HTTPError({ method, url, status, body: text.slice(0, MAX_ERROR_BODY_BYTES) })
    }
    const hasBody = text.length > 0 && status !== 204 && status !== 205
    return new Response(hasBody ? text : null, { status, headers: response.headers })
  }

  // ── Pipeline ──────────────────────────────────────────────

  private async executeWithRecovery(
    method: THttpMethod,
    endpoint: string,
    options: TRequestOptions,
  ): Promise<Response> {
    try {
      return await this.execute(method, endpoint, options)
    } catch (error) {
      if (method !== 'GET') throw error

      if (
        this.config.reconnectOnSessionTimeout &&
        error instanceof HTTPError &&
        error.status === 401
      ) {
        this.logger.warn('session was rejected, reconnecting before retrying the request')
        await this.reconnect(options.signal)
        return this.execute(method, endpoint, options)
      }

      if (this.config.reconnectOnRemoteDisconnect && error instanceof TransportError) {
        this.logger.warn('connection failed, retrying the request once', error.message)
        return this.execute(method, endpoint, options)
      }

      throw error
    }
  }

  private async reconnect(signal?: AbortSignal): Promise<void> {
    this.cookies.remove(SESSION_COOKIE_NAMES)
    this.authProvider?.onAuthFailure?.()
    this.connected = false
    await this.connect(signal)
  }

  private async execute(
    method: THttpMethod,
    endpoint: string,
    options: TRequestOptions,
    prepare?: (request: TOutgoingRequest) => void,
  ): Promise<Response> {
    const { request, response } = await this.dispatch(method, endpoint, options, prepare)
    if (response.status >= 400) {
      const body = await readBodyLimited(response, MAX_ERROR_BODY_BYTES)
      throw new HTTPError({ method, url: request.url.toString(), status: response.status, body })
    }
    return response
  }

  private async dispatch(
    method: THttpMethod,
    endpoint: string,
    options: TRequestOptions,
    prepare?: (request: TOutgoingRequest) => void,
  ): Promise<{ request: TOutgoingRequest; response: Response }> {
    const request: TOutgoingRequest = {
      method,
      url: resolveEndpoint(this.baseUrl, endpoint),
      headers: new Headers(this.defaultHeaders),
    }
    const cookieHeader = this.cookies.header(request.url)
    if (cookieHeader) request.headers.set('Cookie', cookieHeader)

    await this.applyAuth(request, options.signal)
    for (const option of options.requestOptions ?? []) option(request)
    prepare?.(request)

    const timeoutMs = options.timeoutInMilliseconds ?? this.config.timeoutInMilliseconds
    const { signal, timedOut, cleanup } = createTimeoutSignal(timeoutMs, options.signal)
    const fetchImplementation = resolveFetch(this.fetchImplementation)
    this.logger.debug(`${method} ${request.url.toString()}`)

    try {
      const init: TDispatchInit = {
        method,
        headers: request.headers,
        body: serializeBody(options.body),
        signal,
        dispatcher: this.connectionPool,
      }
      const response = await fetchImplementation(request.url, init)
      this.cookies.storeFromResponse(request.url, response.headers)
      return { request, response }
    } catch (error) {
      if (options.signal?.aborted) throw new AbortOperationError()
      if (timedOut()) {
        throw new TimeoutError(`${method} ${request.url.toString()} timed out after ${timeoutMs}ms`)
      }
      throw new TransportError(`${method} ${request.url.toString()} failed: ${errorMessage(error)}`, {
        cause: error,
      })
    } finally {
      cleanup()
    }
  }

  private async applyAuth(request: TOutgoingRequest, signal?: AbortSignal): Promise<void> {
    if (!this.authProvider) return
    try {
      await this.authProvider.apply(request, signal)
    } catch (error) {
      if (error instanceof AuthError) throw error
      throw new AuthError(`failed to apply credentials: ${errorMessage(error)}`, { cause: error })
    }
  }

  private buildDefaultHeaders(): Headers {
    const headers = new Headers({
      Connection: 'keep-alive',
      'User-Agent': USER_AGENT,
      'Content-Type': 'application/json; odata.streaming=true; charset=utf-8',
      Accept: 'application/json;odata.metadata=none,text/plain',
      'TM1-SessionContext': this.config.sessionContext,
    })
    for (const [name, value] of Object.entries(this.config.additionalHeaders)) {
      headers.set(name, value)
    }
    if (this.config.impersonate) {
      if (usesV12Auth(this.authMode)) {
        throw new ConfigurationError('User Impersonation is not supported in TM1 v12')
      }
      headers.set('TM1-Impersonate', this.config.impersonate)
    }
    return headers
  }

  private async establishSession(signal?: AbortSignal): Promise<void> {
    try {
      if (this.authMode.kind === 'workspace-proxy') {
        await this.loginThroughProxy(this.authMode.user, this.authMode.password, signal)
        this.version = await this.readVersion(PRODUCT_VERSION_ENDPOINT, signal)
      } else if (this.serviceRoot.topology === 'named-instance' && this.authMode.kind !== 'session-reuse') {
        const user =
          this.authMode.kind === 'service-to-service' ? this.authMode.clientId : (this.config.user ?? '')
        const response = await this.execute('POST', this.serviceRoot.authUrl, {
          signal,
          body: { User: user },
        })
        await discardBody(response)
        this.version = await this.readVersion(PRODUCT_VERSION_ENDPOINT, signal)
      } else {
        this.version = await this.readVersion(this.serviceRoot.authUrl, signal)
      }
    } catch (error) {
      if (error instanceof HTTPError && (error.status === 401 || error.status === 403)) {
        throw new AuthError(`authentication failed: ${error.message}`, { cause: error })
      }
      throw error
    }
    this.connected = true
    this.logger.debug(`connected to TM1 server version ${this.version}`)
  }

  private async readVersion(endpoint: string, signal?: AbortSignal): Promise<string> {
    const response = await this.execute('GET', endpoint, { signal })
    return trimQuotes(await response.text())
  }

  private async loginThroughProxy(user: string, password: string, signal?: AbortSignal): Promise<void> {
    const response = await this.execute('POST', this.serviceRoot.authUrl, {
      signal,
      body: { username: user, password },
    })
    await discardBody(response)
    const csrf = this.cookies
      .get(new URL(this.serviceRoot.authUrl))
      .find(({ name }) => name === PROXY_CSRF_COOKIE)
    if (csrf) this.defaultHeaders.set(PROXY_CSRF_HEADER, csrf.value)
  }
}
