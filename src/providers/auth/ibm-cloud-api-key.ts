import type { Dispatcher } from 'undici'
import { DEFAULT_IAM_URL } from '../../core/config.ts'
import type { TDispatchInit } from '../../core/connection-pool.ts'
import { AuthError, ConfigurationError } from '../../core/errors.ts'
import type { TAuthProvider, TOutgoingRequest } from '../../core/types.ts'
import { createTimeoutSignal, resolveFetch } from '../../core/utils.ts'

const DEFAULT_REFRESH_BUFFER_MS = 60_000
const DEFAULT_TIMEOUT_MS = 10_000
const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600
const API_KEY_GRANT_TYPE = 'urn:ibm:params:oauth:grant-type:apikey'

export type TIbmCloudApiKeyOptions = {
  apiKey: string
  /** IAM service URL. @default 'https://iam.cloud.ibm.com' */
  iamUrl?: string
  /** Time in ms before expiry to trigger refresh. @default 60000 */
  refreshBufferMs?: number
  /** Request timeout in ms. @default 10000 */
  timeoutMs?: number
  fetchImplementation?: typeof fetch
  /** Connection pool for the token exchange. */
  dispatcher?: Dispatcher
}

type TIamTokenResponse = {
  access_token?: string
  expires_in?: number
  token_type?: string
}

type TCachedToken = {
  token: string
  expiresAtMs: number
}

/**
 * Exchanges an IBM Cloud API key for an IAM access token and sends it as a bearer token.
 * Tokens are cached and refreshed before expiry.
 */
export class IbmCloudApiKeyAuth implements TAuthProvider {
  private readonly apiKey: string
  private readonly tokenEndpoint: string
  private readonly refreshBufferMs: number
  private readonly timeoutMs: number
  private readonly fetchImplementation?: typeof fetch
  private readonly dispatcher?: Dispatcher

  private cachedToken: TCachedToken | null = null
  private pendingTokenRequest: Promise<string> | null = null

  constructor(options: TIbmCloudApiKeyOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError('apiKey is required')
    }
    const iamUrl = (options.iamUrl || DEFAULT_IAM_URL).replace(/\/+$/, '')
    try {
      new URL(iamUrl)
    } catch {
      throw new ConfigurationError(`Invalid iamUrl: "${iamUrl}"`)
    }

    this.apiKey = options.apiKey
    this.tokenEndpoint = `${iamUrl}/identity/token`
    this.refreshBufferMs = options.refreshBufferMs ?? DEFAULT_REFRESH_BUFFER_MS
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.fetchImplementation = options.fetchImplementation
    this.dispatcher = options.dispatcher
  }

  async apply(request: TOutgoingRequest, signal?: AbortSignal): Promise<void> {
    const token = await this.getToken(signal)
    request.headers.set('Authorization', `Bearer ${token}`)
  }

  onAuthFailure(): void {
    this.clearCache()
  }

  /** Returns a valid access token, fetching or refreshing as needed. */
  async getToken(signal?: AbortSignal): Promise<string> {
    if (this.cachedToken && Date.now() < this.cachedToken.expiresAtMs - this.refreshBufferMs) {
      return this.cachedToken.token
    }

    // Coalesce concurrent requests
    if (this.pendingTokenRequest) {
      return this.pendingTokenRequest
    }

    this.pendingTokenRequest = this.fetchToken(signal)

    try {
      return await this.pendingTokenRequest
    } finally {
      this.pendingTokenRequest = null
    }
  }

  clearCache(): void {
    this.cachedToken = null
  }

  private async fetchToken(signal?: AbortSignal): Promise<string> {
    const now = Date.now()
    const { signal: combinedSignal, timedOut, cleanup } = createTimeoutSignal(this.timeoutMs, signal)

    try {
      const fetchImplementation = resolveFetch(this.fetchImplementation)
      const init: TDispatchInit = {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: new URLSearchParams({
          grant_type: API_KEY_GRANT_TYPE,
          apikey: this.apiKey,
        }),
        signal: combinedSignal,
        dispatcher: this.dispatcher,
      }
      const response = await fetchImplementation(this.tokenEndpoint, init)

      if (response.status !== 200) {
        await this.handleErrorResponse(response)
      }

      const data: TIamTokenResponse = await response.json()

      if (!data.access_token) {
        throw new AuthError('IAM token response missing access_token')
      }

      const expiresInSeconds =
        typeof data.expires_in === 'number' && data.expires_in > 0
          ? data.expires_in
          : DEFAULT_TOKEN_LIFETIME_SECONDS
      this.cachedToken = {
        token: data.access_token,
        expiresAtMs: now + expiresInSeconds * 1000,
      }

      return this.cachedToken.token
    } catch (error) {
      if (error instanceof AuthError) {
        throw error
      }

      if (error instanceof Error && error.name === 'AbortError') {
        if (timedOut()) {
          throw new AuthError(`IAM token request timed out after ${this.timeoutMs}ms`)
        }
        throw new AuthError('IAM token request was cancelled')
      }

      throw new AuthError(
        `Failed to fetch IAM token: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { cause: error },
      )
    } finally {
      cleanup()
    }
  }

  private async handleErrorResponse(response: Response): Promise<never> {
    const errorDetail = (await response.text().catch(() => '')).trim()
    const statusMessage = errorDetail ? `: ${errorDetail}` : ''
    throw new AuthError(`IAM token request failed with status ${response.status}${statusMessage}`)
  }
}
