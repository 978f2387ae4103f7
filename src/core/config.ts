import { ConfigurationError } from './errors.ts'

export const DEFAULT_TIMEOUT_IN_MILLISECONDS = 60_000
export const DEFAULT_SESSION_CONTEXT = 'tm1-client'
export const DEFAULT_CONNECTION_POOL_SIZE = 10
export const DEFAULT_IAM_URL = 'https://iam.cloud.ibm.com'

export type TConnectionConfig = {
  // ── Connection ─────────────────────────────────────────────
  address?: string
  port?: number
  /** Use https for composed URLs. */
  ssl?: boolean
  /** Full service root; replaces address-based composition. */
  baseUrl?: string
  /** Session endpoint paired with an explicit Databases base URL. */
  authUrl?: string
  tenant?: string
  database?: string
  instance?: string
  workspaceProxyHost?: string

  // ── Credentials ────────────────────────────────────────────
  user?: string
  password?: string
  /** The password is base64 encoded. */
  decodeBase64?: boolean
  namespace?: string
  camPassport?: string
  sessionId?: string
  accessToken?: string
  applicationClientId?: string
  applicationClientSecret?: string
  apiKey?: string
  iamUrl?: string
  integratedLogin?: boolean

  // ── Behavior ───────────────────────────────────────────────
  timeoutInMilliseconds?: number
  asyncRequestsMode?: boolean
  cancelAtTimeout?: boolean
  sessionContext?: string
  impersonate?: string
  reconnectOnSessionTimeout?: boolean
  reconnectOnRemoteDisconnect?: boolean
  verifySsl?: boolean
  connectionPoolSize?: number
  /** Leave the server session open on close. */
  keepAlive?: boolean
  additionalHeaders?: Record<string, string>
}

export type TResolvedConfig = TConnectionConfig & {
  ssl: boolean
  timeoutInMilliseconds: number
  asyncRequestsMode: boolean
  cancelAtTimeout: boolean
  sessionContext: string
  reconnectOnSessionTimeout: boolean
  reconnectOnRemoteDisconnect: boolean
  verifySsl: boolean
  connectionPoolSize: number
  keepAlive: boolean
  additionalHeaders: Record<string, string>
}

export function resolveConfig(config: TConnectionConfig): TResolvedConfig {
  validateConfig(config)

  return {
    ...config,
    ssl: config.ssl ?? false,
    timeoutInMilliseconds: config.timeoutInMilliseconds ?? DEFAULT_TIMEOUT_IN_MILLISECONDS,
    asyncRequestsMode: config.asyncRequestsMode ?? false,
    cancelAtTimeout: config.cancelAtTimeout ?? false,
    sessionContext: config.sessionContext || DEFAULT_SESSION_CONTEXT,
    reconnectOnSessionTimeout: config.reconnectOnSessionTimeout ?? true,
    reconnectOnRemoteDisconnect: config.reconnectOnRemoteDisconnect ?? true,
    verifySsl: config.verifySsl ?? true,
    connectionPoolSize: config.connectionPoolSize ?? DEFAULT_CONNECTION_POOL_SIZE,
    keepAlive: config.keepAlive ?? false,
    additionalHeaders: config.additionalHeaders ?? {},
  }
}

function validateConfig(config: TConnectionConfig): void {
  if (config.baseUrl && config.address) {
    throw new ConfigurationError('baseUrl and address cannot both be set')
  }
  if (!config.baseUrl && !config.address && !config.workspaceProxyHost) {
    throw new ConfigurationError('either baseUrl or address must be set')
  }
  if (config.baseUrl && !/^https?:\/\//i.test(config.baseUrl)) {
    throw new ConfigurationError('baseUrl must start with http:// or https://')
  }
  if (config.port !== undefined && (!Number.isInteger(config.port) || config.port <= 0)) {
    throw new ConfigurationError('port must be a positive integer')
  }
  if (config.timeoutInMilliseconds !== undefined && config.timeoutInMilliseconds <= 0) {
    throw new ConfigurationError('timeoutInMilliseconds must be a positive number')
  }
  if (config.connectionPoolSize !== undefined && config.connectionPoolSize <= 0) {
    throw new ConfigurationError('connectionPoolSize must be a positive number')
  }
}

function readBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined
  const normalized = value.trim().toLowerCase()
  if (normalized === 'true' || normalized === '1') return true
  if (normalized === 'false' || normalized === '0') return false
  throw new ConfigurationError(`invalid boolean value: ${value}`)
}

function readNumber(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined
  const parsed = Number(value)
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${name} must be a number`)
  }
  return parsed
}

const STRING_VARIABLES = {
  TM1_ADDRESS: 'address',
  TM1_BASE_URL: 'baseUrl',
  TM1_AUTH_URL: 'authUrl',
  TM1_TENANT: 'tenant',
  TM1_DATABASE: 'database',
  TM1_INSTANCE: 'instance',
  TM1_USER: 'user',
  TM1_PASSWORD: 'password',
  TM1_NAMESPACE: 'namespace',
  TM1_SESSION_ID: 'sessionId',
  TM1_ACCESS_TOKEN: 'accessToken',
  TM1_APPLICATION_CLIENT_ID: 'applicationClientId',
  TM1_APPLICATION_CLIENT_SECRET: 'applicationClientSecret',
  TM1_API_KEY: 'apiKey',
  TM1_IAM_URL: 'iamUrl',
  TM1_SESSION_CONTEXT: 'sessionContext',
} as const satisfies Record<string, keyof TConnectionConfig>

/** Reads TM1_* environment variables into a partial connection config. */
export function configFromEnvironment(
  env: Record<string, string | undefined> = process.env,
): TConnectionConfig {
  const config: TConnectionConfig = {}

  for (const [variable, key] of Object.entries(STRING_VARIABLES)) {
    const value = env[variable]
    if (value) config[key] = value
  }

  const port = readNumber('TM1_PORT', env.TM1_PORT)
  if (port !== undefined) config.port = port
  const timeout = readNumber('TM1_TIMEOUT_MS', env.TM1_TIMEOUT_MS)
  if (timeout !== undefined) config.timeoutInMilliseconds = timeout
  const ssl = readBoolean(env.TM1_SSL)
  if (ssl !== undefined) config.ssl = ssl
  const asyncMode = readBoolean(env.TM1_ASYNC_REQUESTS_MODE)
  if (asyncMode !== undefined) config.asyncRequestsMode = asyncMode

  return config
}
