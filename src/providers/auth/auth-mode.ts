import type { Dispatcher } from 'undici'
import { DEFAULT_IAM_URL, type TConnectionConfig } from '../../core/config.ts'
import { ConfigurationError, NotImplementedError } from '../../core/errors.ts'
import type { TAuthProvider } from '../../core/types.ts'
import { decodeBase64 } from '../../core/utils.ts'
import { BasicAuth } from './basic-auth.ts'
import { BearerTokenAuth } from './bearer-token-auth.ts'
import { CamNamespaceAuth, CamPassportAuth } from './cam-auth.ts'
import { IbmCloudApiKeyAuth } from './ibm-cloud-api-key.ts'
import { SessionCookieAuth } from './session-cookie-auth.ts'

const SAAS_HOST_MARKER = 'planninganalytics.saas.ibm.com'

export type TAuthMode =
  | { kind: 'session-reuse'; sessionId: string }
  | { kind: 'basic-api-key'; apiKey: string }
  | { kind: 'ibm-cloud-api-key'; apiKey: string; iamUrl: string }
  | { kind: 'service-to-service'; clientId: string; clientSecret: string }
  | { kind: 'access-token'; accessToken: string }
  | { kind: 'cam-passport'; passport: string }
  | { kind: 'cam-namespace'; user: string; password: string; namespace: string }
  | { kind: 'windows-integrated' }
  | { kind: 'workspace-proxy'; user: string; password: string }
  | { kind: 'basic'; user: string; password: string }
  | { kind: 'custom' }

export type TAuthModeKind = TAuthMode['kind']

const V12_AUTH_MODES: ReadonlySet<TAuthModeKind> = new Set<TAuthModeKind>([
  'basic-api-key',
  'ibm-cloud-api-key',
  'service-to-service',
  'access-token',
  'workspace-proxy',
])

function password(config: TConnectionConfig): string {
  const raw = config.password ?? ''
  return config.decodeBase64 ? decodeBase64(raw) : raw
}

function isSaasHost(config: TConnectionConfig): boolean {
  return [config.address, config.baseUrl].some((value) => value?.includes(SAAS_HOST_MARKER))
}

/** Picks the authentication mode from the declared config fields. First match wins. */
export function selectAuthMode(config: TConnectionConfig): TAuthMode {
  if (config.sessionId) {
    return { kind: 'session-reuse', sessionId: config.sessionId }
  }
  if (config.apiKey && isSaasHost(config)) {
    return { kind: 'basic-api-key', apiKey: config.apiKey }
  }
  if (config.apiKey && (config.tenant || config.iamUrl)) {
    return { kind: 'ibm-cloud-api-key', apiKey: config.apiKey, iamUrl: config.iamUrl || DEFAULT_IAM_URL }
  }
  if (config.applicationClientId && config.applicationClientSecret) {
    return {
      kind: 'service-to-service',
      clientId: config.applicationClientId,
      clientSecret: config.applicationClientSecret,
    }
  }
  if (config.accessToken) {
    return { kind: 'access-token', accessToken: config.accessToken }
  }
  if (config.camPassport) {
    return { kind: 'cam-passport', passport: config.camPassport }
  }
  if (config.namespace) {
    return {
      kind: 'cam-namespace',
      user: config.user ?? '',
      password: password(config),
      namespace: config.namespace,
    }
  }
  if (config.integratedLogin) {
    return { kind: 'windows-integrated' }
  }
  if (config.user && config.workspaceProxyHost) {
    return { kind: 'workspace-proxy', user: config.user, password: password(config) }
  }
  if (config.user) {
    return { kind: 'basic', user: config.user, password: password(config) }
  }
  throw new ConfigurationError('no credentials configured')
}

export function usesV12Auth(mode: TAuthMode): boolean {
  return V12_AUTH_MODES.has(mode.kind)
}

export type TCreateAuthProviderOptions = {
  /** Cookie carrying a reused session. */
  sessionCookieName?: string
  fetchImplementation?: typeof fetch
  /** Connection pool for token exchanges. */
  dispatcher?: Dispatcher
}

/**
 * Builds the provider that signs requests for a mode. Returns undefined for the
 * workspace proxy, whose credentials travel in the login body and then in cookies,
 * and for a caller-supplied provider.
 */
export function createAuthProvider(
  mode: TAuthMode,
  options: TCreateAuthProviderOptions = {},
): TAuthProvider | undefined {
  switch (mode.kind) {
    case 'session-reuse':
      return new SessionCookieAuth(mode.sessionId, options.sessionCookieName)
    case 'basic-api-key':
      return new BasicAuth('apikey', mode.apiKey)
    case 'ibm-cloud-api-key':
      return new IbmCloudApiKeyAuth({
        apiKey: mode.apiKey,
        iamUrl: mode.iamUrl,
        fetchImplementation: options.fetchImplementation,
        dispatcher: options.dispatcher,
      })
    case 'service-to-service':
      return new BasicAuth(mode.clientId, mode.clientSecret)
    case 'access-token':
      return new BearerTokenAuth(mode.accessToken)
    case 'cam-passport':
      return new CamPassportAuth(mode.passport)
    case 'cam-namespace':
      return new CamNamespaceAuth(mode.user, mode.password, mode.namespace)
    case 'windows-integrated':
      throw new NotImplementedError('integrated Windows authentication is not implemented')
    case 'workspace-proxy':
    case 'custom':
      return undefined
    case 'basic':
      return new BasicAuth(mode.user, mode.password)
  }
}
