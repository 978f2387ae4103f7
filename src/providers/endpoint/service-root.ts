import type { TConnectionConfig } from '../../core/config.ts'
import { ConfigurationError } from '../../core/errors.ts'

const PRODUCT_VERSION_PATH = 'Configuration/ProductVersion/$value'

export type TTopology = 'legacy' | 'saas' | 'named-instance' | 'workspace-proxy'

export type TServiceRoot = {
  topology: TTopology
  /** Always ends with a single '/'. */
  baseUrl: string
  /** Endpoint that establishes the session. */
  authUrl: string
}

function withTrailingSlash(url: string): string {
  return `${url.replace(/\/+$/, '')}/`
}

function scheme(config: TConnectionConfig): string {
  return config.ssl ? 'https' : 'http'
}

function hostWithPort(host: string, port?: number): string {
  return port ? `${host}:${port}` : host
}

function requireField(value: string | undefined, name: string, topology: string): string {
  if (!value) throw new ConfigurationError(`${name} is required for ${topology} connections`)
  return value
}

function legacyRoot(baseUrl: string): TServiceRoot {
  const root = withTrailingSlash(baseUrl)
  return { topology: 'legacy', baseUrl: root, authUrl: root + PRODUCT_VERSION_PATH }
}

function fromExplicitBaseUrl(config: TConnectionConfig, baseUrl: string): TServiceRoot {
  const trimmed = baseUrl.trim().replace(/\/+$/, '')

  if (trimmed.includes('api/v1/Databases')) {
    if (!config.authUrl) {
      throw new ConfigurationError('authUrl is required when baseUrl targets a database')
    }
    return { topology: 'named-instance', baseUrl: withTrailingSlash(trimmed), authUrl: config.authUrl }
  }

  if (/\/api\/[^/]+\/v0\/tm1\/[^/]+$/.test(trimmed)) {
    const root = withTrailingSlash(trimmed)
    return { topology: 'saas', baseUrl: root, authUrl: root + PRODUCT_VERSION_PATH }
  }

  const proxy = /^(https?:\/\/[^/]+)\/tm1\/[^/]+\/api\/v1$/i.exec(trimmed)
  if (proxy?.[1]) {
    return { topology: 'workspace-proxy', baseUrl: withTrailingSlash(trimmed), authUrl: `${proxy[1]}/login` }
  }

  if (trimmed.endsWith('/api/v1')) return legacyRoot(trimmed)
  return legacyRoot(`${trimmed}/api/v1`)
}

/** Composes the service root and session endpoint for the configured deployment. */
export function resolveServiceRoot(config: TConnectionConfig): TServiceRoot {
  if (config.baseUrl) return fromExplicitBaseUrl(config, config.baseUrl)

  if (config.tenant) {
    const address = requireField(config.address, 'address', 'SaaS')
    const database = requireField(config.database, 'database', 'SaaS')
    const root = `https://${address}/api/${config.tenant}/v0/tm1/${encodeURIComponent(database)}/`
    return { topology: 'saas', baseUrl: root, authUrl: root + PRODUCT_VERSION_PATH }
  }

  if (config.instance) {
    const address = requireField(config.address, 'address', 'named instance')
    const database = requireField(config.database, 'database', 'named instance')
    const server = `${scheme(config)}://${hostWithPort(address, config.port)}/${config.instance}`
    return {
      topology: 'named-instance',
      baseUrl: `${server}/api/v1/Databases('${encodeURIComponent(database)}')/`,
      authUrl: `${server}/auth/v1/session`,
    }
  }

  if (config.workspaceProxyHost) {
    const database = requireField(config.database, 'database', 'workspace proxy')
    const host = `${scheme(config)}://${config.workspaceProxyHost}`
    return {
      topology: 'workspace-proxy',
      baseUrl: `${host}/tm1/${encodeURIComponent(database)}/api/v1/`,
      authUrl: `${host}/login`,
    }
  }

  const address = config.address || 'localhost'
  return legacyRoot(`${scheme(config)}://${hostWithPort(address, config.port)}/api/v1`)
}
