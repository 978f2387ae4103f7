type TStoredCookie = {
  name: string
  value: string
  domain: string
  path: string
  expiresAtMs: number | null
}

function defaultPath(url: URL): string {
  const path = url.pathname
  if (!path.startsWith('/') || path === '/') return '/'
  const lastSlash = path.lastIndexOf('/')
  return lastSlash <= 0 ? '/' : path.slice(0, lastSlash)
}

function pathMatches(requestPath: string, cookiePath: string): boolean {
  if (requestPath === cookiePath) return true
  if (!requestPath.startsWith(cookiePath)) return false
  return cookiePath.endsWith('/') || requestPath.charAt(cookiePath.length) === '/'
}

function domainMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`)
}

/**
 * Minimal in-memory cookie store fed from Set-Cookie response headers.
 * Holds the server session (TM1SessionId / paSession) for one client.
 */
export class CookieJar {
  private cookies: TStoredCookie[] = []

  /** Stores every Set-Cookie header of a response received from `url`. */
  storeFromResponse(url: URL, headers: Headers): void {
    for (const header of headers.getSetCookie()) {
      this.store(url, header)
    }
  }

  store(url: URL, setCookie: string): void {
    const [pair, ...attributes] = setCookie.split(';')
    if (!pair) return
    const separator = pair.indexOf('=')
    if (separator <= 0) return
    const name = pair.slice(0, separator).trim()
    const value = pair.slice(separator + 1).trim()

    let domain = url.hostname.toLowerCase()
    let path = defaultPath(url)
    let expiresAtMs: number | null = null
    let maxAgeSeen = false

    for (const attribute of attributes) {
      const [rawKey = '', ...rest] = attribute.split('=')
      const key = rawKey.trim().toLowerCase()
      const attributeValue = rest.join('=').trim()
      if (key === 'domain' && attributeValue) {
        domain = attributeValue.replace(/^\./, '').toLowerCase()
      } else if (key === 'path' && attributeValue.startsWith('/')) {
        path = attributeValue
      } else if (key === 'max-age') {
        const seconds = Number.parseInt(attributeValue, 10)
        if (!Number.isNaN(seconds)) {
          maxAgeSeen = true
          expiresAtMs = Date.now() + seconds * 1000
        }
      } else if (key === 'expires' && !maxAgeSeen) {
        const parsed = Date.parse(attributeValue)
        if (!Number.isNaN(parsed)) expiresAtMs = parsed
      }
    }

    this.cookies = this.cookies.filter(
      (cookie) => !(cookie.name === name && cookie.domain === domain && cookie.path === path),
    )
    if (expiresAtMs !== null && expiresAtMs <= Date.now()) return
    this.cookies.push({ name, value, domain, path, expiresAtMs })
  }

  /** Cookies that apply to `url`, longest path first. */
  get(url: URL): Array<{ name: string; value: string }> {
    const now = Date.now()
    this.cookies = this.cookies.filter(
      (cookie) => cookie.expiresAtMs === null || cookie.expiresAtMs > now,
    )
    const host = url.hostname.toLowerCase()
    return this.cookies
      .filter((cookie) => domainMatches(host, cookie.domain) && pathMatches(url.pathname, cookie.path))
      .sort((a, b) => b.path.length - a.path.length)
      .map(({ name, value }) => ({ name, value }))
  }

  /** Value of a Cookie request header for `url`, or undefined when nothing applies. */
  header(url: URL): string | undefined {
    const matching = this.get(url)
    if (matching.length === 0) return undefined
    return matching.map(({ name, value }) => `${name}=${value}`).join('; ')
  }

  set(url: URL, name: string, value: string, path = '/'): void {
    this.store(url, `${name}=${value}; Path=${path}`)
  }

  remove(names: string[]): void {
    this.cookies = this.cookies.filter((cookie) => !names.includes(cookie.name))
  }

  clear(): void {
    this.cookies = []
  }
}
