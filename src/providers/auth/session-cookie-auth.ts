import { AuthError } from '../../core/errors.ts'
import type { TAuthProvider, TOutgoingRequest } from '../../core/types.ts'

export const DEFAULT_SESSION_COOKIE_NAME = 'TM1SessionId'

/** Reuses an existing server session by sending its cookie. */
export class SessionCookieAuth implements TAuthProvider {
  private readonly value: string
  private readonly name: string

  constructor(value: string, name: string = DEFAULT_SESSION_COOKIE_NAME) {
    this.value = value
    this.name = name || DEFAULT_SESSION_COOKIE_NAME
  }

  apply(request: TOutgoingRequest): void {
    if (!this.value) throw new AuthError('session cookie value is empty')
    const cookie = `${this.name}=${this.value}`
    const existing = request.headers.get('Cookie')
    request.headers.set('Cookie', existing ? `${existing}; ${cookie}` : cookie)
  }
}
