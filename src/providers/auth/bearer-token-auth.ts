import { AuthError } from '../../core/errors.ts'
import type { TAuthProvider, TOutgoingRequest } from '../../core/types.ts'

export class BearerTokenAuth implements TAuthProvider {
  private readonly token: string

  constructor(token: string) {
    this.token = token
  }

  apply(request: TOutgoingRequest): void {
    if (!this.token) throw new AuthError('bearer token is empty')
    request.headers.set('Authorization', `Bearer ${this.token}`)
  }
}
